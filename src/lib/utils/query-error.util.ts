import { QueryFailedError } from 'typeorm';

// mysql2, better-sqlite3 and postgres codes for a unique index violation
const UNIQUE_VIOLATION_CODES = new Set(['ER_DUP_ENTRY', 'SQLITE_CONSTRAINT_UNIQUE', 'SQLITE_CONSTRAINT_PRIMARYKEY', '23505']);

export function isUniqueViolation(error: unknown): boolean {
	if (!(error instanceof QueryFailedError)) {
		return false;
	}

	const driverError: unknown = error.driverError;
	if (typeof driverError !== 'object' || driverError === null || !('code' in driverError)) {
		return false;
	}

	return typeof driverError.code === 'string' && UNIQUE_VIOLATION_CODES.has(driverError.code);
}
