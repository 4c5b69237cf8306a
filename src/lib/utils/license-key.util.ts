import { randomBytes } from 'crypto';

export const DEFAULT_LICENSE_KEY_PREFIX = 'NOVE';

/**
 * Builds a key of the form PREFIX-XXX-AAAA-BBBB-CCCC, where XXX is the plan
 * identifier's first three characters and the groups come from a random 128-bit value.
 * The plan segment is for humans only; uniqueness is enforced by the licenses table.
 */
export function generateLicenseKey(plan: string, prefix: string = DEFAULT_LICENSE_KEY_PREFIX): string {
	const raw = randomBytes(16).toString('hex').toUpperCase();
	const planSegment = plan.slice(0, 3).toUpperCase();
	return `${prefix}-${planSegment}-${raw.slice(0, 4)}-${raw.slice(4, 8)}-${raw.slice(8, 12)}`;
}
