import { ConfigService } from '@nestjs/config';
import { TypeOrmModuleOptions } from '@nestjs/typeorm';
import { License } from '../licensing/entities/license.entity';
import { Activation } from '../licensing/entities/activation.entity';
import { Contact } from '../contacts/entities/contact.entity';
import { CommunicationLog } from '../communication/entities/communication-log.entity';

export const ENTITIES = [License, Activation, Contact, CommunicationLog];

export const DEFAULT_SQLITE_PATH = 'license-registry.db';

export const MYSQL_DATE_STRINGS = ['DATE'];

const toInt = (value: string | undefined, fallback: number): number => {
	const parsed = parseInt(value ?? '', 10);
	return Number.isNaN(parsed) ? fallback : parsed;
};

/**
 * MySQL in production, better-sqlite3 for local runs (DATABASE_TYPE=better-sqlite3).
 */
export function createTypeOrmOptions(configService: ConfigService): TypeOrmModuleOptions {
	const synchronize = configService.get<string>('DATABASE_SYNCHRONIZE') !== 'false';

	if (configService.get<string>('DATABASE_TYPE') === 'better-sqlite3') {
		return {
			type: 'better-sqlite3',
			database: configService.get<string>('DATABASE_PATH') || DEFAULT_SQLITE_PATH,
			entities: ENTITIES,
			synchronize,
			logging: false,
		};
	}

	return {
		type: 'mysql',
		host: configService.get<string>('DATABASE_HOST'),
		port: toInt(configService.get<string>('DATABASE_PORT'), 3306),
		username: configService.get<string>('DATABASE_USER'),
		password: configService.get<string>('DATABASE_PASSWORD'),
		database: configService.get<string>('DATABASE_NAME'),
		entities: ENTITIES,
		synchronize,
		logging: false,
		// DATE columns stay 'YYYY-MM-DD' strings; as Date objects they shift a day west of UTC
		dateStrings: MYSQL_DATE_STRINGS,
		extra: {
			connectionLimit: toInt(configService.get<string>('DB_CONNECTION_LIMIT'), 10),
			idleTimeout: toInt(configService.get<string>('DB_IDLE_TIMEOUT'), 300000),
			ssl: configService.get<string>('NODE_ENV') === 'production' ? { rejectUnauthorized: false } : false,
			charset: 'utf8mb4',
			timezone: 'Z',
			multipleStatements: false,
		},
		retryAttempts: 10,
		retryDelay: 1000,
		autoLoadEntities: false,
	};
}
