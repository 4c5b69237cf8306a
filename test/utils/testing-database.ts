import { ConfigService } from '@nestjs/config';
import { TypeOrmModule } from '@nestjs/typeorm';
import { ENTITIES } from '../../src/config/database.config';

/** Fresh in-memory SQLite database per testing module. */
export const testingDatabaseModule = () =>
	TypeOrmModule.forRoot({
		type: 'better-sqlite3',
		database: ':memory:',
		entities: ENTITIES,
		synchronize: true,
		dropSchema: true,
		logging: false,
	});

export const TEST_CONFIG: Record<string, string> = {
	ADMIN_TOKEN: 'test-secret',
	NOTIFY_TO: 'ops@example.com',
	LICENSE_KEY_PREFIX: 'NOVE',
	LICENSE_TIMEZONE: 'UTC',
	PRODUCT_NAME: 'NOVE OS',
	INSTALL_SCRIPT_URL: 'https://noveos.jp/install.sh',
};

export const testingConfigService = (overrides: Record<string, string | undefined> = {}): ConfigService =>
	new ConfigService({ ...TEST_CONFIG, ...overrides });
