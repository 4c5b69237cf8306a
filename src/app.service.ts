import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { InjectDataSource } from '@nestjs/typeorm';
import { DataSource } from 'typeorm';

export interface HealthStatus {
	status: 'ok';
	service: string;
	docs: string;
}

export interface DatabaseStatus {
	connected: boolean;
	initialized: boolean;
	type: string;
	latencyMs?: number;
	error?: string;
}

@Injectable()
export class AppService {
	private readonly logger = new Logger(AppService.name);

	constructor(
		@InjectDataSource()
		private readonly dataSource: DataSource,
		private readonly configService: ConfigService,
	) {}

	getHealth(): HealthStatus {
		const productName = this.configService.get<string>('PRODUCT_NAME') || 'NOVE OS';
		return { status: 'ok', service: `${productName} API`, docs: '/docs' };
	}

	/**
	 * Runs a trivial query to confirm the connection is usable, not just initialised.
	 */
	async getDatabaseStatus(): Promise<DatabaseStatus> {
		const status: DatabaseStatus = {
			connected: false,
			initialized: this.dataSource.isInitialized,
			type: this.dataSource.options.type,
		};
		if (!status.initialized) {
			return status;
		}

		const startedAt = Date.now();
		try {
			await this.dataSource.query('SELECT 1');
			status.connected = true;
			status.latencyMs = Date.now() - startedAt;
		} catch (error) {
			status.error = error instanceof Error ? error.message : String(error);
			this.logger.error(`Database health check failed: ${status.error}`);
		}
		return status;
	}
}
