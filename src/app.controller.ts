import { Controller, Get } from '@nestjs/common';
import { ApiTags, ApiOperation, ApiOkResponse } from '@nestjs/swagger';
import { AppService, DatabaseStatus, HealthStatus } from './app.service';

@ApiTags('🔧 System Health')
@Controller()
export class AppController {
	constructor(private readonly appService: AppService) {}

	@Get()
	@ApiOperation({ summary: 'Health check endpoint' })
	@ApiOkResponse({
		description: 'API is healthy and responding',
		schema: {
			type: 'object',
			example: { status: 'ok', service: 'NOVE OS API', docs: '/docs' },
		},
	})
	getHealth(): HealthStatus {
		return this.appService.getHealth();
	}

	@Get('health/database')
	@ApiOperation({
		summary: 'Get database connection status',
		description: 'Runs a trivial query against the database and reports whether it succeeded.',
	})
	@ApiOkResponse({
		description: 'Database status retrieved successfully',
		schema: {
			type: 'object',
			properties: {
				status: { type: 'string', example: 'Database Status Check' },
				timestamp: { type: 'string', format: 'date-time' },
				connected: { type: 'boolean', example: true },
				initialized: { type: 'boolean', example: true },
				type: { type: 'string', example: 'mysql' },
				latencyMs: { type: 'number', example: 3 },
			},
		},
	})
	async getDatabaseStatus(): Promise<DatabaseStatus & { status: string; timestamp: string }> {
		return {
			status: 'Database Status Check',
			timestamp: new Date().toISOString(),
			...(await this.appService.getDatabaseStatus()),
		};
	}
}
