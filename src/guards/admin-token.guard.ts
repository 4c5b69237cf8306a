import { Injectable, CanActivate, ExecutionContext, UnauthorizedException, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Request } from 'express';

export const ADMIN_TOKEN_HEADER = 'x-admin-token';

@Injectable()
export class AdminTokenGuard implements CanActivate {
	private readonly logger = new Logger(AdminTokenGuard.name);

	constructor(private readonly configService: ConfigService) {}

	canActivate(context: ExecutionContext): boolean {
		const request = context.switchToHttp().getRequest<Request>();
		const token = request.headers[ADMIN_TOKEN_HEADER];

		if (typeof token !== 'string' || !token) {
			this.logger.warn(`Admin request to ${request.url} missing ${ADMIN_TOKEN_HEADER} header`);
			throw new UnauthorizedException('x-admin-token header is required');
		}

		const adminToken = this.configService.get<string>('ADMIN_TOKEN');

		if (!adminToken) {
			this.logger.error('ADMIN_TOKEN not configured in environment');
			throw new UnauthorizedException('Admin API is not configured');
		}

		if (token !== adminToken) {
			this.logger.warn(`Invalid admin token attempted on ${request.url}`);
			throw new UnauthorizedException('Invalid admin token');
		}

		return true;
	}
}
