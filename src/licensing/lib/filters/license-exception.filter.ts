import { ArgumentsHost, Catch, ExceptionFilter, HttpException, HttpStatus, Logger } from '@nestjs/common';
import { Request, Response } from 'express';
import { isUniqueViolation } from '../../../lib/utils/query-error.util';

const DEFAULT_REASONS: Record<number, string> = {
	[HttpStatus.BAD_REQUEST]: 'bad_request',
	[HttpStatus.UNAUTHORIZED]: 'unauthorized',
	[HttpStatus.FORBIDDEN]: 'forbidden',
	[HttpStatus.NOT_FOUND]: 'not_found',
	[HttpStatus.CONFLICT]: 'conflict',
	[HttpStatus.INTERNAL_SERVER_ERROR]: 'internal_error',
};

export interface ErrorBody {
	statusCode: number;
	reason: string;
	message: string;
	[detail: string]: string | number;
}

/**
 * Renders every error as `{ statusCode, reason, message, ...details, path, timestamp }`.
 * Details are the extra fields an exception carries, e.g. `server_limit` on limit_reached.
 */
@Catch()
export class LicenseExceptionFilter implements ExceptionFilter {
	private readonly logger = new Logger(LicenseExceptionFilter.name);

	catch(exception: unknown, host: ArgumentsHost): void {
		const ctx = host.switchToHttp();
		const response = ctx.getResponse<Response>();
		const request = ctx.getRequest<Request>();

		const body = {
			...this.toErrorBody(exception),
			path: request.url,
			timestamp: new Date().toISOString(),
		};

		response.status(body.statusCode).json(body);
	}

	toErrorBody(exception: unknown): ErrorBody {
		if (exception instanceof HttpException) {
			return this.fromHttpException(exception);
		}

		if (isUniqueViolation(exception)) {
			this.logger.warn(`Unique constraint violation: ${exception instanceof Error ? exception.message : exception}`);
			return {
				statusCode: HttpStatus.CONFLICT,
				reason: DEFAULT_REASONS[HttpStatus.CONFLICT],
				message: 'The record conflicts with an existing one, please retry',
			};
		}

		this.logger.error('Unhandled error', exception instanceof Error ? exception.stack : String(exception));
		return {
			statusCode: HttpStatus.INTERNAL_SERVER_ERROR,
			reason: DEFAULT_REASONS[HttpStatus.INTERNAL_SERVER_ERROR],
			message: 'Internal server error',
		};
	}

	private fromHttpException(exception: HttpException): ErrorBody {
		const statusCode = exception.getStatus();
		const body: ErrorBody = {
			statusCode,
			reason: DEFAULT_REASONS[statusCode] ?? 'error',
			message: exception.message,
		};

		const payload = exception.getResponse();
		if (typeof payload === 'string') {
			body.message = payload;
			return body;
		}

		const entries: [string, unknown][] = Object.entries(payload);
		for (const [field, value] of entries) {
			if (field === 'statusCode' || field === 'error') {
				continue;
			}
			if (field === 'message' && Array.isArray(value)) {
				// ValidationPipe reports one message per failed constraint
				body.message = value.join('; ');
			} else if (typeof value === 'string' || typeof value === 'number') {
				body[field] = value;
			}
		}

		return body;
	}
}
