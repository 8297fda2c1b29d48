import {
	Injectable,
	NestInterceptor,
	ExecutionContext,
	CallHandler,
	HttpException,
	Logger,
} from '@nestjs/common';
import { Observable } from 'rxjs';
import { tap, catchError } from 'rxjs/operators';
import { Request, Response } from 'express';

const SENSITIVE_FIELDS = ['password', 'token', 'secret', 'api_key'];
// base64 fields are summarised, never logged
const BINARY_FIELDS = ['image_base64'];

@Injectable()
export class LoggingInterceptor implements NestInterceptor {
	private readonly logger = new Logger('HTTP');

	intercept(context: ExecutionContext, next: CallHandler): Observable<unknown> {
		const request = context.switchToHttp().getRequest<Request>();
		const response = context.switchToHttp().getResponse<Response>();
		const { method, url, body, query, ip } = request;
		const userAgent = request.get('user-agent') || '';
		const startTime = Date.now();

		// Log request
		const requestLog = {
			method,
			url,
			body: this.sanitize(body),
			query: Object.keys(query).length > 0 ? query : undefined,
			ip,
			userAgent,
		};

		this.logger.log(`${method} ${url} - ${JSON.stringify(requestLog)}`, 'REQUEST');

		// Handle response
		return next.handle().pipe(
			tap((data: unknown) => {
				const responseTime = Date.now() - startTime;
				this.logger.log(
					`${method} ${url} ${response.statusCode} - ${responseTime}ms - ${this.getResponseSize(data)}`,
					'RESPONSE',
				);
			}),
			catchError((error: unknown) => {
				const responseTime = Date.now() - startTime;
				const statusCode = error instanceof HttpException ? error.getStatus() : 500;
				const message = error instanceof Error ? error.message : String(error);
				const stack = error instanceof Error ? error.stack : undefined;

				this.logger.error(`${method} ${url} ${statusCode} - ${responseTime}ms - ${message}`, stack, 'ERROR');

				throw error;
			}),
		);
	}

	sanitize(body: unknown): unknown {
		if (!isRecord(body)) {
			return body;
		}

		const sanitized: Record<string, unknown> = { ...body };

		for (const field of SENSITIVE_FIELDS) {
			if (sanitized[field]) {
				sanitized[field] = '***';
			}
		}
		for (const field of BINARY_FIELDS) {
			const value = sanitized[field];
			if (typeof value === 'string') {
				sanitized[field] = `<${formatBytes(value.length)} base64>`;
			}
		}

		return sanitized;
	}

	getResponseSize(data: unknown): string {
		if (data === undefined || data === null) return '0 B';
		return formatBytes(JSON.stringify(data).length);
	}
}

function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function formatBytes(size: number): string {
	if (size < 1024) return `${size} B`;
	if (size < 1024 * 1024) return `${(size / 1024).toFixed(2)} KB`;
	return `${(size / (1024 * 1024)).toFixed(2)} MB`;
}
