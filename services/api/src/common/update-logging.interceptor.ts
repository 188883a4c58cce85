import {
  Injectable,
  NestInterceptor,
  ExecutionContext,
  CallHandler,
  Logger,
} from '@nestjs/common';
import type { Request } from 'express';
import { Observable } from 'rxjs';
import { tap } from 'rxjs/operators';

/**
 * Logs admin requests with their duration. Credentials in the body are
 * replaced with [REDACTED].
 */
@Injectable()
export class UpdateLoggingInterceptor implements NestInterceptor {
  private readonly logger = new Logger('UpdatesApi');

  // Fields to redact from logs
  private readonly sensitiveFields = ['secret', 'key', 'token', 'password', 'auth'];

  intercept(context: ExecutionContext, next: CallHandler): Observable<unknown> {
    const request = context.switchToHttp().getRequest<Request>();
    const { method, url } = request;
    const body: unknown = request.body;
    const now = Date.now();

    if (body && typeof body === 'object' && Object.keys(body).length > 0) {
      this.logger.log(`${method} ${url} - Request: ${JSON.stringify(this.sanitize(body))}`);
    }

    return next.handle().pipe(
      tap({
        next: () => {
          this.logger.log(`${method} ${url} - Completed [${Date.now() - now}ms]`);
        },
        error: (error: unknown) => {
          const duration = Date.now() - now;
          const message = error instanceof Error ? error.message : String(error);
          this.logger.error(
            `${method} ${url} - Error [${duration}ms]: ${message}`,
            error instanceof Error ? error.stack : undefined,
          );
        },
      }),
    );
  }

  /**
   * Recursively replace sensitive fields with [REDACTED]
   */
  sanitize(value: unknown): unknown {
    if (Array.isArray(value)) {
      return value.map((item) => this.sanitize(item));
    }

    if (value !== null && typeof value === 'object') {
      const sanitized: Record<string, unknown> = {};
      for (const [key, item] of Object.entries(value)) {
        sanitized[key] = this.sensitiveFields.includes(key.toLowerCase()) ? '[REDACTED]' : this.sanitize(item);
      }
      return sanitized;
    }

    return value;
  }
}
