import { CallHandler, ExecutionContext, HttpException, Injectable, NestInterceptor } from '@nestjs/common';
import type { Request, Response } from 'express';
import { randomUUID } from 'node:crypto';
import { Observable } from 'rxjs';
import { catchError, tap } from 'rxjs/operators';

import { isDirectoryError } from '../../domain/errors/directory-error';
import { statusForKind } from '../scim/common/scim-errors';
import { LogCategory } from './log-levels';
import { ScimLogger } from './scim-logger.service';

const DIALECT_IN_PATH = /^\/scim\/([^/?]+)/;

/**
 * Assigns (or propagates) X-Request-Id, runs the handler inside a correlation
 * context and logs every request/response pair.
 */
@Injectable()
export class RequestLoggingInterceptor implements NestInterceptor {
  constructor(private readonly scimLogger: ScimLogger) {}

  intercept(context: ExecutionContext, next: CallHandler): Observable<unknown> {
    const httpContext = context.switchToHttp();
    const request = httpContext.getRequest<Request>();
    const response = httpContext.getResponse<Response>();
    const startedAt = Date.now();
    const url = request.originalUrl ?? request.url;

    const header = request.headers['x-request-id'];
    const requestId = (typeof header === 'string' && header) || randomUUID();
    response.setHeader('X-Request-Id', requestId);

    const dialect = DIALECT_IN_PATH.exec(url)?.[1];

    return new Observable((subscriber) =>
      this.scimLogger.runWithContext(
        { requestId, method: request.method, path: url, dialect, startTime: startedAt },
        () => {
          this.scimLogger.info(LogCategory.HTTP, `→ ${request.method} ${url}`, {
            userAgent: request.headers['user-agent'],
            contentType: request.headers['content-type'],
          });

          const includePayloads = this.scimLogger.getConfig().includePayloads;
          if (includePayloads && isNonEmptyBody(request.body)) {
            this.scimLogger.trace(LogCategory.HTTP, 'Request body', { body: request.body });
          }

          return next
            .handle()
            .pipe(
              tap((responseBody: unknown) => {
                this.scimLogger.info(LogCategory.HTTP, `← ${response.statusCode} ${request.method} ${url}`, {
                  status: response.statusCode,
                  durationMs: Date.now() - startedAt,
                });
                if (includePayloads && responseBody) {
                  this.scimLogger.trace(LogCategory.HTTP, 'Response body', { body: responseBody });
                }
              }),
              catchError((error: unknown) => {
                const status = statusOf(error);
                const data = { status, durationMs: Date.now() - startedAt };
                // Expected client errors are logged quietly; the exception filter reports the rest.
                if (status < 500) {
                  this.scimLogger.info(LogCategory.HTTP, `← ${status} ${request.method} ${url}`, data);
                } else {
                  this.scimLogger.warn(LogCategory.HTTP, `← ${status} ${request.method} ${url}`, data);
                }
                throw error;
              }),
            )
            .subscribe(subscriber);
        },
      ),
    );
  }
}

function isNonEmptyBody(body: unknown): body is Record<string, unknown> {
  return typeof body === 'object' && body !== null && Object.keys(body).length > 0;
}

function statusOf(error: unknown): number {
  if (error instanceof HttpException) return error.getStatus();
  if (isDirectoryError(error)) return statusForKind(error.kind);
  return 500;
}
