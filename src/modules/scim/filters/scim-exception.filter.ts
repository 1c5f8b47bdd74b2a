import { ArgumentsHost, Catch, ExceptionFilter, HttpException, HttpStatus } from '@nestjs/common';
import type { Request, Response } from 'express';

import { isDirectoryError } from '../../../domain/errors/directory-error';
import type { ScimDialect } from '../../../domain/models/user.model';
import { LogCategory } from '../../logging/log-levels';
import { ScimLogger } from '../../logging/scim-logger.service';
import { SCIM_CONTENT_TYPE } from '../common/scim-constants';
import { buildErrorBody, scimTypeForKind, statusForKind, type ScimErrorOptions } from '../common/scim-errors';

const SCIM_ROUTE = /^\/scim\/(v1|v2)(?:[/?]|$)/;

/** Dialect envelope to answer with; `undefined` for non-SCIM routes (admin, unknown paths). */
export function dialectOfUrl(url: string): ScimDialect | undefined {
  const match = SCIM_ROUTE.exec(url);
  if (match?.[1] === 'v1') return 'v1';
  if (match?.[1] === 'v2') return 'v2';
  return undefined;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

/** Pull status / detail / scimType out of a framework exception. */
export function describeHttpException(exception: HttpException): ScimErrorOptions {
  const status = exception.getStatus();
  const raw = exception.getResponse();
  if (typeof raw === 'string') return { status, detail: raw };
  if (!isRecord(raw)) return { status, detail: exception.message };

  const scimType = typeof raw.scimType === 'string' ? raw.scimType : undefined;
  if (typeof raw.detail === 'string') return { status, detail: raw.detail, scimType };
  if (typeof raw.message === 'string') return { status, detail: raw.message, scimType };
  if (Array.isArray(raw.message)) return { status, detail: raw.message.map(String).join('; '), scimType };
  return { status, detail: exception.message, scimType };
}

/**
 * Global exception filter.
 *
 * Renders directory errors, framework HttpExceptions (validation, guards,
 * unknown routes) and unexpected failures in the error envelope of the
 * request's dialect:
 *   - v1: `{ Errors: [{ description, code }] }`
 *   - v2: `{ schemas: [Error URN], detail, status: "<code>", scimType? }`
 *
 * SCIM routes answer with application/scim+json; everything else uses the v2
 * envelope as application/json.
 */
@Catch()
export class ScimExceptionFilter implements ExceptionFilter {
  constructor(private readonly logger: ScimLogger) {}

  catch(exception: unknown, host: ArgumentsHost): void {
    const ctx = host.switchToHttp();
    const request = ctx.getRequest<Request>();
    const response = ctx.getResponse<Response>();
    const dialect = dialectOfUrl(request.originalUrl ?? request.url);

    const error = this.describe(exception);
    const body = buildErrorBody(dialect ?? 'v2', error);

    if (response.headersSent) return;
    response
      .status(error.status)
      .setHeader('Content-Type', dialect ? SCIM_CONTENT_TYPE : 'application/json; charset=utf-8')
      .json(body);
  }

  private describe(exception: unknown): ScimErrorOptions {
    if (isDirectoryError(exception)) {
      return {
        status: statusForKind(exception.kind),
        detail: exception.message,
        scimType: scimTypeForKind(exception.kind),
      };
    }
    if (exception instanceof HttpException) {
      return describeHttpException(exception);
    }
    this.logger.error(LogCategory.GENERAL, 'Unhandled error', exception);
    return { status: HttpStatus.INTERNAL_SERVER_ERROR, detail: 'Internal server error' };
  }
}
