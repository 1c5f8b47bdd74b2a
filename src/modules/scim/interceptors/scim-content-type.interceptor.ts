import { CallHandler, ExecutionContext, Injectable, NestInterceptor } from '@nestjs/common';
import type { Response } from 'express';
import { Observable } from 'rxjs';
import { tap } from 'rxjs/operators';

import { SCIM_CONTENT_TYPE } from '../common/scim-constants';

function locationOf(body: unknown): string | undefined {
  if (typeof body !== 'object' || body === null || !('meta' in body)) return undefined;
  const { meta } = body;
  if (typeof meta !== 'object' || meta === null || !('location' in meta)) return undefined;
  return typeof meta.location === 'string' ? meta.location : undefined;
}

/**
 * Sets `Content-Type: application/scim+json` on successful SCIM responses and
 * the `Location` header on 201 Created (RFC 7644 §3.1).
 */
@Injectable()
export class ScimContentTypeInterceptor implements NestInterceptor {
  intercept(context: ExecutionContext, next: CallHandler): Observable<unknown> {
    return next.handle().pipe(
      tap((data: unknown) => {
        const response = context.switchToHttp().getResponse<Response>();
        if (response.headersSent) return;
        response.setHeader('Content-Type', SCIM_CONTENT_TYPE);

        const location = locationOf(data);
        if (response.statusCode === 201 && location) {
          response.setHeader('Location', location);
        }
      }),
    );
  }
}
