import { CanActivate, ExecutionContext, HttpException, HttpStatus, Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import type { Request, Response } from 'express';
import { timingSafeEqual } from 'node:crypto';

import { LogCategory } from '../logging/log-levels';
import { ScimLogger } from '../logging/scim-logger.service';
import { createScimError } from '../scim/common/scim-errors';

function sameSecret(presented: string, expected: string): boolean {
  const a = Buffer.from(presented);
  const b = Buffer.from(expected);
  return a.length === b.length && timingSafeEqual(a, b);
}

/**
 * Optional bearer-token check. With `SCIM_SHARED_SECRET` unset every request
 * passes; once set, every route requires `Authorization: Bearer <secret>`.
 */
@Injectable()
export class SharedSecretGuard implements CanActivate {
  constructor(
    private readonly configService: ConfigService,
    private readonly logger: ScimLogger,
  ) {}

  canActivate(context: ExecutionContext): boolean {
    const expectedSecret = this.configService.get<string>('SCIM_SHARED_SECRET');
    if (!expectedSecret) {
      return true;
    }

    const httpContext = context.switchToHttp();
    const request = httpContext.getRequest<Request>();
    const response = httpContext.getResponse<Response>();
    const header = request.headers.authorization;

    if (!header || !header.startsWith('Bearer ')) {
      this.logger.warn(LogCategory.AUTH, 'Missing or malformed Authorization header');
      throw this.rejection(response, 'Missing bearer token.');
    }

    if (!sameSecret(header.slice(7), expectedSecret)) {
      this.logger.warn(LogCategory.AUTH, 'Invalid bearer token');
      throw this.rejection(response, 'Invalid bearer token.');
    }

    this.logger.trace(LogCategory.AUTH, 'Bearer token accepted');
    return true;
  }

  private rejection(response: Response, detail: string): HttpException {
    response.setHeader('WWW-Authenticate', 'Bearer realm="SCIM"');
    return createScimError({ status: HttpStatus.UNAUTHORIZED, detail, scimType: 'invalidToken' });
  }
}
