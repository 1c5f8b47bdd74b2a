import { HttpStatus, ValidationPipe, type INestApplication, type ValidationError } from '@nestjs/common';
import { json } from 'express';

import { SCIM_ERROR_TYPE } from '../scim/common/scim-constants';
import { createScimError } from '../scim/common/scim-errors';

/** Flatten nested class-validator failures into one line. */
export function describeValidationErrors(errors: ValidationError[]): string {
  const messages: string[] = [];
  const visit = (error: ValidationError): void => {
    messages.push(...Object.values(error.constraints ?? {}));
    (error.children ?? []).forEach(visit);
  };
  errors.forEach(visit);
  return messages.join('; ');
}

/**
 * Middleware and pipes shared by `main.ts` and the e2e harness.
 */
export function configureApp(app: INestApplication): void {
  // Accept both standard JSON and SCIM media type payloads
  app.use(
    json({
      limit: '5mb',
      type: (req) => {
        const ct = req.headers['content-type']?.toLowerCase() ?? '';
        return ct.includes('application/json') || ct.includes('application/scim+json');
      },
    }),
  );

  app.enableCors({
    origin: true,
    methods: ['GET', 'POST', 'PUT', 'PATCH', 'DELETE', 'OPTIONS'],
    allowedHeaders: ['Content-Type', 'Authorization', 'Accept', 'X-Request-Id'],
    exposedHeaders: ['Location', 'X-Request-Id'],
    credentials: false,
  });

  app.useGlobalPipes(
    new ValidationPipe({
      whitelist: false,
      transform: true,
      transformOptions: { enableImplicitConversion: true },
      exceptionFactory: (errors) =>
        createScimError({
          status: HttpStatus.BAD_REQUEST,
          detail: describeValidationErrors(errors),
          scimType: SCIM_ERROR_TYPE.INVALID_VALUE,
        }),
    }),
  );
}
