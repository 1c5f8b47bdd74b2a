import { HttpException, HttpStatus } from '@nestjs/common';

import type { DirectoryErrorKind } from '../../../domain/errors/directory-error';
import type { ScimDialect } from '../../../domain/models/user.model';
import { SCIM_ERROR_SCHEMA, SCIM_ERROR_TYPE, type ScimErrorType } from './scim-constants';

const KIND_STATUS: Record<DirectoryErrorKind, number> = {
  NotFound: HttpStatus.NOT_FOUND,
  Conflict: HttpStatus.CONFLICT,
  MethodNotAllowed: HttpStatus.METHOD_NOT_ALLOWED,
  InvalidPatch: HttpStatus.BAD_REQUEST,
  InvalidValue: HttpStatus.BAD_REQUEST,
  InvalidConfig: HttpStatus.BAD_REQUEST,
};

const KIND_SCIM_TYPE: Partial<Record<DirectoryErrorKind, ScimErrorType>> = {
  Conflict: SCIM_ERROR_TYPE.UNIQUENESS,
  InvalidPatch: SCIM_ERROR_TYPE.INVALID_SYNTAX,
  InvalidValue: SCIM_ERROR_TYPE.INVALID_VALUE,
};

export function statusForKind(kind: DirectoryErrorKind): number {
  return KIND_STATUS[kind];
}

export function scimTypeForKind(kind: DirectoryErrorKind): ScimErrorType | undefined {
  return KIND_SCIM_TYPE[kind];
}

export interface ScimErrorOptions {
  status: number;
  detail: string;
  scimType?: string;
}

/** Legacy dialect envelope. */
export interface ScimV1ErrorBody {
  Errors: Array<{ description: string; code: number }>;
}

/** Current dialect envelope; `status` is the HTTP status code as text (RFC 7644 §3.12). */
export interface ScimV2ErrorBody {
  schemas: string[];
  detail: string;
  status: string;
  scimType?: string;
}

export function buildErrorBody(dialect: ScimDialect, options: ScimErrorOptions): ScimV1ErrorBody | ScimV2ErrorBody {
  const { status, detail, scimType } = options;
  if (dialect === 'v1') {
    return { Errors: [{ description: detail, code: status }] };
  }
  const body: ScimV2ErrorBody = { schemas: [SCIM_ERROR_SCHEMA], detail, status: String(status) };
  if (scimType) body.scimType = scimType;
  return body;
}

/**
 * HttpException carrying a SCIM error. The exception filter re-renders it in
 * the envelope of the request's dialect.
 */
export function createScimError({ status, detail, scimType }: ScimErrorOptions): HttpException {
  return new HttpException(
    {
      schemas: [SCIM_ERROR_SCHEMA],
      detail,
      scimType,
      status: String(status),
    },
    status,
  );
}
