import { HttpStatus } from '@nestjs/common';

import { isPlainObject } from '../../../domain/models/user-attributes';
import { SCIM_ERROR_TYPE } from './scim-constants';
import { createScimError } from './scim-errors';

/** Request bodies must be JSON objects; arrays and scalars are rejected. */
export function requireObjectBody(body: unknown): Record<string, unknown> {
  if (!isPlainObject(body)) {
    throw createScimError({
      status: HttpStatus.BAD_REQUEST,
      detail: 'Request body must be a JSON object.',
      scimType: SCIM_ERROR_TYPE.INVALID_SYNTAX,
    });
  }
  return body;
}
