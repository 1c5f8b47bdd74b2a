import { HttpStatus, Injectable, PipeTransform } from '@nestjs/common';

import type { ScimDialect } from '../../../domain/models/user.model';
import { SCIM_DIALECTS } from '../common/scim-constants';
import { createScimError } from '../common/scim-errors';

/** Narrows the `:dialect` route segment; anything but `v1` / `v2` is a 404. */
@Injectable()
export class ParseDialectPipe implements PipeTransform<string, ScimDialect> {
  transform(value: string): ScimDialect {
    const dialect = SCIM_DIALECTS.find((known) => known === value);
    if (!dialect) {
      throw createScimError({ status: HttpStatus.NOT_FOUND, detail: `Unsupported protocol version '${value}'` });
    }
    return dialect;
  }
}
