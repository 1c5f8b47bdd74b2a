import type { Request } from 'express';

import type { ScimDialect } from '../../../domain/models/user.model';

/**
 * Origin of the incoming request (`scheme://host`), honouring the forwarding
 * headers set by a reverse proxy.
 */
export function buildOrigin(request: Request): string {
  const protocol = request.headers['x-forwarded-proto']?.toString() ?? request.protocol;
  const host = request.headers['x-forwarded-host']?.toString() ?? request.get('host') ?? 'localhost';
  return `${protocol}://${host}`;
}

/** Base URL of a dialect's resource collections, e.g. `http://host/scim/v2`. */
export function buildBaseUrl(request: Request, dialect: ScimDialect): string {
  return `${buildOrigin(request)}/scim/${dialect}`;
}
