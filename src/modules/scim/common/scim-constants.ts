import type { ScimDialect } from '../../../domain/models/user.model';

export const SCIM_V1_CORE_SCHEMA = 'urn:scim:schemas:core:1.0';
export const SCIM_CORE_USER_SCHEMA = 'urn:ietf:params:scim:schemas:core:2.0:User';
export const SCIM_CORE_GROUP_SCHEMA = 'urn:ietf:params:scim:schemas:core:2.0:Group';
export const SCIM_LIST_RESPONSE_SCHEMA = 'urn:ietf:params:scim:api:messages:2.0:ListResponse';
export const SCIM_ERROR_SCHEMA = 'urn:ietf:params:scim:api:messages:2.0:Error';

export const SCIM_CONTENT_TYPE = 'application/scim+json; charset=utf-8';

export const SCIM_DIALECTS: readonly ScimDialect[] = ['v1', 'v2'];

/** Core schema URN per dialect and resource type. */
export const CORE_SCHEMAS: Record<ScimDialect, { user: string; group: string }> = {
  v1: { user: SCIM_V1_CORE_SCHEMA, group: SCIM_V1_CORE_SCHEMA },
  v2: { user: SCIM_CORE_USER_SCHEMA, group: SCIM_CORE_GROUP_SCHEMA },
};

/** `schemas` value of a list response: the legacy dialect reuses its core URN. */
export const LIST_SCHEMAS: Record<ScimDialect, string> = {
  v1: SCIM_V1_CORE_SCHEMA,
  v2: SCIM_LIST_RESPONSE_SCHEMA,
};

export const DEFAULT_START_INDEX = 1;
export const DEFAULT_COUNT = 100;

/**
 * RFC 7644 §3.12 scimType keywords used by this server.
 */
export const SCIM_ERROR_TYPE = {
  /** A value is already in use (409 Conflict) */
  UNIQUENESS: 'uniqueness',
  /** The request body is invalid or not conforming (400) */
  INVALID_SYNTAX: 'invalidSyntax',
  /** One or more values are not valid (400) */
  INVALID_VALUE: 'invalidValue',
} as const;

export type ScimErrorType = (typeof SCIM_ERROR_TYPE)[keyof typeof SCIM_ERROR_TYPE];
