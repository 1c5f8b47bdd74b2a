import type { ListPage } from '../../../domain/repositories/resource-store.interface';
import type { GroupRecord } from '../../../domain/models/group.model';
import { ENTERPRISE_URNS } from '../../../domain/models/user-attributes';
import type { ResourceMeta, ScimDialect, UserGroupRef, UserRecord } from '../../../domain/models/user.model';
import { CORE_SCHEMAS, LIST_SCHEMAS } from '../common/scim-constants';

export interface ScimMeta {
  resourceType: 'User' | 'Group';
  created: string;
  lastModified: string;
  location: string;
}

/** Wire representation of a resource; attribute keys beyond the fixed ones vary. */
export interface ScimResource {
  schemas: string[];
  id: string;
  meta: ScimMeta;
  [attribute: string]: unknown;
}

export interface ScimListResponse {
  schemas: string[];
  totalResults: number;
  startIndex: number;
  itemsPerPage: number;
  Resources: ScimResource[];
}

/** Attributes copied verbatim when present, in output order. */
const USER_OUTPUT_ATTRIBUTES = [
  'externalId',
  'userName',
  'name',
  'displayName',
  'nickName',
  'profileUrl',
  'title',
  'userType',
  'preferredLanguage',
  'locale',
  'timezone',
  'active',
  'emails',
  'phoneNumbers',
  'ims',
  'photos',
  'addresses',
  'entitlements',
  'roles',
  'x509Certificates',
] as const;

function formatMeta(meta: ResourceMeta, location: string): ScimMeta {
  return {
    resourceType: meta.resourceType,
    created: meta.created.toISOString(),
    lastModified: meta.lastModified.toISOString(),
    location,
  };
}

/**
 * Render a User for the given dialect.
 *
 * Only attributes that are present are emitted; `password` never is. The
 * enterprise extension is keyed by the URN of the dialect that supplied it.
 */
export function formatUser(
  user: UserRecord,
  groups: UserGroupRef[],
  dialect: ScimDialect,
  baseUrl: string,
): ScimResource {
  const resource: ScimResource = {
    schemas: [CORE_SCHEMAS[dialect].user],
    id: user.id,
    meta: formatMeta(user.meta, `${baseUrl}/Users/${user.id}`),
  };

  for (const attribute of USER_OUTPUT_ATTRIBUTES) {
    const value = user[attribute];
    if (value !== undefined) {
      resource[attribute] = value;
    }
  }

  if (groups.length > 0) {
    resource.groups = groups.map((group) => ({ value: group.value, display: group.display }));
  }

  if (user.enterpriseExtension) {
    const { dialect: origin, ...extension } = user.enterpriseExtension;
    const urn = ENTERPRISE_URNS[origin];
    resource[urn] = extension;
    resource.schemas.push(urn);
  }

  return resource;
}

export function formatGroup(group: GroupRecord, dialect: ScimDialect, baseUrl: string): ScimResource {
  const resource: ScimResource = {
    schemas: [CORE_SCHEMAS[dialect].group],
    id: group.id,
    meta: formatMeta(group.meta, `${baseUrl}/Groups/${group.id}`),
  };
  if (group.externalId !== undefined) resource.externalId = group.externalId;
  resource.displayName = group.displayName;
  resource.members = group.members.map((member) => ({
    value: member.value,
    display: member.display,
    type: member.type,
  }));

  return resource;
}

export function formatListResponse(
  dialect: ScimDialect,
  page: ListPage<unknown>,
  resources: ScimResource[],
  startIndex: number,
): ScimListResponse {
  return {
    schemas: [LIST_SCHEMAS[dialect]],
    totalResults: page.total,
    startIndex,
    itemsPerPage: resources.length,
    Resources: resources,
  };
}
