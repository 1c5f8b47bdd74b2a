/**
 * Domain model for User resources.
 *
 * Optional attributes are modelled as optional properties: an attribute that
 * was never supplied, or that a patch cleared, is simply absent from the
 * record. Mutations use `null` to request a clear (see `UserUpdate`).
 */

/** Protocol dialect a payload arrived on: legacy (`v1`) or current (`v2`). */
export type ScimDialect = 'v1' | 'v2';

export interface ResourceMeta {
  resourceType: 'User' | 'Group';
  created: Date;
  lastModified: Date;
}

export interface UserName {
  formatted?: string;
  familyName?: string;
  givenName?: string;
  middleName?: string;
  honorificPrefix?: string;
  honorificSuffix?: string;
}

/** Element of emails, phoneNumbers, ims, photos, entitlements, roles, x509Certificates. */
export interface MultiValuedAttribute {
  value: string;
  type?: string;
  primary?: boolean;
  display?: string;
}

export interface Address {
  formatted?: string;
  streetAddress?: string;
  locality?: string;
  region?: string;
  postalCode?: string;
  country?: string;
  type?: string;
  primary?: boolean;
}

export interface EnterpriseAttributes {
  employeeNumber?: string;
  costCenter?: string;
  organization?: string;
  division?: string;
  department?: string;
}

export interface LegacyManager {
  managerId?: string;
  displayName?: string;
}

export interface CurrentManager {
  value?: string;
  $ref?: string;
  displayName?: string;
}

/** Enterprise extension, tagged with the dialect (and therefore URN) it came from. */
export type EnterpriseExtension =
  | (EnterpriseAttributes & { dialect: 'v1'; manager?: LegacyManager })
  | (EnterpriseAttributes & { dialect: 'v2'; manager?: CurrentManager });

/** Attributes that may be absent from a User. */
export interface OptionalUserAttributes {
  name?: UserName;
  displayName?: string;
  externalId?: string;
  nickName?: string;
  title?: string;
  userType?: string;
  profileUrl?: string;
  preferredLanguage?: string;
  locale?: string;
  timezone?: string;
  emails?: MultiValuedAttribute[];
  phoneNumbers?: MultiValuedAttribute[];
  ims?: MultiValuedAttribute[];
  photos?: MultiValuedAttribute[];
  addresses?: Address[];
  entitlements?: MultiValuedAttribute[];
  roles?: MultiValuedAttribute[];
  x509Certificates?: MultiValuedAttribute[];
  /** Write-only; never formatted outward. */
  password?: string;
  enterpriseExtension?: EnterpriseExtension;
}

export interface UserAttributes extends OptionalUserAttributes {
  userName: string;
  active: boolean;
}

export interface UserRecord extends UserAttributes {
  id: string;
  meta: ResourceMeta;
}

export type UserCreateInput = Pick<UserAttributes, 'userName'> &
  Partial<Omit<UserAttributes, 'userName'>>;

/**
 * Attribute-level update. A key that is absent leaves the attribute alone,
 * `null` clears it.
 */
export type UserUpdate = {
  [K in keyof UserAttributes]?: UserAttributes[K] | null;
};

/** Derived (never stored) membership entry of a User. */
export interface UserGroupRef {
  value: string;
  display: string;
}
