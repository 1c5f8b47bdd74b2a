/**
 * Attribute catalogue and value parsing for User payloads.
 *
 * Both dialects share the same core attribute names; they differ only in the
 * URN that carries the enterprise extension and in the shape of its manager
 * reference. Values arrive as untyped JSON and are narrowed here into the
 * structured records of `user.model.ts`.
 */
import { DirectoryError } from '../errors/directory-error';
import type {
  Address,
  CurrentManager,
  EnterpriseAttributes,
  EnterpriseExtension,
  LegacyManager,
  MultiValuedAttribute,
  OptionalUserAttributes,
  ScimDialect,
  UserAttributes,
  UserName,
  UserUpdate,
} from './user.model';

export const ENTERPRISE_URNS: Record<ScimDialect, string> = {
  v1: 'urn:scim:schemas:extension:enterprise:1.0',
  v2: 'urn:ietf:params:scim:schemas:extension:enterprise:2.0:User',
};

const STRING_ATTRIBUTES = [
  'displayName',
  'externalId',
  'nickName',
  'title',
  'userType',
  'profileUrl',
  'preferredLanguage',
  'locale',
  'timezone',
  'password',
] as const;

const MULTI_VALUED_ATTRIBUTES = [
  'emails',
  'phoneNumbers',
  'ims',
  'photos',
  'entitlements',
  'roles',
  'x509Certificates',
] as const;

type StringAttribute = (typeof STRING_ATTRIBUTES)[number];
type MultiValuedAttributeName = (typeof MULTI_VALUED_ATTRIBUTES)[number];

/** Every top-level User attribute a payload may set, except the enterprise extension. */
export type UserAttributeName = Exclude<keyof UserAttributes, 'enterpriseExtension'>;

export const USER_ATTRIBUTE_NAMES: readonly UserAttributeName[] = [
  'userName',
  'active',
  'name',
  'addresses',
  ...STRING_ATTRIBUTES,
  ...MULTI_VALUED_ATTRIBUTES,
];

const NAME_PARTS = [
  'formatted',
  'familyName',
  'givenName',
  'middleName',
  'honorificPrefix',
  'honorificSuffix',
] as const;

const ADDRESS_PARTS = [
  'formatted',
  'streetAddress',
  'locality',
  'region',
  'postalCode',
  'country',
  'type',
] as const;

const ENTERPRISE_PARTS = [
  'employeeNumber',
  'costCenter',
  'organization',
  'division',
  'department',
] as const;

export function isUserAttributeName(name: string): name is UserAttributeName {
  return USER_ATTRIBUTE_NAMES.some((known) => known === name);
}

function isMultiValuedAttribute(name: UserAttributeName): name is MultiValuedAttributeName {
  return MULTI_VALUED_ATTRIBUTES.some((known) => known === name);
}

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function invalid(detail: string): DirectoryError {
  return new DirectoryError('InvalidValue', detail);
}

function requireString(attribute: string, value: unknown): string {
  if (typeof value !== 'string') {
    throw invalid(`Attribute '${attribute}' must be a string.`);
  }
  return value;
}

function optionalString(attribute: string, value: unknown): string | undefined {
  return value === undefined || value === null ? undefined : requireString(attribute, value);
}

function optionalBoolean(attribute: string, value: unknown): boolean | undefined {
  return value === undefined || value === null ? undefined : parseBoolean(attribute, value);
}

/** Accepts JSON booleans and the "true"/"false" strings some provisioning clients send. */
export function parseBoolean(attribute: string, value: unknown): boolean {
  if (typeof value === 'boolean') return value;
  if (typeof value === 'string') {
    const lower = value.trim().toLowerCase();
    if (lower === 'true') return true;
    if (lower === 'false') return false;
  }
  throw invalid(`Attribute '${attribute}' must be a boolean.`);
}

function requireObject(attribute: string, value: unknown): Record<string, unknown> {
  if (!isPlainObject(value)) {
    throw invalid(`Attribute '${attribute}' must be an object.`);
  }
  return value;
}

function requireArray(attribute: string, value: unknown): unknown[] {
  if (!Array.isArray(value)) {
    throw invalid(`Attribute '${attribute}' must be a list.`);
  }
  return value;
}

function parseName(value: unknown): UserName {
  const raw = requireObject('name', value);
  const name: UserName = {};
  for (const part of NAME_PARTS) {
    const parsed = optionalString(`name.${part}`, raw[part]);
    if (parsed !== undefined) name[part] = parsed;
  }
  return name;
}

function parseMultiValued(attribute: string, value: unknown): MultiValuedAttribute[] {
  return requireArray(attribute, value).map((item) => {
    const raw = requireObject(attribute, item);
    const entry: MultiValuedAttribute = { value: requireString(`${attribute}.value`, raw.value) };
    const type = optionalString(`${attribute}.type`, raw.type);
    const primary = optionalBoolean(`${attribute}.primary`, raw.primary);
    const display = optionalString(`${attribute}.display`, raw.display);
    if (type !== undefined) entry.type = type;
    if (primary !== undefined) entry.primary = primary;
    if (display !== undefined) entry.display = display;
    return entry;
  });
}

function parseAddresses(value: unknown): Address[] {
  return requireArray('addresses', value).map((item) => {
    const raw = requireObject('addresses', item);
    const address: Address = {};
    for (const part of ADDRESS_PARTS) {
      const parsed = optionalString(`addresses.${part}`, raw[part]);
      if (parsed !== undefined) address[part] = parsed;
    }
    const primary = optionalBoolean('addresses.primary', raw.primary);
    if (primary !== undefined) address.primary = primary;
    return address;
  });
}

/**
 * Parse a single non-null attribute value into `target`.
 * @throws DirectoryError InvalidValue when the value has the wrong shape
 */
export function assignUserAttribute(
  target: Partial<UserAttributes>,
  name: UserAttributeName,
  value: unknown,
): void {
  if (name === 'userName') {
    const userName = requireString(name, value);
    if (userName.trim().length === 0) {
      throw invalid("Attribute 'userName' cannot be empty.");
    }
    target.userName = userName;
  } else if (name === 'active') {
    target.active = parseBoolean(name, value);
  } else if (name === 'name') {
    target.name = parseName(value);
  } else if (name === 'addresses') {
    target.addresses = parseAddresses(value);
  } else if (isMultiValuedAttribute(name)) {
    target[name] = parseMultiValued(name, value);
  } else {
    const stringAttribute: StringAttribute = name;
    target[stringAttribute] = requireString(name, value);
  }
}

function parseLegacyManager(value: unknown): LegacyManager {
  const raw = requireObject('manager', value);
  const manager: LegacyManager = {};
  const managerId = optionalString('manager.managerId', raw.managerId);
  const displayName = optionalString('manager.displayName', raw.displayName);
  if (managerId !== undefined) manager.managerId = managerId;
  if (displayName !== undefined) manager.displayName = displayName;
  return manager;
}

function parseCurrentManager(value: unknown): CurrentManager {
  const raw = requireObject('manager', value);
  const manager: CurrentManager = {};
  const managerValue = optionalString('manager.value', raw.value);
  const ref = optionalString('manager.$ref', raw.$ref);
  const displayName = optionalString('manager.displayName', raw.displayName);
  if (managerValue !== undefined) manager.value = managerValue;
  if (ref !== undefined) manager.$ref = ref;
  if (displayName !== undefined) manager.displayName = displayName;
  return manager;
}

export function parseEnterpriseExtension(value: unknown, dialect: ScimDialect): EnterpriseExtension {
  const raw = requireObject(ENTERPRISE_URNS[dialect], value);
  const attributes: EnterpriseAttributes = {};
  for (const part of ENTERPRISE_PARTS) {
    const parsed = optionalString(part, raw[part]);
    if (parsed !== undefined) attributes[part] = parsed;
  }
  const hasManager = raw.manager !== undefined && raw.manager !== null;
  if (dialect === 'v1') {
    return hasManager
      ? { ...attributes, dialect, manager: parseLegacyManager(raw.manager) }
      : { ...attributes, dialect };
  }
  return hasManager
    ? { ...attributes, dialect, manager: parseCurrentManager(raw.manager) }
    : { ...attributes, dialect };
}

/**
 * Parse a create/replace payload. Keys carrying `null` are dropped: a full
 * payload never clears anything.
 */
export function parseUserPayload(raw: Record<string, unknown>, dialect: ScimDialect): Partial<UserAttributes> {
  const values: Partial<UserAttributes> = {};
  for (const name of USER_ATTRIBUTE_NAMES) {
    const value = raw[name];
    if (value !== undefined && value !== null) {
      assignUserAttribute(values, name, value);
    }
  }
  const extension = raw[ENTERPRISE_URNS[dialect]];
  if (extension !== undefined && extension !== null) {
    values.enterpriseExtension = parseEnterpriseExtension(extension, dialect);
  }
  return values;
}

/** Convenience used by create paths: a payload whose userName is mandatory. */
export function parseUserCreatePayload(
  raw: Record<string, unknown>,
  dialect: ScimDialect,
): Partial<UserAttributes> & { userName: string } {
  const values = parseUserPayload(raw, dialect);
  if (values.userName === undefined || values.userName.length === 0) {
    throw invalid("Attribute 'userName' is required.");
  }
  return { ...values, userName: values.userName };
}

/** Merge parsed values and clears into a single store-level update. */
export function toUserUpdate(values: Partial<UserAttributes>, cleared: Iterable<keyof UserAttributes>): UserUpdate {
  const update: UserUpdate = { ...values };
  for (const name of cleared) {
    update[name] = null;
  }
  return update;
}

/** Attributes the store may clear; `userName` and `active` are handled separately. */
export const OPTIONAL_USER_ATTRIBUTE_NAMES: readonly (keyof OptionalUserAttributes)[] = [
  'name',
  'addresses',
  ...STRING_ATTRIBUTES,
  ...MULTI_VALUED_ATTRIBUTES,
  'enterpriseExtension',
];
