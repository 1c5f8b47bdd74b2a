export const V1_CORE = 'urn:scim:schemas:core:1.0';
export const V2_USER = 'urn:ietf:params:scim:schemas:core:2.0:User';
export const V2_GROUP = 'urn:ietf:params:scim:schemas:core:2.0:Group';
export const V2_LIST = 'urn:ietf:params:scim:api:messages:2.0:ListResponse';
export const V2_PATCH = 'urn:ietf:params:scim:api:messages:2.0:PatchOp';
export const V2_ERROR = 'urn:ietf:params:scim:api:messages:2.0:Error';
export const V1_ENTERPRISE = 'urn:scim:schemas:extension:enterprise:1.0';
export const V2_ENTERPRISE = 'urn:ietf:params:scim:schemas:extension:enterprise:2.0:User';

export const validUser = (overrides: Record<string, unknown> = {}): Record<string, unknown> => ({
  schemas: [V2_USER],
  userName: 'alice',
  displayName: 'Alice',
  emails: [{ value: 'alice@example.test', type: 'work', primary: true }],
  ...overrides,
});

export const validGroup = (overrides: Record<string, unknown> = {}): Record<string, unknown> => ({
  schemas: [V2_GROUP],
  displayName: 'Eng',
  ...overrides,
});
