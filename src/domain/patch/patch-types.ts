/**
 * Domain-layer patch types.
 *
 * Each patch is a raw, dialect-specific body tagged with the grammar it must
 * be read with. The merger normalizes every kind into either
 * a `UserUpdate` or an ordered list of `MemberOp`s before the store sees it.
 */

/** Loosely-typed JSON body as received from the adaptation layer. */
export type PatchBody = Record<string, unknown>;

/** `{ members: [{ value, operation?: "add" | "delete" }] }` */
export interface LegacyGroupPatch {
  kind: 'legacy-group';
  groupId: string;
  body: PatchBody;
}

/** `{ Operations: [{ op: "add" | "remove", path: "members", value }] }` */
export interface CurrentGroupPatch {
  kind: 'current-group';
  groupId: string;
  body: PatchBody;
}

/** Flat attribute map; a key present with `null` clears the attribute. */
export interface LegacyUserPatch {
  kind: 'legacy-user';
  userId: string;
  body: PatchBody;
}

/** `{ Operations: [{ op: "replace" | "add" | "remove", path?, value? }] }` */
export interface CurrentUserPatch {
  kind: 'current-user';
  userId: string;
  body: PatchBody;
}

export type GroupPatch = LegacyGroupPatch | CurrentGroupPatch;
export type UserPatch = LegacyUserPatch | CurrentUserPatch;

/** One current-dialect operation after shape checks. */
export interface PatchOperation {
  op: string;
  path?: string;
  value?: unknown;
}
