/**
 * Domain models for Group resources plus group membership.
 */
import type { ResourceMeta } from './user.model';

export interface MemberRecord {
  /** Identifier of the member User. */
  value: string;
  /** Resolved label, frozen at the time the entry was added. */
  display: string;
  type: 'User';
}

export interface GroupRecord {
  id: string;
  displayName: string;
  externalId?: string;
  members: MemberRecord[];
  meta: ResourceMeta;
}

/** A reference to a User as supplied by callers; display labels are resolved by the store. */
export interface MemberRef {
  value: string;
}

export interface GroupCreateInput {
  displayName: string;
  externalId?: string;
  members?: MemberRef[];
}

export interface GroupUpdate {
  displayName?: string | null;
  externalId?: string | null;
  members?: MemberRef[] | null;
}

export type MemberOpKind = 'add' | 'remove';

/** Normalized add/remove instruction against a Group's member list. */
export interface MemberOp {
  memberId: string;
  kind: MemberOpKind;
}

/** Seed group whose members are given as userNames. */
export interface SeedGroupInput {
  displayName: string;
  externalId?: string;
  members?: string[];
}
