/**
 * PatchMerger
 *
 * Translates the four patch grammars (legacy/current dialect × User/Group)
 * into the store's primitive mutations:
 *   - User patches  → one `UserUpdate` (absent key = untouched, `null` = clear)
 *   - Group patches → an ordered `MemberOp[]` replayed by `applyMemberOps`
 *
 * Normalization is pure and validates every value before anything is written,
 * so a malformed patch never produces a partial update.
 */
import { DirectoryError } from '../errors/directory-error';
import type { GroupRecord, MemberOp, MemberOpKind } from '../models/group.model';
import {
  ENTERPRISE_URNS,
  USER_ATTRIBUTE_NAMES,
  assignUserAttribute,
  isPlainObject,
  isUserAttributeName,
  parseEnterpriseExtension,
  toUserUpdate,
  type UserAttributeName,
} from '../models/user-attributes';
import type { EnterpriseExtension, ScimDialect, UserAttributes, UserRecord, UserUpdate } from '../models/user.model';
import type { IResourceStore } from '../repositories/resource-store.interface';
import type {
  GroupPatch,
  PatchBody,
  PatchOperation,
  UserPatch,
} from './patch-types';

function invalidPatch(detail: string): DirectoryError {
  return new DirectoryError('InvalidPatch', detail);
}

/** Read `Operations`, rejecting a missing, empty or non-list value. */
function readOperations(body: PatchBody): PatchOperation[] {
  const raw = body.Operations;
  if (!Array.isArray(raw) || raw.length === 0) {
    throw invalidPatch('No operations provided');
  }
  const operations: PatchOperation[] = [];
  for (const entry of raw) {
    if (!isPlainObject(entry) || typeof entry.op !== 'string') continue;
    operations.push({
      op: entry.op.toLowerCase(),
      path: typeof entry.path === 'string' ? entry.path : undefined,
      value: entry.value,
    });
  }
  return operations;
}

/** Member ids carried by a single reference object or a list of them. */
function memberIds(value: unknown): string[] {
  const refs = Array.isArray(value) ? value : [value];
  const ids: string[] = [];
  for (const ref of refs) {
    if (isPlainObject(ref) && typeof ref.value === 'string') {
      ids.push(ref.value);
    }
  }
  return ids;
}

/** Case-insensitive lookup of a flat attribute path. */
function resolveAttribute(path: string): UserAttributeName | undefined {
  const lower = path.toLowerCase();
  return USER_ATTRIBUTE_NAMES.find((name) => name.toLowerCase() === lower);
}

/**
 * Accumulates attribute sets and clears; the last mutation of an attribute
 * wins, as if the operations had been applied one by one.
 */
class UserUpdateBuilder {
  private readonly values: Partial<UserAttributes> = {};
  private readonly cleared = new Set<keyof UserAttributes>();
  private extension: EnterpriseExtension | null | undefined;

  constructor(private readonly dialect: ScimDialect) {}

  set(name: UserAttributeName, value: unknown): void {
    if (value === null || value === undefined) {
      this.clear(name);
      return;
    }
    assignUserAttribute(this.values, name, value);
    this.cleared.delete(name);
  }

  clear(name: UserAttributeName): void {
    delete this.values[name];
    this.cleared.add(name);
  }

  setExtension(value: unknown): void {
    this.extension = value === null || value === undefined ? null : parseEnterpriseExtension(value, this.dialect);
  }

  clearExtension(): void {
    this.extension = null;
  }

  get isEmpty(): boolean {
    return Object.keys(this.values).length === 0 && this.cleared.size === 0 && this.extension === undefined;
  }

  build(): UserUpdate {
    const update = toUserUpdate(this.values, this.cleared);
    if (this.extension !== undefined) {
      update.enterpriseExtension = this.extension;
    }
    return update;
  }
}

export class PatchMerger {
  constructor(private readonly store: IResourceStore) {}

  /**
   * @throws DirectoryError InvalidPatch when no member operation survives filtering
   */
  static toMemberOps(patch: GroupPatch): MemberOp[] {
    return patch.kind === 'legacy-group'
      ? PatchMerger.legacyMemberOps(patch.body)
      : PatchMerger.currentMemberOps(patch.body);
  }

  /**
   * @throws DirectoryError InvalidPatch when nothing actionable remains
   * @throws DirectoryError InvalidValue when an attribute value is malformed
   */
  static toUserUpdate(patch: UserPatch): UserUpdate {
    return patch.kind === 'legacy-user'
      ? PatchMerger.legacyUserUpdate(patch.body)
      : PatchMerger.currentUserUpdate(patch.body);
  }

  // ─── Application ───────────────────────────────────────────────────

  async patchGroup(patch: GroupPatch): Promise<GroupRecord> {
    return this.store.applyMemberOps(patch.groupId, PatchMerger.toMemberOps(patch));
  }

  async patchUser(patch: UserPatch): Promise<UserRecord> {
    return this.store.updateUser(patch.userId, PatchMerger.toUserUpdate(patch));
  }

  // ─── Group grammars ────────────────────────────────────────────────

  private static legacyMemberOps(body: PatchBody): MemberOp[] {
    const members = body.members;
    if (!Array.isArray(members) || members.length === 0) {
      throw invalidPatch('No member operations provided');
    }

    const ops: MemberOp[] = [];
    for (const entry of members) {
      if (!isPlainObject(entry) || typeof entry.value !== 'string') continue;
      const operation = typeof entry.operation === 'string' ? entry.operation.toLowerCase() : 'add';
      if (operation === 'add') {
        ops.push({ memberId: entry.value, kind: 'add' });
      } else if (operation === 'delete') {
        ops.push({ memberId: entry.value, kind: 'remove' });
      }
    }
    if (ops.length === 0) {
      throw invalidPatch('No valid member operations found');
    }
    return ops;
  }

  private static currentMemberOps(body: PatchBody): MemberOp[] {
    const ops: MemberOp[] = [];
    for (const operation of readOperations(body)) {
      if (operation.path?.toLowerCase() !== 'members') continue;
      if (operation.op !== 'add' && operation.op !== 'remove') continue;
      const kind: MemberOpKind = operation.op;
      for (const memberId of memberIds(operation.value)) {
        ops.push({ memberId, kind });
      }
    }
    if (ops.length === 0) {
      throw invalidPatch('No valid member operations found');
    }
    return ops;
  }

  // ─── User grammars ─────────────────────────────────────────────────

  private static legacyUserUpdate(body: PatchBody): UserUpdate {
    const builder = new UserUpdateBuilder('v1');
    for (const [key, value] of Object.entries(body)) {
      if (isUserAttributeName(key)) {
        builder.set(key, value);
      } else if (key === ENTERPRISE_URNS.v1) {
        builder.setExtension(value);
      }
    }
    if (builder.isEmpty) {
      throw invalidPatch('No attributes provided');
    }
    return builder.build();
  }

  private static currentUserUpdate(body: PatchBody): UserUpdate {
    const builder = new UserUpdateBuilder('v2');
    const enterpriseUrn = ENTERPRISE_URNS.v2;

    for (const operation of readOperations(body)) {
      const { op, path, value } = operation;
      if (op !== 'replace' && op !== 'add' && op !== 'remove') continue;

      if (path === undefined || path === '') {
        // Path-less form: the value is an object of attribute → value pairs.
        if (op === 'remove' || !isPlainObject(value)) continue;
        for (const [key, entry] of Object.entries(value)) {
          const name = resolveAttribute(key);
          if (name) {
            builder.set(name, entry);
          } else if (key === enterpriseUrn) {
            builder.setExtension(entry);
          }
        }
        continue;
      }

      if (path === enterpriseUrn) {
        if (op === 'remove') builder.clearExtension();
        else builder.setExtension(value);
        continue;
      }

      const name = resolveAttribute(path);
      if (!name) continue;
      if (op === 'remove') builder.clear(name);
      else builder.set(name, value);
    }

    const extension = body[enterpriseUrn];
    if (extension !== undefined && extension !== null) {
      builder.setExtension(extension);
    }

    if (builder.isEmpty) {
      throw invalidPatch('No valid operations found');
    }
    return builder.build();
  }
}
