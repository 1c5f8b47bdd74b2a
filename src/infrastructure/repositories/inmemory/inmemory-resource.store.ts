/**
 * InMemoryResourceStore: IResourceStore backed by two insertion-ordered Maps.
 *
 * Every public method runs under a single StoreLock, so membership updates,
 * cascading deletes and seeding are atomic with respect to other requests.
 * Records are cloned on the way in and on the way out.
 */
import { Injectable } from '@nestjs/common';
import { randomUUID } from 'node:crypto';
import { DirectoryError } from '../../../domain/errors/directory-error';
import { FilterMatcher } from '../../../domain/filter/filter-matcher';
import type {
  GroupCreateInput,
  GroupRecord,
  GroupUpdate,
  MemberOp,
  MemberRecord,
  MemberRef,
  SeedGroupInput,
} from '../../../domain/models/group.model';
import { OPTIONAL_USER_ATTRIBUTE_NAMES } from '../../../domain/models/user-attributes';
import type {
  OptionalUserAttributes,
  UserCreateInput,
  UserGroupRef,
  UserRecord,
  UserUpdate,
} from '../../../domain/models/user.model';
import type { IResourceStore, ListPage, StoreCounts } from '../../../domain/repositories/resource-store.interface';
import { StoreLock } from './store-lock';

type UserTable = Map<string, UserRecord>;
type GroupTable = Map<string, GroupRecord>;

function newId(...tables: Map<string, unknown>[]): string {
  const id = randomUUID();
  if (tables.some((table) => table.has(id))) {
    throw new Error(`Identifier collision on ${id}`);
  }
  return id;
}

function newMeta(resourceType: 'User' | 'Group'): GroupRecord['meta'] {
  const now = new Date();
  return { resourceType, created: now, lastModified: new Date(now.getTime()) };
}

function memberLabel(user: UserRecord): string {
  return user.displayName ?? user.userName;
}

function toMember(user: UserRecord): MemberRecord {
  return { value: user.id, display: memberLabel(user), type: 'User' };
}

/** Filterable attributes of a User: top-level values minus secrets and metadata. */
function userAttributeMap(user: UserRecord): Record<string, unknown> {
  const { password: _password, meta: _meta, enterpriseExtension: _extension, ...attributes } = user;
  return { ...attributes };
}

function groupAttributeMap(group: GroupRecord): Record<string, unknown> {
  return { id: group.id, displayName: group.displayName, externalId: group.externalId };
}

function page<T>(items: T[], startIndex: number, count: number): ListPage<T> {
  const start = Math.max(startIndex, 1) - 1;
  const size = Math.max(count, 0);
  return { resources: items.slice(start, start + size), total: items.length };
}

function applyOptional<K extends keyof OptionalUserAttributes>(
  target: OptionalUserAttributes,
  key: K,
  value: OptionalUserAttributes[K] | null | undefined,
): void {
  if (value === undefined) return;
  if (value === null) {
    delete target[key];
    return;
  }
  target[key] = value;
}

function findUserByName(users: UserTable, userName: string): UserRecord | undefined {
  for (const user of users.values()) {
    if (user.userName === userName) return user;
  }
  return undefined;
}

function requireDisplayName(value: unknown): string {
  if (typeof value !== 'string' || value.length === 0) {
    throw new DirectoryError('InvalidValue', "Attribute 'displayName' is required.");
  }
  return value;
}

@Injectable()
export class InMemoryResourceStore implements IResourceStore {
  private users: UserTable = new Map();
  private groups: GroupTable = new Map();
  private readonly lock = new StoreLock();

  // ─── Users ──────────────────────────────────────────────────────────

  async createUser(input: UserCreateInput): Promise<UserRecord> {
    return this.lock.run(() => structuredClone(this.insertUser(this.users, input)));
  }

  async getUser(id: string): Promise<UserRecord | null> {
    return this.lock.run(() => {
      const user = this.users.get(id);
      return user ? structuredClone(user) : null;
    });
  }

  async getUserByName(userName: string): Promise<UserRecord | null> {
    return this.lock.run(() => {
      const user = findUserByName(this.users, userName);
      return user ? structuredClone(user) : null;
    });
  }

  async listUsers(startIndex: number, count: number, filter?: string): Promise<ListPage<UserRecord>> {
    return this.lock.run(() => {
      const matched = new FilterMatcher(filter).apply([...this.users.values()], userAttributeMap);
      const result = page(matched, startIndex, count);
      return { resources: result.resources.map((user) => structuredClone(user)), total: result.total };
    });
  }

  async updateUser(id: string, fields: UserUpdate): Promise<UserRecord> {
    return this.lock.run(() => {
      const existing = this.users.get(id);
      if (!existing) throw DirectoryError.notFound('User', id);

      const next = structuredClone(existing);
      if (fields.userName === null || fields.userName?.trim() === '') {
        throw new DirectoryError('InvalidValue', "Attribute 'userName' cannot be cleared.");
      }
      if (fields.userName !== undefined && fields.userName !== existing.userName) {
        const holder = findUserByName(this.users, fields.userName);
        if (holder && holder.id !== id) {
          throw new DirectoryError('Conflict', `User ${fields.userName} already exists`);
        }
        next.userName = fields.userName;
      }
      if (fields.active !== undefined) {
        next.active = fields.active ?? true;
      }
      for (const key of OPTIONAL_USER_ATTRIBUTE_NAMES) {
        applyOptional(next, key, fields[key]);
      }
      next.meta.lastModified = new Date();

      this.users.set(id, next);
      return structuredClone(next);
    });
  }

  async deleteUser(id: string): Promise<boolean> {
    return this.lock.run(() => {
      if (!this.users.delete(id)) return false;
      for (const group of this.groups.values()) {
        group.members = group.members.filter((member) => member.value !== id);
      }
      return true;
    });
  }

  async getUserGroups(id: string): Promise<UserGroupRef[]> {
    return this.lock.run(() => {
      const refs: UserGroupRef[] = [];
      for (const group of this.groups.values()) {
        if (group.members.some((member) => member.value === id)) {
          refs.push({ value: group.id, display: group.displayName });
        }
      }
      return refs;
    });
  }

  // ─── Groups ─────────────────────────────────────────────────────────

  async createGroup(input: GroupCreateInput): Promise<GroupRecord> {
    return this.lock.run(() => {
      const group: GroupRecord = {
        id: newId(this.users, this.groups),
        displayName: requireDisplayName(input.displayName),
        members: this.resolveMembers(input.members ?? []),
        meta: newMeta('Group'),
      };
      if (input.externalId !== undefined) group.externalId = input.externalId;
      this.groups.set(group.id, group);
      return structuredClone(group);
    });
  }

  async getGroup(id: string): Promise<GroupRecord | null> {
    return this.lock.run(() => {
      const group = this.groups.get(id);
      return group ? structuredClone(group) : null;
    });
  }

  async listGroups(startIndex: number, count: number, filter?: string): Promise<ListPage<GroupRecord>> {
    return this.lock.run(() => {
      const matched = new FilterMatcher(filter).apply([...this.groups.values()], groupAttributeMap);
      const result = page(matched, startIndex, count);
      return { resources: result.resources.map((group) => structuredClone(group)), total: result.total };
    });
  }

  async updateGroup(id: string, fields: GroupUpdate): Promise<GroupRecord> {
    return this.lock.run(() => {
      const existing = this.groups.get(id);
      if (!existing) throw DirectoryError.notFound('Group', id);

      const next = structuredClone(existing);
      if (fields.displayName !== undefined) {
        next.displayName = requireDisplayName(fields.displayName);
      }
      if (fields.externalId === null) {
        delete next.externalId;
      } else if (fields.externalId !== undefined) {
        next.externalId = fields.externalId;
      }
      if (fields.members !== undefined) {
        next.members = this.resolveMembers(fields.members ?? []);
      }
      next.meta.lastModified = new Date();

      this.groups.set(id, next);
      return structuredClone(next);
    });
  }

  async deleteGroup(id: string): Promise<boolean> {
    return this.lock.run(() => this.groups.delete(id));
  }

  async applyMemberOps(groupId: string, ops: MemberOp[]): Promise<GroupRecord> {
    return this.lock.run(() => {
      const existing = this.groups.get(groupId);
      if (!existing) throw DirectoryError.notFound('Group', groupId);

      // Replay on a working copy; nothing is committed if any op fails.
      let members = [...existing.members];
      for (const op of ops) {
        if (!op.memberId) continue;
        if (op.kind === 'remove') {
          members = members.filter((member) => member.value !== op.memberId);
        } else if (!members.some((member) => member.value === op.memberId)) {
          members.push(toMember(this.requireUser(op.memberId)));
        }
      }

      const next = structuredClone(existing);
      next.members = members;
      next.meta.lastModified = new Date();
      this.groups.set(groupId, next);
      return structuredClone(next);
    });
  }

  // ─── Administration ─────────────────────────────────────────────────

  async seed(users: UserCreateInput[], groups: SeedGroupInput[]): Promise<StoreCounts> {
    return this.lock.run(() => {
      const userTable: UserTable = new Map();
      const groupTable: GroupTable = new Map();

      for (const input of users) {
        this.insertUser(userTable, input);
      }
      for (const input of groups) {
        const members: MemberRecord[] = [];
        for (const userName of input.members ?? []) {
          const user = findUserByName(userTable, userName);
          if (user && !members.some((member) => member.value === user.id)) {
            members.push(toMember(user));
          }
        }
        const group: GroupRecord = {
          id: newId(userTable, groupTable),
          displayName: requireDisplayName(input.displayName),
          members,
          meta: newMeta('Group'),
        };
        if (input.externalId !== undefined) group.externalId = input.externalId;
        groupTable.set(group.id, group);
      }

      this.users = userTable;
      this.groups = groupTable;
      return { users: userTable.size, groups: groupTable.size };
    });
  }

  async clear(): Promise<void> {
    return this.lock.run(() => {
      this.users.clear();
      this.groups.clear();
    });
  }

  async counts(): Promise<StoreCounts> {
    return this.lock.run(() => ({ users: this.users.size, groups: this.groups.size }));
  }

  // ─── Internals (caller holds the lock) ──────────────────────────────

  private insertUser(table: UserTable, input: UserCreateInput): UserRecord {
    if (!input.userName) {
      throw new DirectoryError('InvalidValue', "Attribute 'userName' is required.");
    }
    if (findUserByName(table, input.userName)) {
      throw new DirectoryError('Conflict', `User ${input.userName} already exists`);
    }
    const record: UserRecord = {
      ...structuredClone(input),
      active: input.active ?? true,
      id: newId(table, this.groups),
      meta: newMeta('User'),
    };
    table.set(record.id, record);
    return record;
  }

  private requireUser(id: string): UserRecord {
    const user = this.users.get(id);
    if (!user) {
      throw new DirectoryError('InvalidValue', `Member '${id}' does not reference an existing User.`);
    }
    return user;
  }

  private resolveMembers(refs: MemberRef[]): MemberRecord[] {
    const members: MemberRecord[] = [];
    for (const ref of refs) {
      if (members.some((member) => member.value === ref.value)) continue;
      members.push(toMember(this.requireUser(ref.value)));
    }
    return members;
  }
}
