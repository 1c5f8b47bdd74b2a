/**
 * IResourceStore: persistence port for the directory's User and Group tables.
 *
 * Implementations:
 *   - InMemoryResourceStore (the only backend; state is volatile)
 *
 * Lookups return `null` for a missing id; mutations on a missing id throw a
 * `NotFound` DirectoryError. Returned records are detached copies.
 */
import type {
  GroupCreateInput,
  GroupRecord,
  GroupUpdate,
  MemberOp,
  SeedGroupInput,
} from '../models/group.model';
import type { UserCreateInput, UserGroupRef, UserRecord, UserUpdate } from '../models/user.model';

export interface ListPage<T> {
  /** The requested window of the filtered results. */
  resources: T[];
  /** Number of resources matching the filter, independent of the window. */
  total: number;
}

export interface StoreCounts {
  users: number;
  groups: number;
}

export interface IResourceStore {
  /** @throws DirectoryError Conflict when the userName is taken */
  createUser(input: UserCreateInput): Promise<UserRecord>;

  getUser(id: string): Promise<UserRecord | null>;

  /** Exact, case-sensitive userName lookup. */
  getUserByName(userName: string): Promise<UserRecord | null>;

  /**
   * Filter, count, then window.
   *
   * @param startIndex 1-based index of the first result
   * @param count      Maximum page size; 0 yields an empty page
   * @param filter     Single `attr eq "value"` clause; anything else is ignored
   */
  listUsers(startIndex: number, count: number, filter?: string): Promise<ListPage<UserRecord>>;

  /** Overwrite only the keys present in `fields`; `null` clears. */
  updateUser(id: string, fields: UserUpdate): Promise<UserRecord>;

  /** Delete a User and drop it from every Group. Returns false when absent. */
  deleteUser(id: string): Promise<boolean>;

  /** Groups the User is currently a member of (reverse scan). */
  getUserGroups(id: string): Promise<UserGroupRef[]>;

  /** @throws DirectoryError InvalidValue when a member is not a live User */
  createGroup(input: GroupCreateInput): Promise<GroupRecord>;

  getGroup(id: string): Promise<GroupRecord | null>;

  listGroups(startIndex: number, count: number, filter?: string): Promise<ListPage<GroupRecord>>;

  updateGroup(id: string, fields: GroupUpdate): Promise<GroupRecord>;

  deleteGroup(id: string): Promise<boolean>;

  /** Replay ordered add/remove ops against the member list; all-or-nothing. */
  applyMemberOps(groupId: string, ops: MemberOp[]): Promise<GroupRecord>;

  /** Replace all state; group members are resolved from userNames. */
  seed(users: UserCreateInput[], groups: SeedGroupInput[]): Promise<StoreCounts>;

  clear(): Promise<void>;

  counts(): Promise<StoreCounts>;
}
