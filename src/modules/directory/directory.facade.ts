import { Inject, Injectable } from '@nestjs/common';

import { DirectoryError } from '../../domain/errors/directory-error';
import type { GroupCreateInput, GroupRecord, GroupUpdate, SeedGroupInput } from '../../domain/models/group.model';
import type { UserAttributes, UserCreateInput, UserGroupRef, UserRecord } from '../../domain/models/user.model';
import { PatchMerger, type GroupPatch, type UserPatch } from '../../domain/patch';
import { PolicyResolver, type PolicyFlag, type PolicyState } from '../../domain/policy/policy-resolver';
import type { IResourceStore, ListPage, StoreCounts } from '../../domain/repositories/resource-store.interface';
import { RESOURCE_STORE } from '../../domain/repositories/repository.tokens';
import { LogCategory } from '../logging/log-levels';
import { ScimLogger } from '../logging/scim-logger.service';

export interface ListRequest {
  startIndex: number;
  count: number;
  filter?: string;
}

export interface DirectoryStatus extends StoreCounts {
  config: PolicyState;
}

const BLOCKED_MESSAGES: Record<PolicyFlag, string> = {
  groups_put: 'Method Not Allowed. Use PATCH for group updates.',
  groups_patch: 'Method Not Allowed. Use PUT for group updates.',
};

/**
 * DirectoryFacade: single entry point of the directory engine.
 *
 * Dispatches CRUD, list and patch calls to the store and the patch merger.
 * Group PUT and PATCH are checked against the policy before anything is
 * read or written; User operations are never gated.
 */
@Injectable()
export class DirectoryFacade {
  constructor(
    @Inject(RESOURCE_STORE) private readonly store: IResourceStore,
    private readonly patchMerger: PatchMerger,
    private readonly policy: PolicyResolver,
    private readonly logger: ScimLogger,
  ) {}

  // ─── Users ──────────────────────────────────────────────────────────

  async createUser(input: UserCreateInput): Promise<UserRecord> {
    const user = await this.store.createUser(input);
    this.logger.info(LogCategory.SCIM_USER, 'User created', { id: user.id, userName: user.userName });
    return user;
  }

  async getUser(id: string): Promise<UserRecord> {
    const user = await this.store.getUser(id);
    if (!user) throw DirectoryError.notFound('User', id);
    return user;
  }

  async listUsers(request: ListRequest): Promise<ListPage<UserRecord>> {
    this.logger.debug(LogCategory.SCIM_FILTER, 'Listing users', { ...request });
    return this.store.listUsers(request.startIndex, request.count, request.filter);
  }

  /** Overwrites only the supplied attributes; nothing is cleared. */
  async replaceUser(id: string, values: Partial<UserAttributes>): Promise<UserRecord> {
    const user = await this.store.updateUser(id, values);
    this.logger.info(LogCategory.SCIM_USER, 'User replaced', { id, attributes: Object.keys(values) });
    return user;
  }

  async patchUser(patch: UserPatch): Promise<UserRecord> {
    const user = await this.patchMerger.patchUser(patch);
    this.logger.info(LogCategory.SCIM_USER, 'User patched', { id: user.id, kind: patch.kind });
    return user;
  }

  async deleteUser(id: string): Promise<void> {
    if (!(await this.store.deleteUser(id))) throw DirectoryError.notFound('User', id);
    this.logger.info(LogCategory.SCIM_USER, 'User deleted', { id });
  }

  async getUserGroups(id: string): Promise<UserGroupRef[]> {
    return this.store.getUserGroups(id);
  }

  // ─── Groups ─────────────────────────────────────────────────────────

  async createGroup(input: GroupCreateInput): Promise<GroupRecord> {
    const group = await this.store.createGroup(input);
    this.logger.info(LogCategory.SCIM_GROUP, 'Group created', {
      id: group.id,
      displayName: group.displayName,
      members: group.members.length,
    });
    return group;
  }

  async getGroup(id: string): Promise<GroupRecord> {
    const group = await this.store.getGroup(id);
    if (!group) throw DirectoryError.notFound('Group', id);
    return group;
  }

  async listGroups(request: ListRequest): Promise<ListPage<GroupRecord>> {
    this.logger.debug(LogCategory.SCIM_FILTER, 'Listing groups', { ...request });
    return this.store.listGroups(request.startIndex, request.count, request.filter);
  }

  async replaceGroup(id: string, input: GroupCreateInput): Promise<GroupRecord> {
    this.assertAllowed('groups_put');
    const update: GroupUpdate = { displayName: input.displayName };
    if (input.externalId !== undefined) update.externalId = input.externalId;
    if (input.members !== undefined) update.members = input.members;

    const group = await this.store.updateGroup(id, update);
    this.logger.info(LogCategory.SCIM_GROUP, 'Group replaced', { id, members: group.members.length });
    return group;
  }

  async patchGroup(patch: GroupPatch): Promise<GroupRecord> {
    this.assertAllowed('groups_patch');
    const group = await this.patchMerger.patchGroup(patch);
    this.logger.info(LogCategory.SCIM_GROUP, 'Group members patched', {
      id: group.id,
      kind: patch.kind,
      members: group.members.length,
    });
    return group;
  }

  async deleteGroup(id: string): Promise<void> {
    if (!(await this.store.deleteGroup(id))) throw DirectoryError.notFound('Group', id);
    this.logger.info(LogCategory.SCIM_GROUP, 'Group deleted', { id });
  }

  // ─── Administration ─────────────────────────────────────────────────

  async seed(users: UserCreateInput[], groups: SeedGroupInput[]): Promise<StoreCounts> {
    const counts = await this.store.seed(users, groups);
    this.logger.info(LogCategory.ADMIN, 'Directory seeded', { ...counts });
    return counts;
  }

  async clearAll(): Promise<void> {
    await this.store.clear();
    this.logger.info(LogCategory.ADMIN, 'Directory cleared');
  }

  async status(): Promise<DirectoryStatus> {
    const counts = await this.store.counts();
    return { ...counts, config: this.policy.getState() };
  }

  getPolicyState(): PolicyState {
    return this.policy.getState();
  }

  setProfile(name: string): PolicyState {
    this.policy.setProfile(name);
    this.logger.info(LogCategory.POLICY, `Profile changed to '${name}'`);
    return this.policy.getState();
  }

  setOverride(flag: string, value: boolean): PolicyState {
    this.policy.setOverride(flag, value);
    this.logger.info(LogCategory.POLICY, `Override set: ${flag}=${value}`);
    return this.policy.getState();
  }

  clearOverride(flag: string): PolicyState {
    this.policy.clearOverride(flag);
    this.logger.info(LogCategory.POLICY, `Override cleared: ${flag}`);
    return this.policy.getState();
  }

  private assertAllowed(flag: PolicyFlag): void {
    if (!this.policy.isAllowed(flag)) {
      this.logger.warn(LogCategory.POLICY, `Blocked by policy: ${flag}`, { profile: this.policy.activeProfile });
      throw new DirectoryError('MethodNotAllowed', BLOCKED_MESSAGES[flag]);
    }
  }
}
