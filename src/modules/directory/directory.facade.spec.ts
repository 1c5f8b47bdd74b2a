import { Test, TestingModule } from '@nestjs/testing';

import { DirectoryError } from '../../domain/errors/directory-error';
import { PatchMerger } from '../../domain/patch';
import { PolicyResolver } from '../../domain/policy/policy-resolver';
import type { IResourceStore } from '../../domain/repositories/resource-store.interface';
import { RESOURCE_STORE } from '../../domain/repositories/repository.tokens';
import { InMemoryResourceStore } from '../../infrastructure/repositories/inmemory/inmemory-resource.store';
import { ScimLogger } from '../logging/scim-logger.service';
import { DirectoryFacade } from './directory.facade';

describe('DirectoryFacade', () => {
  let facade: DirectoryFacade;
  let store: IResourceStore;
  let policy: PolicyResolver;

  const mockLogger = {
    trace: jest.fn(),
    debug: jest.fn(),
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
    fatal: jest.fn(),
  };

  beforeEach(async () => {
    jest.clearAllMocks();
    const module: TestingModule = await Test.createTestingModule({
      providers: [
        DirectoryFacade,
        { provide: RESOURCE_STORE, useClass: InMemoryResourceStore },
        { provide: PolicyResolver, useValue: new PolicyResolver({ profile: 'restricted-put' }) },
        {
          provide: PatchMerger,
          useFactory: (resourceStore: IResourceStore) => new PatchMerger(resourceStore),
          inject: [RESOURCE_STORE],
        },
        { provide: ScimLogger, useValue: mockLogger },
      ],
    }).compile();

    facade = module.get(DirectoryFacade);
    store = module.get(RESOURCE_STORE);
    policy = module.get(PolicyResolver);
  });

  // ─── Users ──────────────────────────────────────────────────────────

  describe('users', () => {
    it('should throw NotFound for a missing user on read and delete', async () => {
      await expect(facade.getUser('missing')).rejects.toMatchObject({ kind: 'NotFound' });
      await expect(facade.deleteUser('missing')).rejects.toMatchObject({ kind: 'NotFound' });
    });

    it('should keep unspecified attributes on replace', async () => {
      const user = await facade.createUser({ userName: 'alice', title: 'Engineer', nickName: 'Al' });
      const replaced = await facade.replaceUser(user.id, { userName: 'alice', title: 'Lead' });

      expect(replaced.title).toBe('Lead');
      expect(replaced.nickName).toBe('Al');
    });

    it('should never gate user patches', async () => {
      policy.setOverride('groups_patch', false);
      const user = await facade.createUser({ userName: 'alice' });

      const patched = await facade.patchUser({ kind: 'legacy-user', userId: user.id, body: { displayName: 'A' } });
      expect(patched.displayName).toBe('A');
    });

    it('should log user creation', async () => {
      const user = await facade.createUser({ userName: 'alice' });
      expect(mockLogger.info).toHaveBeenCalledWith('scim.user', 'User created', { id: user.id, userName: 'alice' });
    });
  });

  // ─── Group gating ───────────────────────────────────────────────────

  describe('group gating', () => {
    it('should block PUT under restricted-put without touching the store', async () => {
      const group = await facade.createGroup({ displayName: 'Eng' });
      const updateGroup = jest.spyOn(store, 'updateGroup');

      let caught: unknown;
      try {
        await facade.replaceGroup(group.id, { displayName: 'Renamed' });
      } catch (error) {
        caught = error;
      }

      expect(caught).toBeInstanceOf(DirectoryError);
      expect(caught).toMatchObject({
        kind: 'MethodNotAllowed',
        message: 'Method Not Allowed. Use PATCH for group updates.',
      });
      expect(updateGroup).not.toHaveBeenCalled();
    });

    it('should check the gate before the resource exists', async () => {
      await expect(facade.replaceGroup('missing', { displayName: 'x' })).rejects.toMatchObject({
        kind: 'MethodNotAllowed',
      });
    });

    it('should follow override, clear and profile switch', async () => {
      const group = await facade.createGroup({ displayName: 'Eng' });

      facade.setOverride('groups_put', true);
      await expect(facade.replaceGroup(group.id, { displayName: 'Renamed' })).resolves.toMatchObject({
        displayName: 'Renamed',
      });

      facade.clearOverride('groups_put');
      await expect(facade.replaceGroup(group.id, { displayName: 'Again' })).rejects.toMatchObject({
        kind: 'MethodNotAllowed',
      });

      facade.setOverride('groups_put', true);
      facade.setProfile('restricted-put');
      expect(facade.getPolicyState().overrides).toEqual({});
      await expect(facade.replaceGroup(group.id, { displayName: 'Again' })).rejects.toMatchObject({
        kind: 'MethodNotAllowed',
      });
    });

    it('should block PATCH under restricted-patch', async () => {
      facade.setProfile('restricted-patch');
      const group = await facade.createGroup({ displayName: 'Eng' });

      await expect(
        facade.patchGroup({ kind: 'current-group', groupId: group.id, body: { Operations: [] } }),
      ).rejects.toMatchObject({ kind: 'MethodNotAllowed', message: 'Method Not Allowed. Use PUT for group updates.' });
    });

    it('should reject an unknown flag with InvalidConfig', () => {
      expect(() => facade.setOverride('users_put', true)).toThrow(DirectoryError);
    });
  });

  // ─── Membership scenario ────────────────────────────────────────────

  it('should keep the derived groups view consistent with legacy member patches', async () => {
    const alice = await facade.createUser({ userName: 'alice' });
    const eng = await facade.createGroup({ displayName: 'Eng', members: [{ value: alice.id }] });

    expect(await facade.getUserGroups(alice.id)).toEqual([{ value: eng.id, display: 'Eng' }]);

    const patched = await facade.patchGroup({
      kind: 'legacy-group',
      groupId: eng.id,
      body: { members: [{ value: alice.id, operation: 'delete' }] },
    });

    expect(patched.members).toEqual([]);
    expect(await facade.getUserGroups(alice.id)).toEqual([]);
  });

  // ─── Administration ─────────────────────────────────────────────────

  describe('administration', () => {
    it('should seed, report status and clear', async () => {
      await facade.seed([{ userName: 'alice' }], [{ displayName: 'Eng', members: ['alice'] }]);

      const status = await facade.status();
      expect(status.users).toBe(1);
      expect(status.groups).toBe(1);
      expect(status.config.profile).toBe('restricted-put');

      await facade.clearAll();
      expect(await facade.status()).toMatchObject({ users: 0, groups: 0 });
    });
  });
});
