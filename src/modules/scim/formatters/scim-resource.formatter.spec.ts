import type { GroupRecord } from '../../../domain/models/group.model';
import type { UserRecord } from '../../../domain/models/user.model';
import { formatGroup, formatListResponse, formatUser } from './scim-resource.formatter';

const created = new Date('2026-01-02T03:04:05.000Z');
const lastModified = new Date('2026-01-03T03:04:05.000Z');

const minimalUser: UserRecord = {
  id: 'u1',
  userName: 'alice',
  active: true,
  meta: { resourceType: 'User', created, lastModified },
};

describe('scim-resource.formatter', () => {
  // ─── formatUser ───────────────────────────────────────────────────

  describe('formatUser', () => {
    it('should emit only required attributes for a minimal user', () => {
      expect(formatUser(minimalUser, [], 'v2', 'http://localhost/scim/v2')).toEqual({
        schemas: ['urn:ietf:params:scim:schemas:core:2.0:User'],
        id: 'u1',
        userName: 'alice',
        active: true,
        meta: {
          resourceType: 'User',
          created: '2026-01-02T03:04:05.000Z',
          lastModified: '2026-01-03T03:04:05.000Z',
          location: 'http://localhost/scim/v2/Users/u1',
        },
      });
    });

    it('should never emit the password', () => {
      const resource = formatUser({ ...minimalUser, password: 'test-secret' }, [], 'v1', 'http://h/scim/v1');
      expect(resource).not.toHaveProperty('password');
      expect(resource.schemas).toEqual(['urn:scim:schemas:core:1.0']);
    });

    it('should attach the derived groups only when non-empty', () => {
      const resource = formatUser(minimalUser, [{ value: 'g1', display: 'Eng' }], 'v2', 'http://h/scim/v2');
      expect(resource.groups).toEqual([{ value: 'g1', display: 'Eng' }]);
    });

    it('should key the enterprise extension by the URN it came from', () => {
      const resource = formatUser(
        { ...minimalUser, enterpriseExtension: { dialect: 'v1', department: 'R&D', manager: { managerId: 'm1' } } },
        [],
        'v2',
        'http://h/scim/v2',
      );

      expect(resource.schemas).toEqual([
        'urn:ietf:params:scim:schemas:core:2.0:User',
        'urn:scim:schemas:extension:enterprise:1.0',
      ]);
      expect(resource['urn:scim:schemas:extension:enterprise:1.0']).toEqual({
        department: 'R&D',
        manager: { managerId: 'm1' },
      });
    });
  });

  // ─── formatGroup ──────────────────────────────────────────────────

  describe('formatGroup', () => {
    it('should render members and omit an absent externalId', () => {
      const group: GroupRecord = {
        id: 'g1',
        displayName: 'Eng',
        members: [{ value: 'u1', display: 'alice', type: 'User' }],
        meta: { resourceType: 'Group', created, lastModified },
      };

      const resource = formatGroup(group, 'v1', 'http://h/scim/v1');

      expect(resource).not.toHaveProperty('externalId');
      expect(resource.members).toEqual([{ value: 'u1', display: 'alice', type: 'User' }]);
      expect(resource.meta.location).toBe('http://h/scim/v1/Groups/g1');
    });
  });

  // ─── formatListResponse ───────────────────────────────────────────

  describe('formatListResponse', () => {
    it('should use the dialect list schema and report the page size', () => {
      const user = formatUser(minimalUser, [], 'v1', 'http://h/scim/v1');

      expect(formatListResponse('v1', { resources: [minimalUser], total: 7 }, [user], 3)).toEqual({
        schemas: ['urn:scim:schemas:core:1.0'],
        totalResults: 7,
        startIndex: 3,
        itemsPerPage: 1,
        Resources: [user],
      });
      expect(formatListResponse('v2', { resources: [], total: 0 }, [], 1).schemas).toEqual([
        'urn:ietf:params:scim:api:messages:2.0:ListResponse',
      ]);
    });
  });
});
