import type { INestApplication } from '@nestjs/common';
import request from 'supertest';

import { createTestApp } from './helpers/app.helper';
import { V2_ERROR, V2_PATCH, validGroup } from './helpers/fixtures';

const PATCH_BODY = { schemas: [V2_PATCH], Operations: [{ op: 'add', path: 'members', value: [] as unknown[] }] };

describe('Group verb policy (E2E)', () => {
  describe('restricted-put profile', () => {
    let app: INestApplication;
    let groupId: string;

    beforeAll(async () => {
      app = await createTestApp({ SCIM_PROFILE: 'restricted-put', SCIM_GROUPS_PUT: undefined, SCIM_GROUPS_PATCH: undefined });
    });

    afterAll(async () => {
      await app.close();
      delete process.env.SCIM_PROFILE;
    });

    beforeEach(async () => {
      await request(app.getHttpServer()).put('/admin/profile/restricted-put').expect(200);
      const res = await request(app.getHttpServer()).post('/scim/v2/Groups').send(validGroup()).expect(201);
      groupId = res.body.id;
    });

    it('should block PUT with 405 in both envelopes', async () => {
      const current = await request(app.getHttpServer())
        .put(`/scim/v2/Groups/${groupId}`)
        .send(validGroup({ displayName: 'Renamed' }))
        .expect(405);
      expect(current.body).toEqual({
        schemas: [V2_ERROR],
        detail: 'Method Not Allowed. Use PATCH for group updates.',
        status: '405',
      });

      const legacy = await request(app.getHttpServer())
        .put(`/scim/v1/Groups/${groupId}`)
        .send(validGroup({ displayName: 'Renamed' }))
        .expect(405);
      expect(legacy.body).toEqual({
        Errors: [{ description: 'Method Not Allowed. Use PATCH for group updates.', code: 405 }],
      });

      const unchanged = await request(app.getHttpServer()).get(`/scim/v2/Groups/${groupId}`).expect(200);
      expect(unchanged.body.displayName).toBe('Eng');
    });

    it('should report the profile as the source of each flag', async () => {
      const res = await request(app.getHttpServer()).get('/admin/config').expect(200);

      expect(res.body).toEqual({
        profile: 'restricted-put',
        effective: { groups_put: false, groups_patch: true },
        sources: { groups_put: 'profile', groups_patch: 'profile' },
        overrides: {},
        environment: {},
      });
    });

    it('should honour a runtime override until it is cleared', async () => {
      const set = await request(app.getHttpServer()).put('/admin/config/groups_put?value=true').expect(200);
      expect(set.body.message).toBe('Override set: groups_put=true');

      await request(app.getHttpServer())
        .put(`/scim/v2/Groups/${groupId}`)
        .send(validGroup({ displayName: 'Renamed' }))
        .expect(200);

      const cleared = await request(app.getHttpServer()).delete('/admin/config/groups_put').expect(200);
      expect(cleared.body.message).toBe('Override cleared: groups_put');

      await request(app.getHttpServer()).put(`/scim/v2/Groups/${groupId}`).send(validGroup()).expect(405);
    });

    it('should drop overrides when the profile changes', async () => {
      await request(app.getHttpServer()).put('/admin/config/groups_patch?value=false').expect(200);

      const switched = await request(app.getHttpServer()).put('/admin/profile/restricted-patch').expect(200);
      expect(switched.body.message).toBe("Profile changed to 'restricted-patch'");
      expect(switched.body.config.overrides).toEqual({});

      await request(app.getHttpServer()).put(`/scim/v2/Groups/${groupId}`).send(validGroup()).expect(200);
      const blocked = await request(app.getHttpServer())
        .patch(`/scim/v2/Groups/${groupId}`)
        .send(PATCH_BODY)
        .expect(405);
      expect(blocked.body.detail).toBe('Method Not Allowed. Use PUT for group updates.');
    });

    it('should answer invalid admin input in the current envelope as plain JSON', async () => {
      const profile = await request(app.getHttpServer()).put('/admin/profile/bogus').expect(400);
      expect(profile.headers['content-type']).toContain('application/json');
      expect(profile.body).toEqual({
        schemas: [V2_ERROR],
        detail: "Invalid profile 'bogus'. Valid profiles: permissive, restricted-put, restricted-patch",
        status: '400',
      });

      const flag = await request(app.getHttpServer()).put('/admin/config/users_put?value=true').expect(400);
      expect(flag.body.detail).toBe("Invalid setting 'users_put'. Valid settings: groups_patch, groups_put");

      const value = await request(app.getHttpServer()).put('/admin/config/groups_put').expect(400);
      expect(value.body.detail).toBe("Query parameter 'value' must be true or false.");
    });
  });

  describe('environment layer', () => {
    let app: INestApplication;

    beforeAll(async () => {
      app = await createTestApp({ SCIM_PROFILE: 'restricted-put', SCIM_GROUPS_PUT: 'true', SCIM_GROUPS_PATCH: undefined });
    });

    afterAll(async () => {
      await app.close();
      delete process.env.SCIM_PROFILE;
      delete process.env.SCIM_GROUPS_PUT;
    });

    it('should let the environment beat the profile and survive a profile switch', async () => {
      const before = await request(app.getHttpServer()).get('/admin/config').expect(200);
      expect(before.body.effective.groups_put).toBe(true);
      expect(before.body.sources.groups_put).toBe('environment');

      await request(app.getHttpServer()).put('/admin/profile/restricted-put').expect(200);

      const group = await request(app.getHttpServer()).post('/scim/v2/Groups').send(validGroup()).expect(201);
      await request(app.getHttpServer())
        .put(`/scim/v2/Groups/${group.body.id}`)
        .send(validGroup({ displayName: 'Renamed' }))
        .expect(200);
    });
  });
});
