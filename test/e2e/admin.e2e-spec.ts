import type { INestApplication } from '@nestjs/common';
import request from 'supertest';

import { createTestApp } from './helpers/app.helper';
import { V2_ERROR, validUser } from './helpers/fixtures';

describe('Admin API (E2E)', () => {
  let app: INestApplication;

  beforeAll(async () => {
    app = await createTestApp({ SCIM_PROFILE: undefined, SCIM_GROUPS_PUT: undefined, SCIM_GROUPS_PATCH: undefined });
  });

  afterAll(async () => {
    await app.close();
  });

  beforeEach(async () => {
    await request(app.getHttpServer()).delete('/admin/clear').expect(200);
  });

  it('should seed users and groups with members resolved by userName', async () => {
    const seeded = await request(app.getHttpServer())
      .post('/admin/seed')
      .send({
        users: [{ userName: 'alice', displayName: 'Alice' }, { userName: 'bob' }],
        groups: [{ displayName: 'Eng', members: ['alice', 'bob', 'carol'] }],
      })
      .expect(201);
    expect(seeded.body).toEqual({ message: 'Data seeded successfully', users: 2, groups: 1 });

    const groups = await request(app.getHttpServer())
      .get('/scim/v2/Groups')
      .query({ filter: 'displayName eq "Eng"' })
      .expect(200);
    expect(groups.body.Resources[0].members.map((m: { display: string }) => m.display)).toEqual(['Alice', 'bob']);

    const status = await request(app.getHttpServer()).get('/admin/status').expect(200);
    expect(status.body).toMatchObject({ users: 2, groups: 1, config: { profile: 'permissive' } });
  });

  it('should replace existing data when seeding', async () => {
    await request(app.getHttpServer()).post('/scim/v2/Users').send(validUser({ userName: 'old' })).expect(201);

    await request(app.getHttpServer()).post('/admin/seed').send({ users: [{ userName: 'new' }] }).expect(201);

    const users = await request(app.getHttpServer()).get('/scim/v2/Users').expect(200);
    expect(users.body.Resources.map((u: { userName: string }) => u.userName)).toEqual(['new']);
  });

  it('should clear everything', async () => {
    await request(app.getHttpServer()).post('/scim/v2/Users').send(validUser()).expect(201);

    const cleared = await request(app.getHttpServer()).delete('/admin/clear').expect(200);
    expect(cleared.body).toEqual({ message: 'All data cleared' });

    const status = await request(app.getHttpServer()).get('/admin/status').expect(200);
    expect(status.body).toMatchObject({ users: 0, groups: 0 });
  });

  it('should reject a malformed seed body', async () => {
    const res = await request(app.getHttpServer())
      .post('/admin/seed')
      .send({ groups: [{ members: ['alice'] }] })
      .expect(400);

    expect(res.body).toMatchObject({ schemas: [V2_ERROR], status: '400', scimType: 'invalidValue' });
  });

  it('should reject seed users that are not objects', async () => {
    const res = await request(app.getHttpServer())
      .post('/admin/seed')
      .send({ users: [{ userName: 'alice' }, 'bob'] })
      .expect(400);

    expect(res.body).toEqual({
      schemas: [V2_ERROR],
      detail: 'Seed user at index 1 must be an object.',
      status: '400',
      scimType: 'invalidValue',
    });
  });

  it('should reject an override value other than true or false', async () => {
    await request(app.getHttpServer()).put('/admin/config/groups_put').query({ value: 'banana' }).expect(400);

    const config = await request(app.getHttpServer()).get('/admin/config').expect(200);
    expect(config.body.overrides).toEqual({});
  });

  it('should answer unknown routes in the current envelope', async () => {
    const res = await request(app.getHttpServer()).get('/nope').expect(404);

    expect(res.headers['content-type']).toContain('application/json');
    expect(res.body).toEqual({ schemas: [V2_ERROR], detail: 'Cannot GET /nope', status: '404' });
  });

  describe('logs', () => {
    afterEach(async () => {
      await request(app.getHttpServer()).put('/admin/logs/config').send({ globalLevel: 'OFF' }).expect(200);
    });

    it('should correlate entries by X-Request-Id', async () => {
      await request(app.getHttpServer()).put('/admin/logs/config').send({ globalLevel: 'INFO' }).expect(200);
      await request(app.getHttpServer()).delete('/admin/logs/recent').expect(204);

      const created = await request(app.getHttpServer())
        .post('/scim/v2/Users')
        .set('X-Request-Id', 'req-e2e-1')
        .send(validUser())
        .expect(201);
      expect(created.headers['x-request-id']).toBe('req-e2e-1');

      const recent = await request(app.getHttpServer())
        .get('/admin/logs/recent')
        .query({ requestId: 'req-e2e-1', category: 'scim.user' })
        .expect(200);

      expect(recent.body.count).toBe(1);
      expect(recent.body.entries[0]).toMatchObject({
        level: 'INFO',
        category: 'scim.user',
        message: 'User created',
        requestId: 'req-e2e-1',
        dialect: 'v2',
        data: { userName: 'alice' },
      });
    });
  });
});
