import type { INestApplication } from '@nestjs/common';
import request from 'supertest';

import { createTestApp } from './helpers/app.helper';
import { V2_ERROR } from './helpers/fixtures';

describe('Shared secret authentication (E2E)', () => {
  let app: INestApplication;

  beforeAll(async () => {
    app = await createTestApp({ SCIM_SHARED_SECRET: 'test-secret' });
  });

  afterAll(async () => {
    await app.close();
    delete process.env.SCIM_SHARED_SECRET;
  });

  it('should reject a request without a token', async () => {
    const res = await request(app.getHttpServer()).get('/scim/v2/Users').expect(401);

    expect(res.headers['www-authenticate']).toBe('Bearer realm="SCIM"');
    expect(res.body).toEqual({
      schemas: [V2_ERROR],
      detail: 'Missing bearer token.',
      status: '401',
      scimType: 'invalidToken',
    });
  });

  it('should use the legacy envelope on v1 routes', async () => {
    const res = await request(app.getHttpServer())
      .get('/scim/v1/Users')
      .set('Authorization', 'Bearer wrong-secret')
      .expect(401);

    expect(res.body).toEqual({ Errors: [{ description: 'Invalid bearer token.', code: 401 }] });
  });

  it('should protect admin routes too', async () => {
    await request(app.getHttpServer()).get('/admin/status').expect(401);
  });

  it('should accept the configured secret', async () => {
    await request(app.getHttpServer())
      .get('/scim/v2/Users')
      .set('Authorization', 'Bearer test-secret')
      .expect(200);
    await request(app.getHttpServer()).get('/admin/status').set('Authorization', 'Bearer test-secret').expect(200);
  });
});
