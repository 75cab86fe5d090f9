import request from 'supertest';
import { describe, it, expect } from '@jest/globals';
import { FakeTextService } from '@/tests/helpers/fake-text-service';
import { authHeaders, createTestApp } from '@/tests/helpers/test-app';

describe('app', () => {
  it('reports healthy with a store and a provider', async () => {
    const { app } = createTestApp({ providers: { openai: new FakeTextService('x') } });

    const response = await request(app).get('/health');

    expect(response.status).toBe(200);
    expect(response.body.status).toBe('healthy');
  });

  it('stays up but degraded without providers', async () => {
    const { app } = createTestApp();

    const response = await request(app).get('/health');

    expect(response.status).toBe(200);
    expect(response.body.status).toBe('degraded');
  });

  it('returns 503 when the store is unreachable', async () => {
    const { app } = createTestApp({ databaseUp: false });

    const response = await request(app).get('/health');

    expect(response.status).toBe(503);
  });

  it('answers unknown paths with a JSON 404', async () => {
    const { app } = createTestApp();

    const response = await request(app).get('/nowhere').set(authHeaders);

    expect(response.status).toBe(404);
    expect(response.body).toEqual({
      success: false,
      error: { type: 'NOT_FOUND', message: 'Not found', details: { path: '/nowhere' } },
    });
  });
});
