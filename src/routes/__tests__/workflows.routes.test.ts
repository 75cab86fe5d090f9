import request from 'supertest';
import { describe, it, expect, beforeEach } from '@jest/globals';
import type { Express } from 'express';
import { authHeaders, createTestApp, TEST_API_KEY } from '@/tests/helpers/test-app';
import type { InMemoryRepositories } from '@/tests/helpers/in-memory-store';

const OTHER_USER_ID = '66666666-6666-4666-8666-666666666666';

describe('workflow routes', () => {
  let app: Express;
  let repositories: InMemoryRepositories;

  beforeEach(() => {
    ({ app, repositories } = createTestApp());
  });

  const createWorkflow = () =>
    request(app)
      .post('/workflows')
      .set(authHeaders)
      .send({ title: 'Launch video', contentType: 'Video Script', platforms: ['YouTube'] });

  describe('authentication', () => {
    it('rejects a missing API key', async () => {
      const response = await request(app).get('/workflows').set('x-user-id', authHeaders['x-user-id']);

      expect(response.status).toBe(401);
      expect(response.body).toEqual({
        success: false,
        error: { type: 'UNAUTHORIZED', message: 'Unauthorized', details: {} },
      });
    });

    it('rejects a wrong API key', async () => {
      const response = await request(app)
        .get('/workflows')
        .set({ ...authHeaders, 'x-api-key': 'wrong-secret' });

      expect(response.status).toBe(401);
    });

    it('requires a UUID user id', async () => {
      const response = await request(app)
        .get('/workflows')
        .set({ 'x-api-key': TEST_API_KEY, 'x-user-id': 'alice' });

      expect(response.status).toBe(400);
      expect(response.body.error.message).toBe('x-user-id header must be a UUID');
    });
  });

  it('creates a workflow with its checklist', async () => {
    const response = await createWorkflow();

    expect(response.status).toBe(201);
    expect(response.body.success).toBe(true);
    expect(response.body.data.workflow).toMatchObject({
      userId: authHeaders['x-user-id'],
      title: 'Launch video',
      status: 'planned',
    });
    expect(response.body.data.tasks).toHaveLength(7);
    expect(response.body.data.warnings).toEqual([]);
  });

  it('returns 400 with field errors for invalid input', async () => {
    const response = await request(app).post('/workflows').set(authHeaders).send({ contentType: 'Blog Post' });

    expect(response.status).toBe(400);
    expect(response.body.error.type).toBe('VALIDATION_ERROR');
    expect(response.body.error.details.fieldErrors.title).toEqual(['Required']);
  });

  it('returns 400 for a malformed JSON body', async () => {
    const response = await request(app)
      .post('/workflows')
      .set(authHeaders)
      .set('content-type', 'application/json')
      .send('{"title":');

    expect(response.status).toBe(400);
    expect(response.body.error).toEqual({
      type: 'VALIDATION_ERROR',
      message: 'Malformed JSON body',
      details: {},
    });
  });

  it('lists only the current user workflows', async () => {
    await createWorkflow();
    await request(app)
      .post('/workflows')
      .set({ ...authHeaders, 'x-user-id': OTHER_USER_ID })
      .send({ title: 'Someone else', contentType: 'Blog Post' });

    const response = await request(app).get('/workflows').set(authHeaders);

    expect(response.status).toBe(200);
    expect(response.body.data.map((workflow: { title: string }) => workflow.title)).toEqual(['Launch video']);
  });

  it('advances status and rejects a skipped step with 409', async () => {
    const created = await createWorkflow();
    const id: string = created.body.data.workflow.id;

    const skipped = await request(app)
      .patch(`/workflows/${id}/status`)
      .set(authHeaders)
      .send({ status: 'published' });
    const started = await request(app)
      .patch(`/workflows/${id}/status`)
      .set(authHeaders)
      .send({ status: 'in_progress' });

    expect(skipped.status).toBe(409);
    expect(skipped.body.error.type).toBe('INVALID_TRANSITION');
    expect(started.status).toBe(200);
    expect(started.body.data.status).toBe('in_progress');
  });

  it('returns 503 when the store fails', async () => {
    repositories.workflows.failing.add('list');

    const response = await request(app).get('/workflows').set(authHeaders);

    expect(response.status).toBe(503);
    expect(response.body.error.type).toBe('STORE_ERROR');
  });

  it('lists and completes checklist tasks', async () => {
    const created = await createWorkflow();
    const id: string = created.body.data.workflow.id;

    const tasks = await request(app).get(`/workflows/${id}/tasks`).set(authHeaders);
    const taskId: string = tasks.body.data[0].id;
    const completed = await request(app)
      .patch(`/workflows/tasks/${taskId}`)
      .set(authHeaders)
      .send({ status: 'completed' });

    expect(tasks.body.data[0].title).toBe('Define video concept');
    expect(completed.status).toBe(200);
    expect(completed.body.data.status).toBe('completed');
    expect(typeof completed.body.data.completedAt).toBe('string');
  });

  it('reports dashboard metrics', async () => {
    await createWorkflow();

    const response = await request(app).get('/workflows/metrics').set(authHeaders);

    expect(response.body).toEqual({
      success: true,
      data: {
        total: 1,
        planned: 1,
        inProgress: 0,
        completed: 0,
        completionRate: 0,
        platformDistribution: { YouTube: 1 },
        contentTypeDistribution: { 'Video Script': 1 },
      },
    });
  });

  it('deletes a workflow and then reports it missing', async () => {
    const created = await createWorkflow();
    const id: string = created.body.data.workflow.id;

    const deleted = await request(app).delete(`/workflows/${id}`).set(authHeaders);
    const again = await request(app).delete(`/workflows/${id}`).set(authHeaders);

    expect(deleted.status).toBe(200);
    expect(deleted.body.data).toEqual({ id });
    expect(again.status).toBe(404);
  });

  it('returns 404 to another user for status, tasks and delete', async () => {
    const created = await createWorkflow();
    const id: string = created.body.data.workflow.id;
    const otherUser = { ...authHeaders, 'x-user-id': OTHER_USER_ID };

    const status = await request(app)
      .patch(`/workflows/${id}/status`)
      .set(otherUser)
      .send({ status: 'in_progress' });
    const tasks = await request(app).get(`/workflows/${id}/tasks`).set(otherUser);
    const deleted = await request(app).delete(`/workflows/${id}`).set(otherUser);

    expect(status.status).toBe(404);
    expect(tasks.status).toBe(404);
    expect(deleted.status).toBe(404);
    expect(repositories.workflows.rows).toHaveLength(1);
    expect(repositories.workflows.rows[0]?.status).toBe('planned');
  });

  it('returns 404, not 503, for a malformed workflow id', async () => {
    repositories.workflows.failing.add('findById');

    const response = await request(app).delete('/workflows/not-a-uuid').set(authHeaders);

    expect(response.status).toBe(404);
    expect(response.body.error.type).toBe('NOT_FOUND');
  });
});
