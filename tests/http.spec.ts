import request from 'supertest';
import { describe, expect, it } from 'vitest';
import { createApp } from '../src/http/app.js';
import { HangingStore, MANAGER, cleanupRequest, seededRuntime } from './fixtures.js';
import { loadConfig } from '../src/config.js';
import { buildRuntime } from '../src/runtime.js';

async function app() {
  const { rt } = await seededRuntime();
  return createApp(rt);
}

describe('HTTP binding', () => {
  it('answers health and verb listing', async () => {
    const a = await app();
    const health = await request(a).get('/health');
    expect(health.status).toBe(200);
    expect(health.body).toEqual({ ok: true, store: 'memory', verbs: 28 });
    const verbs = await request(a).get('/verbs');
    expect(verbs.body.verbs).toContain('record_approval');
  });

  it('runs the request lifecycle', async () => {
    const a = await app();
    const created = await request(a).post('/program-requests').send({ ...cleanupRequest(), status: 'rejected' });
    expect(created.status).toBe(201);
    expect(created.body.status).toBe('submitted');
    const id: string = created.body.id;

    const review = await request(a).post(`/program-requests/${id}/review`).send({ reviewer: MANAGER });
    expect(review.status).toBe(200);
    expect(review.body).toEqual({ id, status: 'under_review' });

    const approval = await request(a).post('/approvals').send({ request_id: id, approved_by: MANAGER, decision: 'approved' });
    expect(approval.status).toBe(201);

    const again = await request(a).post('/approvals').send({ request_id: id, approved_by: MANAGER, decision: 'rejected' });
    expect(again.status).toBe(409);
    expect(again.body).toMatchObject({ ok: false, error: 'INVALID_TRANSITION', details: { from: 'approved', to: 'rejected' } });

    const listed = await request(a).get('/program-requests').query({ status: 'approved' });
    expect(listed.body).toEqual([expect.objectContaining({ id, status: 'approved' })]);
  });

  it('maps lifecycle errors to status codes', async () => {
    const a = await app();
    const missing = await request(a).get('/program-requests/nope');
    expect(missing.status).toBe(404);
    expect(missing.body).toMatchObject({ error: 'NOT_FOUND', message: 'programrequest nope not found' });

    const invalid = await request(a).post('/approvals').send({ request_id: 'x', decision: 'maybe' });
    expect(invalid.status).toBe(422);
    expect(invalid.body).toMatchObject({ error: 'VALIDATION_ERROR', details: { field: 'approved_by' } });

    const { body } = await request(a).post('/program-requests').send(cleanupRequest());
    const early = await request(a).post('/events').send({
      request_id: body.id, title: 'Cleanup', branch_code: 'RU-01',
      start_time: '2026-11-07T09:00:00Z', end_time: '2026-11-07T13:00:00Z',
    });
    expect(early.status).toBe(412);
    expect(early.body.error).toBe('PRECONDITION_FAILED');

    const badFilter = await request(a).get('/events').query({ status: 'postponed' });
    expect(badFilter.status).toBe(422);
  });

  it('treats empty query values as no filter', async () => {
    const a = await app();
    await request(a).post('/program-requests').send(cleanupRequest());
    const res = await request(a).get('/program-requests?status=&branch_code=RU-01');
    expect(res.status).toBe(200);
    expect(res.body).toHaveLength(1);
  });

  it('serves the program catalog and schema listing', async () => {
    const a = await app();
    const created = await request(a).post('/programs').send({ title: 'Campus cleanup', type: 'community_service' });
    expect(created.status).toBe(201);
    const listed = await request(a).get('/programs').query({ type: 'community_service' });
    expect(listed.body).toEqual([expect.objectContaining({ title: 'Campus cleanup', kpis: [] })]);
    const schema = await request(a).get('/schema');
    expect(schema.status).toBe(200);
    expect(schema.body).toEqual(expect.arrayContaining([
      { name: 'budgetitem', fields: [{ name: 'name', type: 'string' }, { name: 'amount', type: 'number' }] },
    ]));
  });

  it('rejects malformed JSON', async () => {
    const a = await app();
    const res = await request(a).post('/branches').set('Content-Type', 'application/json').send('{"code":');
    expect(res.status).toBe(400);
    expect(res.body).toEqual({ ok: false, error: 'INVALID_JSON', message: 'invalid json' });
  });

  it('reports a stalled store as unavailable', async () => {
    const rt = buildRuntime({ ...loadConfig({}), storeTimeoutMs: 20 }, new HangingStore());
    const res = await request(createApp(rt)).get('/branches');
    expect(res.status).toBe(503);
    expect(res.body).toMatchObject({ error: 'STORE_UNAVAILABLE', message: 'store find branch failed: timed out after 20ms' });
  });

  it('marks notifications read', async () => {
    const a = await app();
    const created = await request(a).post('/notifications').send({ user_email: 'avery.park@example.org', title: 'Reminder', message: 'Report due' });
    expect(created.status).toBe(201);
    const read = await request(a).post(`/notifications/${created.body.id}/read`);
    expect(read.body).toEqual({ id: created.body.id, is_read: true });
  });
});
