import { beforeEach, describe, expect, it } from 'vitest';
import { clearEvents, getEvents } from '../src/engine/events.js';
import { VerbContext, getVerb, listVerbs, runVerb } from '../src/verbs/index.js';
import { MANAGER, cleanupRequest, seededRuntime } from './fixtures.js';

async function context(): Promise<VerbContext> {
  const { rt } = await seededRuntime();
  return { lifecycle: rt.lifecycle, referenceData: rt.referenceData };
}

describe('verb registry', () => {
  beforeEach(() => clearEvents());

  it('exposes every lifecycle and catalog operation', () => {
    expect(listVerbs()).toHaveLength(28);
    expect(listVerbs()).toEqual(expect.arrayContaining([
      'submit_request', 'begin_review', 'record_approval', 'schedule_event', 'update_event_status',
      'submit_report', 'submit_evaluation', 'list_requests', 'mark_notification_read', 'create_program', 'describe_schema',
    ]));
  });

  it('reports an unknown verb as not found', async () => {
    expect(() => getVerb('archive_request')).toThrow('verb archive_request not found');
    const ctx = await context();
    await expect(runVerb('archive_request', {}, ctx)).rejects.toMatchObject({ code: 'NOT_FOUND' });
  });

  it('runs a decision end to end and records timing events', async () => {
    const ctx = await context();
    const submitted = await runVerb('submit_request', cleanupRequest(), ctx, 'corr-1');
    expect(submitted).toMatchObject({ status: 'submitted' });
    const [request] = await ctx.lifecycle.listRequests();
    if (!request) throw new Error('request was not stored');
    await runVerb('record_approval', { request_id: request.id, approved_by: MANAGER, decision: 'approved' }, ctx, 'corr-1');
    expect(await runVerb('get_request', { request_id: request.id }, ctx)).toMatchObject({ status: 'approved' });
    expect(getEvents({ type: 'verb.end', correlation_id: 'corr-1' })).toHaveLength(2);
  });

  it('rejects unknown filter keys', async () => {
    const ctx = await context();
    await expect(runVerb('list_requests', { colour: 'red' }, ctx)).rejects.toMatchObject({ code: 'VALIDATION_ERROR', field: 'colour' });
    await expect(runVerb('list_branches', { region: 'North' }, ctx)).rejects.toMatchObject({ field: 'region' });
    const [invalid] = getEvents({ type: 'verb.invalid_args' });
    expect(invalid?.payload).toMatchObject({ verb: 'list_requests' });
    expect(getEvents({ type: 'verb.error' })).toHaveLength(2);
  });

  it('validates program types and lists record shapes', async () => {
    const ctx = await context();
    await expect(runVerb('create_program', { title: 'Trip', type: 'excursion' }, ctx))
      .rejects.toMatchObject({ code: 'VALIDATION_ERROR', field: 'type' });
    const models = await runVerb('describe_schema', {}, ctx);
    expect(models).toEqual(expect.arrayContaining([expect.objectContaining({ name: 'program' })]));
  });

  it('treats missing arguments as an empty object', async () => {
    const ctx = await context();
    expect(await runVerb('list_branches', undefined, ctx)).toEqual([expect.objectContaining({ code: 'RU-01' })]);
    await expect(runVerb('get_event', undefined, ctx)).rejects.toMatchObject({ field: 'event_id' });
  });
});
