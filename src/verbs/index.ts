// Verb registry: the transport-neutral operation contract. Each verb validates its own
// arguments and delegates to the lifecycle or the reference-data catalog.
import { z } from 'zod';
import { ReferenceData } from '../adapters/reference_data.js';
import { NotFoundError, errorMessage } from '../engine/errors.js';
import { logEvent } from '../engine/events.js';
import { ProgramLifecycle } from '../engine/program_lifecycle.js';
import { describeRecords } from '../models/introspection.js';
import {
  approvalFilterSchema,
  beginReviewSchema,
  createBranchSchema,
  createNotificationSchema,
  createProgramSchema,
  createResourceSchema,
  createRoleSchema,
  createUserSchema,
  eventFilterSchema,
  notificationFilterSchema,
  outcomeFilterSchema,
  programFilterSchema,
  recordApprovalSchema,
  requestFilterSchema,
  resourceFilterSchema,
  scheduleEventSchema,
  submitEvaluationSchema,
  submitReportSchema,
  submitRequestSchema,
  updateEventStatusSchema,
  userFilterSchema,
} from '../models/schemas.js';
import { emptyArgsSchema, eventIdSchema, notificationIdSchema, requestIdSchema, validateVerbArgs } from './schemas.js';

export type VerbContext = {
  lifecycle: ProgramLifecycle;
  referenceData: ReferenceData;
};

export type Verb = {
  name: string;
  run: (args: unknown, ctx: VerbContext) => Promise<unknown>;
};

const registry: Record<string, Verb> = {};

export function register<S extends z.ZodTypeAny>(
  name: string,
  schema: S,
  handler: (args: z.output<S>, ctx: VerbContext) => Promise<unknown>,
) {
  if (registry[name]) throw new Error(`Verb already registered: ${name}`);
  registry[name] = { name, run: (args, ctx) => handler(validateVerbArgs(name, schema, args), ctx) };
}

export function getVerb(name: string): Verb {
  const v = registry[name];
  if (!v) throw new NotFoundError('verb', name);
  return v;
}

export function listVerbs() {
  return Object.keys(registry);
}

export async function runVerb(name: string, args: unknown, ctx: VerbContext, correlation_id?: string): Promise<unknown> {
  const verb = getVerb(name);
  const start = Date.now();
  logEvent('verb.start', { verb: name }, correlation_id);
  try {
    const result = await verb.run(args, ctx);
    logEvent('verb.end', { verb: name, ok: true, duration_ms: Date.now() - start }, correlation_id);
    return result;
  } catch (e) {
    logEvent('verb.error', { verb: name, ok: false, duration_ms: Date.now() - start, error: errorMessage(e) }, correlation_id);
    throw e;
  }
}

// ---- Program requests ----
register('submit_request', submitRequestSchema, (args, ctx) => ctx.lifecycle.submitRequest(args));
register('get_request', requestIdSchema, (args, ctx) => ctx.lifecycle.getRequest(args.request_id));
register('list_requests', requestFilterSchema, (args, ctx) => ctx.lifecycle.listRequests(args));
register('begin_review', beginReviewSchema, (args, ctx) => ctx.lifecycle.beginReview(args));

// ---- Approvals ----
register('record_approval', recordApprovalSchema, (args, ctx) => ctx.lifecycle.recordApproval(args));
register('list_approvals', approvalFilterSchema, (args, ctx) => ctx.lifecycle.listApprovals(args));

// ---- Events ----
register('schedule_event', scheduleEventSchema, (args, ctx) => ctx.lifecycle.scheduleEvent(args));
register('get_event', eventIdSchema, (args, ctx) => ctx.lifecycle.getEvent(args.event_id));
register('update_event_status', updateEventStatusSchema, (args, ctx) => ctx.lifecycle.updateEventStatus(args));
register('list_events', eventFilterSchema, (args, ctx) => ctx.lifecycle.listEvents(args));

// ---- Reports & evaluations ----
register('submit_report', submitReportSchema, (args, ctx) => ctx.lifecycle.submitReport(args));
register('list_reports', outcomeFilterSchema, (args, ctx) => ctx.lifecycle.listReports(args));
register('submit_evaluation', submitEvaluationSchema, (args, ctx) => ctx.lifecycle.submitEvaluation(args));
register('list_evaluations', outcomeFilterSchema, (args, ctx) => ctx.lifecycle.listEvaluations(args));

// ---- Reference data ----
register('create_branch', createBranchSchema, (args, ctx) => ctx.referenceData.createBranch(args));
register('list_branches', emptyArgsSchema, (_args, ctx) => ctx.referenceData.listBranches());
register('create_role', createRoleSchema, (args, ctx) => ctx.referenceData.createRole(args));
register('list_roles', emptyArgsSchema, (_args, ctx) => ctx.referenceData.listRoles());
register('create_user', createUserSchema, (args, ctx) => ctx.referenceData.createUser(args));
register('list_users', userFilterSchema, (args, ctx) => ctx.referenceData.listUsers(args));
register('create_program', createProgramSchema, (args, ctx) => ctx.referenceData.createProgram(args));
register('list_programs', programFilterSchema, (args, ctx) => ctx.referenceData.listPrograms(args));
register('create_resource', createResourceSchema, (args, ctx) => ctx.referenceData.createResource(args));
register('list_resources', resourceFilterSchema, (args, ctx) => ctx.referenceData.listResources(args));
register('create_notification', createNotificationSchema, (args, ctx) => ctx.referenceData.createNotification(args));
register('list_notifications', notificationFilterSchema, (args, ctx) => ctx.referenceData.listNotifications(args));
register('mark_notification_read', notificationIdSchema, (args, ctx) => ctx.referenceData.markNotificationRead(args.notification_id));

// ---- Introspection ----
register('describe_schema', emptyArgsSchema, async () => describeRecords());
