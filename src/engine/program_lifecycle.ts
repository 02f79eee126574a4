import { DocumentStore, StoredRecord } from '../adapters/document_store.js';
import { NotifyParams, Notifier } from '../adapters/notifier.js';
import { ReferenceKind, ReferenceValidator } from '../adapters/reference_validator.js';
import {
  ApprovalFilter,
  BeginReviewInput,
  EventFilter,
  OutcomeFilter,
  RecordApprovalInput,
  RequestFilter,
  ScheduleEventInput,
  SubmitEvaluationInput,
  SubmitReportInput,
  SubmitRequestInput,
  UpdateEventStatusInput,
  approvalFilterSchema,
  beginReviewSchema,
  eventFilterSchema,
  outcomeFilterSchema,
  parseInput,
  recordApprovalSchema,
  requestFilterSchema,
  scheduleEventSchema,
  submitEvaluationSchema,
  submitReportSchema,
  submitRequestSchema,
  updateEventStatusSchema,
} from '../models/schemas.js';
import { EventStatus, RequestStatus } from '../models/types.js';
import { logError, logWarn } from '../util/logger.js';
import {
  InconsistentReferenceError,
  InvalidTransitionError,
  NotFoundError,
  PreconditionFailedError,
  StoreUnavailableError,
  ValidationError,
  errorMessage,
} from './errors.js';
import { logEvent } from './events.js';
import { lockKey, withLock } from './locks.js';
import { eventMachine, requestMachine } from './machines.js';

export interface LifecycleDeps {
  store: DocumentStore;
  references: ReferenceValidator;
  /** When absent, no lifecycle notifications are written. */
  notifier?: Notifier;
}

type LifecycleNotice = Omit<NotifyParams, 'user_email'> & {
  /** Email or user id of the person to notify. */
  requester?: string | null;
};

export interface RequestTransitionResult {
  id: string;
  request_id: string;
  status: RequestStatus;
}

/**
 * Program request lifecycle: submission, review, approval decisions, event scheduling and the
 * reports and evaluations that follow. Holds no authoritative state; every call reads the
 * store, validates, and writes back.
 */
export class ProgramLifecycle {
  private readonly store: DocumentStore;
  private readonly references: ReferenceValidator;
  private readonly notifier?: Notifier;

  constructor(deps: LifecycleDeps) {
    this.store = deps.store;
    this.references = deps.references;
    this.notifier = deps.notifier;
  }

  // ---- Requests ----

  async submitRequest(input: SubmitRequestInput): Promise<{ id: string; status: RequestStatus }> {
    const req = parseInput(submitRequestSchema, input);
    await this.requireReference('branch', req.branch_code, 'branch_code');
    if (req.requested_by) await this.requireReference('user', req.requested_by, 'requested_by');
    const status = requestMachine.initial;
    const id = await this.store.create('programrequest', {
      branch_code: req.branch_code,
      program_title: req.program_title,
      program_type: req.program_type,
      description: req.description ?? null,
      proposed_date: req.proposed_date ?? null,
      location: req.location ?? null,
      budget: req.budget,
      requested_by: req.requested_by ?? null,
      status,
    });
    logEvent('request.submitted', { id, branch_code: req.branch_code, program_type: req.program_type }, id);
    return { id, status };
  }

  async getRequest(id: string): Promise<StoredRecord<'programrequest'>> {
    const request = await this.store.findById('programrequest', id);
    if (!request) throw new NotFoundError('programrequest', id);
    return request;
  }

  /** Unbounded: returns every match. */
  async listRequests(filter: RequestFilter = {}) {
    return this.store.find('programrequest', parseInput(requestFilterSchema, filter));
  }

  async beginReview(input: BeginReviewInput): Promise<{ id: string; status: RequestStatus }> {
    const { request_id, reviewer } = parseInput(beginReviewSchema, input);
    const target: RequestStatus = 'under_review';
    const request = await withLock(lockKey('programrequest', request_id), async () => {
      const current = await this.getRequest(request_id);
      this.assertRequestTransition(current.status, target);
      await this.requireReference('user', reviewer, 'reviewer');
      await this.transitionRequest(current, target);
      return current;
    });
    logEvent('request.review_started', { request_id, reviewer }, request_id);
    await this.notifySafely({
      kind: 'request_under_review',
      requester: request.requested_by,
      vars: { program_title: request.program_title, reviewer },
      correlation_id: request_id,
    });
    return { id: request_id, status: target };
  }

  // ---- Approvals ----

  /**
   * Records a decision and moves the request to the matching terminal status. The status is
   * written first with a conditional update, then the approval is inserted. If either write
   * fails or times out, the decision is rolled back: pending writes are awaited, any approval
   * written by this attempt is deleted and the status is restored. Decisions on the same
   * request are serialized.
   */
  async recordApproval(input: RecordApprovalInput): Promise<RequestTransitionResult> {
    const a = parseInput(recordApprovalSchema, input);
    const target: RequestStatus = a.decision;
    const { approvalId, request } = await withLock(lockKey('programrequest', a.request_id), async () => {
      const current = await this.getRequest(a.request_id);
      this.assertRequestTransition(current.status, target);
      await this.requireReference('user', a.approved_by, 'approved_by');
      const prior = new Set((await this.store.find('approval', { request_id: a.request_id })).map(x => x.id));
      try {
        await this.transitionRequest(current, target);
      } catch (err) {
        // A conflict means another writer decided; only an unknown outcome is ours to undo.
        if (err instanceof StoreUnavailableError) await this.rollbackDecision(current, target, prior, err);
        throw err;
      }
      try {
        const id = await this.store.create('approval', {
          request_id: a.request_id,
          approved_by: a.approved_by,
          decision: a.decision,
          notes: a.notes ?? null,
        });
        return { approvalId: id, request: current };
      } catch (err) {
        await this.rollbackDecision(current, target, prior, err);
        throw err;
      }
    });
    logEvent('approval.recorded', { id: approvalId, request_id: a.request_id, decision: a.decision, from: request.status }, a.request_id);
    await this.notifySafely({
      kind: a.decision === 'approved' ? 'request_approved' : 'request_rejected',
      requester: request.requested_by,
      branch_code: request.branch_code,
      vars: {
        program_title: request.program_title,
        branch_code: request.branch_code,
        decided_by: a.approved_by,
        notes: a.notes ?? null,
      },
      correlation_id: a.request_id,
    });
    return { id: approvalId, request_id: a.request_id, status: target };
  }

  async listApprovals(filter: ApprovalFilter = {}) {
    return this.store.find('approval', parseInput(approvalFilterSchema, filter));
  }

  // ---- Events ----

  async scheduleEvent(input: ScheduleEventInput): Promise<{ id: string; status: EventStatus }> {
    const e = parseInput(scheduleEventSchema, input);
    if (Date.parse(e.start_time) >= Date.parse(e.end_time)) {
      throw new ValidationError('end_time', 'end_time must be after start_time');
    }
    await this.requireReference('branch', e.branch_code, 'branch_code');
    for (const [i, resource] of e.resources.entries()) {
      await this.requireReference('resource', resource, `resources.${i}`);
    }
    const request_id = e.request_id ?? null;
    if (request_id) {
      const request = await this.getRequest(request_id);
      if (request.status !== 'approved') {
        throw new PreconditionFailedError(`program request ${request_id} is ${request.status}, not approved`, {
          request_id,
          status: request.status,
        });
      }
    }
    const id = await this.store.create('event', {
      request_id,
      title: e.title,
      branch_code: e.branch_code,
      start_time: e.start_time,
      end_time: e.end_time,
      location: e.location ?? null,
      resources: e.resources,
      status: e.status,
    });
    logEvent('event.scheduled', { id, request_id, branch_code: e.branch_code, status: e.status }, request_id ?? id);
    await this.notifySafely({
      kind: 'event_scheduled',
      branch_code: e.branch_code,
      vars: { title: e.title, start_time: e.start_time, end_time: e.end_time, location: e.location ?? null },
      correlation_id: request_id ?? id,
    });
    return { id, status: e.status };
  }

  async getEvent(id: string): Promise<StoredRecord<'event'>> {
    const event = await this.store.findById('event', id);
    if (!event) throw new NotFoundError('event', id);
    return event;
  }

  async updateEventStatus(input: UpdateEventStatusInput): Promise<{ id: string; status: EventStatus }> {
    const { event_id, status } = parseInput(updateEventStatusSchema, input);
    const from = await withLock(lockKey('event', event_id), async () => {
      const event = await this.getEvent(event_id);
      if (!eventMachine.canTransition(event.status, status)) {
        throw new InvalidTransitionError(eventMachine.name, event.status, status);
      }
      const outcome = await this.store.updateOne('event', event_id, { status }, { expect: { status: event.status } });
      if (outcome === 'not_found') throw new NotFoundError('event', event_id);
      if (outcome === 'conflict') {
        const latest = await this.getEvent(event_id);
        throw new InvalidTransitionError(eventMachine.name, latest.status, status);
      }
      return event.status;
    });
    logEvent('event.status_changed', { id: event_id, from, to: status }, event_id);
    return { id: event_id, status };
  }

  async listEvents(filter: EventFilter = {}) {
    return this.store.find('event', parseInput(eventFilterSchema, filter));
  }

  // ---- Reports & evaluations (append-only) ----

  async submitReport(input: SubmitReportInput): Promise<{ id: string }> {
    const r = parseInput(submitReportSchema, input);
    const request_id = r.request_id ?? null;
    const event_id = r.event_id ?? null;
    await this.checkOutcomeReferences(request_id, event_id);
    if (r.submitted_by) await this.requireReference('user', r.submitted_by, 'submitted_by');
    const id = await this.store.create('report', {
      request_id,
      event_id,
      submitted_by: r.submitted_by ?? null,
      summary: r.summary,
      attendees_count: r.attendees_count ?? null,
      photos: r.photos,
    });
    logEvent('report.submitted', { id, request_id, event_id }, request_id ?? event_id ?? id);
    return { id };
  }

  async listReports(filter: OutcomeFilter = {}) {
    return this.store.find('report', parseInput(outcomeFilterSchema, filter));
  }

  async submitEvaluation(input: SubmitEvaluationInput): Promise<{ id: string }> {
    const v = parseInput(submitEvaluationSchema, input);
    const request_id = v.request_id ?? null;
    const event_id = v.event_id ?? null;
    await this.checkOutcomeReferences(request_id, event_id);
    const id = await this.store.create('evaluation', {
      request_id,
      event_id,
      score: v.score,
      methodology: v.methodology ?? null,
      comments: v.comments ?? null,
    });
    logEvent('evaluation.submitted', { id, request_id, event_id, score: v.score }, request_id ?? event_id ?? id);
    return { id };
  }

  async listEvaluations(filter: OutcomeFilter = {}) {
    return this.store.find('evaluation', parseInput(outcomeFilterSchema, filter));
  }

  // ---- internals ----

  private assertRequestTransition(from: RequestStatus, to: RequestStatus) {
    if (!requestMachine.canTransition(from, to)) throw new InvalidTransitionError(requestMachine.name, from, to);
  }

  // Conditional on the status read under the lock, so a writer outside this process cannot
  // have both decisions win.
  private async transitionRequest(request: StoredRecord<'programrequest'>, to: RequestStatus) {
    const outcome = await this.store.updateOne('programrequest', request.id, { status: to }, { expect: { status: request.status } });
    if (outcome === 'not_found') throw new NotFoundError('programrequest', request.id);
    if (outcome === 'conflict') {
      const latest = await this.getRequest(request.id);
      throw new InvalidTransitionError(requestMachine.name, latest.status, to);
    }
  }

  private async rollbackDecision(
    request: StoredRecord<'programrequest'>,
    target: RequestStatus,
    prior: ReadonlySet<string>,
    cause: unknown,
  ) {
    try {
      await this.store.settle();
      const stray = (await this.store.find('approval', { request_id: request.id })).filter(x => !prior.has(x.id));
      for (const approval of stray) await this.store.deleteOne('approval', approval.id);
      const outcome = await this.store.updateOne('programrequest', request.id, { status: request.status }, { expect: { status: target } });
      logEvent('approval.rolled_back', {
        request_id: request.id,
        restored: request.status,
        outcome,
        removed: stray.length,
        cause: errorMessage(cause),
      }, request.id);
    } catch (err) {
      logError('approval rollback failed; request status may not match approvals', {
        request_id: request.id,
        expected: request.status,
        error: errorMessage(err),
      });
    }
  }

  private async checkOutcomeReferences(request_id: string | null, event_id: string | null) {
    if (request_id) await this.getRequest(request_id);
    if (!event_id) return;
    const event = await this.getEvent(event_id);
    if (request_id && event.request_id && event.request_id !== request_id) {
      throw new InconsistentReferenceError(`event ${event_id} belongs to program request ${event.request_id}, not ${request_id}`, {
        event_id,
        event_request_id: event.request_id,
        request_id,
      });
    }
  }

  private async requireReference(kind: ReferenceKind, key: string, field: string) {
    if (!(await this.references.exists(kind, key))) throw new ValidationError(field, `unknown ${kind} ${key}`);
  }

  private async userEmail(ref: string | null): Promise<string | null> {
    if (!ref) return null;
    if (ref.includes('@')) return ref.toLowerCase();
    const user = await this.store.findById('user', ref);
    return user ? user.email : null;
  }

  // Notifications ride alongside committed writes: a failure, including the requester lookup,
  // is reported and never rolled into the caller.
  private async notifySafely({ requester, ...params }: LifecycleNotice) {
    if (!this.notifier) return;
    try {
      const user_email = await this.userEmail(requester ?? null);
      await this.notifier.notify({ ...params, user_email });
    } catch (err) {
      logWarn('notification failed', { kind: params.kind, correlation_id: params.correlation_id, error: errorMessage(err) });
      logEvent('notification.failed', { kind: params.kind, error: errorMessage(err) }, params.correlation_id);
    }
  }
}
