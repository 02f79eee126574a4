import { z } from 'zod';
import { ValidationError } from '../engine/errors.js';
import {
  AVAILABILITY_STATUSES,
  DECISIONS,
  EVENT_STATUSES,
  NOTIFICATION_TYPES,
  PROGRAM_TYPES,
  REQUEST_STATUSES,
  RESOURCE_TYPES,
  ROLE_NAMES,
  type Approval,
  type BudgetItem,
  type Branch,
  type Evaluation,
  type Notification,
  type Program,
  type ProgramRequest,
  type Report,
  type Resource,
  type Role,
  type ScheduledEvent,
  type Stored,
  type User,
} from './types.js';

const text = z.string().trim().min(1);
const isoDateTime = z
  .string()
  .datetime({ offset: true })
  .transform(v => new Date(v).toISOString());

export const budgetItemSchema = z.object({
  name: text,
  amount: z.number().finite().nonnegative(),
});

// ---- Lifecycle inputs ----

export const submitRequestSchema = z.object({
  branch_code: text,
  program_title: text,
  program_type: z.enum(PROGRAM_TYPES),
  description: z.string().nullish(),
  proposed_date: isoDateTime.nullish(),
  location: z.string().nullish(),
  budget: z.array(budgetItemSchema).default([]),
  requested_by: text.nullish(),
  // Accepted for compatibility; a new request is always `submitted`.
  status: z.enum(REQUEST_STATUSES).optional(),
});

export const beginReviewSchema = z.object({
  request_id: text,
  reviewer: text,
});

export const recordApprovalSchema = z.object({
  request_id: text,
  approved_by: text,
  decision: z.enum(DECISIONS),
  notes: z.string().nullish(),
});

export const scheduleEventSchema = z.object({
  request_id: text.nullish(),
  title: text,
  branch_code: text,
  start_time: isoDateTime,
  end_time: isoDateTime,
  location: z.string().nullish(),
  resources: z.array(text).default([]),
  status: z.enum(EVENT_STATUSES).default('scheduled'),
});

export const updateEventStatusSchema = z.object({
  event_id: text,
  status: z.enum(EVENT_STATUSES),
});

export const submitReportSchema = z.object({
  request_id: text.nullish(),
  event_id: text.nullish(),
  submitted_by: text.nullish(),
  summary: text,
  attendees_count: z.number().int().nonnegative().nullish(),
  photos: z.array(text).default([]),
});

export const submitEvaluationSchema = z.object({
  request_id: text.nullish(),
  event_id: text.nullish(),
  score: z.number().min(0).max(100),
  methodology: z.string().nullish(),
  comments: z.string().nullish(),
});

// ---- Query filters (closed: unknown keys are rejected) ----

export const requestFilterSchema = z
  .object({
    status: z.enum(REQUEST_STATUSES).optional(),
    branch_code: text.optional(),
    requested_by: text.optional(),
  })
  .strict();

export const approvalFilterSchema = z
  .object({
    request_id: text.optional(),
    decision: z.enum(DECISIONS).optional(),
  })
  .strict();

export const eventFilterSchema = z
  .object({
    branch_code: text.optional(),
    status: z.enum(EVENT_STATUSES).optional(),
    request_id: text.optional(),
  })
  .strict();

export const outcomeFilterSchema = z
  .object({
    request_id: text.optional(),
    event_id: text.optional(),
  })
  .strict();

export const userFilterSchema = z.object({ branch_code: text.optional() }).strict();

export const resourceFilterSchema = z
  .object({
    branch_code: text.optional(),
    type: z.enum(RESOURCE_TYPES).optional(),
  })
  .strict();

export const programFilterSchema = z.object({ type: z.enum(PROGRAM_TYPES).optional() }).strict();

export const notificationFilterSchema = z
  .object({
    user_email: text.optional(),
    branch_code: text.optional(),
  })
  .strict();

export type SubmitRequestInput = z.input<typeof submitRequestSchema>;
export type BeginReviewInput = z.input<typeof beginReviewSchema>;
export type RecordApprovalInput = z.input<typeof recordApprovalSchema>;
export type ScheduleEventInput = z.input<typeof scheduleEventSchema>;
export type UpdateEventStatusInput = z.input<typeof updateEventStatusSchema>;
export type SubmitReportInput = z.input<typeof submitReportSchema>;
export type SubmitEvaluationInput = z.input<typeof submitEvaluationSchema>;
export type RequestFilter = z.input<typeof requestFilterSchema>;
export type ApprovalFilter = z.input<typeof approvalFilterSchema>;
export type EventFilter = z.input<typeof eventFilterSchema>;
export type OutcomeFilter = z.input<typeof outcomeFilterSchema>;
export type UserFilter = z.input<typeof userFilterSchema>;
export type ResourceFilter = z.input<typeof resourceFilterSchema>;
export type ProgramFilter = z.input<typeof programFilterSchema>;
export type NotificationFilter = z.input<typeof notificationFilterSchema>;

// ---- Reference data inputs ----

export const createBranchSchema = z.object({
  code: text,
  name: text,
  region: z.string().nullish(),
  manager_name: z.string().nullish(),
  manager_email: z.string().trim().toLowerCase().email().nullish(),
});

export const createRoleSchema = z.object({
  name: z.enum(ROLE_NAMES),
  description: z.string().nullish(),
});

export const createUserSchema = z.object({
  full_name: text,
  email: z.string().trim().toLowerCase().email(),
  branch_code: text.nullish(),
  role: z.enum(ROLE_NAMES),
  is_active: z.boolean().default(true),
});

export const createProgramSchema = z.object({
  title: text,
  type: z.enum(PROGRAM_TYPES),
  objective: z.string().nullish(),
  kpis: z.array(text).default([]),
});

export const createResourceSchema = z.object({
  name: text,
  type: z.enum(RESOURCE_TYPES),
  branch_code: text.nullish(),
  capacity: z.number().int().nonnegative().nullish(),
  availability_status: z.enum(AVAILABILITY_STATUSES).default('available'),
});

export const createNotificationSchema = z.object({
  user_email: z.string().trim().toLowerCase().email().nullish(),
  branch_code: text.nullish(),
  title: text,
  message: text,
  type: z.enum(NOTIFICATION_TYPES).default('info'),
  is_read: z.boolean().default(false),
});

export type CreateBranchInput = z.input<typeof createBranchSchema>;
export type CreateRoleInput = z.input<typeof createRoleSchema>;
export type CreateUserInput = z.input<typeof createUserSchema>;
export type CreateProgramInput = z.input<typeof createProgramSchema>;
export type CreateResourceInput = z.input<typeof createResourceSchema>;
export type CreateNotificationInput = z.input<typeof createNotificationSchema>;

// ---- Stored record shapes (used to validate persisted snapshots) ----

const nullableText = z.string().nullable();

export const branchRecordSchema = z.object({
  code: z.string(),
  name: z.string(),
  region: nullableText,
  manager_name: nullableText,
  manager_email: nullableText,
}) satisfies z.ZodType<Branch>;

export const roleRecordSchema = z.object({
  name: z.enum(ROLE_NAMES),
  description: nullableText,
}) satisfies z.ZodType<Role>;

export const userRecordSchema = z.object({
  full_name: z.string(),
  email: z.string(),
  branch_code: nullableText,
  role: z.enum(ROLE_NAMES),
  is_active: z.boolean(),
}) satisfies z.ZodType<User>;

export const programRecordSchema = z.object({
  title: z.string(),
  type: z.enum(PROGRAM_TYPES),
  objective: nullableText,
  kpis: z.array(z.string()),
}) satisfies z.ZodType<Program>;

export const resourceRecordSchema = z.object({
  name: z.string(),
  type: z.enum(RESOURCE_TYPES),
  branch_code: nullableText,
  capacity: z.number().nullable(),
  availability_status: z.enum(AVAILABILITY_STATUSES),
}) satisfies z.ZodType<Resource>;

export const budgetItemRecordSchema = z.object({
  name: z.string(),
  amount: z.number(),
}) satisfies z.ZodType<BudgetItem>;

export const programRequestRecordSchema = z.object({
  branch_code: z.string(),
  program_title: z.string(),
  program_type: z.enum(PROGRAM_TYPES),
  description: nullableText,
  proposed_date: nullableText,
  location: nullableText,
  budget: z.array(budgetItemRecordSchema),
  requested_by: nullableText,
  status: z.enum(REQUEST_STATUSES),
}) satisfies z.ZodType<ProgramRequest>;

export const approvalRecordSchema = z.object({
  request_id: z.string(),
  approved_by: z.string(),
  decision: z.enum(DECISIONS),
  notes: nullableText,
}) satisfies z.ZodType<Approval>;

export const eventRecordSchema = z.object({
  request_id: nullableText,
  title: z.string(),
  branch_code: z.string(),
  start_time: z.string(),
  end_time: z.string(),
  location: nullableText,
  resources: z.array(z.string()),
  status: z.enum(EVENT_STATUSES),
}) satisfies z.ZodType<ScheduledEvent>;

export const reportRecordSchema = z.object({
  request_id: nullableText,
  event_id: nullableText,
  submitted_by: nullableText,
  summary: z.string(),
  attendees_count: z.number().nullable(),
  photos: z.array(z.string()),
}) satisfies z.ZodType<Report>;

export const evaluationRecordSchema = z.object({
  request_id: nullableText,
  event_id: nullableText,
  score: z.number(),
  methodology: nullableText,
  comments: nullableText,
}) satisfies z.ZodType<Evaluation>;

export const notificationRecordSchema = z.object({
  user_email: nullableText,
  branch_code: nullableText,
  title: z.string(),
  message: z.string(),
  type: z.enum(NOTIFICATION_TYPES),
  is_read: z.boolean(),
}) satisfies z.ZodType<Notification>;

/** Record shapes by collection name, as listed by schema introspection. */
export const RECORD_MODELS = {
  branch: branchRecordSchema,
  role: roleRecordSchema,
  user: userRecordSchema,
  program: programRecordSchema,
  budgetitem: budgetItemRecordSchema,
  programrequest: programRequestRecordSchema,
  approval: approvalRecordSchema,
  resource: resourceRecordSchema,
  event: eventRecordSchema,
  report: reportRecordSchema,
  evaluation: evaluationRecordSchema,
  notification: notificationRecordSchema,
} satisfies Record<string, z.AnyZodObject>;

const recordMetaSchema = z.object({
  id: z.string(),
  created_at: z.string(),
  updated_at: z.string(),
});

export function storedSchema<T>(record: z.ZodType<T>): z.ZodType<Stored<T>> {
  return z.intersection(record, recordMetaSchema);
}

/**
 * Parses `input` with `schema`, turning the first zod issue into a ValidationError
 * that names the offending field.
 */
export function parseInput<S extends z.ZodTypeAny>(schema: S, input: unknown): z.output<S> {
  const parsed = schema.safeParse(input);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    if (!issue) throw new ValidationError('', 'invalid input');
    const field = issue.code === 'unrecognized_keys' ? issue.keys.join(',') : issue.path.join('.');
    throw new ValidationError(field, issue.message);
  }
  return parsed.data;
}
