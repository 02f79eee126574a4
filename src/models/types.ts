export const PROGRAM_TYPES = ['student_activity', 'community_service', 'volunteering'] as const;
export type ProgramType = (typeof PROGRAM_TYPES)[number];

export const REQUEST_STATUSES = ['submitted', 'under_review', 'approved', 'rejected'] as const;
export type RequestStatus = (typeof REQUEST_STATUSES)[number];

export const DECISIONS = ['approved', 'rejected'] as const;
export type Decision = (typeof DECISIONS)[number];

export const EVENT_STATUSES = ['scheduled', 'in_progress', 'completed', 'cancelled'] as const;
export type EventStatus = (typeof EVENT_STATUSES)[number];

export const NOTIFICATION_TYPES = ['info', 'success', 'warning', 'error'] as const;
export type NotificationType = (typeof NOTIFICATION_TYPES)[number];

export const ROLE_NAMES = [
  'admin',
  'hq_manager',
  'branch_manager',
  'coordinator',
  'reviewer',
  'finance',
  'it',
  'quality',
  'viewer',
] as const;
export type RoleName = (typeof ROLE_NAMES)[number];

export const RESOURCE_TYPES = ['venue', 'equipment', 'it_support', 'media', 'transport'] as const;
export type ResourceType = (typeof RESOURCE_TYPES)[number];

export const AVAILABILITY_STATUSES = ['available', 'reserved', 'maintenance'] as const;
export type AvailabilityStatus = (typeof AVAILABILITY_STATUSES)[number];

// Reference data

export interface Branch {
  code: string; // e.g. RU-01
  name: string;
  region: string | null;
  manager_name: string | null;
  manager_email: string | null;
}

export interface Role {
  name: RoleName;
  description: string | null;
}

export interface User {
  full_name: string;
  email: string;
  branch_code: string | null;
  role: RoleName;
  is_active: boolean;
}

// Catalog entry a request can be modelled on; requests do not reference it.
export interface Program {
  title: string;
  type: ProgramType;
  objective: string | null;
  kpis: string[];
}

export interface Resource {
  name: string;
  type: ResourceType;
  branch_code: string | null;
  capacity: number | null;
  availability_status: AvailabilityStatus;
}

// Lifecycle

export interface BudgetItem {
  name: string;
  amount: number;
}

export interface ProgramRequest {
  branch_code: string;
  program_title: string;
  program_type: ProgramType;
  description: string | null;
  proposed_date: string | null; // ISO
  location: string | null;
  budget: BudgetItem[];
  requested_by: string | null; // user email or id
  status: RequestStatus;
}

/** Append-only: never updated after insert. */
export interface Approval {
  request_id: string;
  approved_by: string;
  decision: Decision;
  notes: string | null;
}

export interface ScheduledEvent {
  request_id: string | null; // null for ad-hoc events
  title: string;
  branch_code: string;
  start_time: string; // ISO
  end_time: string; // ISO
  location: string | null;
  resources: string[];
  status: EventStatus;
}

export interface Report {
  request_id: string | null;
  event_id: string | null;
  submitted_by: string | null;
  summary: string;
  attendees_count: number | null;
  photos: string[];
}

export interface Evaluation {
  request_id: string | null;
  event_id: string | null;
  score: number; // 0..100
  methodology: string | null;
  comments: string | null;
}

export interface Notification {
  user_email: string | null;
  branch_code: string | null;
  title: string;
  message: string;
  type: NotificationType;
  is_read: boolean;
}

export interface RecordMeta {
  id: string;
  created_at: string;
  updated_at: string;
}

export type Stored<T> = T & RecordMeta;

export interface AuditEntry {
  id: string;
  ts: string;
  type: string;
  correlation_id?: string;
  payload: Record<string, unknown>;
}
