import {
  Approval,
  Branch,
  Evaluation,
  Notification,
  Program,
  ProgramRequest,
  Report,
  Resource,
  Role,
  ScheduledEvent,
  Stored,
  User,
} from '../models/types.js';

/** Record shape per collection. Collection names are the lowercased entity names. */
export interface CollectionRecords {
  branch: Branch;
  role: Role;
  user: User;
  program: Program;
  programrequest: ProgramRequest;
  approval: Approval;
  resource: Resource;
  event: ScheduledEvent;
  report: Report;
  evaluation: Evaluation;
  notification: Notification;
}

export type CollectionName = keyof CollectionRecords;

export type StoredRecord<C extends CollectionName> = Stored<CollectionRecords[C]>;

/** Exact-match conjunction; undefined entries are ignored. */
export type StoreFilter<C extends CollectionName> = Partial<CollectionRecords[C]>;

export type UpdateOutcome = 'updated' | 'not_found' | 'conflict';

export interface UpdateOptions<C extends CollectionName> {
  /** Apply the patch only if the current record matches; otherwise the outcome is `conflict`. */
  expect?: StoreFilter<C>;
}

export type StoreSnapshot = { [C in CollectionName]: StoredRecord<C>[] };

/**
 * Narrow key/value-with-secondary-index contract the lifecycle runs against.
 * Every call is independently atomic; `find` returns records in insertion order.
 */
export interface DocumentStore {
  create<C extends CollectionName>(collection: C, record: CollectionRecords[C]): Promise<string>;
  findById<C extends CollectionName>(collection: C, id: string): Promise<StoredRecord<C> | undefined>;
  find<C extends CollectionName>(collection: C, filter?: StoreFilter<C>): Promise<StoredRecord<C>[]>;
  updateOne<C extends CollectionName>(
    collection: C,
    id: string,
    patch: Partial<CollectionRecords[C]>,
    options?: UpdateOptions<C>,
  ): Promise<UpdateOutcome>;
  deleteOne<C extends CollectionName>(collection: C, id: string): Promise<boolean>;
  /** Resolves once no write started earlier can still land, including calls abandoned by a timeout. */
  settle(): Promise<void>;
  close(): Promise<void>;
}

export function matchesFilter<R extends object>(record: R, filter: Partial<R>): boolean {
  for (const key in filter) {
    const wanted = filter[key];
    if (wanted !== undefined && record[key] !== wanted) return false;
  }
  return true;
}
