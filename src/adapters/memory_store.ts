import { randomUUID } from 'node:crypto';
import {
  CollectionName,
  CollectionRecords,
  DocumentStore,
  StoreFilter,
  StoreSnapshot,
  StoredRecord,
  UpdateOptions,
  UpdateOutcome,
  matchesFilter,
} from './document_store.js';

export interface MemoryStoreOptions {
  now?: () => Date;
  generateId?: () => string;
}

type CollectionMaps = { [C in CollectionName]: Map<string, StoredRecord<C>> };

function emptyCollections(): CollectionMaps {
  return {
    branch: new Map(),
    role: new Map(),
    user: new Map(),
    program: new Map(),
    programrequest: new Map(),
    approval: new Map(),
    resource: new Map(),
    event: new Map(),
    report: new Map(),
    evaluation: new Map(),
    notification: new Map(),
  };
}

// In-process document store. Maps keep insertion order, which is the order `find` returns.
// Records are cloned on the way in and out so callers never alias stored state. A write whose
// persist step fails is undone before the error reaches the caller.
export class MemoryStore implements DocumentStore {
  protected collections: CollectionMaps = emptyCollections();
  private readonly now: () => Date;
  private readonly generateId: () => string;

  constructor(options: MemoryStoreOptions = {}) {
    this.now = options.now ?? (() => new Date());
    this.generateId = options.generateId ?? randomUUID;
  }

  protected map<C extends CollectionName>(collection: C): Map<string, StoredRecord<C>> {
    return this.collections[collection];
  }

  async create<C extends CollectionName>(collection: C, record: CollectionRecords[C]): Promise<string> {
    const id = this.generateId();
    const ts = this.now().toISOString();
    const stored: StoredRecord<C> = { ...structuredClone(record), id, created_at: ts, updated_at: ts };
    const map = this.map(collection);
    map.set(id, stored);
    try {
      await this.persist();
    } catch (err) {
      if (map.get(id) === stored) map.delete(id);
      throw err;
    }
    return id;
  }

  async findById<C extends CollectionName>(collection: C, id: string): Promise<StoredRecord<C> | undefined> {
    const rec = this.map(collection).get(id);
    return rec ? structuredClone(rec) : undefined;
  }

  async find<C extends CollectionName>(collection: C, filter: StoreFilter<C> = {}): Promise<StoredRecord<C>[]> {
    const out: StoredRecord<C>[] = [];
    for (const rec of this.map(collection).values()) {
      if (matchesFilter<CollectionRecords[C]>(rec, filter)) out.push(structuredClone(rec));
    }
    return out;
  }

  async updateOne<C extends CollectionName>(
    collection: C,
    id: string,
    patch: Partial<CollectionRecords[C]>,
    options: UpdateOptions<C> = {},
  ): Promise<UpdateOutcome> {
    const current = this.map(collection).get(id);
    if (!current) return 'not_found';
    if (options.expect && !matchesFilter<CollectionRecords[C]>(current, options.expect)) return 'conflict';
    const next: StoredRecord<C> = { ...current, ...structuredClone(patch), id, updated_at: this.now().toISOString() };
    const map = this.map(collection);
    map.set(id, next);
    try {
      await this.persist();
    } catch (err) {
      if (map.get(id) === next) map.set(id, current);
      throw err;
    }
    return 'updated';
  }

  async deleteOne<C extends CollectionName>(collection: C, id: string): Promise<boolean> {
    const map = this.map(collection);
    const current = map.get(id);
    if (!current) return false;
    map.delete(id);
    try {
      await this.persist();
    } catch (err) {
      // Re-inserted records move to the end of `find` order.
      if (!map.has(id)) map.set(id, current);
      throw err;
    }
    return true;
  }

  async settle(): Promise<void> {}

  async close(): Promise<void> {}

  snapshot(): StoreSnapshot {
    const c = this.collections;
    return {
      branch: [...c.branch.values()],
      role: [...c.role.values()],
      user: [...c.user.values()],
      program: [...c.program.values()],
      programrequest: [...c.programrequest.values()],
      approval: [...c.approval.values()],
      resource: [...c.resource.values()],
      event: [...c.event.values()],
      report: [...c.report.values()],
      evaluation: [...c.evaluation.values()],
      notification: [...c.notification.values()],
    };
  }

  protected restore(snapshot: StoreSnapshot) {
    const next = emptyCollections();
    for (const r of snapshot.branch) next.branch.set(r.id, r);
    for (const r of snapshot.role) next.role.set(r.id, r);
    for (const r of snapshot.user) next.user.set(r.id, r);
    for (const r of snapshot.program) next.program.set(r.id, r);
    for (const r of snapshot.programrequest) next.programrequest.set(r.id, r);
    for (const r of snapshot.approval) next.approval.set(r.id, r);
    for (const r of snapshot.resource) next.resource.set(r.id, r);
    for (const r of snapshot.event) next.event.set(r.id, r);
    for (const r of snapshot.report) next.report.set(r.id, r);
    for (const r of snapshot.evaluation) next.evaluation.set(r.id, r);
    for (const r of snapshot.notification) next.notification.set(r.id, r);
    this.collections = next;
  }

  // Hook for durable subclasses; called after every write, which is undone if this rejects.
  protected async persist(): Promise<void> {}
}
