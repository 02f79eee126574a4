import { LifecycleError, StoreUnavailableError, errorMessage } from '../engine/errors.js';
import {
  CollectionName,
  CollectionRecords,
  DocumentStore,
  StoreFilter,
  StoredRecord,
  UpdateOptions,
  UpdateOutcome,
} from './document_store.js';

/**
 * Bounds every store call by `timeoutMs`. A timeout, or any failure that is not already a
 * LifecycleError, surfaces as StoreUnavailable. Nothing is retried here.
 *
 * A timed-out call keeps running underneath and may still land. Such calls are tracked until
 * they finish, and `settle()` waits for them (again bounded by `timeoutMs`).
 */
export class TimedStore implements DocumentStore {
  private readonly abandoned = new Set<Promise<void>>();

  constructor(private readonly inner: DocumentStore, private readonly timeoutMs: number) {}

  create<C extends CollectionName>(collection: C, record: CollectionRecords[C]): Promise<string> {
    return this.guard(`create ${collection}`, () => this.inner.create(collection, record));
  }

  findById<C extends CollectionName>(collection: C, id: string): Promise<StoredRecord<C> | undefined> {
    return this.guard(`findById ${collection}`, () => this.inner.findById(collection, id));
  }

  find<C extends CollectionName>(collection: C, filter?: StoreFilter<C>): Promise<StoredRecord<C>[]> {
    return this.guard(`find ${collection}`, () => this.inner.find(collection, filter));
  }

  updateOne<C extends CollectionName>(
    collection: C,
    id: string,
    patch: Partial<CollectionRecords[C]>,
    options?: UpdateOptions<C>,
  ): Promise<UpdateOutcome> {
    return this.guard(`updateOne ${collection}`, () => this.inner.updateOne(collection, id, patch, options));
  }

  deleteOne<C extends CollectionName>(collection: C, id: string): Promise<boolean> {
    return this.guard(`deleteOne ${collection}`, () => this.inner.deleteOne(collection, id));
  }

  async settle(): Promise<void> {
    const pending = [...this.abandoned];
    if (pending.length) await this.bounded('settle', Promise.all(pending));
    await this.guard('settle', () => this.inner.settle());
  }

  close(): Promise<void> {
    return this.inner.close();
  }

  pendingCount() {
    return this.abandoned.size;
  }

  private async guard<T>(operation: string, call: () => Promise<T>): Promise<T> {
    // A synchronous throw from `call` becomes a rejection.
    const pending = new Promise<T>((resolve, reject) => {
      call().then(resolve, reject);
    });
    try {
      return await this.bounded(operation, pending);
    } catch (err) {
      if (err instanceof LifecycleError) throw err;
      throw new StoreUnavailableError(operation, errorMessage(err), { cause: err });
    }
  }

  private async bounded<T>(operation: string, pending: Promise<T>): Promise<T> {
    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<never>((_resolve, reject) => {
      timer = setTimeout(() => {
        this.track(pending);
        reject(new StoreUnavailableError(operation, `timed out after ${this.timeoutMs}ms`));
      }, this.timeoutMs);
    });
    try {
      return await Promise.race([pending, timeout]);
    } finally {
      clearTimeout(timer);
    }
  }

  private track(pending: Promise<unknown>) {
    const done = () => {
      this.abandoned.delete(settled);
    };
    const settled: Promise<void> = pending.then(done, done);
    this.abandoned.add(settled);
  }
}
