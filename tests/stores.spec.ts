import { existsSync, mkdirSync, mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import path from 'node:path';
import { afterEach, describe, expect, it } from 'vitest';
import { JsonFileStore } from '../src/adapters/json_file_store.js';
import { CollectionName, CollectionRecords } from '../src/adapters/document_store.js';
import { MemoryStore } from '../src/adapters/memory_store.js';
import { StoreReferenceValidator } from '../src/adapters/reference_validator.js';
import { TimedStore } from '../src/adapters/timed_store.js';
import { NotFoundError, StoreUnavailableError } from '../src/engine/errors.js';
import { HangingStore } from './fixtures.js';

function sequentialIds() {
  let n = 0;
  return () => `id-${++n}`;
}

const branch = { code: 'RU-01', name: 'Riverside Branch', region: null, manager_name: null, manager_email: null };

describe('MemoryStore', () => {
  it('assigns ids and timestamps', async () => {
    let clock = new Date('2026-01-01T00:00:00.000Z');
    const store = new MemoryStore({ generateId: sequentialIds(), now: () => clock });
    const id = await store.create('branch', branch);
    expect(id).toBe('id-1');
    clock = new Date('2026-01-02T00:00:00.000Z');
    expect(await store.updateOne('branch', id, { name: 'Riverside' })).toBe('updated');
    expect(await store.findById('branch', id)).toEqual({
      ...branch,
      name: 'Riverside',
      id: 'id-1',
      created_at: '2026-01-01T00:00:00.000Z',
      updated_at: '2026-01-02T00:00:00.000Z',
    });
  });

  it('never hands out live references', async () => {
    const store = new MemoryStore();
    const id = await store.create('programrequest', {
      branch_code: 'RU-01', program_title: 'Cleanup', program_type: 'volunteering', description: null,
      proposed_date: null, location: null, budget: [{ name: 'venue', amount: 10 }], requested_by: null, status: 'submitted',
    });
    const copy = await store.findById('programrequest', id);
    copy?.budget.push({ name: 'snacks', amount: 5 });
    const [listed] = await store.find('programrequest');
    expect(listed?.budget).toEqual([{ name: 'venue', amount: 10 }]);
  });

  it('filters by exact match and ignores undefined entries', async () => {
    const store = new MemoryStore();
    await store.create('branch', branch);
    await store.create('branch', { ...branch, code: 'RU-02', region: 'South' });
    expect((await store.find('branch', { region: 'South' })).map(b => b.code)).toEqual(['RU-02']);
    expect((await store.find('branch', { region: undefined })).map(b => b.code)).toEqual(['RU-01', 'RU-02']);
  });

  it('applies conditional updates only when the expectation holds', async () => {
    const store = new MemoryStore();
    const id = await store.create('event', {
      request_id: null, title: 'Cleanup', branch_code: 'RU-01', start_time: 'a', end_time: 'b',
      location: null, resources: [], status: 'scheduled',
    });
    expect(await store.updateOne('event', id, { status: 'cancelled' }, { expect: { status: 'in_progress' } })).toBe('conflict');
    expect((await store.findById('event', id))?.status).toBe('scheduled');
    expect(await store.updateOne('event', id, { status: 'cancelled' }, { expect: { status: 'scheduled' } })).toBe('updated');
    expect(await store.updateOne('event', 'missing', { status: 'cancelled' })).toBe('not_found');
  });

  it('deletes once', async () => {
    const store = new MemoryStore();
    const id = await store.create('branch', branch);
    expect(await store.deleteOne('branch', id)).toBe(true);
    expect(await store.deleteOne('branch', id)).toBe(false);
    expect(await store.findById('branch', id)).toBeUndefined();
  });
});

describe('MemoryStore persist failures', () => {
  class BrokenDiskStore extends MemoryStore {
    broken = false;
    protected override async persist(): Promise<void> {
      if (this.broken) throw new Error('disk full');
    }
  }

  it('undoes the write that could not be persisted', async () => {
    const store = new BrokenDiskStore();
    const id = await store.create('branch', branch);
    store.broken = true;

    await expect(store.create('branch', { ...branch, code: 'RU-02' })).rejects.toThrow('disk full');
    await expect(store.updateOne('branch', id, { name: 'Renamed' })).rejects.toThrow('disk full');
    await expect(store.deleteOne('branch', id)).rejects.toThrow('disk full');

    const all = await store.find('branch');
    expect(all.map(b => [b.code, b.name])).toEqual([['RU-01', 'Riverside Branch']]);
  });
});

describe('JsonFileStore', () => {
  const dirs: string[] = [];
  const tempFile = () => {
    const dir = mkdtempSync(path.join(tmpdir(), 'lifecycle-store-'));
    dirs.push(dir);
    return path.join(dir, 'nested', 'store.json');
  };
  afterEach(() => {
    for (const dir of dirs.splice(0)) rmSync(dir, { recursive: true, force: true });
  });

  it('reloads what it persisted', async () => {
    const file = tempFile();
    const first = new JsonFileStore(file);
    const id = await first.create('branch', branch);
    const second = new JsonFileStore(file);
    expect(await second.findById('branch', id)).toMatchObject({ ...branch, id });
  });

  it('keeps the previous snapshot when a write fails', async () => {
    const file = tempFile();
    const store = new JsonFileStore(file);
    await store.create('branch', branch);
    expect(existsSync(`${file}.tmp`)).toBe(false);

    mkdirSync(`${file}.tmp`);
    await expect(store.create('branch', { ...branch, code: 'RU-02' })).rejects.toThrow();
    expect((await store.find('branch')).map(b => b.code)).toEqual(['RU-01']);
    expect((await new JsonFileStore(file).find('branch')).map(b => b.code)).toEqual(['RU-01']);
  });

  it('loads snapshots written before programs existed', async () => {
    const file = tempFile();
    mkdirSync(path.dirname(file), { recursive: true });
    const empty = {
      version: 1, updated_at: '2026-01-01T00:00:00.000Z', branch: [], role: [], user: [], programrequest: [],
      approval: [], resource: [], event: [], report: [], evaluation: [], notification: [],
    };
    writeFileSync(file, JSON.stringify(empty));
    const store = new JsonFileStore(file);
    expect(await store.find('program')).toEqual([]);
    await store.create('program', { title: 'Campus cleanup', type: 'community_service', objective: null, kpis: ['volunteer_hours'] });
    expect(await new JsonFileStore(file).find('program')).toEqual([expect.objectContaining({ title: 'Campus cleanup' })]);
  });

  it('refuses a snapshot it cannot read', () => {
    const file = tempFile();
    mkdirSync(path.dirname(file), { recursive: true });
    writeFileSync(file, JSON.stringify({ version: 2 }));
    expect(() => new JsonFileStore(file)).toThrow(`Corrupt store file ${file}`);
  });
});

describe('TimedStore', () => {
  it('reports a stalled call as unavailable', async () => {
    const store = new TimedStore(new HangingStore(), 20);
    await expect(store.find('branch')).rejects.toThrow(new StoreUnavailableError('find branch', 'timed out after 20ms'));
  });

  it('waits for a timed-out write to land on settle', async () => {
    class SlowStore extends MemoryStore {
      override async create<C extends CollectionName>(collection: C, record: CollectionRecords[C]): Promise<string> {
        await new Promise(resolve => setTimeout(resolve, 60));
        return super.create(collection, record);
      }
    }
    const store = new TimedStore(new SlowStore(), 40);
    await expect(store.create('branch', branch)).rejects.toThrow('store create branch failed: timed out after 40ms');
    expect(store.pendingCount()).toBe(1);
    await store.settle();
    expect(store.pendingCount()).toBe(0);
    expect(await store.find('branch')).toHaveLength(1);
  });

  it('wraps unexpected failures and keeps lifecycle errors', async () => {
    class FlakyStore extends MemoryStore {
      override async deleteOne(): Promise<boolean> {
        throw new Error('connection reset');
      }
    }
    const store = new TimedStore(new FlakyStore(), 1000);
    const err = await store.deleteOne('branch', 'x').catch((e: unknown) => e);
    expect(err).toBeInstanceOf(StoreUnavailableError);
    expect(err).toMatchObject({ code: 'STORE_UNAVAILABLE', message: 'store deleteOne branch failed: connection reset' });

    class StrictStore extends MemoryStore {
      override async findById(): Promise<undefined> {
        throw new NotFoundError('branch', 'x');
      }
    }
    await expect(new TimedStore(new StrictStore(), 1000).findById('branch', 'x')).rejects.toBeInstanceOf(NotFoundError);
  });
});

describe('StoreReferenceValidator', () => {
  it('resolves branches by code, users by email or id, resources by id', async () => {
    const store = new MemoryStore();
    await store.create('branch', branch);
    const userId = await store.create('user', {
      full_name: 'Avery Park', email: 'avery.park@example.org', branch_code: 'RU-01', role: 'coordinator', is_active: true,
    });
    const hallId = await store.create('resource', {
      name: 'Main Hall', type: 'venue', branch_code: 'RU-01', capacity: 80, availability_status: 'available',
    });
    const refs = new StoreReferenceValidator(store);
    expect(await refs.exists('branch', 'RU-01')).toBe(true);
    expect(await refs.exists('branch', 'RU-09')).toBe(false);
    expect(await refs.exists('user', 'Avery.Park@example.org')).toBe(true);
    expect(await refs.exists('user', userId)).toBe(true);
    expect(await refs.exists('resource', hallId)).toBe(true);
    expect(await refs.exists('resource', 'Main Hall')).toBe(false);
  });
});
