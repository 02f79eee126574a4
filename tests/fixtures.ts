import { CollectionName, DocumentStore, StoreFilter, StoredRecord } from '../src/adapters/document_store.js';
import { MemoryStore } from '../src/adapters/memory_store.js';
import { AppConfig, loadConfig } from '../src/config.js';
import { Runtime, buildRuntime } from '../src/runtime.js';

export const COORDINATOR = 'avery.park@example.org';
export const MANAGER = 'jordan.hale@example.org';

export interface Seeded {
  rt: Runtime;
  hallId: string;
}

export async function seededRuntime(overrides: Partial<AppConfig> = {}, base?: DocumentStore): Promise<Seeded> {
  const rt = buildRuntime({ ...loadConfig({}), ...overrides }, base);
  await rt.referenceData.createBranch({ code: 'RU-01', name: 'Riverside Branch', region: 'North' });
  await rt.referenceData.createUser({ full_name: 'Avery Park', email: COORDINATOR, branch_code: 'RU-01', role: 'coordinator' });
  await rt.referenceData.createUser({ full_name: 'Jordan Hale', email: MANAGER, role: 'hq_manager' });
  const hall = await rt.referenceData.createResource({ name: 'Main Hall', type: 'venue', branch_code: 'RU-01', capacity: 80 });
  return { rt, hallId: hall.id };
}

export function cleanupRequest(title = 'Campus cleanup day') {
  return {
    branch_code: 'RU-01',
    program_title: title,
    program_type: 'student_activity' as const,
    budget: [{ name: 'venue', amount: 100 }],
    requested_by: COORDINATOR,
  };
}

// Never answers a read.
export class HangingStore extends MemoryStore {
  override find<C extends CollectionName>(_collection: C, _filter?: StoreFilter<C>): Promise<StoredRecord<C>[]> {
    return new Promise(() => undefined);
  }
}
