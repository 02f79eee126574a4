import { DocumentStore } from './adapters/document_store.js';
import { JsonFileStore } from './adapters/json_file_store.js';
import { MemoryStore } from './adapters/memory_store.js';
import { Notifier } from './adapters/notifier.js';
import { ReferenceData } from './adapters/reference_data.js';
import { ReferenceValidator, StoreReferenceValidator } from './adapters/reference_validator.js';
import { TimedStore } from './adapters/timed_store.js';
import { AppConfig } from './config.js';
import { ProgramLifecycle } from './engine/program_lifecycle.js';

export interface Runtime {
  config: AppConfig;
  store: DocumentStore;
  references: ReferenceValidator;
  referenceData: ReferenceData;
  lifecycle: ProgramLifecycle;
}

export function buildRuntime(config: AppConfig, base?: DocumentStore): Runtime {
  const raw = base ?? (config.storeDriver === 'file' ? new JsonFileStore(config.dataFile) : new MemoryStore());
  const store = new TimedStore(raw, config.storeTimeoutMs);
  const references = new StoreReferenceValidator(store);
  const notifier = config.notificationsEnabled ? new Notifier(store) : undefined;
  return {
    config,
    store,
    references,
    referenceData: new ReferenceData(store),
    lifecycle: new ProgramLifecycle({ store, references, notifier }),
  };
}
