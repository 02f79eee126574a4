// Memory store persisted as a single JSON snapshot, rewritten after every write. The snapshot
// is written beside the target and renamed over it, so a crash leaves the previous file intact.
import { existsSync, readFileSync } from 'node:fs';
import fs from 'node:fs/promises';
import { dirname } from 'node:path';
import { z } from 'zod';
import {
  approvalRecordSchema,
  branchRecordSchema,
  evaluationRecordSchema,
  eventRecordSchema,
  notificationRecordSchema,
  programRecordSchema,
  programRequestRecordSchema,
  reportRecordSchema,
  resourceRecordSchema,
  roleRecordSchema,
  storedSchema,
  userRecordSchema,
} from '../models/schemas.js';
import { logDebug } from '../util/logger.js';
import { MemoryStore, MemoryStoreOptions } from './memory_store.js';

const snapshotFileSchema = z.object({
  version: z.literal(1),
  updated_at: z.string(),
  branch: z.array(storedSchema(branchRecordSchema)),
  role: z.array(storedSchema(roleRecordSchema)),
  user: z.array(storedSchema(userRecordSchema)),
  program: z.array(storedSchema(programRecordSchema)).default([]),
  programrequest: z.array(storedSchema(programRequestRecordSchema)),
  approval: z.array(storedSchema(approvalRecordSchema)),
  resource: z.array(storedSchema(resourceRecordSchema)),
  event: z.array(storedSchema(eventRecordSchema)),
  report: z.array(storedSchema(reportRecordSchema)),
  evaluation: z.array(storedSchema(evaluationRecordSchema)),
  notification: z.array(storedSchema(notificationRecordSchema)),
});

export class JsonFileStore extends MemoryStore {
  readonly file: string;
  private writing: Promise<void> = Promise.resolve();

  constructor(file: string, options: MemoryStoreOptions = {}) {
    super(options);
    this.file = file;
    this.load();
  }

  private load() {
    if (!existsSync(this.file)) return;
    const parsed = snapshotFileSchema.safeParse(JSON.parse(readFileSync(this.file, 'utf-8')));
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      throw new Error(`Corrupt store file ${this.file}${issue ? ` at ${issue.path.join('.')}: ${issue.message}` : ''}`);
    }
    this.restore(parsed.data);
  }

  // Writes run one at a time and each snapshots the state current when it starts. A failed
  // write rejects for its caller only; the next write still runs.
  protected override persist(): Promise<void> {
    const write = this.writing.then(() => this.writeSnapshot());
    this.writing = write.catch(() => undefined);
    return write;
  }

  override async settle(): Promise<void> {
    await this.writing;
  }

  private async writeSnapshot() {
    const body = { version: 1, updated_at: new Date().toISOString(), ...this.snapshot() };
    const tmp = `${this.file}.tmp`;
    await fs.mkdir(dirname(this.file), { recursive: true });
    await fs.writeFile(tmp, JSON.stringify(body, null, 2));
    await fs.rename(tmp, this.file);
    logDebug('store persisted', { file: this.file });
  }
}
