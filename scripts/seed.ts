// Seed script: loads branches, roles, users, programs and resources from data/reference_seed.json
// into the JSON file store (DATA_FILE). Records that already exist are skipped.
// Run with: npm run seed

import '../src/env_bootstrap.js';
import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { dirname, join } from 'node:path';
import { z } from 'zod';
import { JsonFileStore } from '../src/adapters/json_file_store.js';
import { ReferenceData } from '../src/adapters/reference_data.js';
import { loadConfig } from '../src/config.js';
import { ValidationError, errorMessage } from '../src/engine/errors.js';
import {
  createBranchSchema,
  createProgramSchema,
  createResourceSchema,
  createRoleSchema,
  createUserSchema,
} from '../src/models/schemas.js';
import { logError, logInfo } from '../src/util/logger.js';

const seedFileSchema = z.object({
  branches: z.array(createBranchSchema),
  roles: z.array(createRoleSchema),
  users: z.array(createUserSchema),
  programs: z.array(createProgramSchema),
  resources: z.array(createResourceSchema),
});

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);
const seedFile = join(__dirname, '..', 'data', 'reference_seed.json');

async function insert(label: string, create: () => Promise<{ id: string }>) {
  try {
    const { id } = await create();
    logInfo(`seeded ${label}`, { id });
    return true;
  } catch (e) {
    if (e instanceof ValidationError) {
      logInfo(`skipped ${label}`, { reason: e.message });
      return false;
    }
    throw e;
  }
}

async function main() {
  const config = loadConfig();
  const seed = seedFileSchema.parse(JSON.parse(readFileSync(seedFile, 'utf-8')));
  const store = new JsonFileStore(config.dataFile);
  const data = new ReferenceData(store);
  let created = 0;
  for (const b of seed.branches) if (await insert(`branch ${b.code}`, () => data.createBranch(b))) created++;
  for (const r of seed.roles) if (await insert(`role ${r.name}`, () => data.createRole(r))) created++;
  for (const u of seed.users) if (await insert(`user ${u.email}`, () => data.createUser(u))) created++;
  const programs = await data.listPrograms();
  for (const p of seed.programs) {
    if (programs.some(x => x.title === p.title)) continue;
    if (await insert(`program ${p.title}`, () => data.createProgram(p))) created++;
  }
  for (const r of seed.resources) {
    // Resources have no natural key; skip by name + branch.
    const existing = await data.listResources();
    if (existing.some(x => x.name === r.name && x.branch_code === (r.branch_code ?? null))) continue;
    if (await insert(`resource ${r.name}`, () => data.createResource(r))) created++;
  }
  await store.close();
  console.log(`Seeded ${created} records into ${config.dataFile}`);
}

main().catch(e => {
  logError('seed failed', { error: errorMessage(e) });
  process.exit(1);
});
