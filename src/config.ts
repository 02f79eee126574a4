import { z } from 'zod';
import { ValidationError } from './engine/errors.js';

const envSchema = z.object({
  PORT: z.coerce.number().int().positive().default(8000),
  HOST: z.string().min(1).default('127.0.0.1'),
  STORE_DRIVER: z.enum(['memory', 'file']).default('memory'),
  DATA_FILE: z.string().min(1).default('data/store.json'),
  STORE_TIMEOUT_MS: z.coerce.number().int().positive().default(5000),
  NOTIFICATIONS_ENABLED: z.enum(['true', 'false']).default('true').transform(v => v === 'true'),
});

export interface AppConfig {
  port: number;
  host: string;
  storeDriver: 'memory' | 'file';
  dataFile: string;
  storeTimeoutMs: number;
  notificationsEnabled: boolean;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new ValidationError(issue ? issue.path.join('.') : '', issue ? issue.message : 'invalid environment');
  }
  const e = parsed.data;
  return {
    port: e.PORT,
    host: e.HOST,
    storeDriver: e.STORE_DRIVER,
    dataFile: e.DATA_FILE,
    storeTimeoutMs: e.STORE_TIMEOUT_MS,
    notificationsEnabled: e.NOTIFICATIONS_ENABLED,
  };
}
