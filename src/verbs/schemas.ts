import { z } from 'zod';
import { parseInput } from '../models/schemas.js';
import { logEvent } from '../engine/events.js';

const id = z.string().trim().min(1);

export const requestIdSchema = z.object({ request_id: id });
export const eventIdSchema = z.object({ event_id: id });
export const notificationIdSchema = z.object({ notification_id: id });
export const emptyArgsSchema = z.object({}).strict();

export function validateVerbArgs<S extends z.ZodTypeAny>(name: string, schema: S, args: unknown): z.output<S> {
  try {
    return parseInput(schema, args ?? {});
  } catch (err) {
    logEvent('verb.invalid_args', { verb: name, error: err instanceof Error ? err.message : String(err) });
    throw err;
  }
}
