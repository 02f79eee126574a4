import { AuditEntry } from '../models/types.js';

// Diagnostic trail of lifecycle activity. Not a source of truth: the store is.
const RING_SIZE = 500;
const events: AuditEntry[] = [];
let seq = 1;

export function logEvent(type: string, payload: Record<string, unknown>, correlation_id?: string) {
  events.push({ id: `${Date.now()}-${seq++}`, ts: new Date().toISOString(), type, correlation_id, payload });
  if (events.length > RING_SIZE) events.shift();
}

export function getEvents(filter?: { type?: string; correlation_id?: string }) {
  if (!filter) return [...events];
  return events.filter(e =>
    (filter.type ? e.type === filter.type : true) &&
    (filter.correlation_id ? e.correlation_id === filter.correlation_id : true));
}

export function clearEvents() {
  events.length = 0;
}
