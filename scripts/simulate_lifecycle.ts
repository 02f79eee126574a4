// Walks one program request through its lifecycle against an in-memory runtime and prints
// each step. Run with: npm run simulate
import '../src/env_bootstrap.js';
import { loadConfig } from '../src/config.js';
import { LifecycleError, errorMessage } from '../src/engine/errors.js';
import { buildRuntime } from '../src/runtime.js';

async function step<T>(label: string, fn: () => Promise<T>) {
  try {
    const out = await fn();
    console.log(`✔ ${label}`, out);
    return out;
  } catch (e) {
    if (e instanceof LifecycleError) {
      console.log(`✘ ${label} -> ${e.code}: ${e.message}`);
      return undefined;
    }
    throw e;
  }
}

async function main() {
  const rt = buildRuntime({ ...loadConfig(), storeDriver: 'memory' });
  await rt.referenceData.createBranch({ code: 'RU-01', name: 'Riverside Branch' });
  await rt.referenceData.createUser({ full_name: 'Avery Park', email: 'avery.park@example.org', branch_code: 'RU-01', role: 'coordinator' });
  await rt.referenceData.createUser({ full_name: 'Jordan Hale', email: 'jordan.hale@example.org', role: 'hq_manager' });

  const r1 = await rt.lifecycle.submitRequest({
    branch_code: 'RU-01',
    program_title: 'Campus cleanup day',
    program_type: 'student_activity',
    budget: [{ name: 'venue', amount: 100 }],
    requested_by: 'avery.park@example.org',
  });
  console.log('✔ submit', r1);
  await step('approve', () => rt.lifecycle.recordApproval({ request_id: r1.id, approved_by: 'jordan.hale@example.org', decision: 'approved' }));
  await step('approve again', () => rt.lifecycle.recordApproval({ request_id: r1.id, approved_by: 'jordan.hale@example.org', decision: 'rejected' }));
  const evt = await step('schedule', () => rt.lifecycle.scheduleEvent({
    request_id: r1.id,
    title: 'Campus cleanup',
    branch_code: 'RU-01',
    start_time: '2026-11-07T09:00:00Z',
    end_time: '2026-11-07T13:00:00Z',
  }));
  const r2 = await rt.lifecycle.submitRequest({
    branch_code: 'RU-01',
    program_title: 'Reading club',
    program_type: 'volunteering',
    requested_by: 'avery.park@example.org',
  });
  if (evt) {
    await step('report with mismatched request', () => rt.lifecycle.submitReport({ event_id: evt.id, request_id: r2.id, summary: 'Done' }));
    await step('report', () => rt.lifecycle.submitReport({ event_id: evt.id, request_id: r1.id, summary: 'Forty bags collected', attendees_count: 25 }));
  }
  console.log('notifications:', await rt.referenceData.listNotifications({ branch_code: 'RU-01' }));
}

main().catch(e => {
  console.error(errorMessage(e));
  process.exit(1);
});
