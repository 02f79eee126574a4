import cors from 'cors';
import express, { NextFunction, Request, Response } from 'express';
import { Runtime } from '../runtime.js';
import { VerbContext, listVerbs, runVerb } from '../verbs/index.js';
import { errorHandler } from './error_handler.js';

type ArgsFrom = (req: Request) => unknown;

const body: ArgsFrom = req => req.body;
// An empty query value means "no filter", not an empty match.
const query: ArgsFrom = req => Object.fromEntries(Object.entries(req.query).filter(([, v]) => v !== ''));
const none: ArgsFrom = () => ({});

export function createApp(runtime: Runtime) {
  const ctx: VerbContext = { lifecycle: runtime.lifecycle, referenceData: runtime.referenceData };
  const app = express();
  app.use(cors());
  app.use(express.json({ limit: '1mb' }));

  // Express 4 does not route rejected promises to the error handler on its own.
  const verb = (name: string, argsFrom: ArgsFrom, status = 200) =>
    (req: Request, res: Response, next: NextFunction) => {
      runVerb(name, argsFrom(req), ctx)
        .then(result => { res.status(status).json(result); })
        .catch(next);
    };

  app.get('/', (_req, res) => {
    res.json({ message: 'Program lifecycle backend running' });
  });
  app.get('/health', (_req, res) => {
    res.json({ ok: true, store: runtime.config.storeDriver, verbs: listVerbs().length });
  });
  app.get('/verbs', (_req, res) => {
    res.json({ verbs: listVerbs() });
  });
  app.get('/schema', verb('describe_schema', none));

  // Reference data
  app.post('/branches', verb('create_branch', body, 201));
  app.get('/branches', verb('list_branches', none));
  app.post('/roles', verb('create_role', body, 201));
  app.get('/roles', verb('list_roles', none));
  app.post('/users', verb('create_user', body, 201));
  app.get('/users', verb('list_users', query));
  app.post('/programs', verb('create_program', body, 201));
  app.get('/programs', verb('list_programs', query));
  app.post('/resources', verb('create_resource', body, 201));
  app.get('/resources', verb('list_resources', query));

  // Program request lifecycle
  app.post('/program-requests', verb('submit_request', body, 201));
  app.get('/program-requests', verb('list_requests', query));
  app.get('/program-requests/:id', verb('get_request', req => ({ request_id: req.params.id })));
  app.post('/program-requests/:id/review', verb('begin_review', req => ({ ...req.body, request_id: req.params.id })));
  app.post('/approvals', verb('record_approval', body, 201));
  app.get('/approvals', verb('list_approvals', query));

  // Scheduling
  app.post('/events', verb('schedule_event', body, 201));
  app.get('/events', verb('list_events', query));
  app.get('/events/:id', verb('get_event', req => ({ event_id: req.params.id })));
  app.post('/events/:id/status', verb('update_event_status', req => ({ ...req.body, event_id: req.params.id })));

  // Execution, reporting and evaluation
  app.post('/reports', verb('submit_report', body, 201));
  app.get('/reports', verb('list_reports', query));
  app.post('/evaluations', verb('submit_evaluation', body, 201));
  app.get('/evaluations', verb('list_evaluations', query));

  // Notifications
  app.post('/notifications', verb('create_notification', body, 201));
  app.get('/notifications', verb('list_notifications', query));
  app.post('/notifications/:id/read', verb('mark_notification_read', req => ({ notification_id: req.params.id })));

  // Must be last: centralized error handler.
  app.use(errorHandler);
  return app;
}
