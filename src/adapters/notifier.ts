import { logEvent } from '../engine/events.js';
import { renderInline, renderTemplate } from '../engine/templates.js';
import { NotificationType } from '../models/types.js';
import { logInfo } from '../util/logger.js';
import { DocumentStore } from './document_store.js';

export type NotificationKind = 'request_approved' | 'request_rejected' | 'request_under_review' | 'event_scheduled';

const KINDS: Record<NotificationKind, { title: string; type: NotificationType }> = {
  request_approved: { title: 'Program request approved: {{program_title}}', type: 'success' },
  request_rejected: { title: 'Program request rejected: {{program_title}}', type: 'warning' },
  request_under_review: { title: 'Program request under review: {{program_title}}', type: 'info' },
  event_scheduled: { title: 'Event scheduled: {{title}}', type: 'info' },
};

export interface NotifyParams {
  kind: NotificationKind;
  user_email?: string | null;
  branch_code?: string | null;
  vars: Record<string, unknown>;
  correlation_id?: string;
}

/** Writes notification records; delivery to people is someone else's job. */
export class Notifier {
  constructor(private readonly store: DocumentStore) {}

  async notify(p: NotifyParams): Promise<string> {
    const kind = KINDS[p.kind];
    const title = renderInline(kind.title, p.vars);
    const message = await renderTemplate(p.kind, p.vars);
    const user_email = p.user_email ?? null;
    const branch_code = p.branch_code ?? null;
    const id = await this.store.create('notification', { user_email, branch_code, title, message, type: kind.type, is_read: false });
    logEvent('notification.sent', { id, kind: p.kind, user_email, branch_code }, p.correlation_id);
    logInfo('[notify]', { id, kind: p.kind, to: user_email ?? branch_code });
    return id;
  }
}
