/**
 * Structured audit logging for security-relevant events.
 * All events are logged at info level with a structured `event` field.
 */

import { logger } from './logger.js';

export type AuditEvent =
  | 'oauth.code_issued'
  | 'oauth.token_issued'
  | 'oauth.token_refreshed'
  | 'oauth.token_revoked'
  | 'oauth.grant_denied'
  | 'oauth.clients_seeded';

interface AuditContext {
  event: AuditEvent;
  clientId?: string;
  userId?: string | null;
  grantType?: string;
  scope?: string;
  reason?: string;
  [key: string]: unknown;
}

/**
 * Log a structured audit event.
 */
export function audit(context: AuditContext, message: string): void {
  logger.info(context, `[AUDIT] ${message}`);
}
