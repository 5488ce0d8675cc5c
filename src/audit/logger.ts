import { randomUUID } from 'node:crypto';
import { JsonAuditStore } from './json-store.js';
import { logger } from '../log/index.js';
import { errorMessage } from '../errors.js';
import type { AuditStore } from './store.js';
import { AuditQuerySchema } from './types.js';
import type { AuditAction, AuditEntry, AuditQueryInput } from './types.js';

let _store: AuditStore | undefined;
let _actor = 'cli';

export function getAuditStore(): AuditStore {
  if (!_store) {
    _store = new JsonAuditStore();
  }
  return _store;
}

export function setAuditStore(store: AuditStore): void {
  _store = store;
}

/** Default actor recorded on entries, normally this machine's id. */
export function setAuditActor(actor: string): void {
  _actor = actor;
}

/**
 * Record an audit event. Never throws.
 */
export async function audit(
  action: AuditAction,
  opts: {
    taskId?: string;
    owner?: string;
    detail?: Record<string, unknown>;
    success?: boolean;
    error?: string;
    actor?: string;
  } = {},
): Promise<void> {
  const entry: AuditEntry = {
    id: randomUUID(),
    timestamp: new Date().toISOString(),
    action,
    actor: opts.actor ?? _actor,
    taskId: opts.taskId,
    owner: opts.owner,
    detail: opts.detail,
    success: opts.success ?? true,
    error: opts.error,
  };

  try {
    await getAuditStore().append(entry);
  } catch (err) {
    // Audit logging must not break the main flow
    logger.debug(`audit ${action} not recorded: ${errorMessage(err)}`);
  }
}

/** Entries matching `input`, newest first. Throws ZodError on a malformed query. */
export async function queryAudit(input: AuditQueryInput): Promise<AuditEntry[]> {
  return getAuditStore().query(AuditQuerySchema.parse(input));
}
