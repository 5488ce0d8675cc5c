import type { AuditEntry, AuditQuery } from './types.js';

/**
 * Append-only audit log store interface.
 * Implementations: JsonAuditStore (local), DynamoAuditStore (AWS).
 */
export interface AuditStore {
  append(entry: AuditEntry): Promise<void>;

  /** Newest first, filtered and capped by `query.limit`. */
  query(query: AuditQuery): Promise<AuditEntry[]>;
}
