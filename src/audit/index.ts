export { audit, getAuditStore, queryAudit, setAuditStore, setAuditActor } from './logger.js';
export { JsonAuditStore } from './json-store.js';
export { DynamoAuditStore } from './dynamo-store.js';
export type { AuditStore } from './store.js';
export { AuditAction, AuditEntrySchema, AuditQuerySchema } from './types.js';
export type { AuditEntry, AuditQuery, AuditQueryInput } from './types.js';
