export * from './errors.js';
export * from './types/index.js';
export * from './tasks/index.js';
export * from './store/index.js';
export * from './peers/index.js';
export { registerBuiltinHandlers } from './handlers/index.js';
export { TaskNode } from './node.js';
export type { CreateTaskOptions, TaskNodeOptions, WaitOptions } from './node.js';
export { loadConfig, loadStoredConfig, saveConfig, getTaskrelayDir } from './config/index.js';
export { Logger, logger, setLogLevel } from './log/index.js';
export { audit, setAuditStore, setAuditActor } from './audit/index.js';
export type { AuditEntry, AuditStore } from './audit/index.js';
