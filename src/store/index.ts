export { RemoteTaskStore } from './adapter.js';
export type { RemoteTaskStoreOptions } from './adapter.js';
export { watchChanges } from './watch.js';
export type { WatchOptions } from './watch.js';
export { supersedes } from './conflict.js';
export { MemoryTaskStore } from './memory-store.js';
export { JsonTaskStore } from './json-store.js';
export { DynamoTaskStore } from './dynamo-store.js';
export type { DynamoTaskStoreOptions } from './dynamo-store.js';
export { createTaskStore, createAuditStore, ensureTables } from './factory.js';
export type { TaskStore, PutResult, TaskListFilter } from './store.js';
