export {
  TaskStatus,
  TaskSchema,
  TaskResultSchema,
  TERMINAL_STATUSES,
} from './task.js';
export type { Task, TaskResult, UnassignedTask, StoredTask, TaskChange } from './task.js';

export { PeerStatus, PeerRecordSchema } from './peer.js';
export type { PeerRecord, PeerLoad } from './peer.js';

export { ConfigSchema, DEFAULT_CONFIG, StoreBackend, LogLevel } from './config.js';
export type { Config } from './config.js';
