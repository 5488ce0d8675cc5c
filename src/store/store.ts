import type { PeerRecord, StoredTask, Task, TaskStatus } from '../types/index.js';

export interface PutResult {
  /** false when the stored record already wins under last-writer-wins */
  applied: boolean;
  /** Sequence number of the stored record after the call */
  seq: number;
}

export interface TaskListFilter {
  owner?: string;
  status?: TaskStatus;
}

/**
 * Shared task record store backend.
 * Implementations: MemoryTaskStore (in-process), JsonTaskStore (file),
 * DynamoTaskStore (AWS).
 *
 * Every applied write stamps the record with a store-wide increasing `seq`.
 */
export interface TaskStore {
  /**
   * How many sequence numbers behind its cursor a watcher re-reads.
   * Non-zero for backends whose owner index may surface writes out of order.
   */
  readonly sequenceOverlap: number;

  /** Last-writer-wins upsert keyed by id. */
  put(task: Task): Promise<PutResult>;

  get(id: string): Promise<StoredTask | undefined>;

  /** Records of `owner` with seq > cursor, ascending by seq. */
  changesSince(owner: string, cursor: number, limit: number): Promise<StoredTask[]>;

  list(filter?: TaskListFilter): Promise<StoredTask[]>;

  /** Delete terminal records last updated before `before`. Returns the count. */
  purge(before: string): Promise<number>;

  heartbeat(peer: PeerRecord): Promise<void>;

  listPeers(): Promise<PeerRecord[]>;
}
