import { StoreUnavailableError, errorMessage } from '../errors.js';
import { logger as rootLogger } from '../log/index.js';
import type { Logger } from '../log/index.js';
import { withCancelRequest } from '../tasks/model.js';
import { isTerminal } from '../tasks/state.js';
import type { PeerRecord, StoredTask, Task, TaskChange } from '../types/index.js';
import { backoffDelay } from '../utils/async.js';
import { supersedes } from './conflict.js';
import type { PutResult, TaskListFilter, TaskStore } from './store.js';
import { watchChanges } from './watch.js';
import type { WatchOptions } from './watch.js';

export interface RemoteTaskStoreOptions {
  pollIntervalMs?: number;
  publishRetryBaseMs?: number;
  publishRetryMaxMs?: number;
  logger?: Logger;
}

function stripSeq(record: StoredTask): Task {
  const { seq: _seq, ...task } = record;
  return task;
}

/**
 * Bridges the processor and router to the shared store.
 *
 * `put` is synchronous with the caller and surfaces StoreUnavailableError.
 * `publish` is write-behind: the newest version of each task is kept in an
 * outbox and retried with backoff until the store accepts it.
 */
export class RemoteTaskStore {
  private readonly log: Logger;
  private readonly pollIntervalMs: number;
  private readonly retryBaseMs: number;
  private readonly retryMaxMs: number;

  private outbox = new Map<string, Task>();
  private draining: Promise<void> | undefined;
  private retryTimer: NodeJS.Timeout | undefined;
  private failures = 0;
  private closed = false;

  constructor(
    readonly backend: TaskStore,
    options: RemoteTaskStoreOptions = {},
  ) {
    this.log = (options.logger ?? rootLogger).child('store');
    this.pollIntervalMs = options.pollIntervalMs ?? 2000;
    this.retryBaseMs = options.publishRetryBaseMs ?? 500;
    this.retryMaxMs = options.publishRetryMaxMs ?? 30_000;
  }

  private async call<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (err) {
      if (err instanceof StoreUnavailableError) throw err;
      throw new StoreUnavailableError(operation, err);
    }
  }

  put(task: Task): Promise<PutResult> {
    return this.call('put', () => this.backend.put(task));
  }

  async get(id: string): Promise<Task | undefined> {
    const record = await this.call('get', () => this.backend.get(id));
    return record ? stripSeq(record) : undefined;
  }

  async list(filter?: TaskListFilter): Promise<Task[]> {
    const records = await this.call('list', () => this.backend.list(filter));
    return records.map(stripSeq);
  }

  watch(owner: string, options: WatchOptions = {}): AsyncGenerator<TaskChange> {
    return watchChanges(this.backend, owner, {
      pollIntervalMs: this.pollIntervalMs,
      retryBaseMs: this.retryBaseMs,
      retryMaxMs: this.retryMaxMs,
      logger: this.log,
      ...options,
    });
  }

  /**
   * Ask the owner of a task to cancel it. Returns the stored task after the
   * request, or undefined when no such task exists. Terminal tasks are
   * returned unchanged.
   */
  async requestCancel(id: string): Promise<Task | undefined> {
    const task = await this.get(id);
    if (!task || isTerminal(task.status) || task.cancelRequestedAt) return task;

    const requested = withCancelRequest(task);
    const res = await this.put(requested);
    if (res.applied) return requested;
    // Someone wrote a newer version meanwhile; report what is stored
    return this.get(id);
  }

  purge(before: string): Promise<number> {
    return this.call('purge', () => this.backend.purge(before));
  }

  heartbeat(peer: PeerRecord): Promise<void> {
    return this.call('heartbeat', () => this.backend.heartbeat(peer));
  }

  listPeers(): Promise<PeerRecord[]> {
    return this.call('listPeers', () => this.backend.listPeers());
  }

  /**
   * Write-behind publication of a local transition. Never throws; store
   * failures keep the task in the outbox for a later retry.
   */
  publish(task: Task): void {
    if (this.closed) {
      this.log.warn(`publish after close dropped for task ${task.id} (${task.status})`);
      return;
    }
    const queued = this.outbox.get(task.id);
    if (queued && !supersedes(task, queued)) return;
    this.outbox.set(task.id, task);
    this.kick();
  }

  /** Tasks whose newest version has not reached the store yet. */
  pending(): number {
    return this.outbox.size;
  }

  /**
   * Try to publish everything now. Resolves true when the outbox is empty.
   */
  async flush(): Promise<boolean> {
    while (this.draining) {
      await this.draining;
    }
    if (this.retryTimer) {
      clearTimeout(this.retryTimer);
      this.retryTimer = undefined;
    }
    this.kick();
    while (this.draining) {
      await this.draining;
    }
    return this.outbox.size === 0;
  }

  /** Stop retrying. Anything left in the outbox is reported and dropped. */
  close(): void {
    this.closed = true;
    if (this.retryTimer) {
      clearTimeout(this.retryTimer);
      this.retryTimer = undefined;
    }
    if (this.outbox.size > 0) {
      this.log.warn(`${this.outbox.size} task update(s) were not published: ${[...this.outbox.keys()].join(', ')}`);
    }
  }

  private kick(): void {
    if (this.draining || this.retryTimer || this.closed) return;
    this.draining = this.drain().finally(() => {
      this.draining = undefined;
    });
  }

  private async drain(): Promise<void> {
    for (;;) {
      const next = this.outbox.entries().next();
      if (next.done) return;
      const [id, task] = next.value;

      try {
        await this.put(task);
      } catch (err) {
        this.failures++;
        const wait = backoffDelay(this.failures, this.retryBaseMs, this.retryMaxMs);
        this.log.warn(`publish of task ${id} failed, retrying in ${wait}ms: ${errorMessage(err)}`);
        this.retryTimer = setTimeout(() => {
          this.retryTimer = undefined;
          this.kick();
        }, wait);
        this.retryTimer.unref();
        return;
      }

      this.failures = 0;
      // A newer version may have arrived while the write was in flight
      if (this.outbox.get(id) === task) this.outbox.delete(id);
      this.log.debug(`published task ${id} (${task.status})`);
    }
  }
}
