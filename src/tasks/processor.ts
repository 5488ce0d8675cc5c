import { audit } from '../audit/index.js';
import {
  HandlerExecutionError,
  HandlerTimeoutError,
  RetryExhaustedError,
  TaskRelayError,
  UnknownTypeError,
  errorMessage,
} from '../errors.js';
import { logger as rootLogger } from '../log/index.js';
import type { Logger } from '../log/index.js';
import type { RemoteTaskStore } from '../store/index.js';
import type { Task, TaskResult } from '../types/index.js';
import { backoffDelay, sleep, withTimeout } from '../utils/async.js';
import type { LocalTaskQueue } from './queue.js';
import type { HandlerRegistry, RegisteredHandler } from './registry.js';
import { isTerminal, transition } from './state.js';

export interface TaskProcessorOptions {
  machineId: string;
  registry: HandlerRegistry;
  queue: LocalTaskQueue;
  store: RemoteTaskStore;
  maxAttempts: number;
  retryBackoffBaseMs: number;
  retryBackoffMaxMs: number;
  handlerConcurrencyLimit: number;
  defaultHandlerTimeoutMs: number;
  /** Follow this machine's tasks in the shared store. Defaults to true. */
  watchRemote?: boolean;
  /** Finished tasks remembered for de-duplication */
  maxFinishedEntries?: number;
  /** Called after every local transition, once it has been handed to the store */
  onTransition?: (task: Task, previous: Task) => void;
  logger?: Logger;
}

interface TrackedTask {
  task: Task;
  running: boolean;
  cancelRequested: boolean;
  retryTimer?: NodeJS.Timeout;
}

type ProcessorState = 'idle' | 'running' | 'stopping' | 'stopped';

function failure(error: Error): TaskResult {
  return { ok: false, error: error.message, errorName: error.name };
}

/**
 * Executes the tasks this machine owns.
 *
 * Tasks arrive from the local queue (routed here by this machine) and from
 * the store watch (routed here by peers). Each task id is tracked once, so a
 * task delivered on both paths runs once per attempt. Execution is
 * at-least-once: an attempt interrupted by a crash is counted as failed and
 * retried when the processor next starts.
 */
export class TaskProcessor {
  private readonly log: Logger;
  private readonly tracked = new Map<string, TrackedTask>();
  private readonly finished: string[] = [];
  private readonly inflight = new Set<Promise<void>>();
  private readonly completionWaiters = new Map<
    string,
    Array<{ resolve: (task: Task) => void; reject: (err: Error) => void }>
  >();

  private state: ProcessorState = 'idle';
  private active = 0;
  private slotWaiters: Array<() => void> = [];
  private dispatchLoop: Promise<void> | undefined;
  private watchLoop: Promise<void> | undefined;
  private readonly watchAbort = new AbortController();
  private cursor = 0;

  constructor(private options: TaskProcessorOptions) {
    this.log = (options.logger ?? rootLogger).child('processor');
  }

  start(): void {
    if (this.state !== 'idle') return;
    this.options.registry.seal();
    this.state = 'running';
    this.dispatchLoop = this.dispatch();
    if (this.options.watchRemote !== false) {
      this.watchLoop = this.follow();
    }
    this.log.info(
      `processing tasks for ${this.options.machineId} (${this.options.registry.types().join(', ') || 'no handlers'})`,
    );
    void audit('worker.start', {
      detail: { types: this.options.registry.types(), concurrency: this.options.handlerConcurrencyLimit },
    });
  }

  /**
   * Stop taking tasks, wait for running handlers to settle, and stop the
   * store watch. Queued and retry-scheduled tasks stay pending in the store
   * and are picked up again on the next start.
   */
  async shutdown(): Promise<void> {
    if (this.state === 'idle') {
      this.state = 'stopped';
      this.options.queue.close();
      return;
    }
    if (this.state !== 'running') return;
    this.state = 'stopping';

    const leftover = this.options.queue.close();
    if (leftover.length > 0) {
      this.log.info(`${leftover.length} queued task(s) left pending`);
    }
    for (const entry of this.tracked.values()) {
      if (entry.retryTimer) {
        clearTimeout(entry.retryTimer);
        entry.retryTimer = undefined;
      }
    }
    this.watchAbort.abort();

    await this.dispatchLoop;
    await Promise.all([...this.inflight]);
    await this.watchLoop;

    this.state = 'stopped';
    for (const [id, waiters] of this.completionWaiters) {
      for (const waiter of waiters) {
        waiter.reject(new TaskRelayError(`Processor stopped before task ${id} finished`, { taskId: id }));
      }
    }
    this.completionWaiters.clear();
    await audit('worker.stop');
  }

  isRunning(): boolean {
    return this.state === 'running';
  }

  /** Pending plus in_progress tasks on this machine, as advertised to peers. */
  load(): number {
    const ids = new Set<string>();
    for (const entry of this.tracked.values()) {
      if (!isTerminal(entry.task.status)) ids.add(entry.task.id);
    }
    // A task may be queued more than once before it is admitted
    for (const id of this.options.queue.ids()) {
      const entry = this.tracked.get(id);
      if (!entry || !isTerminal(entry.task.status)) ids.add(id);
    }
    return ids.size;
  }

  /** Handlers currently executing. */
  running(): number {
    let count = 0;
    for (const entry of this.tracked.values()) {
      if (entry.running) count++;
    }
    return count;
  }

  /** Latest local view of a task this processor has handled. */
  get(id: string): Task | undefined {
    return this.tracked.get(id)?.task;
  }

  /**
   * Cancel a locally tracked task. A pending task is cancelled at once; an
   * in_progress task finishes its current attempt but is not retried.
   * Returns undefined when the task is neither tracked nor queued here.
   */
  cancel(id: string): Task | undefined {
    let entry = this.tracked.get(id);
    if (!entry) {
      // Still waiting for a handler slot; track it so admit() drops it
      const queued = this.options.queue.find(id);
      if (!queued || queued.owner !== this.options.machineId || queued.status !== 'pending') return undefined;
      entry = { task: queued, running: false, cancelRequested: true };
      this.track(entry);
    }
    entry.cancelRequested = true;
    if (entry.task.status === 'pending' && !entry.running) {
      this.cancelEntry(entry);
    }
    return entry.task;
  }

  /** Resolves with the task once it reaches a terminal status here. */
  waitFor(id: string): Promise<Task> {
    const entry = this.tracked.get(id);
    if (entry && isTerminal(entry.task.status)) {
      return Promise.resolve(entry.task);
    }
    return new Promise((resolve, reject) => {
      const waiters = this.completionWaiters.get(id) ?? [];
      waiters.push({ resolve, reject });
      this.completionWaiters.set(id, waiters);
    });
  }

  // Semaphore over handler slots

  private acquire(): Promise<void> {
    if (this.active < this.options.handlerConcurrencyLimit) {
      this.active++;
      return Promise.resolve();
    }
    return new Promise((resolve) => {
      this.slotWaiters.push(() => {
        this.active++;
        resolve();
      });
    });
  }

  private release(): void {
    this.active--;
    const next = this.slotWaiters.shift();
    if (next) next();
  }

  private async dispatch(): Promise<void> {
    for (;;) {
      await this.acquire();
      const task = await this.options.queue.dequeue();
      if (!task) {
        this.release();
        return;
      }

      const entry = this.admit(task);
      if (!entry) {
        this.release();
        continue;
      }

      const run: Promise<void> = this.execute(entry)
        .catch((err: unknown) => {
          this.log.error(`task ${entry.task.id} left in an unexpected state`, err);
        })
        .finally(() => {
          this.release();
          this.inflight.delete(run);
        });
      this.inflight.add(run);
    }
  }

  /**
   * Decide whether a dequeued task should start now. Returns the tracking
   * entry to execute, or undefined to drop this delivery.
   */
  private admit(task: Task): TrackedTask | undefined {
    let entry = this.tracked.get(task.id);
    if (!entry) {
      if (task.owner !== this.options.machineId) {
        this.log.warn(`task ${task.id} is owned by ${task.owner}, not executing it here`);
        return undefined;
      }
      if (task.status !== 'pending') return undefined;
      entry = { task, running: false, cancelRequested: task.cancelRequestedAt !== undefined };
      this.track(entry);
    }

    if (entry.running || entry.retryTimer || entry.task.status !== 'pending') return undefined;

    if (entry.cancelRequested) {
      this.cancelEntry(entry);
      return undefined;
    }

    const notBefore = entry.task.notBefore ? Date.parse(entry.task.notBefore) : 0;
    const wait = notBefore - Date.now();
    if (wait > 0) {
      this.scheduleRetry(entry, wait);
      return undefined;
    }
    return entry;
  }

  private async execute(entry: TrackedTask): Promise<void> {
    let handler: RegisteredHandler;
    try {
      handler = this.options.registry.resolve(entry.task.type);
    } catch (err) {
      if (!(err instanceof UnknownTypeError)) throw err;
      // Not retryable: no attempt is made
      this.commit(entry, transition(entry.task, 'in_progress'));
      this.commit(entry, transition(entry.task, 'failed', { result: failure(err) }));
      this.log.warn(`task ${entry.task.id} failed: ${err.message}`);
      await audit('task.fail', { taskId: entry.task.id, success: false, error: err.message });
      return;
    }

    const started = transition(entry.task, 'in_progress', { attempt: entry.task.attempt + 1 });
    entry.running = true;
    this.commit(entry, started);
    this.log.debug(`task ${started.id} (${started.type}) attempt ${started.attempt}/${this.options.maxAttempts}`);
    await audit('task.start', { taskId: started.id, detail: { type: started.type, attempt: started.attempt } });

    const timeoutMs = handler.timeoutMs ?? this.options.defaultHandlerTimeoutMs;
    const controller = new AbortController();
    let value: unknown;
    try {
      value = await withTimeout(
        Promise.resolve().then(() =>
          handler.run(started.payload, { taskId: started.id, attempt: started.attempt, signal: controller.signal }),
        ),
        timeoutMs,
        () => new HandlerTimeoutError(timeoutMs),
      );
    } catch (err) {
      controller.abort();
      entry.running = false;
      const error = err instanceof HandlerTimeoutError ? err : new HandlerExecutionError(err);
      this.log.warn(`task ${started.id} attempt ${started.attempt} failed: ${error.message}`);
      await this.settleFailure(entry, error);
      return;
    }

    entry.running = false;
    this.commit(entry, transition(entry.task, 'completed', { result: { ok: true, value: value ?? null } }));
    this.log.info(`task ${started.id} (${started.type}) completed`);
    await audit('task.complete', { taskId: started.id, detail: { attempt: started.attempt } });
  }

  /** An in_progress attempt failed; retry it, or finish the task. */
  private async settleFailure(entry: TrackedTask, error: Error): Promise<void> {
    const { task } = entry;

    if (task.attempt >= this.options.maxAttempts) {
      const exhausted = new RetryExhaustedError(task.attempt, error);
      this.commit(entry, transition(task, 'failed', { result: failure(exhausted) }));
      this.log.warn(`task ${task.id} failed: ${exhausted.message}`);
      await audit('task.fail', { taskId: task.id, success: false, error: exhausted.message });
      return;
    }

    if (entry.cancelRequested) {
      this.commit(entry, transition(task, 'pending'));
      this.cancelEntry(entry);
      return;
    }

    const wait = backoffDelay(task.attempt, this.options.retryBackoffBaseMs, this.options.retryBackoffMaxMs);
    const notBefore = new Date(Date.now() + wait).toISOString();
    this.commit(entry, transition(task, 'pending', { notBefore }));
    this.scheduleRetry(entry, wait);
    await audit('task.retry', {
      taskId: task.id,
      success: false,
      error: error.message,
      detail: { attempt: task.attempt, retryInMs: wait },
    });
  }

  private scheduleRetry(entry: TrackedTask, wait: number): void {
    if (this.state !== 'running') return;
    entry.retryTimer = setTimeout(() => {
      entry.retryTimer = undefined;
      if (this.state !== 'running' || this.options.queue.isClosed()) return;
      this.options.queue.enqueue(entry.task);
    }, wait);
  }

  private cancelEntry(entry: TrackedTask): void {
    if (entry.retryTimer) {
      clearTimeout(entry.retryTimer);
      entry.retryTimer = undefined;
    }
    this.commit(entry, transition(entry.task, 'cancelled'));
    this.log.info(`task ${entry.task.id} cancelled`);
    void audit('task.cancel', { taskId: entry.task.id, owner: entry.task.owner });
  }

  /** Adopt a new version of a tracked task and hand it to the store. */
  private commit(entry: TrackedTask, next: Task): void {
    const previous = entry.task;
    entry.task = next;
    this.options.store.publish(next);
    this.options.onTransition?.(next, previous);

    if (isTerminal(next.status)) {
      this.remember(next.id);
      const waiters = this.completionWaiters.get(next.id);
      this.completionWaiters.delete(next.id);
      for (const waiter of waiters ?? []) waiter.resolve(next);
    }
  }

  private track(entry: TrackedTask): void {
    this.tracked.set(entry.task.id, entry);
  }

  private remember(id: string): void {
    this.finished.push(id);
    const max = this.options.maxFinishedEntries ?? 1000;
    while (this.finished.length > max) {
      const oldest = this.finished.shift();
      if (oldest !== undefined) this.tracked.delete(oldest);
    }
  }

  /** Follow this machine's tasks in the store, re-subscribing after errors. */
  private async follow(): Promise<void> {
    const signal = this.watchAbort.signal;
    let failures = 0;
    while (!signal.aborted) {
      try {
        for await (const change of this.options.store.watch(this.options.machineId, {
          cursor: this.cursor,
          signal,
        })) {
          failures = 0;
          this.cursor = Math.max(this.cursor, change.seq);
          this.ingest(change.task);
        }
      } catch (err) {
        failures++;
        const wait = backoffDelay(failures, this.options.retryBackoffBaseMs, this.options.retryBackoffMaxMs);
        this.log.error(`store watch failed, resubscribing in ${wait}ms: ${errorMessage(err)}`);
        await sleep(wait, signal);
      }
    }
  }

  private ingest(incoming: Task): void {
    if (this.state !== 'running') return;
    const entry = this.tracked.get(incoming.id);

    if (entry) {
      // Our own writes echo back; only a cancellation request is news
      if (incoming.cancelRequestedAt && !entry.cancelRequested) {
        entry.cancelRequested = true;
        // Later writes must outrank the request under last-writer-wins
        const updatedAt =
          Date.parse(incoming.updatedAt) > Date.parse(entry.task.updatedAt) ? incoming.updatedAt : entry.task.updatedAt;
        entry.task = { ...entry.task, cancelRequestedAt: incoming.cancelRequestedAt, updatedAt };
        this.log.info(`cancellation requested for task ${incoming.id}`);
        if (entry.task.status === 'pending' && !entry.running) {
          this.cancelEntry(entry);
        }
      }
      return;
    }

    switch (incoming.status) {
      case 'pending':
        if (incoming.cancelRequestedAt) {
          const fresh: TrackedTask = { task: incoming, running: false, cancelRequested: true };
          this.track(fresh);
          this.cancelEntry(fresh);
        } else {
          this.options.queue.enqueue(incoming);
        }
        return;
      case 'in_progress':
        this.recover(incoming).catch((err: unknown) => {
          this.log.error(`recovery of task ${incoming.id} failed`, err);
        });
        return;
      default:
        return;
    }
  }

  /**
   * An in_progress task owned here that no handler is running: a previous
   * run of this machine stopped mid-attempt. That attempt counts as failed.
   */
  private async recover(task: Task): Promise<void> {
    const entry: TrackedTask = {
      task,
      running: false,
      cancelRequested: task.cancelRequestedAt !== undefined,
    };
    this.track(entry);
    this.log.warn(`recovering task ${task.id}: attempt ${task.attempt} was interrupted`);
    await this.settleFailure(entry, new HandlerExecutionError('attempt interrupted before completion'));
  }
}
