import { audit, queryAudit, setAuditActor, setAuditStore } from './audit/index.js';
import type { AuditEntry } from './audit/index.js';
import { TaskRelayError, errorMessage } from './errors.js';
import { logger as rootLogger, setLogLevel } from './log/index.js';
import type { Logger } from './log/index.js';
import { PeerHeartbeat, StorePeerDirectory } from './peers/index.js';
import type { PeerDirectory } from './peers/index.js';
import { RemoteTaskStore, createAuditStore, createTaskStore } from './store/index.js';
import type { TaskStore } from './store/index.js';
import { createTask } from './tasks/model.js';
import { TaskProcessor } from './tasks/processor.js';
import { LocalTaskQueue } from './tasks/queue.js';
import type { HandlerRegistry } from './tasks/registry.js';
import { purgeExpired } from './tasks/retention.js';
import { DelegationRouter } from './tasks/router.js';
import type { DelegationPolicy } from './tasks/router.js';
import { isTerminal } from './tasks/state.js';
import type { Config, Task } from './types/index.js';
import { sleep } from './utils/async.js';

export interface TaskNodeOptions {
  config: Config;
  registry: HandlerRegistry;
  backend: TaskStore;
  /** Defaults to presence records in the store */
  peers?: PeerDirectory;
  policy?: DelegationPolicy;
  /** Publish presence and purge expired tasks while running. Defaults to true. */
  background?: boolean;
  logger?: Logger;
}

export interface CreateTaskOptions {
  /** Skip the delegation policy and assign this machine */
  owner?: string;
}

export interface WaitOptions {
  timeoutMs?: number;
  pollIntervalMs?: number;
  signal?: AbortSignal;
}

const PURGE_INTERVAL_MS = 3_600_000;

/**
 * One machine's view of the task system: creates and delegates tasks,
 * executes the ones it owns, and advertises itself to peers.
 */
export class TaskNode {
  readonly machineId: string;
  readonly store: RemoteTaskStore;
  readonly queue = new LocalTaskQueue();
  readonly router: DelegationRouter;
  readonly processor: TaskProcessor;

  private readonly log: Logger;
  private readonly heartbeat: PeerHeartbeat;
  private purgeTimer: NodeJS.Timeout | undefined;
  private started = false;
  private stopping: Promise<boolean> | undefined;

  constructor(private options: TaskNodeOptions) {
    const { config } = options;
    this.machineId = config.machineId;
    this.log = (options.logger ?? rootLogger).child(config.machineId);

    this.store = new RemoteTaskStore(options.backend, {
      pollIntervalMs: config.pollIntervalMs,
      publishRetryBaseMs: config.publishRetryBaseMs,
      publishRetryMaxMs: config.publishRetryMaxMs,
      logger: this.log,
    });

    this.processor = new TaskProcessor({
      machineId: config.machineId,
      registry: options.registry,
      queue: this.queue,
      store: this.store,
      maxAttempts: config.maxAttempts,
      retryBackoffBaseMs: config.retryBackoffBaseMs,
      retryBackoffMaxMs: config.retryBackoffMaxMs,
      handlerConcurrencyLimit: config.handlerConcurrencyLimit,
      defaultHandlerTimeoutMs: config.defaultHandlerTimeoutMs,
      logger: this.log,
    });

    const peers =
      options.peers ??
      new StorePeerDirectory(this.store, config.machineId, {
        ttlSeconds: config.peerTtlSeconds,
        allowlist: config.peers,
      });

    this.router = new DelegationRouter({
      selfId: config.machineId,
      store: this.store,
      peers,
      policy: options.policy,
      localQueue: this.queue,
      logger: this.log,
    });

    this.heartbeat = new PeerHeartbeat(this.store, {
      id: config.machineId,
      descriptor: config.descriptor,
      intervalMs: config.heartbeatIntervalSeconds * 1000,
      load: () => this.processor.load(),
      logger: this.log,
    });
  }

  get config(): Config {
    return this.options.config;
  }

  /** Build a node from a loaded config, with the configured store backends. */
  static fromConfig(config: Config, registry: HandlerRegistry): TaskNode {
    setLogLevel(config.logLevel);
    setAuditStore(createAuditStore(config));
    setAuditActor(config.machineId);
    return new TaskNode({ config, registry, backend: createTaskStore(config) });
  }

  /**
   * Validate, delegate and record a new task. Returns its id once the task
   * is in the shared store. Throws ValidationError, UnknownTypeError or
   * DelegationError; no task exists anywhere after a throw.
   */
  async createTask(type: string, payload: unknown, opts: CreateTaskOptions = {}): Promise<string> {
    const draft = createTask(this.options.registry, type, payload, this.machineId);
    const task = await this.router.route(draft, opts);
    await audit('task.create', { taskId: task.id, owner: task.owner, detail: { type: task.type } });
    return task.id;
  }

  /** Latest known state: the local view for tasks executed here, else the store's. */
  async getTask(id: string): Promise<Task | undefined> {
    return this.processor.get(id) ?? (await this.store.get(id));
  }

  /**
   * Request cancellation. Tasks queued or executing here are handled directly; for
   * others the request is recorded in the store for their owner to act on.
   */
  async cancelTask(id: string): Promise<Task | undefined> {
    const local = this.processor.cancel(id);
    if (local) return local;
    const task = await this.store.requestCancel(id);
    if (task?.cancelRequestedAt) {
      await audit('task.cancel', { taskId: id, owner: task.owner, detail: { requested: true } });
    }
    return task;
  }

  /** Audit entries recorded for a task by this machine, newest first. */
  taskHistory(id: string, limit = 50): Promise<AuditEntry[]> {
    return queryAudit({ taskId: id, limit });
  }

  /** Poll until the task reaches a terminal status. */
  async waitForTask(id: string, opts: WaitOptions = {}): Promise<Task> {
    const { timeoutMs, pollIntervalMs = this.options.config.pollIntervalMs, signal } = opts;
    const deadline = timeoutMs === undefined ? Infinity : Date.now() + timeoutMs;

    for (;;) {
      const task = await this.getTask(id);
      if (task && isTerminal(task.status)) return task;
      if (signal?.aborted) {
        throw new TaskRelayError(`Stopped waiting for task ${id}`, { taskId: id });
      }
      if (Date.now() >= deadline) {
        throw new TaskRelayError(`Task ${id} did not finish within ${timeoutMs}ms`, {
          taskId: id,
          status: task?.status,
        });
      }
      await sleep(Math.min(pollIntervalMs, deadline - Date.now()), signal);
    }
  }

  async start(): Promise<void> {
    if (this.started) return;
    this.started = true;
    this.processor.start();

    if (this.options.background !== false) {
      await this.heartbeat.start();
      this.purgeTimer = setInterval(() => {
        purgeExpired(this.store, this.options.config.retentionHours).catch((err: unknown) => {
          this.log.warn(`purge failed: ${errorMessage(err)}`);
        });
      }, PURGE_INTERVAL_MS);
      this.purgeTimer.unref();
    }
  }

  /**
   * Stop executing, mark this machine offline, and push every local
   * transition to the store. Returns false if some updates could not be
   * published.
   */
  shutdown(): Promise<boolean> {
    if (!this.stopping) this.stopping = this.stop();
    return this.stopping;
  }

  private async stop(): Promise<boolean> {
    if (this.purgeTimer) {
      clearInterval(this.purgeTimer);
      this.purgeTimer = undefined;
    }
    await this.processor.shutdown();
    if (this.started && this.options.background !== false) {
      await this.heartbeat.stop();
    }
    const flushed = await this.store.flush();
    this.store.close();
    return flushed;
  }
}
