import { randomUUID } from 'node:crypto';
import { StoreUnavailableError } from './errors.js';
import type { AuditStore } from './audit/index.js';
import type { AuditEntry, AuditQuery } from './audit/index.js';
import { MemoryTaskStore } from './store/index.js';
import type { PutResult, TaskListFilter, TaskStore } from './store/index.js';
import { ConfigSchema } from './types/index.js';
import type { Config, PeerRecord, StoredTask, Task } from './types/index.js';

export class MemoryAuditStore implements AuditStore {
  readonly entries: AuditEntry[] = [];

  async append(entry: AuditEntry): Promise<void> {
    this.entries.push(entry);
  }

  async query(query: AuditQuery): Promise<AuditEntry[]> {
    return this.entries
      .filter((e) => (query.action ? e.action === query.action : true))
      .filter((e) => (query.taskId ? e.taskId === query.taskId : true))
      .reverse()
      .slice(0, query.limit);
  }
}

/** Config with timings short enough for tests. */
export function testConfig(overrides: Partial<Config> = {}): Config {
  return ConfigSchema.parse({
    machineId: 'machine-a',
    pollIntervalMs: 10,
    retryBackoffBaseMs: 10,
    retryBackoffMaxMs: 40,
    publishRetryBaseMs: 10,
    publishRetryMaxMs: 40,
    defaultHandlerTimeoutMs: 1000,
    ...overrides,
  });
}

/** A shared store that can be taken offline. */
export class FlakyTaskStore implements TaskStore {
  readonly inner = new MemoryTaskStore();
  online = true;
  putCalls = 0;
  /** Task ids left out of `changesSince`, as a lagging index would */
  readonly hidden = new Set<string>();

  constructor(readonly sequenceOverlap = 0) {}

  private check(operation: string): void {
    if (!this.online) {
      throw new StoreUnavailableError(operation, new Error('connection refused'));
    }
  }

  async put(task: Task): Promise<PutResult> {
    this.putCalls++;
    this.check('put');
    return this.inner.put(task);
  }

  async get(id: string): Promise<StoredTask | undefined> {
    this.check('get');
    return this.inner.get(id);
  }

  async changesSince(owner: string, cursor: number, limit: number): Promise<StoredTask[]> {
    this.check('changesSince');
    const changes = await this.inner.changesSince(owner, cursor, limit);
    return changes.filter((t) => !this.hidden.has(t.id));
  }

  async list(filter?: TaskListFilter): Promise<StoredTask[]> {
    this.check('list');
    return this.inner.list(filter);
  }

  async purge(before: string): Promise<number> {
    this.check('purge');
    return this.inner.purge(before);
  }

  async heartbeat(peer: PeerRecord): Promise<void> {
    this.check('heartbeat');
    return this.inner.heartbeat(peer);
  }

  async listPeers(): Promise<PeerRecord[]> {
    this.check('listPeers');
    return this.inner.listPeers();
  }
}

/** Poll `predicate` until it holds. */
export async function waitUntil(predicate: () => boolean | Promise<boolean>, timeoutMs = 3000): Promise<void> {
  const deadline = Date.now() + timeoutMs;
  while (!(await predicate())) {
    if (Date.now() > deadline) throw new Error(`condition not met within ${timeoutMs}ms`);
    await new Promise((resolve) => setTimeout(resolve, 5));
  }
}

export function makeTask(overrides: Partial<Task> = {}): Task {
  return {
    id: randomUUID(),
    type: 'echo',
    payload: { msg: 'hi' },
    owner: 'machine-a',
    createdBy: 'machine-a',
    status: 'pending',
    attempt: 0,
    createdAt: '2026-01-01T00:00:00.000Z',
    updatedAt: '2026-01-01T00:00:00.000Z',
    ...overrides,
  };
}
