import { afterEach, describe, expect, it } from 'vitest';
import { DelegationError, UnknownTypeError, ValidationError } from './errors.js';
import { registerBuiltinHandlers } from './handlers/index.js';
import { TaskNode } from './node.js';
import { StaticPeerDirectory } from './peers/index.js';
import type { PeerDirectory } from './peers/index.js';
import { MemoryTaskStore } from './store/index.js';
import type { TaskStore } from './store/index.js';
import { HandlerRegistry } from './tasks/registry.js';
import { FlakyTaskStore, testConfig, waitUntil } from './test-helpers.js';
import type { Config } from './types/index.js';
import { sleep } from './utils/async.js';

const nodes: TaskNode[] = [];

function node(
  machineId: string,
  backend: TaskStore,
  opts: { peers?: PeerDirectory; background?: boolean; registry?: HandlerRegistry; config?: Partial<Config> } = {},
): TaskNode {
  const n = new TaskNode({
    config: testConfig({ machineId, ...opts.config }),
    registry: opts.registry ?? registerBuiltinHandlers(new HandlerRegistry()),
    backend,
    peers: opts.peers,
    background: opts.background ?? false,
  });
  nodes.push(n);
  return n;
}

afterEach(async () => {
  for (const n of nodes.splice(0)) await n.shutdown();
});

describe('TaskNode', () => {
  it('runs a task it keeps for itself', async () => {
    const a = node('machine-a', new MemoryTaskStore(), { peers: new StaticPeerDirectory([]) });
    await a.start();

    const id = await a.createTask('echo', { msg: 'hi' });
    const done = await a.waitForTask(id, { timeoutMs: 2000 });

    expect(done.owner).toBe('machine-a');
    expect(done.status).toBe('completed');
    expect(done.result).toEqual({ ok: true, value: 'hi' });
  });

  it('records a new task as pending before anything runs it', async () => {
    const a = node('machine-a', new MemoryTaskStore(), { peers: new StaticPeerDirectory([]) });
    const id = await a.createTask('echo', { msg: 'hi' });

    const task = await a.getTask(id);
    expect(task?.status).toBe('pending');
    expect(task?.owner).toBe('machine-a');
    expect(task?.attempt).toBe(0);
  });

  it('delegates to a peer that executes the task', async () => {
    const shared = new MemoryTaskStore();
    const a = node('machine-a', shared, { peers: new StaticPeerDirectory([{ id: 'machine-b', load: 0 }]) });
    const b = node('machine-b', shared, { peers: new StaticPeerDirectory([]) });
    await b.start();

    const id = await a.createTask('echo', { msg: 'hi' });
    const done = await a.waitForTask(id, { timeoutMs: 2000 });

    expect(done.owner).toBe('machine-b');
    expect(done.createdBy).toBe('machine-a');
    expect(done.result).toEqual({ ok: true, value: 'hi' });
    expect(a.processor.get(id)).toBeUndefined();
  });

  it('finds peers through their presence records', async () => {
    const shared = new MemoryTaskStore();
    const b = node('machine-b', shared, { peers: new StaticPeerDirectory([]), background: true });
    await b.start();
    const a = node('machine-a', shared);

    const id = await a.createTask('echo', { msg: 'hi' });
    expect((await a.getTask(id))?.owner).toBe('machine-b');
    expect((await a.waitForTask(id, { timeoutMs: 2000 })).status).toBe('completed');
  });

  it('marks itself offline on shutdown', async () => {
    const shared = new MemoryTaskStore();
    const b = node('machine-b', shared, { peers: new StaticPeerDirectory([]), background: true });
    await b.start();
    expect((await shared.listPeers()).map((p) => p.status)).toEqual(['online']);

    await b.shutdown();
    expect((await shared.listPeers()).map((p) => p.status)).toEqual(['offline']);
  });

  it('cancels a task owned by another machine through the store', async () => {
    const shared = new MemoryTaskStore();
    let calls = 0;
    const registry = new HandlerRegistry().register('echo', {
      shape: { msg: { kind: 'string' } },
      run: (p) => {
        calls++;
        return p.msg;
      },
    });
    const a = node('machine-a', shared, { peers: new StaticPeerDirectory([{ id: 'machine-b', load: 0 }]) });
    const b = node('machine-b', shared, { peers: new StaticPeerDirectory([]), registry });

    const id = await a.createTask('echo', { msg: 'hi' });
    const requested = await a.cancelTask(id);
    expect(requested?.cancelRequestedAt).toBeDefined();

    await b.start();
    const done = await a.waitForTask(id, { timeoutMs: 2000 });
    expect(done.status).toBe('cancelled');
    expect(calls).toBe(0);
  });

  it('lets a running local task finish after cancellation', async () => {
    const a = node('machine-a', new MemoryTaskStore(), { peers: new StaticPeerDirectory([]) });
    const id = await a.createTask('delay', { ms: 50 });
    await a.start();
    await waitUntil(async () => (await a.getTask(id))?.status === 'in_progress');

    const cancelled = await a.cancelTask(id);
    expect(cancelled?.status).toBe('in_progress');

    const done = await a.waitForTask(id, { timeoutMs: 2000 });
    expect(done.status).toBe('completed');
    expect(done.result).toEqual({ ok: true, value: { waitedMs: 50 } });
  });

  it('cancels a queued local task before it gets a handler slot', async () => {
    let release: () => void = () => undefined;
    const held = new Promise<void>((resolve) => {
      release = resolve;
    });
    let echoed = 0;
    const registry = new HandlerRegistry()
      .register('hold', { shape: {}, run: () => held })
      .register('echo', {
        shape: { msg: { kind: 'string' } },
        run: (p) => {
          echoed++;
          return p.msg;
        },
      });
    const backend = new MemoryTaskStore();
    const a = node('machine-a', backend, {
      peers: new StaticPeerDirectory([]),
      registry,
      // The store watch must not see the cancellation before the slot frees up
      config: { handlerConcurrencyLimit: 1, pollIntervalMs: 2000 },
    });
    await a.start();

    const first = await a.createTask('hold', {});
    await waitUntil(() => a.processor.get(first)?.status === 'in_progress');
    const second = await a.createTask('echo', { msg: 'hi' });

    const cancelled = await a.cancelTask(second);
    expect(cancelled?.status).toBe('cancelled');

    release();
    expect((await a.waitForTask(first, { timeoutMs: 2000 })).status).toBe('completed');
    await sleep(20);

    expect(echoed).toBe(0);
    expect(a.processor.get(second)?.status).toBe('cancelled');
    expect(await a.store.flush()).toBe(true);
    expect((await backend.get(second))?.status).toBe('cancelled');
  });

  it('reports the audit trail of a task', async () => {
    const a = node('machine-a', new MemoryTaskStore(), { peers: new StaticPeerDirectory([]) });
    const id = await a.createTask('echo', { msg: 'hi' });
    await a.start();
    await a.waitForTask(id, { timeoutMs: 2000 });

    const history = await a.taskHistory(id);
    expect(history.map((e) => e.action)).toEqual(['task.complete', 'task.start', 'task.create', 'task.delegate']);
    expect(history[3]?.detail).toEqual({ type: 'echo', reason: 'no healthy peers' });
    expect(await a.taskHistory(id, 1)).toHaveLength(1);
  });

  it('rejects invalid requests without storing anything', async () => {
    const store = new MemoryTaskStore();
    const a = node('machine-a', store, { peers: new StaticPeerDirectory([]) });

    await expect(a.createTask('echo', { msg: 5 })).rejects.toBeInstanceOf(ValidationError);
    await expect(a.createTask('ghost', {})).rejects.toBeInstanceOf(UnknownTypeError);
    expect(await store.list()).toEqual([]);
  });

  it('reports a delegation failure when the store is down', async () => {
    const store = new FlakyTaskStore();
    store.online = false;
    const a = node('machine-a', store, { peers: new StaticPeerDirectory([]) });

    await expect(a.createTask('echo', { msg: 'hi' })).rejects.toBeInstanceOf(DelegationError);
    expect(await store.inner.list()).toEqual([]);
  });

  it('gives up waiting after the timeout', async () => {
    const a = node('machine-a', new MemoryTaskStore(), { peers: new StaticPeerDirectory([]) });
    const id = await a.createTask('echo', { msg: 'hi' });
    await expect(a.waitForTask(id, { timeoutMs: 30 })).rejects.toThrow(`Task ${id} did not finish within 30ms`);
  });
});
