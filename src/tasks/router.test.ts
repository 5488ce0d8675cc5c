import { describe, expect, it } from 'vitest';
import { setAuditStore } from '../audit/index.js';
import { DelegationError } from '../errors.js';
import { StaticPeerDirectory } from '../peers/index.js';
import type { PeerDirectory } from '../peers/index.js';
import { RemoteTaskStore } from '../store/index.js';
import { FlakyTaskStore, MemoryAuditStore } from '../test-helpers.js';
import { createTask } from './model.js';
import { LocalTaskQueue } from './queue.js';
import { HandlerRegistry } from './registry.js';
import { DelegationRouter, leastLoaded } from './router.js';

const registry = new HandlerRegistry().register('echo', { shape: { msg: { kind: 'string' } }, run: (p) => p.msg });

function draft() {
  return createTask(registry, 'echo', { msg: 'hi' }, 'machine-a');
}

function setup(peers: PeerDirectory) {
  const backend = new FlakyTaskStore();
  const queue = new LocalTaskQueue();
  const router = new DelegationRouter({
    selfId: 'machine-a',
    store: new RemoteTaskStore(backend),
    peers,
    localQueue: queue,
  });
  return { backend, queue, router };
}

describe('leastLoaded', () => {
  it('keeps the task when there are no peers', () => {
    expect(leastLoaded([], 'machine-a').owner).toBe('machine-a');
  });

  it('picks the peer with the lowest load', () => {
    const peers = [
      { id: 'machine-b', load: 3 },
      { id: 'machine-c', load: 1 },
    ];
    expect(leastLoaded(peers, 'machine-a')).toEqual({ owner: 'machine-c', reason: 'least loaded peer (load 1)' });
  });

  it('breaks ties by peer id', () => {
    const peers = [
      { id: 'machine-d', load: 1 },
      { id: 'machine-c', load: 1 },
    ];
    expect(leastLoaded(peers, 'machine-a').owner).toBe('machine-c');
  });
});

describe('DelegationRouter', () => {
  it('delegates to a healthy peer and records the task once', async () => {
    const { backend, queue, router } = setup(new StaticPeerDirectory([{ id: 'machine-b', load: 0 }]));
    const task = await router.route(draft());

    expect(task.owner).toBe('machine-b');
    expect(task.createdBy).toBe('machine-a');
    expect(backend.putCalls).toBe(1);
    expect((await backend.inner.get(task.id))?.owner).toBe('machine-b');
    expect(queue.len()).toBe(0);
  });

  it('keeps the task and queues it locally without peers', async () => {
    const { backend, queue, router } = setup(new StaticPeerDirectory([]));
    const task = await router.route(draft());

    expect(task.owner).toBe('machine-a');
    expect((await backend.inner.get(task.id))?.status).toBe('pending');
    expect(queue.ids()).toEqual([task.id]);
  });

  it('honours an explicit owner', async () => {
    const { router } = setup(new StaticPeerDirectory([{ id: 'machine-b', load: 0 }]));
    const task = await router.route(draft(), { owner: 'machine-c' });
    expect(task.owner).toBe('machine-c');
  });

  it('fails without creating the task when the store is unreachable', async () => {
    const { backend, queue, router } = setup(new StaticPeerDirectory([]));
    backend.online = false;
    const task = draft();

    await expect(router.route(task)).rejects.toBeInstanceOf(DelegationError);
    expect(await backend.inner.get(task.id)).toBeUndefined();
    expect(queue.len()).toBe(0);
  });

  it('fails when peers cannot be listed', async () => {
    const { router } = setup({
      listPeers: async () => {
        throw new Error('directory offline');
      },
    });
    await expect(router.route(draft())).rejects.toThrow('directory offline');
  });

  it('audits the delegation', async () => {
    const audits = new MemoryAuditStore();
    setAuditStore(audits);
    const { router } = setup(new StaticPeerDirectory([{ id: 'machine-b', load: 2 }]));
    const task = await router.route(draft());

    expect(audits.entries).toHaveLength(1);
    expect(audits.entries[0]).toMatchObject({
      action: 'task.delegate',
      taskId: task.id,
      owner: 'machine-b',
      success: true,
      detail: { type: 'echo', reason: 'least loaded peer (load 2)' },
    });
  });
});
