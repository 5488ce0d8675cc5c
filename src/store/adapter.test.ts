import { describe, expect, it } from 'vitest';
import { StoreUnavailableError } from '../errors.js';
import { FlakyTaskStore, makeTask, waitUntil } from '../test-helpers.js';
import { RemoteTaskStore } from './adapter.js';

function adapterFor(backend: FlakyTaskStore): RemoteTaskStore {
  return new RemoteTaskStore(backend, { pollIntervalMs: 5, publishRetryBaseMs: 5, publishRetryMaxMs: 10 });
}

describe('RemoteTaskStore', () => {
  it('returns tasks without the store sequence number', async () => {
    const backend = new FlakyTaskStore();
    const store = adapterFor(backend);
    const task = makeTask();
    await store.put(task);

    expect(await store.get(task.id)).toEqual(task);
    expect(await store.get('missing')).toBeUndefined();
  });

  it('surfaces an unreachable store to synchronous callers', async () => {
    const backend = new FlakyTaskStore();
    backend.online = false;
    await expect(adapterFor(backend).put(makeTask())).rejects.toBeInstanceOf(StoreUnavailableError);
  });

  it('retries a publication until the store comes back', async () => {
    const backend = new FlakyTaskStore();
    backend.online = false;
    const store = adapterFor(backend);
    const task = makeTask();

    store.publish(task);
    expect(store.pending()).toBe(1);
    await waitUntil(() => backend.putCalls >= 2);

    backend.online = true;
    await waitUntil(() => store.pending() === 0);
    expect(await backend.inner.get(task.id)).toEqual({ ...task, seq: 1 });
    store.close();
  });

  it('publishes only the newest queued version of a task', async () => {
    const backend = new FlakyTaskStore();
    backend.online = false;
    const store = adapterFor(backend);
    const v1 = makeTask();
    const v2 = { ...v1, status: 'in_progress' as const, attempt: 1, updatedAt: '2026-01-01T00:00:01.000Z' };

    store.publish(v1);
    store.publish(v2);
    store.publish(v1);
    expect(store.pending()).toBe(1);

    backend.online = true;
    expect(await store.flush()).toBe(true);
    expect(await backend.inner.get(v1.id)).toEqual({ ...v2, seq: 1 });
    store.close();
  });

  it('records a cancellation request on an open task', async () => {
    const store = adapterFor(new FlakyTaskStore());
    const task = makeTask();
    await store.put(task);

    const requested = await store.requestCancel(task.id);
    expect(requested?.status).toBe('pending');
    expect(requested?.cancelRequestedAt).toBe(requested?.updatedAt);
    expect(await store.get(task.id)).toEqual(requested);
  });

  it('leaves finished tasks alone when asked to cancel', async () => {
    const store = adapterFor(new FlakyTaskStore());
    const done = makeTask({ status: 'completed', attempt: 1, result: { ok: true, value: 'hi' } });
    await store.put(done);

    expect(await store.requestCancel(done.id)).toEqual(done);
    expect(await store.requestCancel('missing')).toBeUndefined();
  });

  it('drops publications after close', () => {
    const store = adapterFor(new FlakyTaskStore());
    store.close();
    store.publish(makeTask());
    expect(store.pending()).toBe(0);
  });
});
