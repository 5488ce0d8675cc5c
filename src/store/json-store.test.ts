import { randomUUID } from 'node:crypto';
import { writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { describe, expect, it } from 'vitest';
import { StoreUnavailableError } from '../errors.js';
import { makeTask } from '../test-helpers.js';
import { JsonTaskStore } from './json-store.js';

function storePath(): string {
  return join(process.env.TASKRELAY_HOME ?? tmpdir(), `store-${randomUUID()}.json`);
}

describe('JsonTaskStore', () => {
  it('starts empty when the file does not exist', async () => {
    const store = new JsonTaskStore(storePath());
    expect(await store.list()).toEqual([]);
    expect(await store.listPeers()).toEqual([]);
  });

  it('persists tasks across instances', async () => {
    const path = storePath();
    const task = makeTask();
    expect(await new JsonTaskStore(path).put(task)).toEqual({ applied: true, seq: 1 });

    const reopened = new JsonTaskStore(path);
    expect(await reopened.get(task.id)).toEqual({ ...task, seq: 1 });
    expect(await reopened.put({ ...task, updatedAt: '2026-01-01T00:00:01.000Z' })).toEqual({ applied: true, seq: 2 });
  });

  it('serializes concurrent writes', async () => {
    const store = new JsonTaskStore(storePath());
    const results = await Promise.all([1, 2, 3, 4, 5].map(() => store.put(makeTask())));

    expect(results.map((r) => r.seq).sort()).toEqual([1, 2, 3, 4, 5]);
    expect(await store.list()).toHaveLength(5);
  });

  it('reports a corrupt file as an unavailable store', async () => {
    const path = storePath();
    await writeFile(path, '{ not json', 'utf-8');
    await expect(new JsonTaskStore(path).get('x')).rejects.toBeInstanceOf(StoreUnavailableError);
  });

  it('records presence', async () => {
    const store = new JsonTaskStore(storePath());
    const peer = { id: 'machine-b', status: 'online' as const, lastSeen: '2026-01-01T00:00:00.000Z', load: 1 };
    await store.heartbeat(peer);
    expect(await store.listPeers()).toEqual([peer]);
  });
});
