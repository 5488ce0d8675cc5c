import { describe, expect, it } from 'vitest';
import { setAuditStore } from '../audit/index.js';
import { MemoryTaskStore, RemoteTaskStore } from '../store/index.js';
import { MemoryAuditStore, makeTask } from '../test-helpers.js';
import { purgeExpired } from './retention.js';

describe('purgeExpired', () => {
  it('removes finished tasks older than the retention window', async () => {
    const audits = new MemoryAuditStore();
    setAuditStore(audits);
    const backend = new MemoryTaskStore();
    const expired = makeTask({ status: 'completed', attempt: 1, updatedAt: '2026-01-01T00:00:00.000Z' });
    const fresh = makeTask({ status: 'failed', attempt: 3, updatedAt: '2026-01-02T00:00:00.000Z' });
    const open = makeTask({ status: 'pending', updatedAt: '2026-01-01T00:00:00.000Z' });
    for (const t of [expired, fresh, open]) await backend.put(t);

    const count = await purgeExpired(new RemoteTaskStore(backend), 24, new Date('2026-01-02T12:00:00.000Z'));

    expect(count).toBe(1);
    expect((await backend.list()).map((t) => t.id).sort()).toEqual([fresh.id, open.id].sort());
    expect(audits.entries.map((e) => e.detail)).toEqual([{ count: 1, before: '2026-01-01T12:00:00.000Z' }]);
  });

  it('records nothing when there is nothing to purge', async () => {
    const audits = new MemoryAuditStore();
    setAuditStore(audits);
    expect(await purgeExpired(new RemoteTaskStore(new MemoryTaskStore()), 24)).toBe(0);
    expect(audits.entries).toEqual([]);
  });
});
