import { randomUUID } from 'node:crypto';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { describe, expect, it } from 'vitest';
import { JsonAuditStore } from './json-store.js';
import type { AuditEntry } from './types.js';

function entry(overrides: Partial<AuditEntry>): AuditEntry {
  return {
    id: randomUUID(),
    timestamp: '2026-01-01T00:00:00.000Z',
    action: 'task.create',
    actor: 'machine-a',
    success: true,
    ...overrides,
  };
}

describe('JsonAuditStore', () => {
  it('returns matching entries newest first', async () => {
    const store = new JsonAuditStore(join(process.env.TASKRELAY_HOME ?? tmpdir(), `audit-${randomUUID()}.json`));
    await Promise.all([
      store.append(entry({ taskId: 't1', timestamp: '2026-01-01T00:00:01.000Z' })),
      store.append(entry({ taskId: 't1', action: 'task.complete', timestamp: '2026-01-01T00:00:03.000Z' })),
      store.append(entry({ taskId: 't2', timestamp: '2026-01-01T00:00:02.000Z' })),
    ]);

    const forTask = await store.query({ taskId: 't1', limit: 50 });
    expect(forTask.map((e) => e.action)).toEqual(['task.complete', 'task.create']);

    const creates = await store.query({ action: 'task.create', limit: 1 });
    expect(creates.map((e) => e.taskId)).toEqual(['t2']);

    const since = await store.query({ since: '2026-01-01T00:00:02.000Z', limit: 50 });
    expect(since).toHaveLength(2);
  });
});
