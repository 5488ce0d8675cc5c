import { randomUUID } from 'node:crypto';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { describe, expect, it } from 'vitest';
import { ZodError } from 'zod';
import { JsonAuditStore } from './json-store.js';
import { audit, queryAudit, setAuditActor, setAuditStore } from './logger.js';

describe('queryAudit', () => {
  it('reads back what audit() recorded in the configured store', async () => {
    setAuditStore(new JsonAuditStore(join(process.env.TASKRELAY_HOME ?? tmpdir(), `audit-${randomUUID()}.json`)));
    setAuditActor('machine-a');
    await audit('task.create', { taskId: 't1', detail: { type: 'echo' } });
    await audit('task.create', { taskId: 't2' });

    const entries = await queryAudit({ taskId: 't1' });
    expect(entries).toHaveLength(1);
    expect(entries[0]).toMatchObject({ action: 'task.create', actor: 'machine-a', taskId: 't1', success: true });
    expect(entries[0]?.detail).toEqual({ type: 'echo' });
  });

  it('rejects a malformed query', async () => {
    await expect(queryAudit({ limit: 0 })).rejects.toBeInstanceOf(ZodError);
  });
});
