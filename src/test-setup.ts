import { mkdtempSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { beforeEach } from 'vitest';
import { setAuditStore } from './audit/index.js';
import { setLogLevel } from './log/index.js';
import { MemoryAuditStore } from './test-helpers.js';

process.env.TASKRELAY_HOME = mkdtempSync(join(tmpdir(), 'taskrelay-test-'));
delete process.env.TASKRELAY_MACHINE_ID;
setLogLevel('error');

beforeEach(() => {
  setAuditStore(new MemoryAuditStore());
});
