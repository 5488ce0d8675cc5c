import { readFile, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { z } from 'zod';
import { ensureTaskrelayDir } from '../config/index.js';
import { AuditEntrySchema } from './types.js';
import type { AuditEntry, AuditQuery } from './types.js';
import type { AuditStore } from './store.js';

const AUDIT_FILE = 'audit.json';
const AuditFileSchema = z.array(AuditEntrySchema);

export class JsonAuditStore implements AuditStore {
  private filePath: string | undefined;
  private writes: Promise<void> = Promise.resolve();

  constructor(filePath?: string) {
    this.filePath = filePath;
  }

  private async getFilePath(): Promise<string> {
    if (!this.filePath) {
      const dir = await ensureTaskrelayDir();
      this.filePath = join(dir, AUDIT_FILE);
    }
    return this.filePath;
  }

  private async readAll(): Promise<AuditEntry[]> {
    const path = await this.getFilePath();
    let raw: string;
    try {
      raw = await readFile(path, 'utf-8');
    } catch {
      return [];
    }
    return AuditFileSchema.parse(JSON.parse(raw));
  }

  private async writeAll(entries: AuditEntry[]): Promise<void> {
    const path = await this.getFilePath();
    await writeFile(path, JSON.stringify(entries, null, 2) + '\n', 'utf-8');
  }

  append(entry: AuditEntry): Promise<void> {
    // Serialize read-modify-write cycles within this process
    const next = this.writes.then(async () => {
      const entries = await this.readAll();
      entries.push(entry);
      await this.writeAll(entries);
    });
    this.writes = next.catch(() => undefined);
    return next;
  }

  async query(query: AuditQuery): Promise<AuditEntry[]> {
    await this.writes;
    let entries = await this.readAll();

    if (query.action) {
      entries = entries.filter((e) => e.action === query.action);
    }
    if (query.taskId) {
      entries = entries.filter((e) => e.taskId === query.taskId);
    }
    const since = query.since;
    if (since) {
      entries = entries.filter((e) => e.timestamp >= since);
    }

    // Most recent first
    entries.sort((a, b) => b.timestamp.localeCompare(a.timestamp));

    return entries.slice(0, query.limit);
  }
}
