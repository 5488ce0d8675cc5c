import { readFile, writeFile, mkdir, rename } from 'node:fs/promises';
import { dirname, join } from 'node:path';
import { z } from 'zod';
import { ensureTaskrelayDir } from '../config/index.js';
import { PeerRecordSchema, TaskSchema } from '../types/index.js';
import type { PeerRecord, StoredTask, Task } from '../types/index.js';
import { StoreUnavailableError } from '../errors.js';
import {
  applyPut,
  emptyState,
  purgeState,
  selectChanges,
  selectTasks,
} from './memory-store.js';
import type { StoreState } from './memory-store.js';
import type { PutResult, TaskListFilter, TaskStore } from './store.js';

const STORE_FILE = 'store.json';

const StoreFileSchema = z.object({
  seq: z.number().int().nonnegative(),
  tasks: z.record(TaskSchema.extend({ seq: z.number().int().positive() })),
  peers: z.record(PeerRecordSchema),
});

/**
 * Task store kept in a single JSON file. Suits one machine, or a few
 * machines sharing a network drive; writes from this process are serialized.
 */
export class JsonTaskStore implements TaskStore {
  readonly sequenceOverlap = 0;
  private filePath: string | undefined;
  private writes: Promise<unknown> = Promise.resolve();

  constructor(filePath?: string) {
    this.filePath = filePath;
  }

  private async getFilePath(): Promise<string> {
    if (!this.filePath) {
      const dir = await ensureTaskrelayDir();
      this.filePath = join(dir, STORE_FILE);
    }
    return this.filePath;
  }

  private async readState(): Promise<StoreState> {
    const path = await this.getFilePath();
    let raw: string;
    try {
      raw = await readFile(path, 'utf-8');
    } catch (err) {
      if (err instanceof Error && 'code' in err && err.code === 'ENOENT') return emptyState();
      throw new StoreUnavailableError('read', err);
    }
    try {
      return StoreFileSchema.parse(JSON.parse(raw));
    } catch (err) {
      throw new StoreUnavailableError('read', err);
    }
  }

  private async writeState(state: StoreState): Promise<void> {
    const path = await this.getFilePath();
    const tmp = `${path}.tmp`;
    try {
      await mkdir(dirname(path), { recursive: true });
      await writeFile(tmp, JSON.stringify(state, null, 2) + '\n', 'utf-8');
      await rename(tmp, path);
    } catch (err) {
      throw new StoreUnavailableError('write', err);
    }
  }

  private mutate<T>(fn: (state: StoreState) => T): Promise<T> {
    const next = this.writes.then(async () => {
      const state = await this.readState();
      const result = fn(state);
      await this.writeState(state);
      return result;
    });
    this.writes = next.catch(() => undefined);
    return next;
  }

  private async read(): Promise<StoreState> {
    await this.writes;
    return this.readState();
  }

  put(task: Task): Promise<PutResult> {
    return this.mutate((state) => applyPut(state, task));
  }

  async get(id: string): Promise<StoredTask | undefined> {
    const state = await this.read();
    return state.tasks[id];
  }

  async changesSince(owner: string, cursor: number, limit: number): Promise<StoredTask[]> {
    return selectChanges(await this.read(), owner, cursor, limit);
  }

  async list(filter?: TaskListFilter): Promise<StoredTask[]> {
    return selectTasks(await this.read(), filter);
  }

  purge(before: string): Promise<number> {
    return this.mutate((state) => purgeState(state, before));
  }

  heartbeat(peer: PeerRecord): Promise<void> {
    return this.mutate((state) => {
      state.peers[peer.id] = peer;
    });
  }

  async listPeers(): Promise<PeerRecord[]> {
    return Object.values((await this.read()).peers);
  }
}
