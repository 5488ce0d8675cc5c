import { isTerminal } from '../tasks/state.js';
import type { PeerRecord, StoredTask, Task } from '../types/index.js';
import { supersedes } from './conflict.js';
import type { PutResult, TaskListFilter, TaskStore } from './store.js';

export interface StoreState {
  seq: number;
  tasks: Record<string, StoredTask>;
  peers: Record<string, PeerRecord>;
}

export function emptyState(): StoreState {
  return { seq: 0, tasks: {}, peers: {} };
}

export function applyPut(state: StoreState, task: Task): PutResult {
  const stored = state.tasks[task.id];
  if (!supersedes(task, stored)) {
    return { applied: false, seq: stored?.seq ?? 0 };
  }
  state.seq += 1;
  state.tasks[task.id] = { ...task, seq: state.seq };
  return { applied: true, seq: state.seq };
}

export function selectChanges(state: StoreState, owner: string, cursor: number, limit: number): StoredTask[] {
  return Object.values(state.tasks)
    .filter((t) => t.owner === owner && t.seq > cursor)
    .sort((a, b) => a.seq - b.seq)
    .slice(0, limit);
}

export function selectTasks(state: StoreState, filter: TaskListFilter = {}): StoredTask[] {
  return Object.values(state.tasks)
    .filter((t) => (filter.owner ? t.owner === filter.owner : true))
    .filter((t) => (filter.status ? t.status === filter.status : true))
    .sort((a, b) => a.createdAt.localeCompare(b.createdAt));
}

export function purgeState(state: StoreState, before: string): number {
  const cutoff = Date.parse(before);
  let count = 0;
  for (const [id, task] of Object.entries(state.tasks)) {
    if (isTerminal(task.status) && Date.parse(task.updatedAt) < cutoff) {
      delete state.tasks[id];
      count++;
    }
  }
  return count;
}

/** In-process store, for a single machine and for tests. */
export class MemoryTaskStore implements TaskStore {
  readonly sequenceOverlap = 0;
  private state: StoreState = emptyState();

  async put(task: Task): Promise<PutResult> {
    return applyPut(this.state, task);
  }

  async get(id: string): Promise<StoredTask | undefined> {
    return this.state.tasks[id];
  }

  async changesSince(owner: string, cursor: number, limit: number): Promise<StoredTask[]> {
    return selectChanges(this.state, owner, cursor, limit);
  }

  async list(filter?: TaskListFilter): Promise<StoredTask[]> {
    return selectTasks(this.state, filter);
  }

  async purge(before: string): Promise<number> {
    return purgeState(this.state, before);
  }

  async heartbeat(peer: PeerRecord): Promise<void> {
    this.state.peers[peer.id] = peer;
  }

  async listPeers(): Promise<PeerRecord[]> {
    return Object.values(this.state.peers);
  }
}
