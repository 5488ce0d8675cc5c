import { InvalidTransitionError } from '../errors.js';
import { TERMINAL_STATUSES } from '../types/index.js';
import type { Task, TaskStatus } from '../types/index.js';

const ALLOWED: Record<TaskStatus, readonly TaskStatus[]> = {
  pending: ['in_progress', 'cancelled'],
  in_progress: ['completed', 'failed', 'pending'],
  completed: [],
  failed: [],
  cancelled: [],
};

export function canTransition(from: TaskStatus, to: TaskStatus): boolean {
  return ALLOWED[from].includes(to);
}

export function isTerminal(status: TaskStatus): boolean {
  return TERMINAL_STATUSES.includes(status);
}

/**
 * Timestamp for the next write of a record last written at `previous`.
 * Strictly later than `previous` so last-writer-wins never drops a
 * transition made within the same millisecond.
 */
export function nextTimestamp(previous: string, now: Date = new Date()): string {
  const floor = Date.parse(previous) + 1;
  return new Date(Math.max(now.getTime(), floor)).toISOString();
}

type TransitionPatch = Partial<Pick<Task, 'attempt' | 'result' | 'notBefore'>>;

/**
 * Move a task along the state machine. Returns a new object; `notBefore`
 * is cleared unless the patch sets it.
 */
export function transition(task: Task, to: TaskStatus, patch: TransitionPatch = {}, now?: Date): Task {
  if (!canTransition(task.status, to)) {
    throw new InvalidTransitionError(task.id, task.status, to);
  }
  if (patch.attempt !== undefined && patch.attempt < task.attempt) {
    throw new InvalidTransitionError(task.id, `attempt ${task.attempt}`, `attempt ${patch.attempt}`);
  }

  const { notBefore: _dropped, ...rest } = task;
  return {
    ...rest,
    ...patch,
    status: to,
    updatedAt: nextTimestamp(task.updatedAt, now),
  };
}
