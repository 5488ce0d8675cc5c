import { z } from 'zod';

export const TaskStatus = z.enum(['pending', 'in_progress', 'completed', 'failed', 'cancelled']);
export type TaskStatus = z.infer<typeof TaskStatus>;

export const TERMINAL_STATUSES: readonly TaskStatus[] = ['completed', 'failed', 'cancelled'];

export const TaskResultSchema = z.discriminatedUnion('ok', [
  z.object({ ok: z.literal(true), value: z.unknown() }),
  z.object({ ok: z.literal(false), error: z.string(), errorName: z.string() }),
]);

export type TaskResult = z.infer<typeof TaskResultSchema>;

/** Wire and in-memory shape of a task record. */
export const TaskSchema = z.object({
  id: z.string().uuid(),
  type: z.string().min(1),
  payload: z.record(z.unknown()),
  /** Machine responsible for execution; set once when the task is delegated */
  owner: z.string().min(1),
  /** Machine that created the task */
  createdBy: z.string().min(1),
  status: TaskStatus,
  attempt: z.number().int().nonnegative(),
  result: TaskResultSchema.optional(),
  /** Earliest time a retry may start */
  notBefore: z.string().datetime().optional(),
  /** Set by the originating machine to ask the owner to cancel */
  cancelRequestedAt: z.string().datetime().optional(),
  createdAt: z.string().datetime(),
  updatedAt: z.string().datetime(),
});

export type Task = z.infer<typeof TaskSchema>;

/** A validated task that has not been delegated yet. */
export type UnassignedTask = Omit<Task, 'owner'>;

/** A task as held by a store backend, stamped with its write sequence. */
export interface StoredTask extends Task {
  seq: number;
}

export interface TaskChange {
  task: Task;
  seq: number;
}
