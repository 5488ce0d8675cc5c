import { z } from 'zod';

export const AuditAction = z.enum([
  'task.create',
  'task.delegate',
  'task.start',
  'task.retry',
  'task.complete',
  'task.fail',
  'task.cancel',
  'task.purge',
  'worker.start',
  'worker.stop',
]);

export type AuditAction = z.infer<typeof AuditAction>;

export const AuditEntrySchema = z.object({
  id: z.string().uuid(),
  timestamp: z.string().datetime(),
  action: AuditAction,
  /** Machine that performed the action */
  actor: z.string(),
  taskId: z.string().optional(),
  owner: z.string().optional(),
  detail: z.record(z.unknown()).optional(),
  success: z.boolean(),
  error: z.string().optional(),
});

export type AuditEntry = z.infer<typeof AuditEntrySchema>;

export const AuditQuerySchema = z.object({
  action: AuditAction.optional(),
  taskId: z.string().optional(),
  since: z.string().datetime().optional(),
  limit: z.number().int().positive().default(50),
});

export type AuditQuery = z.infer<typeof AuditQuerySchema>;
export type AuditQueryInput = z.input<typeof AuditQuerySchema>;
