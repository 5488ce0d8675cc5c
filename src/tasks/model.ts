import { randomUUID } from 'node:crypto';
import { ValidationError } from '../errors.js';
import type { Task, UnassignedTask } from '../types/index.js';
import type { HandlerRegistry } from './registry.js';
import { nextTimestamp } from './state.js';

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Validate a request and build a pending, not yet delegated task.
 * Throws ValidationError (naming the field) or UnknownTypeError; nothing
 * is returned on failure.
 */
export function createTask(
  registry: HandlerRegistry,
  type: string,
  payload: unknown,
  createdBy: string,
  now: Date = new Date(),
): UnassignedTask {
  if (typeof type !== 'string' || type.trim() === '') {
    throw new ValidationError('type', 'must be a non-empty string');
  }
  const handler = registry.resolve(type);

  if (!isPlainObject(payload)) {
    throw new ValidationError('payload', 'must be an object');
  }

  const parsed = handler.schema.safeParse(payload);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    // Unknown keys are reported on the object itself
    const key =
      issue.code === 'unrecognized_keys' ? issue.keys[0] : issue.path.map(String).join('.');
    const field = key ? `payload.${key}` : 'payload';
    throw new ValidationError(field, issue.message);
  }

  const ts = now.toISOString();
  return {
    id: randomUUID(),
    type,
    payload: parsed.data,
    createdBy,
    status: 'pending',
    attempt: 0,
    createdAt: ts,
    updatedAt: ts,
  };
}

export function assignOwner(task: UnassignedTask, owner: string): Task {
  if (owner.trim() === '') {
    throw new ValidationError('owner', 'must be a non-empty string');
  }
  return { ...task, owner };
}

/** Mark a task as cancellation-requested without touching its status. */
export function withCancelRequest(task: Task, now: Date = new Date()): Task {
  const updatedAt = nextTimestamp(task.updatedAt, now);
  return { ...task, cancelRequestedAt: updatedAt, updatedAt };
}
