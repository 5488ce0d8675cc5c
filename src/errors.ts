/**
 * Error taxonomy for task creation, execution and store synchronization.
 *
 * Creation errors (validation, unknown type, delegation) reach the caller.
 * Handler errors drive the retry policy. Store errors during publication are
 * an operational condition of this machine, never a task outcome.
 */

export class TaskRelayError extends Error {
  readonly details: Record<string, unknown>;

  constructor(message: string, details: Record<string, unknown> = {}, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.details = details;
  }
}

export class ConfigurationError extends TaskRelayError {}

export class ValidationError extends TaskRelayError {
  constructor(
    readonly field: string,
    message: string,
  ) {
    super(`${field}: ${message}`, { field });
  }
}

export class UnknownTypeError extends TaskRelayError {
  constructor(readonly type: string) {
    super(`No handler registered for task type "${type}"`, { type });
  }
}

export class DuplicateTypeError extends TaskRelayError {
  constructor(readonly type: string) {
    super(`Handler for task type "${type}" is already registered`, { type });
  }
}

export class RegistrySealedError extends TaskRelayError {
  constructor(type: string) {
    super(`Cannot register "${type}": handler registry is sealed`, { type });
  }
}

export class InvalidTransitionError extends TaskRelayError {
  constructor(taskId: string, from: string, to: string) {
    super(`Task ${taskId}: transition ${from} -> ${to} is not allowed`, { taskId, from, to });
  }
}

export class QueueClosedError extends TaskRelayError {
  constructor() {
    super('Local task queue is closed');
  }
}

export class DelegationError extends TaskRelayError {
  constructor(taskId: string, owner: string, cause: unknown) {
    super(`Failed to delegate task ${taskId} to ${owner}: ${errorMessage(cause)}`, { taskId, owner }, { cause });
  }
}

export class HandlerTimeoutError extends TaskRelayError {
  constructor(readonly timeoutMs: number) {
    super(`Handler timed out after ${timeoutMs}ms`, { timeoutMs });
  }
}

export class HandlerExecutionError extends TaskRelayError {
  constructor(cause: unknown) {
    super(errorMessage(cause), {}, { cause });
  }
}

export class RetryExhaustedError extends TaskRelayError {
  constructor(
    readonly attempts: number,
    readonly lastError: Error,
  ) {
    super(`Gave up after ${attempts} attempt(s): ${lastError.message}`, { attempts, lastError: lastError.name });
  }
}

export class StoreUnavailableError extends TaskRelayError {
  constructor(operation: string, cause: unknown) {
    super(`Task store unavailable during ${operation}: ${errorMessage(cause)}`, { operation }, { cause });
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
