import { z } from 'zod';
import { DuplicateTypeError, RegistrySealedError, UnknownTypeError } from '../errors.js';

export type ParamKind = 'string' | 'number' | 'boolean' | 'object' | 'array';

export interface ParamSpec {
  kind: ParamKind;
  /** Defaults to true */
  required?: boolean;
  description?: string;
}

/** Parameter name → expected kind */
export type ParamShape = Record<string, ParamSpec>;

export interface HandlerContext {
  taskId: string;
  attempt: number;
  /** Aborted when the processor stops waiting (timeout) */
  signal: AbortSignal;
}

export type TaskHandler = (payload: Record<string, unknown>, context: HandlerContext) => unknown;

export interface HandlerDefinition {
  shape: ParamShape;
  run: TaskHandler;
  /** Falls back to the processor's defaultHandlerTimeoutMs */
  timeoutMs?: number;
  description?: string;
}

export interface RegisteredHandler extends HandlerDefinition {
  type: string;
  schema: z.ZodType<Record<string, unknown>>;
}

/** Function-tool description handed to the language-model layer. */
export interface HandlerToolDefinition {
  type: 'function';
  function: {
    name: string;
    description: string;
    parameters: {
      type: 'object';
      properties: Record<string, { type: ParamKind; description: string }>;
      required: string[];
    };
  };
}

function kindSchema(kind: ParamKind): z.ZodTypeAny {
  switch (kind) {
    case 'string':
      return z.string();
    case 'number':
      return z.number();
    case 'boolean':
      return z.boolean();
    case 'object':
      return z.record(z.unknown());
    case 'array':
      return z.array(z.unknown());
  }
}

export function buildPayloadSchema(shape: ParamShape): z.ZodType<Record<string, unknown>> {
  const fields: Record<string, z.ZodTypeAny> = {};
  for (const [name, spec] of Object.entries(shape)) {
    const base = kindSchema(spec.kind);
    fields[name] = spec.required === false ? base.optional() : base;
  }
  return z.object(fields).strict();
}

/**
 * Task type → handler table. Populated during startup, then sealed and
 * shared read-only with the processor.
 */
export class HandlerRegistry {
  private handlers = new Map<string, RegisteredHandler>();
  private sealed = false;

  register(type: string, definition: HandlerDefinition): this {
    if (this.sealed) throw new RegistrySealedError(type);
    if (this.handlers.has(type)) throw new DuplicateTypeError(type);

    this.handlers.set(type, {
      ...definition,
      type,
      schema: buildPayloadSchema(definition.shape),
    });
    return this;
  }

  resolve(type: string): RegisteredHandler {
    const handler = this.handlers.get(type);
    if (!handler) throw new UnknownTypeError(type);
    return handler;
  }

  has(type: string): boolean {
    return this.handlers.has(type);
  }

  types(): string[] {
    return [...this.handlers.keys()].sort();
  }

  seal(): this {
    this.sealed = true;
    return this;
  }

  isSealed(): boolean {
    return this.sealed;
  }

  definitions(): HandlerToolDefinition[] {
    return this.types().map((type) => {
      const handler = this.resolve(type);
      const properties: HandlerToolDefinition['function']['parameters']['properties'] = {};
      const required: string[] = [];
      for (const [name, spec] of Object.entries(handler.shape)) {
        properties[name] = { type: spec.kind, description: spec.description ?? '' };
        if (spec.required !== false) required.push(name);
      }
      return {
        type: 'function',
        function: {
          name: type,
          description: handler.description ?? '',
          parameters: { type: 'object', properties, required },
        },
      };
    });
  }
}
