import { describe, expect, it } from 'vitest';
import { DuplicateTypeError, RegistrySealedError, UnknownTypeError } from '../errors.js';
import { HandlerRegistry, buildPayloadSchema } from './registry.js';

describe('HandlerRegistry', () => {
  it('resolves a registered handler by type', () => {
    const registry = new HandlerRegistry();
    registry.register('echo', { shape: { msg: { kind: 'string' } }, run: (p) => p.msg });

    const handler = registry.resolve('echo');
    expect(handler.type).toBe('echo');
    expect(handler.run({ msg: 'hi' }, { taskId: 't', attempt: 1, signal: new AbortController().signal })).toBe(
      'hi',
    );
  });

  it('fails to resolve an unknown type', () => {
    const registry = new HandlerRegistry();
    expect(() => registry.resolve('nope')).toThrow(UnknownTypeError);
    expect(registry.has('nope')).toBe(false);
  });

  it('rejects a second handler for the same type', () => {
    const registry = new HandlerRegistry();
    registry.register('echo', { shape: {}, run: () => null });
    expect(() => registry.register('echo', { shape: {}, run: () => null })).toThrow(DuplicateTypeError);
  });

  it('rejects registration once sealed', () => {
    const registry = new HandlerRegistry().seal();
    expect(registry.isSealed()).toBe(true);
    expect(() => registry.register('echo', { shape: {}, run: () => null })).toThrow(RegistrySealedError);
  });

  it('lists types in sorted order', () => {
    const registry = new HandlerRegistry()
      .register('zeta', { shape: {}, run: () => null })
      .register('alpha', { shape: {}, run: () => null });
    expect(registry.types()).toEqual(['alpha', 'zeta']);
  });

  it('describes handlers as function tools', () => {
    const registry = new HandlerRegistry().register('echo', {
      description: 'Echo a message',
      shape: {
        msg: { kind: 'string', description: 'text' },
        times: { kind: 'number', required: false },
      },
      run: (p) => p.msg,
    });

    expect(registry.definitions()).toEqual([
      {
        type: 'function',
        function: {
          name: 'echo',
          description: 'Echo a message',
          parameters: {
            type: 'object',
            properties: {
              msg: { type: 'string', description: 'text' },
              times: { type: 'number', description: '' },
            },
            required: ['msg'],
          },
        },
      },
    ]);
  });
});

describe('buildPayloadSchema', () => {
  const schema = buildPayloadSchema({ n: { kind: 'number' }, tags: { kind: 'array', required: false } });

  it('accepts a matching payload', () => {
    expect(schema.safeParse({ n: 1 }).success).toBe(true);
    expect(schema.safeParse({ n: 1, tags: ['a'] }).success).toBe(true);
  });

  it('rejects wrong kinds, missing fields and unknown keys', () => {
    expect(schema.safeParse({ n: 'x' }).success).toBe(false);
    expect(schema.safeParse({}).success).toBe(false);
    expect(schema.safeParse({ n: 1, extra: true }).success).toBe(false);
  });
});
