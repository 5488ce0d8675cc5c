import { describe, expect, it } from 'vitest';
import { HandlerRegistry } from '../tasks/registry.js';
import { registerBuiltinHandlers } from './builtin.js';

describe('built-in handlers', () => {
  const registry = registerBuiltinHandlers(new HandlerRegistry());
  const ctx = { taskId: 't', attempt: 1, signal: new AbortController().signal };

  it('registers echo and delay', () => {
    expect(registry.types()).toEqual(['delay', 'echo']);
  });

  it('echo returns its message', () => {
    expect(registry.resolve('echo').run({ msg: 'hi' }, ctx)).toBe('hi');
  });

  it('delay reports how long it waited', async () => {
    await expect(registry.resolve('delay').run({ ms: 5 }, ctx)).resolves.toEqual({ waitedMs: 5 });
  });
});
