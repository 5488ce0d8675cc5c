import type { HandlerRegistry } from '../tasks/registry.js';
import { sleep } from '../utils/async.js';

/** Handlers every worker ships with, for smoke-testing a deployment. */
export function registerBuiltinHandlers(registry: HandlerRegistry): HandlerRegistry {
  registry.register('echo', {
    description: 'Return the given message unchanged',
    shape: { msg: { kind: 'string', description: 'Text to echo back' } },
    run: (payload) => payload.msg,
  });

  registry.register('delay', {
    description: 'Wait for the given number of milliseconds, then return it',
    shape: { ms: { kind: 'number', description: 'How long to wait' } },
    run: async (payload, { signal }) => {
      const ms = typeof payload.ms === 'number' ? payload.ms : 0;
      await sleep(ms, signal);
      return { waitedMs: ms };
    },
  });

  return registry;
}
