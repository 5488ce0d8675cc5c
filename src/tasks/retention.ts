import { audit } from '../audit/index.js';
import type { RemoteTaskStore } from '../store/index.js';

/**
 * Delete terminal tasks last updated more than `retentionHours` ago.
 * Returns the number of tasks removed.
 */
export async function purgeExpired(
  store: RemoteTaskStore,
  retentionHours: number,
  now: Date = new Date(),
): Promise<number> {
  const before = new Date(now.getTime() - retentionHours * 3_600_000).toISOString();
  const count = await store.purge(before);

  if (count > 0) {
    await audit('task.purge', { detail: { count, before } });
  }
  return count;
}
