import { StoreUnavailableError, errorMessage } from '../errors.js';
import { logger as rootLogger } from '../log/index.js';
import type { Logger } from '../log/index.js';
import type { StoredTask, TaskChange } from '../types/index.js';
import { backoffDelay, sleep } from '../utils/async.js';
import type { TaskStore } from './store.js';

export interface WatchOptions {
  /** Resume after this sequence number; 0 replays every record of the owner */
  cursor?: number;
  pollIntervalMs?: number;
  batchSize?: number;
  /** Backoff while the store is unreachable */
  retryBaseMs?: number;
  retryMaxMs?: number;
  signal?: AbortSignal;
  logger?: Logger;
}

function stripSeq(record: StoredTask): TaskChange {
  const { seq, ...task } = record;
  return { task, seq };
}

/**
 * Changes to `owner`'s tasks as a lazy, endless sequence. Ends only when
 * `signal` aborts. Store outages are retried without moving the cursor, so a
 * consumer that re-subscribes with the last `seq` it saw misses nothing.
 */
export async function* watchChanges(
  store: TaskStore,
  owner: string,
  options: WatchOptions = {},
): AsyncGenerator<TaskChange> {
  const {
    pollIntervalMs = 2000,
    batchSize = 100,
    retryBaseMs = 500,
    retryMaxMs = 30_000,
    signal,
  } = options;
  const log = (options.logger ?? rootLogger).child('watch');
  const overlap = store.sequenceOverlap;
  const limit = batchSize + overlap;

  let cursor = options.cursor ?? 0;
  // Sequence numbers already yielded inside the overlap window
  const delivered = new Set<number>();
  let failures = 0;

  while (!signal?.aborted) {
    let batch: StoredTask[];
    try {
      batch = await store.changesSince(owner, Math.max(0, cursor - overlap), limit);
    } catch (err) {
      if (!(err instanceof StoreUnavailableError)) throw err;
      failures++;
      const wait = backoffDelay(failures, retryBaseMs, retryMaxMs);
      log.warn(`store unavailable, retrying in ${wait}ms: ${errorMessage(err)}`);
      await sleep(wait, signal);
      continue;
    }
    if (failures > 0) {
      log.info(`store reachable again, resuming after seq ${cursor}`);
      failures = 0;
    }

    let fresh = 0;
    for (const record of batch) {
      if (delivered.has(record.seq)) continue;
      delivered.add(record.seq);
      cursor = Math.max(cursor, record.seq);
      fresh++;
      yield stripSeq(record);
      if (signal?.aborted) return;
    }

    for (const seq of delivered) {
      if (seq <= cursor - overlap) delivered.delete(seq);
    }

    if (fresh === 0 || batch.length < limit) {
      await sleep(pollIntervalMs, signal);
    }
  }
}
