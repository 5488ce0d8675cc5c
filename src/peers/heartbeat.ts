import { errorMessage } from '../errors.js';
import { logger as rootLogger } from '../log/index.js';
import type { Logger } from '../log/index.js';
import type { RemoteTaskStore } from '../store/index.js';
import type { PeerRecord, PeerStatus } from '../types/index.js';

export interface PeerHeartbeatOptions {
  id: string;
  descriptor?: string;
  intervalMs: number;
  /** Current pending + in_progress count of this machine */
  load: () => number;
  logger?: Logger;
}

/**
 * Publishes this machine's presence and load so routers elsewhere can
 * find it.
 */
export class PeerHeartbeat {
  private timer: NodeJS.Timeout | undefined;
  private readonly log: Logger;

  constructor(
    private store: RemoteTaskStore,
    private options: PeerHeartbeatOptions,
  ) {
    this.log = (options.logger ?? rootLogger).child('heartbeat');
  }

  record(status: PeerStatus): PeerRecord {
    return {
      id: this.options.id,
      status,
      lastSeen: new Date().toISOString(),
      load: status === 'online' ? this.options.load() : 0,
      ...(this.options.descriptor ? { descriptor: this.options.descriptor } : {}),
    };
  }

  /** Write one presence record. Returns false when the store was unreachable. */
  async beat(status: PeerStatus = 'online'): Promise<boolean> {
    try {
      await this.store.heartbeat(this.record(status));
      return true;
    } catch (err) {
      this.log.warn(`presence update failed: ${errorMessage(err)}`);
      return false;
    }
  }

  async start(): Promise<void> {
    if (this.timer) return;
    await this.beat('online');
    this.timer = setInterval(() => {
      void this.beat('online');
    }, this.options.intervalMs);
    this.timer.unref();
  }

  async stop(): Promise<void> {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = undefined;
    }
    await this.beat('offline');
  }
}
