import type { RemoteTaskStore } from '../store/index.js';
import type { PeerLoad, PeerRecord } from '../types/index.js';

/** Source of remote peers a task may be delegated to. */
export interface PeerDirectory {
  /** Healthy peers other than this machine, with their last observed load. */
  listPeers(): Promise<PeerLoad[]>;
}

export class StaticPeerDirectory implements PeerDirectory {
  constructor(private peers: PeerLoad[]) {}

  async listPeers(): Promise<PeerLoad[]> {
    return [...this.peers];
  }
}

export interface StorePeerDirectoryOptions {
  /** Presence older than this marks a peer unhealthy */
  ttlSeconds: number;
  /** When set, only these peer ids are candidates */
  allowlist?: string[];
  now?: () => Date;
}

export function isHealthy(peer: PeerRecord, ttlSeconds: number, now: Date): boolean {
  if (peer.status !== 'online') return false;
  const age = now.getTime() - Date.parse(peer.lastSeen);
  return age <= ttlSeconds * 1000;
}

/** Peers discovered through the presence records in the shared store. */
export class StorePeerDirectory implements PeerDirectory {
  constructor(
    private store: RemoteTaskStore,
    private selfId: string,
    private options: StorePeerDirectoryOptions,
  ) {}

  async listPeers(): Promise<PeerLoad[]> {
    const now = (this.options.now ?? (() => new Date()))();
    const allow = this.options.allowlist ? new Set(this.options.allowlist) : undefined;
    const records = await this.store.listPeers();
    return records
      .filter((p) => p.id !== this.selfId)
      .filter((p) => (allow ? allow.has(p.id) : true))
      .filter((p) => isHealthy(p, this.options.ttlSeconds, now))
      .map((p) => ({ id: p.id, load: p.load }));
  }
}
