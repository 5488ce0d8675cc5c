import { audit } from '../audit/index.js';
import { DelegationError } from '../errors.js';
import { logger as rootLogger } from '../log/index.js';
import type { Logger } from '../log/index.js';
import type { PeerDirectory } from '../peers/index.js';
import type { RemoteTaskStore } from '../store/index.js';
import type { PeerLoad, Task, UnassignedTask } from '../types/index.js';
import { assignOwner } from './model.js';
import type { LocalTaskQueue } from './queue.js';

export interface RouteDecision {
  owner: string;
  reason: string;
}

/** Chooses an owner given the healthy remote peers. */
export type DelegationPolicy = (peers: PeerLoad[], selfId: string) => RouteDecision;

/**
 * Self when no peer is available, otherwise the peer with the lowest
 * pending + in_progress load. Equal loads go to the lexically first id.
 */
export const leastLoaded: DelegationPolicy = (peers, selfId) => {
  if (peers.length === 0) {
    return { owner: selfId, reason: 'no healthy peers' };
  }
  const best = [...peers].sort((a, b) => a.load - b.load || (a.id < b.id ? -1 : a.id > b.id ? 1 : 0))[0];
  return { owner: best.id, reason: `least loaded peer (load ${best.load})` };
};

export interface DelegationRouterOptions {
  selfId: string;
  store: RemoteTaskStore;
  peers: PeerDirectory;
  policy?: DelegationPolicy;
  /** Receives tasks routed to this machine */
  localQueue?: LocalTaskQueue;
  logger?: Logger;
}

export class DelegationRouter {
  private readonly policy: DelegationPolicy;
  private readonly log: Logger;

  constructor(private options: DelegationRouterOptions) {
    this.policy = options.policy ?? leastLoaded;
    this.log = (options.logger ?? rootLogger).child('router');
  }

  async decide(task: UnassignedTask, explicitOwner?: string): Promise<RouteDecision> {
    if (explicitOwner) {
      return { owner: explicitOwner, reason: 'explicitly assigned' };
    }
    let peers: PeerLoad[];
    try {
      peers = await this.options.peers.listPeers();
    } catch (err) {
      throw new DelegationError(task.id, '(undecided)', err);
    }
    return this.policy(peers, this.options.selfId);
  }

  /**
   * Assign an owner and record the task in the shared store, exactly once.
   * Throws DelegationError if either step fails; the task is then not
   * created anywhere.
   */
  async route(task: UnassignedTask, opts: { owner?: string } = {}): Promise<Task> {
    const decision = await this.decide(task, opts.owner);
    const assigned = assignOwner(task, decision.owner);

    try {
      const res = await this.options.store.put(assigned);
      if (!res.applied) {
        throw new Error(`a newer record with id ${task.id} already exists`);
      }
    } catch (err) {
      await audit('task.delegate', {
        taskId: task.id,
        owner: decision.owner,
        success: false,
        error: err instanceof Error ? err.message : String(err),
      });
      throw new DelegationError(task.id, decision.owner, err);
    }

    this.log.debug(`task ${task.id} (${task.type}) -> ${decision.owner}: ${decision.reason}`);
    await audit('task.delegate', {
      taskId: task.id,
      owner: decision.owner,
      detail: { type: task.type, reason: decision.reason },
    });

    const queue = this.options.localQueue;
    if (decision.owner === this.options.selfId && queue && !queue.isClosed()) {
      queue.enqueue(assigned);
    }
    return assigned;
  }
}
