import { QueueClosedError } from '../errors.js';
import type { Task } from '../types/index.js';

/**
 * In-process FIFO of tasks owned by this machine, waiting to be started.
 */
export class LocalTaskQueue {
  private items: Task[] = [];
  private waiters: Array<(task: Task | undefined) => void> = [];
  private closed = false;

  enqueue(task: Task): void {
    if (this.closed) {
      throw new QueueClosedError();
    }

    const waiter = this.waiters.shift();
    if (waiter) {
      waiter(task);
    } else {
      this.items.push(task);
    }
  }

  /**
   * Next task in arrival order. Waits while the queue is empty;
   * resolves `undefined` once the queue is closed.
   */
  dequeue(): Promise<Task | undefined> {
    if (this.closed) {
      return Promise.resolve(undefined);
    }
    const task = this.items.shift();
    if (task) {
      return Promise.resolve(task);
    }
    return new Promise((resolve) => {
      this.waiters.push(resolve);
    });
  }

  len(): number {
    return this.items.length;
  }

  /** Ids of the queued tasks, in order. */
  ids(): string[] {
    return this.items.map((t) => t.id);
  }

  /** The queued copy of a task, if it has not been dequeued yet. */
  find(id: string): Task | undefined {
    return this.items.find((t) => t.id === id);
  }

  isClosed(): boolean {
    return this.closed;
  }

  /**
   * Stop accepting tasks and release every waiting consumer.
   * Returns the tasks that were never dequeued.
   */
  close(): Task[] {
    if (this.closed) return [];
    this.closed = true;

    const waiters = this.waiters;
    this.waiters = [];
    for (const waiter of waiters) waiter(undefined);

    const leftover = this.items;
    this.items = [];
    return leftover;
  }
}
