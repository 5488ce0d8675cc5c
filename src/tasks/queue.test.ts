import { describe, expect, it } from 'vitest';
import { QueueClosedError } from '../errors.js';
import { makeTask } from '../test-helpers.js';
import { LocalTaskQueue } from './queue.js';

describe('LocalTaskQueue', () => {
  it('hands out tasks in arrival order', async () => {
    const queue = new LocalTaskQueue();
    const a = makeTask();
    const b = makeTask();
    queue.enqueue(a);
    queue.enqueue(b);

    expect(queue.len()).toBe(2);
    expect(queue.ids()).toEqual([a.id, b.id]);
    expect(await queue.dequeue()).toBe(a);
    expect(await queue.dequeue()).toBe(b);
    expect(queue.len()).toBe(0);
  });

  it('finds a task that is still waiting', async () => {
    const queue = new LocalTaskQueue();
    const task = makeTask();
    queue.enqueue(task);

    expect(queue.find(task.id)).toBe(task);
    await queue.dequeue();
    expect(queue.find(task.id)).toBeUndefined();
  });

  it('wakes a waiting consumer on enqueue', async () => {
    const queue = new LocalTaskQueue();
    const waiting = queue.dequeue();
    const task = makeTask();
    queue.enqueue(task);
    expect(await waiting).toBe(task);
  });

  it('releases waiting consumers on close', async () => {
    const queue = new LocalTaskQueue();
    const waiting = queue.dequeue();
    queue.close();
    expect(await waiting).toBeUndefined();
    expect(await queue.dequeue()).toBeUndefined();
  });

  it('returns undelivered tasks on close and refuses new ones', () => {
    const queue = new LocalTaskQueue();
    const task = makeTask();
    queue.enqueue(task);

    expect(queue.close()).toEqual([task]);
    expect(queue.isClosed()).toBe(true);
    expect(queue.close()).toEqual([]);
    expect(() => queue.enqueue(makeTask())).toThrow(QueueClosedError);
  });
});
