import type { Task } from '../types/index.js';

type Versioned = Pick<Task, 'updatedAt' | 'owner'>;

/**
 * Last-writer-wins: the later `updatedAt` wins; on equal timestamps the
 * lexically greater owner wins. Identical versions never supersede each
 * other, so repeating a write is a no-op.
 */
export function supersedes(incoming: Versioned, stored: Versioned | undefined): boolean {
  if (!stored) return true;
  const a = Date.parse(incoming.updatedAt);
  const b = Date.parse(stored.updatedAt);
  if (a !== b) return a > b;
  return incoming.owner > stored.owner;
}
