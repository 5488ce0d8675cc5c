import chalk from 'chalk';
import { loadConfig } from '../config/index.js';
import { errorMessage } from '../errors.js';
import { registerBuiltinHandlers } from '../handlers/index.js';
import { TaskNode } from '../node.js';
import { HandlerRegistry } from '../tasks/registry.js';
import type { Config, TaskStatus } from '../types/index.js';

export function createRegistry(): HandlerRegistry {
  return registerBuiltinHandlers(new HandlerRegistry());
}

export async function openNode(overrides: Partial<Config> = {}): Promise<TaskNode> {
  const config = { ...(await loadConfig()), ...overrides };
  return TaskNode.fromConfig(config, createRegistry());
}

export function reportError(err: unknown): void {
  console.error(chalk.red(errorMessage(err)));
  process.exitCode = 1;
}

export function statusColor(s: TaskStatus): string {
  switch (s) {
    case 'completed':
      return chalk.green(s);
    case 'failed':
      return chalk.red(s);
    case 'in_progress':
      return chalk.yellow(s);
    case 'cancelled':
      return chalk.dim(s);
    case 'pending':
      return chalk.cyan(s);
  }
}

export function parseInteger(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < 0) {
    throw new Error(`Expected a non-negative integer, got "${value}"`);
  }
  return n;
}

/** Resolves on the first SIGINT or SIGTERM. */
export function untilSignal(): Promise<NodeJS.Signals> {
  return new Promise((resolve) => {
    process.once('SIGINT', resolve);
    process.once('SIGTERM', resolve);
  });
}
