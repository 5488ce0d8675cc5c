#!/usr/bin/env node

import { Command } from 'commander';
import { createInitCommand } from './commands/init.js';
import { createConfigCommand } from './commands/config.js';
import { createWorkerCommand } from './commands/worker.js';
import { createTasksCommand } from './commands/tasks.js';
import { createPeersCommand } from './commands/peers.js';
import { reportError } from './context.js';

const program = new Command('taskrelay')
  .description('Create, delegate and execute tasks across a group of machines')
  .version('0.1.0');

program.addCommand(createInitCommand());
program.addCommand(createConfigCommand());
program.addCommand(createWorkerCommand());
program.addCommand(createTasksCommand());
program.addCommand(createPeersCommand());

try {
  await program.parseAsync();
} catch (err) {
  reportError(err);
}
