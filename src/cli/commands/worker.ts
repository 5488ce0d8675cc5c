import { Command } from 'commander';
import chalk from 'chalk';
import { openNode, parseInteger, reportError, untilSignal } from '../context.js';

export function createWorkerCommand(): Command {
  return new Command('worker')
    .description('Execute the tasks owned by this machine until interrupted')
    .option('--concurrency <n>', 'Override handlerConcurrencyLimit')
    .action(async (opts: { concurrency?: string }) => {
      const node = await openNode(
        opts.concurrency ? { handlerConcurrencyLimit: Math.max(1, parseInteger(opts.concurrency)) } : {},
      );
      try {
        await node.start();
      } catch (err) {
        reportError(err);
        await node.shutdown();
        return;
      }

      console.log(
        `${chalk.bold(node.machineId)} is processing tasks (${node.config.store.backend} store). Ctrl-C to stop.`,
      );
      const signal = await untilSignal();
      console.log(chalk.dim(`\n${signal} received, finishing running tasks...`));

      const flushed = await node.shutdown();
      if (!flushed) {
        console.error(chalk.yellow('Some task updates could not be published; they will be redone on restart.'));
        process.exitCode = 1;
      }
    });
}
