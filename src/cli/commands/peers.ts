import { Command } from 'commander';
import chalk from 'chalk';
import { isHealthy } from '../../peers/index.js';
import { openNode, reportError } from '../context.js';

export function createPeersCommand(): Command {
  const peers = new Command('peers').description('Machines tasks can be delegated to');

  peers
    .command('list')
    .description('List known machines with their presence and load')
    .option('--json', 'Output as JSON')
    .action(async (opts: { json?: boolean }) => {
      const node = await openNode();
      try {
        const records = await node.store.listPeers();
        if (opts.json) {
          console.log(JSON.stringify(records, null, 2));
          return;
        }
        if (records.length === 0) {
          console.log('No machines have reported presence yet.');
          return;
        }

        const now = new Date();
        for (const p of records.sort((a, b) => a.id.localeCompare(b.id))) {
          const healthy = isHealthy(p, node.config.peerTtlSeconds, now);
          const state = healthy ? chalk.green('healthy') : chalk.dim(p.status === 'online' ? 'stale' : 'offline');
          const self = p.id === node.machineId ? chalk.dim(' (this machine)') : '';
          console.log(`${chalk.bold(p.id)}${self} ${state}`);
          console.log(`  Load: ${p.load}`);
          if (p.descriptor) console.log(chalk.dim(`  ${p.descriptor}`));
          console.log(chalk.dim(`  Last seen: ${p.lastSeen}`));
        }
      } catch (err) {
        reportError(err);
      } finally {
        await node.shutdown();
      }
    });

  return peers;
}
