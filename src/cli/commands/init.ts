import { Command, Option } from 'commander';
import chalk from 'chalk';
import { join } from 'node:path';
import { ensureTaskrelayDir, loadConfig, loadStoredConfig, saveConfig } from '../../config/index.js';
import { ensureTables } from '../../store/index.js';
import { StoreBackend } from '../../types/index.js';
import type { Config } from '../../types/index.js';
import { reportError } from '../context.js';

export function createInitCommand(): Command {
  return new Command('init')
    .description('Initialize ~/.taskrelay/ and, for DynamoDB, create the tables')
    .option('--machine-id <id>', 'Identity of this machine')
    .addOption(new Option('--backend <backend>', 'Task store backend').choices(StoreBackend.options))
    .option('--table <name>', 'DynamoDB table name')
    .option('--region <region>', 'AWS region')
    .action(async (opts: { machineId?: string; backend?: string; table?: string; region?: string }) => {
      try {
        const dir = await ensureTaskrelayDir();
        const current = await loadStoredConfig();

        const config: Config = {
          ...current,
          machineId: opts.machineId ?? current.machineId,
          awsRegion: opts.region ?? current.awsRegion,
          store: {
            ...current.store,
            backend: opts.backend ? StoreBackend.parse(opts.backend) : current.store.backend,
            tableName: opts.table ?? current.store.tableName,
          },
        };
        await saveConfig(config);

        const labelWidth = 16;
        const fmt = (label: string, value: string) => `  ${(label + ':').padEnd(labelWidth)} ${value}`;
        console.log(`Config written to ${join(dir, 'config.json')}\n`);
        console.log(fmt('Machine', config.machineId));
        console.log(fmt('Store', config.store.backend));
        if (config.store.backend === 'dynamo') {
          console.log(fmt('Table', config.store.tableName));
          console.log(fmt('AWS Region', config.awsRegion));
        }

        // Environment credentials and region still apply to table creation
        const tables = await ensureTables(await loadConfig());
        if (tables.length > 0) {
          console.log(chalk.dim(`\nDynamoDB tables ready: ${tables.join(', ')}`));
        }
        console.log(chalk.green('\ntaskrelay initialized.'));
      } catch (err) {
        reportError(err);
      }
    });
}
