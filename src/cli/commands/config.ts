import { Command } from 'commander';
import chalk from 'chalk';
import { loadConfig, loadStoredConfig, saveConfig } from '../../config/index.js';
import { ConfigSchema } from '../../types/index.js';
import { reportError } from '../context.js';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function getPath(obj: unknown, path: string[]): unknown {
  let cur = obj;
  for (const key of path) {
    if (!isRecord(cur)) return undefined;
    cur = cur[key];
  }
  return cur;
}

function setPath(obj: Record<string, unknown>, path: string[], value: unknown): void {
  let cur = obj;
  for (const key of path.slice(0, -1)) {
    const next = cur[key];
    if (isRecord(next)) {
      cur = next;
    } else {
      const created: Record<string, unknown> = {};
      cur[key] = created;
      cur = created;
    }
  }
  cur[path[path.length - 1]] = value;
}

/** Numbers, booleans, arrays and objects are taken as JSON; anything else as a string. */
export function parseValue(raw: string): unknown {
  try {
    return JSON.parse(raw);
  } catch {
    return raw;
  }
}

export function createConfigCommand(): Command {
  const config = new Command('config').description('Read and change ~/.taskrelay/config.json');

  config
    .command('show')
    .description('Print the effective configuration')
    .action(async () => {
      try {
        console.log(JSON.stringify(await loadConfig(), null, 2));
      } catch (err) {
        reportError(err);
      }
    });

  config
    .command('get')
    .description('Print one setting (dotted keys reach nested settings, e.g. store.backend)')
    .argument('<key>', 'Setting name')
    .action(async (key: string) => {
      try {
        const value = getPath(await loadConfig(), key.split('.'));
        if (value === undefined) {
          console.error(`${key} is not set.`);
          process.exitCode = 1;
          return;
        }
        console.log(typeof value === 'string' ? value : JSON.stringify(value, null, 2));
      } catch (err) {
        reportError(err);
      }
    });

  config
    .command('set')
    .description('Change one setting; the result must still be a valid config')
    .argument('<key>', 'Setting name')
    .argument('<value>', 'New value (JSON, or a plain string)')
    .action(async (key: string, value: string) => {
      try {
        const current = await loadStoredConfig();
        const draft: Record<string, unknown> = { ...current, store: { ...current.store } };
        setPath(draft, key.split('.'), parseValue(value));

        const parsed = ConfigSchema.safeParse(draft);
        if (!parsed.success) {
          const issues = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`);
          console.error(chalk.red(`Invalid value for ${key}: ${issues.join('; ')}`));
          process.exitCode = 1;
          return;
        }
        await saveConfig(parsed.data);
        console.log(`${chalk.bold(key)} = ${JSON.stringify(getPath(parsed.data, key.split('.')))}`);
      } catch (err) {
        reportError(err);
      }
    });

  return config;
}
