import { Command, Option } from 'commander';
import chalk from 'chalk';
import { TaskStatus } from '../../types/index.js';
import type { Task } from '../../types/index.js';
import { purgeExpired } from '../../tasks/retention.js';
import { createRegistry, openNode, parseInteger, reportError, statusColor, untilSignal } from '../context.js';

function parsePayload(raw: string): unknown {
  try {
    return JSON.parse(raw);
  } catch {
    throw new Error(`--payload is not valid JSON: ${raw}`);
  }
}

function printTask(t: Task): void {
  console.log(`${chalk.bold(t.type)} ${statusColor(t.status)}`);
  console.log(chalk.dim(`  ID: ${t.id}`));
  console.log(`  Owner: ${t.owner}${t.createdBy !== t.owner ? chalk.dim(` (from ${t.createdBy})`) : ''}`);
  if (t.attempt > 0) console.log(`  Attempt: ${t.attempt}`);
  if (t.notBefore) console.log(chalk.dim(`  Retry after: ${t.notBefore}`));
  if (t.cancelRequestedAt) console.log(chalk.yellow(`  Cancel requested: ${t.cancelRequestedAt}`));
  if (t.result?.ok) {
    const text = JSON.stringify(t.result.value);
    console.log(`  Result: ${text.slice(0, 100)}${text.length > 100 ? '...' : ''}`);
  } else if (t.result) {
    console.log(chalk.red(`  Error: ${t.result.errorName}: ${t.result.error}`));
  }
  console.log(chalk.dim(`  Created: ${t.createdAt}  Updated: ${t.updatedAt}`));
}

export function createTasksCommand(): Command {
  const tasks = new Command('tasks').description('Create, inspect and cancel tasks');

  tasks
    .command('create')
    .description('Validate a task, delegate it to a machine and record it')
    .argument('<type>', 'Task type (see `tasks handlers`)')
    .option('--payload <json>', 'Task payload as a JSON object', '{}')
    .option('--owner <machine>', 'Assign to this machine instead of routing')
    .option('--wait <seconds>', 'Wait up to this long for the task to finish')
    .option('--json', 'Output as JSON')
    .action(async (type: string, opts: { payload: string; owner?: string; wait?: string; json?: boolean }) => {
      const node = await openNode();
      try {
        const id = await node.createTask(type, parsePayload(opts.payload), { owner: opts.owner });
        const created = await node.getTask(id);

        if (!opts.wait) {
          if (opts.json) console.log(JSON.stringify(created, null, 2));
          else console.log(chalk.bold('Task created: ') + id + (created ? ` -> ${chalk.bold(created.owner)}` : ''));
          return;
        }

        if (!opts.json) console.log(chalk.dim(`Task ${id} created, waiting for it to finish...`));
        const done = await node.waitForTask(id, { timeoutMs: parseInteger(opts.wait) * 1000 });
        if (opts.json) console.log(JSON.stringify(done, null, 2));
        else printTask(done);
        if (done.status !== 'completed') process.exitCode = 1;
      } catch (err) {
        reportError(err);
      } finally {
        await node.shutdown();
      }
    });

  tasks
    .command('get')
    .description('Show one task')
    .argument('<id>', 'Task ID')
    .option('--json', 'Output as JSON')
    .action(async (id: string, opts: { json?: boolean }) => {
      const node = await openNode();
      try {
        const task = await node.getTask(id);
        if (!task) {
          console.error('Task not found.');
          process.exitCode = 1;
          return;
        }
        if (opts.json) console.log(JSON.stringify(task, null, 2));
        else printTask(task);
      } catch (err) {
        reportError(err);
      } finally {
        await node.shutdown();
      }
    });

  tasks
    .command('list')
    .description('List tasks in the shared store')
    .option('--owner <machine>', 'Filter by owner')
    .addOption(new Option('--status <status>', 'Filter by status').choices(TaskStatus.options))
    .option('--json', 'Output as JSON')
    .action(async (opts: { owner?: string; status?: string; json?: boolean }) => {
      const node = await openNode();
      try {
        const status = opts.status ? TaskStatus.parse(opts.status) : undefined;
        const taskList = await node.store.list({ owner: opts.owner, status });

        if (opts.json) {
          console.log(JSON.stringify(taskList, null, 2));
          return;
        }
        if (taskList.length === 0) {
          console.log('No tasks found.');
          return;
        }
        for (const t of taskList) {
          printTask(t);
          console.log('');
        }
      } catch (err) {
        reportError(err);
      } finally {
        await node.shutdown();
      }
    });

  tasks
    .command('cancel')
    .description('Ask the owning machine to cancel a task')
    .argument('<id>', 'Task ID')
    .action(async (id: string) => {
      const node = await openNode();
      try {
        const task = await node.cancelTask(id);
        if (!task) {
          console.error('Task not found.');
          process.exitCode = 1;
        } else if (task.status === 'cancelled') {
          console.log(chalk.dim('Task cancelled.'));
        } else if (task.cancelRequestedAt) {
          console.log(`Cancellation requested; ${chalk.bold(task.owner)} will act on it.`);
        } else {
          console.log(`Task is already ${statusColor(task.status)}.`);
        }
      } catch (err) {
        reportError(err);
      } finally {
        await node.shutdown();
      }
    });

  tasks
    .command('watch')
    .description('Follow changes to the tasks owned by a machine')
    .option('--owner <machine>', 'Owner to follow (defaults to this machine)')
    .option('--from <seq>', 'Resume after this sequence number', '0')
    .action(async (opts: { owner?: string; from: string }) => {
      const node = await openNode();
      const abort = new AbortController();
      untilSignal().then(
        () => abort.abort(),
        (err: unknown) => reportError(err),
      );
      try {
        const owner = opts.owner ?? node.machineId;
        console.log(chalk.dim(`Watching tasks of ${owner} (Ctrl-C to stop)`));
        for await (const change of node.store.watch(owner, { cursor: parseInteger(opts.from), signal: abort.signal })) {
          const t = change.task;
          console.log(`${chalk.dim(`#${change.seq}`)} ${t.id} ${chalk.bold(t.type)} ${statusColor(t.status)}`);
        }
      } catch (err) {
        reportError(err);
      } finally {
        await node.shutdown();
      }
    });

  tasks
    .command('history')
    .description('Show the audit trail this machine recorded for a task')
    .argument('<id>', 'Task ID')
    .option('--limit <n>', 'Maximum entries', '50')
    .option('--json', 'Output as JSON')
    .action(async (id: string, opts: { limit: string; json?: boolean }) => {
      const node = await openNode();
      try {
        const entries = await node.taskHistory(id, parseInteger(opts.limit));
        if (opts.json) {
          console.log(JSON.stringify(entries, null, 2));
          return;
        }
        if (entries.length === 0) {
          console.log('No audit entries for this task.');
          return;
        }
        for (const e of entries) {
          const mark = e.success ? chalk.green('ok') : chalk.red('failed');
          console.log(`${chalk.dim(e.timestamp)} ${chalk.bold(e.action)} ${mark} ${chalk.dim(e.actor)}`);
          if (e.error) console.log(chalk.red(`  ${e.error}`));
          if (e.detail) console.log(chalk.dim(`  ${JSON.stringify(e.detail)}`));
        }
      } catch (err) {
        reportError(err);
      } finally {
        await node.shutdown();
      }
    });

  tasks
    .command('handlers')
    .description('List the task types this machine can execute')
    .option('--json', 'Output as function-tool definitions')
    .action((opts: { json?: boolean }) => {
      const registry = createRegistry();
      if (opts.json) {
        console.log(JSON.stringify(registry.definitions(), null, 2));
        return;
      }
      for (const def of registry.definitions()) {
        const params = Object.entries(def.function.parameters.properties)
          .map(([name, p]) => `${name}: ${p.type}`)
          .join(', ');
        console.log(`${chalk.bold(def.function.name)}(${params})`);
        if (def.function.description) console.log(chalk.dim(`  ${def.function.description}`));
      }
    });

  tasks
    .command('purge')
    .description('Delete finished tasks older than the retention window')
    .option('--older-than <hours>', 'Override retentionHours')
    .action(async (opts: { olderThan?: string }) => {
      const node = await openNode();
      try {
        const hours = opts.olderThan ? parseInteger(opts.olderThan) : undefined;
        const count = await purgeExpired(node.store, hours ?? node.config.retentionHours);
        if (count === 0) console.log('No expired tasks.');
        else console.log(chalk.yellow(`Purged ${count} task(s).`));
      } catch (err) {
        reportError(err);
      } finally {
        await node.shutdown();
      }
    });

  return tasks;
}
