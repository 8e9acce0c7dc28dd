import { Command } from 'commander';
import * as out from '../output.js';
import { clientFor, parseStatus, parsePriorityArg, unwrap, usageError, $try } from '../helpers.js';

interface ListOptions {
  status?: string;
  priority?: string;
  overdue?: boolean;
  limit?: string;
}

export function createListCommand(): Command {
  return new Command('list')
    .description('List tasks: urgent first, then newest first')
    .option('-s, --status <status>', 'Filter by status')
    .option('-p, --priority <level>', 'Filter by priority')
    .option('--overdue', 'Show only overdue tasks')
    .option('-n, --limit <count>', 'Show at most this many tasks (1-1000)')
    .action((opts: ListOptions, cmd: Command) => $try(async () => {
      const status = opts.status !== undefined ? parseStatus(opts.status) : undefined;
      if (status === null) {
        usageError(`Unknown status: '${opts.status}'. Use: pending, in-progress, completed, cancelled`);
        return;
      }
      const priority = opts.priority !== undefined ? parsePriorityArg(opts.priority) : undefined;
      if (priority === null) {
        usageError(`Unknown priority: '${opts.priority}'. Use: urgent, high, medium, low`);
        return;
      }
      const limit = opts.limit !== undefined ? Number(opts.limit) : undefined;
      if (limit !== undefined && !Number.isInteger(limit)) {
        usageError(`Invalid limit: '${opts.limit}'`);
        return;
      }

      const tasks = unwrap(await clientFor(cmd).list({
        status,
        priority,
        overdueOnly: opts.overdue ?? false,
        limit,
      }));
      if (!tasks) return;

      if (tasks.length === 0) {
        out.info('No tasks found... use the add command to create one');
        return;
      }
      const now = new Date();
      for (const task of tasks) {
        out.info(out.formatTaskLine(task, now));
      }
    }));
}
