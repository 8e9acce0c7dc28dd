import { Command } from 'commander';
import * as out from '../output.js';
import { clientFor, parsePriorityArg, parseHours, parseDueArg, unwrap, usageError, $try } from '../helpers.js';

interface AddOptions {
  description?: string;
  priority?: string;
  estimate?: string;
  due?: string;
}

export function createAddCommand(): Command {
  return new Command('add')
    .description('Add a new task')
    .argument('<title>', 'Task title')
    .option('-d, --description <text>', 'Longer description')
    .option('-p, --priority <level>', 'urgent, high, medium or low (p1..p4)')
    .option('-e, --estimate <hours>', 'Estimated hours')
    .option('--due <date>', 'Due date: ISO timestamp or offset like 4h, 2d')
    .action((title: string, opts: AddOptions, cmd: Command) => $try(async () => {
      const priority = opts.priority !== undefined ? parsePriorityArg(opts.priority) : undefined;
      if (priority === null) {
        usageError(`Unknown priority: '${opts.priority}'. Use: urgent, high, medium, low`);
        return;
      }
      const estimate = opts.estimate !== undefined ? parseHours(opts.estimate) : undefined;
      if (estimate === null) {
        usageError(`Invalid hours: '${opts.estimate}'`);
        return;
      }
      const due = opts.due !== undefined ? parseDueArg(opts.due) : undefined;
      if (due === null) {
        usageError(`Invalid due date: '${opts.due}'`);
        return;
      }

      const task = unwrap(await clientFor(cmd).create({
        title,
        description: opts.description,
        priority,
        estimated_hours: estimate,
        due_date: due,
      }));
      if (!task) return;

      out.success(`Task saved with id ${task.id}`);
      out.info(out.formatTaskLine(task));
    }));
}
