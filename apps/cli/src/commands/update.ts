import { Command } from 'commander';
import { statusLabel, type TaskPatchPayload } from '@tasktrack/core';
import * as out from '../output.js';
import {
  clientFor, parseStatus, parsePriorityArg, parseHours, parseDueArg, isClearValue,
  unwrap, usageError, $try,
} from '../helpers.js';

interface UpdateOptions {
  title?: string;
  description?: string;
  priority?: string;
  status?: string;
  estimate?: string;
  actual?: string;
  due?: string;
}

export type PatchBuild =
  | { readonly type: 'ok'; readonly patch: TaskPatchPayload }
  | { readonly type: 'invalid'; readonly message: string };

function hoursField(raw: string | undefined): number | null | undefined | 'invalid' {
  if (raw === undefined) return undefined;
  if (isClearValue(raw)) return null;
  return parseHours(raw) ?? 'invalid';
}

/**
 * Turn update options into a wire patch. `none` clears description,
 * hours and due date.
 */
export function buildPatch(opts: UpdateOptions, now: Date = new Date()): PatchBuild {
  const patch: TaskPatchPayload = {};

  if (opts.title !== undefined) patch.title = opts.title;
  if (opts.description !== undefined) {
    patch.description = isClearValue(opts.description) ? null : opts.description;
  }

  if (opts.priority !== undefined) {
    const priority = parsePriorityArg(opts.priority);
    if (!priority) return { type: 'invalid', message: `Unknown priority: '${opts.priority}'. Use: urgent, high, medium, low` };
    patch.priority = priority;
  }

  if (opts.status !== undefined) {
    const status = parseStatus(opts.status);
    if (!status) {
      return { type: 'invalid', message: `Unknown status: '${opts.status}'. Use: pending, in-progress, completed, cancelled` };
    }
    patch.status = status;
  }

  const estimate = hoursField(opts.estimate);
  if (estimate === 'invalid') return { type: 'invalid', message: `Invalid hours: '${opts.estimate}'` };
  if (estimate !== undefined) patch.estimated_hours = estimate;

  const actual = hoursField(opts.actual);
  if (actual === 'invalid') return { type: 'invalid', message: `Invalid hours: '${opts.actual}'` };
  if (actual !== undefined) patch.actual_hours = actual;

  if (opts.due !== undefined) {
    if (isClearValue(opts.due)) {
      patch.due_date = null;
    } else {
      const due = parseDueArg(opts.due, now);
      if (!due) return { type: 'invalid', message: `Invalid due date: '${opts.due}'` };
      patch.due_date = due;
    }
  }

  if (Object.keys(patch).length === 0) {
    return { type: 'invalid', message: 'Nothing to update. Pass at least one field option' };
  }
  return { type: 'ok', patch };
}

export function createUpdateCommand(): Command {
  return new Command('update')
    .description('Update fields of a task')
    .argument('<taskId>', 'The task ID to update')
    .option('--title <text>', 'New title')
    .option('-d, --description <text>', 'New description, or none')
    .option('-p, --priority <level>', 'urgent, high, medium or low')
    .option('-s, --status <status>', 'pending, in-progress, completed or cancelled')
    .option('-e, --estimate <hours>', 'Estimated hours, or none')
    .option('-a, --actual <hours>', 'Actual hours, or none')
    .option('--due <date>', 'Due date: ISO timestamp, offset like 4h, or none')
    .action((taskId: string, opts: UpdateOptions, cmd: Command) => $try(async () => {
      const built = buildPatch(opts);
      if (built.type === 'invalid') {
        usageError(built.message);
        return;
      }

      const task = unwrap(await clientFor(cmd).update(taskId, built.patch));
      if (!task) return;
      out.success(`Updated task ${task.id}`);
      out.info(out.formatTaskLine(task));
    }));
}

export function createStatusCommand(): Command {
  return new Command('status')
    .description('Set the status of one or more tasks')
    .argument('<status>', 'The status to set: pending, in-progress, completed, cancelled')
    .argument('<taskIds...>', 'The id(s) of the task(s)')
    .action((statusStr: string, taskIds: string[], _opts: unknown, cmd: Command) => $try(async () => {
      const status = parseStatus(statusStr);
      if (status == null) {
        usageError(`Unknown status: '${statusStr}'. Use: pending, in-progress, completed, cancelled`);
        return;
      }

      const client = clientFor(cmd);
      for (const id of taskIds) {
        const task = unwrap(await client.update(id, { status }));
        if (task) out.success(`Task ${task.id} is now ${statusLabel(task.status)}`);
      }
    }));
}
