import { Command } from 'commander';
import * as out from '../output.js';
import { clientFor, unwrap, $try } from '../helpers.js';

export function createDeleteCommand(): Command {
  return new Command('delete')
    .description('Delete one or more tasks')
    .argument('<taskIds...>', 'The id(s) of the task(s) to delete')
    .action((taskIds: string[], _opts: unknown, cmd: Command) => $try(async () => {
      const client = clientFor(cmd);
      for (const id of taskIds) {
        const result = unwrap(await client.delete(id));
        if (result) out.success(`${result.message}: ${id}`);
      }
    }));
}

export function createClearCommand(): Command {
  return new Command('clear')
    .description('Delete every task')
    .option('-f, --force', 'Also delete tasks that are in progress')
    .action((opts: { force?: boolean }, cmd: Command) => $try(async () => {
      const result = unwrap(await clientFor(cmd).clear(opts.force ?? false));
      if (!result) return;
      if (result.deleted === 0) {
        out.warning('No tasks to delete');
        return;
      }
      out.success(result.message);
    }));
}
