import { Command } from 'commander';
import * as out from '../output.js';
import { clientFor, unwrap, $try } from '../helpers.js';

export function createGetCommand(): Command {
  return new Command('get')
    .description('Get detailed information about a task')
    .argument('<taskId>', 'The task ID to retrieve')
    .option('--json', 'Output in JSON format')
    .action((taskId: string, opts: { json?: boolean }, cmd: Command) => $try(async () => {
      const task = unwrap(await clientFor(cmd).get(taskId));
      if (!task) return;

      if (opts.json) {
        out.info(JSON.stringify(task, null, 2));
        return;
      }
      for (const line of out.formatTaskDetails(task)) {
        out.info(line);
      }
    }));
}
