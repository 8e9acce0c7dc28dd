#!/usr/bin/env node

import { Command } from 'commander';

import { createServeCommand } from './commands/serve.js';
import { createAddCommand } from './commands/add.js';
import { createListCommand } from './commands/list.js';
import { createGetCommand } from './commands/get.js';
import { createUpdateCommand, createStatusCommand } from './commands/update.js';
import { createDeleteCommand, createClearCommand } from './commands/delete.js';
import { DEFAULT_SERVER_URL } from './helpers.js';

// Build the CLI program
const program = new Command()
  .name('tasktrack')
  .description('Task tracking service and client')
  .version('1.0.0')
  .option('--url <url>', `Task server URL (env: TASKTRACK_URL, default ${DEFAULT_SERVER_URL})`);

// Register commands
program.addCommand(createServeCommand());
program.addCommand(createAddCommand());
program.addCommand(createListCommand());
program.addCommand(createGetCommand());
program.addCommand(createUpdateCommand());
program.addCommand(createStatusCommand());
program.addCommand(createDeleteCommand());
program.addCommand(createClearCommand());

await program.parseAsync();
