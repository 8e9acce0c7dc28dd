import { describe, it, expect, vi, beforeAll, afterAll, beforeEach, afterEach } from 'vitest';
import chalk from 'chalk';
import { Command } from 'commander';
import { TaskServer, setConsoleLogging } from '@tasktrack/server';
import { addTask } from '@tasktrack/core';
import { createClearCommand } from '../src/commands/delete.js';

let server: TaskServer;
let url: string;

function program(): Command {
  return new Command()
    .option('--url <url>')
    .exitOverride()
    .addCommand(createClearCommand());
}

beforeAll(() => {
  chalk.level = 0;
  setConsoleLogging(false);
});

afterAll(() => {
  setConsoleLogging(true);
});

beforeEach(async () => {
  server = new TaskServer({ host: '127.0.0.1', port: 0 });
  ({ url } = await server.start());
});

afterEach(async () => {
  await server.stop();
  vi.restoreAllMocks();
  process.exitCode = undefined;
});

describe('clear command', () => {
  it('warns when there is nothing to delete', async () => {
    const consoleSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    await program().parseAsync(['--url', url, 'clear'], { from: 'user' });
    expect(consoleSpy.mock.calls).toEqual([['No tasks to delete']]);
  });

  it('reports the number deleted', async () => {
    addTask(server.db, { title: 'one' });
    const consoleSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    await program().parseAsync(['--url', url, 'clear'], { from: 'user' });
    expect(consoleSpy.mock.calls).toEqual([['Deleted 1 tasks successfully']]);
  });
});
