import { Command } from 'commander';
import { TaskServer, loadConfig, setLogLevel, createLogger } from '@tasktrack/server';
import { $try } from '../helpers.js';

const log = createLogger('serve');

export function createServeCommand(): Command {
  return new Command('serve')
    .description('Start the task server')
    .option('--host <host>', 'Interface to listen on (env: TASKTRACK_HOST)')
    .option('--port <port>', 'Port to listen on, 0 for any free port (env: TASKTRACK_PORT)')
    .option('--log-level <level>', 'debug, info, warn or error (env: TASKTRACK_LOG_LEVEL)')
    .action((opts: { host?: string; port?: string; logLevel?: string }) => $try(async () => {
      const config = loadConfig(process.env, opts);
      setLogLevel(config.logLevel);

      const server = new TaskServer({ host: config.host, port: config.port });
      await server.start();

      const shutdown = (signal: NodeJS.Signals) => {
        log.info(`Received ${signal}, shutting down`);
        server.stop().catch((err: unknown) => {
          log.error(`Shutdown failed: ${err instanceof Error ? err.message : String(err)}`);
          process.exitCode = 1;
        });
      };
      process.once('SIGINT', shutdown);
      process.once('SIGTERM', shutdown);
    }));
}
