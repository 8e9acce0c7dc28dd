import chalk from 'chalk';

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  scope: string;
  message: string;
  data?: unknown;
}

export type LogTransport = (entry: LogEntry) => void;

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

let transports: LogTransport[] = [];
let minLevel: LogLevel = 'info';

/** Add a transport that receives all log entries. Returns a remover */
export function addLogTransport(transport: LogTransport): () => void {
  transports.push(transport);
  return () => {
    transports = transports.filter(t => t !== transport);
  };
}

/** Entries below this level are dropped */
export function setLogLevel(level: LogLevel): void {
  minLevel = level;
}

export function getLogLevel(): LogLevel {
  return minLevel;
}

function formatEntry(entry: LogEntry): string {
  const prefix = chalk.dim(`[${entry.scope}]`);
  return entry.data !== undefined
    ? `${prefix} ${entry.message} ${chalk.dim(JSON.stringify(entry.data))}`
    : `${prefix} ${entry.message}`;
}

/** Default transport: info/debug to stdout, warn/error to stderr */
export function consoleTransport(entry: LogEntry): void {
  const line = formatEntry(entry);
  switch (entry.level) {
    case 'debug': process.stdout.write(`${chalk.gray(line)}\n`); break;
    case 'info': process.stdout.write(`${line}\n`); break;
    case 'warn': process.stderr.write(`${chalk.yellow('WARN')} ${line}\n`); break;
    case 'error': process.stderr.write(`${chalk.red('ERROR')} ${line}\n`); break;
  }
}

function emit(entry: LogEntry): void {
  if (LEVEL_RANK[entry.level] < LEVEL_RANK[minLevel]) return;
  for (const transport of transports) {
    try {
      transport(entry);
    } catch (err: unknown) {
      process.stderr.write(`log transport failed: ${err instanceof Error ? err.message : String(err)}\n`);
    }
  }
}

export interface Logger {
  debug(message: string, data?: unknown): void;
  info(message: string, data?: unknown): void;
  warn(message: string, data?: unknown): void;
  error(message: string, data?: unknown): void;
}

/**
 * Create a scoped logger:
 *   const log = createLogger('TaskServer');
 *   log.info('Listening', { port });
 */
export function createLogger(scope: string): Logger {
  const log = (level: LogLevel, message: string, data?: unknown) =>
    emit({ timestamp: new Date().toISOString(), level, scope, message, data });

  return {
    debug: (message, data) => log('debug', message, data),
    info: (message, data) => log('info', message, data),
    warn: (message, data) => log('warn', message, data),
    error: (message, data) => log('error', message, data),
  };
}

let detachConsole: (() => void) | null = addLogTransport(consoleTransport);

/** Turn the default console transport on or off */
export function setConsoleLogging(enabled: boolean): void {
  if (enabled && !detachConsole) {
    detachConsole = addLogTransport(consoleTransport);
  } else if (!enabled && detachConsole) {
    detachConsole();
    detachConsole = null;
  }
}
