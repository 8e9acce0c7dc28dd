import { createServer, type Server, type IncomingMessage, type ServerResponse } from 'node:http';
import { performance } from 'node:perf_hooks';
import { createDb, type TaskDb } from '@tasktrack/core';
import { createLogger } from './logger.js';
import { readJsonBody } from './http/body.js';
import { errorResponse, sendJson, type HttpResponse } from './http/respond.js';
import { routes, matchRoute, type Route } from './http/routes.js';

const log = createLogger('TaskServer');

export interface TaskServerOptions {
  host: string;
  port: number;
  /** Store to serve. A fresh in-memory database when omitted */
  db?: TaskDb;
  /** Clock for every operation. Tests pin it */
  clock?: () => Date;
  routes?: readonly Route[];
}

/**
 * HTTP front end for the task store. One request at a time reaches the
 * store; every handler runs synchronously against SQLite once its body
 * has been read.
 */
export class TaskServer {
  private server: Server | null = null;
  readonly db: TaskDb;
  private readonly clock: () => Date;
  private readonly routes: readonly Route[];

  constructor(private readonly options: TaskServerOptions) {
    this.db = options.db ?? createDb();
    this.clock = options.clock ?? (() => new Date());
    this.routes = options.routes ?? routes;
  }

  get isListening(): boolean {
    return this.server?.listening ?? false;
  }

  async start(): Promise<{ url: string; port: number }> {
    if (this.server) {
      throw new Error('Task server already running');
    }

    const server = createServer((req, res) => this.handleRequest(req, res));
    this.server = server;
    const { host } = this.options;

    return new Promise((resolve, reject) => {
      server.on('error', (err) => {
        log.error(`Task server error: ${String(err)}`);
        this.server = null;
        reject(err);
      });

      server.listen(this.options.port, host, () => {
        const address = server.address();
        const port = address !== null && typeof address === 'object' ? address.port : this.options.port;
        const url = `http://${host.includes(':') ? `[${host}]` : host}:${port}`;
        log.info(`Listening on ${url}`);
        resolve({ url, port });
      });
    });
  }

  async stop(): Promise<void> {
    const server = this.server;
    if (!server) return;

    return new Promise((resolve, reject) => {
      server.close((err) => {
        this.server = null;
        if (err) {
          reject(err);
          return;
        }
        log.info('Task server stopped');
        resolve();
      });
      server.closeAllConnections();
    });
  }

  private handleRequest(req: IncomingMessage, res: ServerResponse): void {
    const started = performance.now();
    const method = req.method ?? 'GET';
    const path = (req.url ?? '/').split('?')[0] ?? '/';

    res.on('finish', () => {
      const duration = (performance.now() - started).toFixed(1);
      log.info(`${method} ${path} ${res.statusCode} ${duration}ms`);
    });

    this.dispatch(req, method)
      .then(response => sendJson(res, response))
      .catch((err: unknown) => {
        log.error(`Unhandled error on ${method} ${path}`, {
          error: err instanceof Error ? err.stack ?? err.message : String(err),
        });
        if (res.headersSent) {
          res.end();
          return;
        }
        sendJson(res, errorResponse(500, 'Internal Server Error'));
      });
  }

  private async dispatch(req: IncomingMessage, method: string): Promise<HttpResponse> {
    const url = new URL(req.url ?? '/', 'http://localhost');
    const pathname = url.pathname.length > 1 ? url.pathname.replace(/\/+$/, '') : url.pathname;
    const match = matchRoute(this.routes, method, pathname);

    switch (match.type) {
      case 'not-found':
        return errorResponse(404, 'Not Found');
      case 'method-not-allowed':
        return errorResponse(405, 'Method Not Allowed');
      case 'found':
        return match.handler({
          db: this.db,
          params: match.params,
          query: Object.fromEntries(url.searchParams),
          readBody: () => readJsonBody(req),
          now: this.clock(),
        });
    }
  }
}
