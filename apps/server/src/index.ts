export { TaskServer, type TaskServerOptions } from './server.js';
export { loadConfig, DEFAULT_HOST, DEFAULT_PORT, type ServerConfig, type ConfigOverrides } from './config.js';
export {
  createLogger, addLogTransport, setLogLevel, getLogLevel, consoleTransport, setConsoleLogging, LOG_LEVELS,
  type Logger, type LogLevel, type LogEntry, type LogTransport,
} from './logger.js';
export { routes, matchRoute, type Route, type RouteHandler, type RequestContext, type HttpMethod } from './http/routes.js';
export { statusForFailure, type HttpResponse } from './http/respond.js';
