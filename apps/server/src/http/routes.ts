/**
 * Route table. Each handler maps one HTTP operation onto a task operation
 * and its result onto a status code and JSON body.
 */

import type { TaskDb, ParseResult } from '@tasktrack/core';
import {
  validationError,
  addTask, listTasks, getTask, updateTask, deleteTask, deleteAllTasks,
  parseNewTask, parseTaskPatch, parseTaskFilters, parseDeleteAllQuery,
  toTaskRecord,
} from '@tasktrack/core';
import type { BodyResult } from './body.js';
import { failureResponse, errorResponse, type HttpResponse } from './respond.js';

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'PATCH' | 'DELETE';

export interface RequestContext {
  readonly db: TaskDb;
  readonly params: Readonly<Record<string, string>>;
  readonly query: Readonly<Record<string, string>>;
  readonly readBody: () => Promise<BodyResult>;
  readonly now: Date;
}

export type RouteHandler = (ctx: RequestContext) => Promise<HttpResponse> | HttpResponse;

export interface Route {
  readonly pattern: string;
  readonly handlers: Partial<Record<HttpMethod, RouteHandler>>;
}

export type RouteMatch =
  | { readonly type: 'found'; readonly handler: RouteHandler; readonly params: Record<string, string> }
  | { readonly type: 'not-found' }
  | { readonly type: 'method-not-allowed'; readonly allowed: HttpMethod[] };

type BodyInput<T> =
  | { readonly type: 'ok'; readonly data: T }
  | { readonly type: 'rejected'; readonly response: HttpResponse };

/** Read the JSON body and run it through a wire parser */
async function readInput<T>(
  readBody: () => Promise<BodyResult>,
  parse: (body: unknown) => ParseResult<T>,
): Promise<BodyInput<T>> {
  const body = await readBody();
  switch (body.type) {
    case 'too-large':
      return { type: 'rejected', response: errorResponse(413, 'Request body too large') };
    case 'invalid-json':
      return {
        type: 'rejected',
        response: failureResponse(validationError([{ field: 'body', message: `Invalid JSON: ${body.message}` }])),
      };
    case 'ok': {
      const parsed = parse(body.value);
      if (parsed.type !== 'success') return { type: 'rejected', response: failureResponse(parsed) };
      return { type: 'ok', data: parsed.data };
    }
  }
}

const createTaskHandler: RouteHandler = async ({ db, readBody, now }) => {
  const input = await readInput(readBody, parseNewTask);
  if (input.type === 'rejected') return input.response;

  const result = addTask(db, input.data, now);
  if (result.type !== 'success') return failureResponse(result);
  return { status: 201, body: toTaskRecord(result.data) };
};

const listTasksHandler: RouteHandler = ({ db, query, now }) => {
  const filters = parseTaskFilters(query);
  if (filters.type !== 'success') return failureResponse(filters);
  return { status: 200, body: listTasks(db, filters.data, now).map(toTaskRecord) };
};

const getTaskHandler: RouteHandler = ({ db, params, now }) => {
  const result = getTask(db, params['id'] ?? '', now);
  if (result.type !== 'success') return failureResponse(result);
  return { status: 200, body: toTaskRecord(result.data) };
};

const updateTaskHandler: RouteHandler = async ({ db, params, readBody, now }) => {
  const patch = await readInput(readBody, parseTaskPatch);
  if (patch.type === 'rejected') return patch.response;

  const result = updateTask(db, params['id'] ?? '', patch.data, now);
  if (result.type !== 'success') return failureResponse(result);
  return { status: 200, body: toTaskRecord(result.data) };
};

const deleteTaskHandler: RouteHandler = ({ db, params }) => {
  const result = deleteTask(db, params['id'] ?? '');
  if (result.type !== 'success') return failureResponse(result);
  return { status: 200, body: { message: result.message } };
};

const deleteAllTasksHandler: RouteHandler = ({ db, query }) => {
  const force = parseDeleteAllQuery(query);
  if (force.type !== 'success') return failureResponse(force);

  const result = deleteAllTasks(db, force.data);
  if (result.type !== 'success') return failureResponse(result);
  return { status: 200, body: { message: result.message, deleted: result.data.deleted } };
};

export const routes: readonly Route[] = [
  {
    pattern: '/tasks',
    handlers: { GET: listTasksHandler, POST: createTaskHandler, DELETE: deleteAllTasksHandler },
  },
  {
    pattern: '/tasks/:id',
    handlers: { GET: getTaskHandler, PUT: updateTaskHandler, PATCH: updateTaskHandler, DELETE: deleteTaskHandler },
  },
];

function safeDecode(segment: string): string | null {
  try {
    return decodeURIComponent(segment);
  } catch {
    return null;
  }
}

/** Match `/a/:b` style patterns segment by segment */
function matchPattern(pattern: string, pathname: string): Record<string, string> | null {
  const want = pattern.split('/').filter(Boolean);
  const got = pathname.split('/').filter(Boolean);
  if (want.length !== got.length) return null;

  const params: Record<string, string> = {};
  for (let i = 0; i < want.length; i++) {
    const w = want[i] ?? '';
    const g = got[i] ?? '';
    if (w.startsWith(':')) {
      const value = safeDecode(g);
      if (value === null) return null;
      params[w.slice(1)] = value;
    } else if (w !== g) {
      return null;
    }
  }
  return params;
}

function isHttpMethod(method: string): method is HttpMethod {
  return method === 'GET' || method === 'POST' || method === 'PUT' || method === 'PATCH' || method === 'DELETE';
}

export function matchRoute(table: readonly Route[], method: string, pathname: string): RouteMatch {
  for (const route of table) {
    const params = matchPattern(route.pattern, pathname);
    if (!params) continue;

    const handler = isHttpMethod(method) ? route.handlers[method] : undefined;
    if (handler) return { type: 'found', handler, params };

    const allowed = Object.keys(route.handlers).filter(isHttpMethod);
    return { type: 'method-not-allowed', allowed };
  }
  return { type: 'not-found' };
}
