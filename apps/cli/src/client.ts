/**
 * HTTP client for a running task server.
 */

import { z } from 'zod';
import {
  TaskRecordSchema,
  type TaskRecord, type NewTaskPayload, type TaskPatchPayload, type TaskStatus, type Priority,
} from '@tasktrack/core';

export type ClientResult<T> =
  | { readonly type: 'success'; readonly data: T }
  | { readonly type: 'http-error'; readonly status: number; readonly message: string };

export interface ListOptions {
  status?: TaskStatus;
  priority?: Priority;
  overdueOnly?: boolean;
  limit?: number;
}

const MessageSchema = z.object({ message: z.string() });
const DeleteAllSchema = z.object({ message: z.string(), deleted: z.number() });

const ErrorBodySchema = z.object({
  detail: z.union([
    z.string(),
    z.array(z.object({ field: z.string(), message: z.string() })),
  ]),
});

/** Flatten an error body into one line */
function errorMessage(status: number, body: unknown): string {
  const parsed = ErrorBodySchema.safeParse(body);
  if (!parsed.success) return `Request failed with status ${status}`;
  const { detail } = parsed.data;
  return typeof detail === 'string'
    ? detail
    : detail.map(issue => `${issue.field}: ${issue.message}`).join('; ');
}

export class TaskClient {
  private readonly baseUrl: string;

  constructor(baseUrl: string) {
    this.baseUrl = baseUrl.replace(/\/+$/, '');
  }

  create(payload: NewTaskPayload): Promise<ClientResult<TaskRecord>> {
    return this.request('POST', '/tasks', TaskRecordSchema, payload);
  }

  list(options: ListOptions = {}): Promise<ClientResult<TaskRecord[]>> {
    const query = new URLSearchParams();
    if (options.status) query.set('status', options.status);
    if (options.priority) query.set('priority', options.priority);
    if (options.overdueOnly) query.set('overdue_only', 'true');
    if (options.limit !== undefined) query.set('limit', String(options.limit));
    const qs = query.toString();
    return this.request('GET', qs ? `/tasks?${qs}` : '/tasks', TaskRecordSchema.array());
  }

  get(id: string): Promise<ClientResult<TaskRecord>> {
    return this.request('GET', `/tasks/${encodeURIComponent(id)}`, TaskRecordSchema);
  }

  update(id: string, patch: TaskPatchPayload): Promise<ClientResult<TaskRecord>> {
    return this.request('PUT', `/tasks/${encodeURIComponent(id)}`, TaskRecordSchema, patch);
  }

  delete(id: string): Promise<ClientResult<{ message: string }>> {
    return this.request('DELETE', `/tasks/${encodeURIComponent(id)}`, MessageSchema);
  }

  clear(force = false): Promise<ClientResult<{ message: string; deleted: number }>> {
    return this.request('DELETE', force ? '/tasks?force=true' : '/tasks', DeleteAllSchema);
  }

  private async request<S extends z.ZodTypeAny>(
    method: string,
    path: string,
    schema: S,
    body?: unknown,
  ): Promise<ClientResult<z.output<S>>> {
    const url = `${this.baseUrl}${path}`;

    let res: Response;
    try {
      res = await fetch(url, {
        method,
        headers: body === undefined ? undefined : { 'Content-Type': 'application/json' },
        body: body === undefined ? undefined : JSON.stringify(body),
      });
    } catch (err: unknown) {
      const reason = err instanceof Error && err.cause instanceof Error ? err.cause.message : String(err);
      throw new Error(`Could not reach task server at ${this.baseUrl}: ${reason}`);
    }

    const text = await res.text();
    let payload: unknown = null;
    if (text.length > 0) {
      try {
        payload = JSON.parse(text);
      } catch {
        payload = null;
      }
    }

    if (!res.ok) {
      return { type: 'http-error', status: res.status, message: errorMessage(res.status, payload) };
    }

    const parsed = schema.safeParse(payload);
    if (!parsed.success) {
      throw new Error(`Unexpected response from ${method} ${path}`);
    }
    return { type: 'success', data: parsed.data };
  }
}
