/**
 * CLI helpers: argument parsing, client lookup, error handling.
 */

import type { Command } from 'commander';
import { TaskStatus, Priority } from '@tasktrack/core';
import { TaskClient, type ClientResult } from './client.js';
import * as out from './output.js';

export const DEFAULT_SERVER_URL = 'http://127.0.0.1:8000';

const MINUTE = 60 * 1000;
const UNIT_MS: Record<string, number> = {
  m: MINUTE,
  h: 60 * MINUTE,
  d: 24 * 60 * MINUTE,
  w: 7 * 24 * 60 * MINUTE,
};

/** Server URL: --url, then TASKTRACK_URL, then the local default */
export function resolveServerUrl(explicit: string | undefined, env: Record<string, string | undefined> = process.env): string {
  return explicit || env['TASKTRACK_URL'] || DEFAULT_SERVER_URL;
}

export function clientFor(cmd: Command): TaskClient {
  const { url } = cmd.optsWithGlobals<{ url?: string }>();
  return new TaskClient(resolveServerUrl(url));
}

/**
 * Parse a status string into a TaskStatus value.
 */
export function parseStatus(status: string): TaskStatus | null {
  switch (status.toLowerCase()) {
    case 'pending': case 'todo': return TaskStatus.Pending;
    case 'in-progress': case 'in_progress': case 'inprogress': case 'wip': return TaskStatus.InProgress;
    case 'done': case 'complete': case 'completed': return TaskStatus.Completed;
    case 'cancel': case 'cancelled': case 'canceled': return TaskStatus.Cancelled;
    default: return null;
  }
}

/**
 * Parse a priority string into a Priority value.
 */
export function parsePriorityArg(level: string): Priority | null {
  switch (level.toLowerCase()) {
    case 'urgent': case '1': case 'p1': return Priority.Urgent;
    case 'high': case '2': case 'p2': return Priority.High;
    case 'medium': case '3': case 'p3': return Priority.Medium;
    case 'low': case '4': case 'p4': return Priority.Low;
    default: return null;
  }
}

/** Hours as a number, or null when not a finite number */
export function parseHours(value: string): number | null {
  if (value.trim() === '') return null;
  const hours = Number(value);
  return Number.isFinite(hours) ? hours : null;
}

/**
 * Parse a due date: an ISO-8601 timestamp, or an offset from now such
 * as `30m`, `4h`, `2d`, `1w`. Returns a UTC ISO string, or null.
 */
export function parseDueArg(value: string, now: Date = new Date()): string | null {
  const relative = /^(\d+)([mhdw])$/.exec(value.trim().toLowerCase());
  if (relative) {
    const [, amount, unit] = relative;
    const ms = UNIT_MS[unit ?? ''];
    if (amount === undefined || ms === undefined) return null;
    return new Date(now.getTime() + Number(amount) * ms).toISOString();
  }

  const timestamp = Date.parse(value);
  if (Number.isNaN(timestamp)) return null;
  return new Date(timestamp).toISOString();
}

/** `none` clears an optional field */
export function isClearValue(value: string): boolean {
  return value.toLowerCase() === 'none';
}

/**
 * Report a failed request and mark the process as failed.
 * Returns the data on success.
 */
export function unwrap<T>(result: ClientResult<T>): T | null {
  if (result.type === 'success') return result.data;
  out.error(`${result.message} (${result.status})`);
  process.exitCode = 1;
  return null;
}

/**
 * Wrap a command action with error handling.
 */
export async function $try(fn: () => Promise<void> | void): Promise<void> {
  try {
    await fn();
  } catch (err: unknown) {
    out.error(err instanceof Error ? err.message : String(err));
    process.exitCode = 1;
  }
}

/** Print an argument error and mark the process as failed */
export function usageError(message: string): void {
  out.error(message);
  process.exitCode = 1;
}
