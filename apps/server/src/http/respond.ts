import type { ServerResponse } from 'node:http';
import type { TaskFailure, ValidationIssue } from '@tasktrack/core';
import { failureMessage } from '@tasktrack/core';

export interface HttpResponse {
  readonly status: number;
  readonly body: unknown;
}

export interface ErrorBody {
  readonly detail: string | readonly ValidationIssue[];
}

/** HTTP status for each failure variant */
export function statusForFailure(failure: TaskFailure): number {
  switch (failure.type) {
    case 'validation-error': return 422;
    case 'not-found': return 404;
    case 'invalid-transition': return 400;
    case 'conflict': return 400;
  }
}

export function failureResponse(failure: TaskFailure): HttpResponse {
  const body: ErrorBody = failure.type === 'validation-error'
    ? { detail: failure.issues }
    : { detail: failureMessage(failure) };
  return { status: statusForFailure(failure), body };
}

export function errorResponse(status: number, detail: string): HttpResponse {
  const body: ErrorBody = { detail };
  return { status, body };
}

export function sendJson(res: ServerResponse, response: HttpResponse): void {
  const payload = JSON.stringify(response.body);
  res.writeHead(response.status, {
    'Content-Type': 'application/json',
    'Content-Length': Buffer.byteLength(payload),
  });
  res.end(payload);
}
