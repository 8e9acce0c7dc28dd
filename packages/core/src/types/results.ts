import type { TaskId } from './task.js';

export interface ValidationIssue {
  readonly field: string;
  readonly message: string;
}

/** Every way an operation can fail. No variant leaves the store modified. */
export type TaskFailure =
  | { readonly type: 'validation-error'; readonly message: string; readonly issues: readonly ValidationIssue[] }
  | { readonly type: 'not-found'; readonly taskId: TaskId }
  | { readonly type: 'invalid-transition'; readonly message: string }
  | { readonly type: 'conflict'; readonly message: string; readonly blocking: number };

export type ValidationFailure = Extract<TaskFailure, { type: 'validation-error' }>;

export type TaskResult =
  | { readonly type: 'success'; readonly message: string }
  | TaskFailure;

export type DataResult<T> =
  | { readonly type: 'success'; readonly data: T; readonly message: string }
  | TaskFailure;

/** Human-readable message for any failure */
export function failureMessage(f: TaskFailure): string {
  switch (f.type) {
    case 'validation-error': return f.message;
    case 'not-found': return 'Task not found';
    case 'invalid-transition': return f.message;
    case 'conflict': return f.message;
  }
}

export function validationError(issues: readonly ValidationIssue[]): ValidationFailure {
  const message = issues.map(i => `${i.field}: ${i.message}`).join('; ');
  return { type: 'validation-error', message, issues };
}
