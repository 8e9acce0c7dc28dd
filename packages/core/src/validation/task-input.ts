/**
 * zod schemas for the wire shapes clients send: create payloads, update
 * patches and list queries. Parsing converts snake_case wire names to the
 * camelCase domain types and normalizes timestamps to UTC ISO strings.
 */

import { z } from 'zod';
import { TASK_STATUSES } from '../types/task-status.js';
import { PRIORITIES } from '../types/priority.js';
import type { NewTask, TaskPatch, TaskFilters } from '../types/task.js';
import type { ValidationIssue, ValidationFailure } from '../types/results.js';
import { validationError } from '../types/results.js';

export const MAX_TITLE_LENGTH = 100;
export const MAX_DESCRIPTION_LENGTH = 500;
export const DEFAULT_LIST_LIMIT = 100;
export const MAX_LIST_LIMIT = 1000;

/** ISO-8601 timestamp. Without `Z` or an offset it is read as local time */
const timestamp = z
  .string()
  .datetime({ offset: true, local: true, message: 'Invalid ISO-8601 timestamp' })
  .transform(s => new Date(s).toISOString());

/** Length in code points, so an emoji counts as one character */
function charCount(s: string): number {
  return [...s].length;
}

const title = z
  .string()
  .refine(s => charCount(s) >= 1, { message: 'Title must not be empty' })
  .refine(s => charCount(s) <= MAX_TITLE_LENGTH, { message: `Title must be at most ${MAX_TITLE_LENGTH} characters` });
const description = z
  .string()
  .refine(s => charCount(s) <= MAX_DESCRIPTION_LENGTH, {
    message: `Description must be at most ${MAX_DESCRIPTION_LENGTH} characters`,
  });
const estimatedHours = z.number().min(0.1).max(100);
const actualHours = z.number().min(0).max(200);

const TRUE_FLAGS = ['true', 't', '1', 'yes', 'y', 'on'] as const;
const FALSE_FLAGS = ['false', 'f', '0', 'no', 'n', 'off'] as const;

/** Query-string boolean, case-insensitive: true/false, t/f, 1/0, yes/no, y/n, on/off */
const queryFlag = z
  .string()
  .toLowerCase()
  .pipe(z.enum([...TRUE_FLAGS, ...FALSE_FLAGS]))
  .transform(v => TRUE_FLAGS.some(flag => flag === v));

export const NewTaskSchema = z
  .object({
    title,
    description: description.nullish(),
    priority: z.enum(PRIORITIES).optional(),
    estimated_hours: estimatedHours.nullish(),
    due_date: timestamp.nullish(),
  })
  .transform((p): NewTask => ({
    title: p.title,
    description: p.description ?? null,
    priority: p.priority,
    estimatedHours: p.estimated_hours ?? null,
    dueDate: p.due_date ?? null,
  }));

export const TaskPatchSchema = z
  .object({
    title: title.optional(),
    description: description.nullable().optional(),
    priority: z.enum(PRIORITIES).optional(),
    status: z.enum(TASK_STATUSES).optional(),
    estimated_hours: estimatedHours.nullable().optional(),
    actual_hours: actualHours.nullable().optional(),
    due_date: timestamp.nullable().optional(),
  })
  .transform((p): TaskPatch => ({
    title: p.title,
    description: p.description,
    priority: p.priority,
    status: p.status,
    estimatedHours: p.estimated_hours,
    actualHours: p.actual_hours,
    dueDate: p.due_date,
  }));

export const TaskFiltersSchema = z
  .object({
    status: z.enum(TASK_STATUSES).optional(),
    priority: z.enum(PRIORITIES).optional(),
    overdue_only: queryFlag.optional(),
    limit: z.coerce.number().int().min(1).max(MAX_LIST_LIMIT).optional(),
  })
  .transform((q): TaskFilters => ({
    status: q.status,
    priority: q.priority,
    overdueOnly: q.overdue_only ?? false,
    limit: q.limit ?? DEFAULT_LIST_LIMIT,
  }));

export const DeleteAllSchema = z
  .object({ force: queryFlag.optional() })
  .transform(q => q.force ?? false);

/** Wire shapes as a client sends them, before parsing */
export type NewTaskPayload = z.input<typeof NewTaskSchema>;
export type TaskPatchPayload = z.input<typeof TaskPatchSchema>;

export type ParseResult<T> =
  | { readonly type: 'success'; readonly data: T }
  | ValidationFailure;

function toIssues(error: z.ZodError): ValidationIssue[] {
  return error.issues.map(issue => ({
    field: issue.path.length > 0 ? issue.path.join('.') : 'body',
    message: issue.message,
  }));
}

function parseWith<S extends z.ZodTypeAny>(schema: S, input: unknown): ParseResult<z.output<S>> {
  const parsed = schema.safeParse(input);
  if (parsed.success) return { type: 'success', data: parsed.data };
  return validationError(toIssues(parsed.error));
}

/** Parse a create payload */
export function parseNewTask(body: unknown): ParseResult<NewTask> {
  return parseWith(NewTaskSchema, body);
}

/** Parse an update patch */
export function parseTaskPatch(body: unknown): ParseResult<TaskPatch> {
  return parseWith(TaskPatchSchema, body);
}

/** Parse list query parameters (all values arrive as strings) */
export function parseTaskFilters(query: Record<string, string | undefined>): ParseResult<TaskFilters> {
  return parseWith(TaskFiltersSchema, query);
}

/** Parse the `force` flag of a bulk delete */
export function parseDeleteAllQuery(query: Record<string, string | undefined>): ParseResult<boolean> {
  return parseWith(DeleteAllSchema, query);
}
