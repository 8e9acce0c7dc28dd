/**
 * Task store and rule engine. Low-level row access first, then the
 * operations clients call: add, list, get, update, delete, delete-all.
 */

import { eq, count, max } from 'drizzle-orm';
import type { TaskDb } from '../db.js';
import { inTransaction } from '../db.js';
import { tasks, type TaskRow, type NewTaskRow } from '../schema/tasks.js';
import type { Task, TaskId, NewTask, TaskPatch, TaskFilters } from '../types/task.js';
import type { TaskResult, DataResult, ValidationFailure } from '../types/results.js';
import { validationError } from '../types/results.js';
import { TaskStatus } from '../types/task-status.js';
import { DEFAULT_LIST_LIMIT } from '../validation/task-input.js';
import {
  createTask, mergePatch, applyDerivationRules, computeIsOverdue,
  withFreshOverdue, sortTasksForListing, DEFAULT_ACTUAL_HOURS,
} from './task-helpers.js';

// ---------------------------------------------------------------------------
// Row mapper
// ---------------------------------------------------------------------------

function rowToTask(row: TaskRow): Task {
  return {
    id: row.id,
    title: row.title,
    description: row.description,
    priority: row.priority,
    status: row.status,
    estimatedHours: row.estimatedHours,
    actualHours: row.actualHours,
    dueDate: row.dueDate,
    createdAt: row.createdAt,
    updatedAt: row.updatedAt,
    isOverdue: row.isOverdue,
    sortOrder: row.sortOrder,
  };
}

function taskToRow(task: Task): NewTaskRow {
  return { ...task };
}

// ---------------------------------------------------------------------------
// Read queries
// ---------------------------------------------------------------------------

/** Get a stored task exactly as persisted, overdue flag included */
export function findTask(db: TaskDb, taskId: TaskId): Task | null {
  const row = db.select().from(tasks).where(eq(tasks.id, taskId)).get();
  return row ? rowToTask(row) : null;
}

/** Get every stored task, in insertion order */
export function getAllTasks(db: TaskDb): Task[] {
  return db.select().from(tasks).orderBy(tasks.sortOrder).all().map(rowToTask);
}

export function countTasks(db: TaskDb): number {
  return db.select({ n: count() }).from(tasks).get()?.n ?? 0;
}

export function countTasksWithStatus(db: TaskDb, status: TaskStatus): number {
  return db.select({ n: count() }).from(tasks).where(eq(tasks.status, status)).get()?.n ?? 0;
}

// ---------------------------------------------------------------------------
// Write operations
// ---------------------------------------------------------------------------

/** Next sort_order, one above the newest task */
function nextSortOrder(db: TaskDb): number {
  const row = db.select({ maxOrder: max(tasks.sortOrder) }).from(tasks).get();
  return (row?.maxOrder ?? -1) + 1;
}

export function insertTask(db: TaskDb, task: Task): void {
  db.insert(tasks).values(taskToRow(task)).run();
}

/** Overwrite every mutable column of an existing task */
export function saveTask(db: TaskDb, task: Task): void {
  const { id, createdAt, sortOrder, ...fields } = task;
  db.update(tasks).set(fields).where(eq(tasks.id, id)).run();
}

export function deleteTaskPermanently(db: TaskDb, taskId: TaskId): void {
  db.delete(tasks).where(eq(tasks.id, taskId)).run();
}

/** Remove every task. Returns the number removed */
export function clearAllTasks(db: TaskDb): number {
  return db.delete(tasks).run().changes;
}

/**
 * Recompute the stored overdue flag of every task for `now`.
 * Returns the number of rows whose flag changed.
 */
export function refreshOverdueFlags(db: TaskDb, now: Date = new Date()): number {
  let changed = 0;
  inTransaction(db, () => {
    for (const task of getAllTasks(db)) {
      const isOverdue = computeIsOverdue(task, now);
      if (isOverdue === task.isOverdue) continue;
      db.update(tasks).set({ isOverdue }).where(eq(tasks.id, task.id)).run();
      changed++;
    }
  });
  return changed;
}

// ---------------------------------------------------------------------------
// Validation
// ---------------------------------------------------------------------------

/** A supplied due date must be strictly later than `now` */
function checkDueDate(dueDate: string | null | undefined, now: Date): ValidationFailure | null {
  if (dueDate == null) return null;
  if (Date.parse(dueDate) > now.getTime()) return null;
  return validationError([{ field: 'due_date', message: 'Due date must be in the future' }]);
}

// ---------------------------------------------------------------------------
// High-level operations
// ---------------------------------------------------------------------------

/** Create a task from validated input, then apply the derivation rules */
export function addTask(db: TaskDb, input: NewTask, now: Date = new Date()): DataResult<Task> {
  const invalid = checkDueDate(input.dueDate, now);
  if (invalid) return invalid;

  const task = inTransaction(db, () => {
    const created = applyDerivationRules(createTask(input, nextSortOrder(db), now), now);
    insertTask(db, created);
    return created;
  });
  return { type: 'success', data: task, message: `Created task ${task.id}` };
}

/**
 * Refresh every stored overdue flag, then filter (status, priority,
 * overdue-only), sort urgent-first / newest-first and truncate to `limit`.
 */
export function listTasks(db: TaskDb, filters: TaskFilters = {}, now: Date = new Date()): Task[] {
  return inTransaction(db, () => {
    refreshOverdueFlags(db, now);

    let taskList = getAllTasks(db);
    if (filters.status != null) {
      taskList = taskList.filter(t => t.status === filters.status);
    }
    if (filters.priority != null) {
      taskList = taskList.filter(t => t.priority === filters.priority);
    }
    if (filters.overdueOnly) {
      taskList = taskList.filter(t => t.isOverdue);
    }

    return sortTasksForListing(taskList).slice(0, filters.limit ?? DEFAULT_LIST_LIMIT);
  });
}

/** Get a task with its overdue flag recomputed. The stored flag is left alone */
export function getTask(db: TaskDb, taskId: TaskId, now: Date = new Date()): DataResult<Task> {
  const task = findTask(db, taskId);
  if (!task) return { type: 'not-found', taskId };
  return { type: 'success', data: withFreshOverdue(task, now), message: `Found task ${taskId}` };
}

/**
 * Apply a partial update.
 *
 * A completed task only accepts patches whose status is also completed. A
 * patch without any status is refused too: the missing status compares as
 * "not completed". Completing a task without actual hours records the stored
 * estimate, else 1.0.
 */
export function updateTask(
  db: TaskDb,
  taskId: TaskId,
  patch: TaskPatch,
  now: Date = new Date(),
): DataResult<Task> {
  const invalid = checkDueDate(patch.dueDate, now);
  if (invalid) return invalid;

  return inTransaction(db, (): DataResult<Task> => {
    const stored = findTask(db, taskId);
    if (!stored) return { type: 'not-found', taskId };

    if (stored.status === TaskStatus.Completed && patch.status !== TaskStatus.Completed) {
      return { type: 'invalid-transition', message: 'Cannot change status of completed task' };
    }

    let effective = patch;
    // An explicit actual_hours of 0 counts as supplied; only null/absent gets the default
    if (
      patch.status === TaskStatus.Completed
      && stored.status !== TaskStatus.Completed
      && patch.actualHours == null
      && stored.actualHours == null
    ) {
      effective = { ...patch, actualHours: stored.estimatedHours ?? DEFAULT_ACTUAL_HOURS };
    }

    const updated = applyDerivationRules(mergePatch(stored, effective), now);
    saveTask(db, updated);
    return { type: 'success', data: updated, message: `Updated task ${taskId}` };
  });
}

/** Delete a task permanently. Tasks in progress are refused */
export function deleteTask(db: TaskDb, taskId: TaskId): TaskResult {
  const task = findTask(db, taskId);
  if (!task) return { type: 'not-found', taskId };
  if (task.status === TaskStatus.InProgress) {
    return { type: 'conflict', message: 'Cannot delete task in progress', blocking: 1 };
  }

  deleteTaskPermanently(db, taskId);
  return { type: 'success', message: 'Task deleted successfully' };
}

/**
 * Delete every task. Without `force`, any in-progress task blocks the whole
 * operation and nothing is deleted.
 */
export function deleteAllTasks(db: TaskDb, force = false): DataResult<{ deleted: number }> {
  return inTransaction(db, (): DataResult<{ deleted: number }> => {
    if (!force) {
      const blocking = countTasksWithStatus(db, TaskStatus.InProgress);
      if (blocking > 0) {
        return {
          type: 'conflict',
          message: `Cannot delete ${blocking} in-progress tasks. Use force=true to override`,
          blocking,
        };
      }
    }

    const deleted = clearAllTasks(db);
    return { type: 'success', data: { deleted }, message: `Deleted ${deleted} tasks successfully` };
  });
}
