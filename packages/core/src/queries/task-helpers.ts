import { randomUUID } from 'node:crypto';
import type { TaskId, Task, NewTask, TaskPatch } from '../types/task.js';
import { TaskStatus } from '../types/task-status.js';
import { Priority } from '../types/priority.js';

/** Hours recorded on completion when neither actual nor estimated hours exist */
export const DEFAULT_ACTUAL_HOURS = 1.0;

/** Urgent tasks without a due date become due this long after the mutation */
export const URGENT_DUE_WINDOW_MS = 24 * 60 * 60 * 1000;

/** Generate a task ID. UUIDs are never reused, so deleted IDs stay retired */
export function generateId(): TaskId {
  return randomUUID();
}

/** Whether a task in this status can become overdue */
export function canBeOverdue(status: TaskStatus): boolean {
  switch (status) {
    case TaskStatus.Pending:
    case TaskStatus.InProgress:
    case TaskStatus.Cancelled:
      return true;
    case TaskStatus.Completed:
      return false;
  }
}

export function isUrgent(priority: Priority): boolean {
  switch (priority) {
    case Priority.Urgent:
      return true;
    case Priority.High:
    case Priority.Medium:
    case Priority.Low:
      return false;
  }
}

/** Overdue = has a due date, not completed, and the due date has passed */
export function computeIsOverdue(task: Pick<Task, 'dueDate' | 'status'>, now: Date): boolean {
  if (task.dueDate == null || !canBeOverdue(task.status)) return false;
  return now.getTime() > Date.parse(task.dueDate);
}

/** Return a copy of the task with `isOverdue` recomputed for `now` */
export function withFreshOverdue(task: Task, now: Date): Task {
  return { ...task, isOverdue: computeIsOverdue(task, now) };
}

/**
 * Post-mutation adjustments, applied after every create and merge:
 *   a. completed without actual hours -> estimated hours, else 1.0
 *   b. urgent without a due date -> due in 24 hours
 *   c. recompute the overdue flag
 *   d. bump updatedAt
 */
export function applyDerivationRules(task: Task, now: Date): Task {
  let derived = task;

  // Only null counts as absent: an explicit 0 is kept, unlike a falsy test
  if (derived.status === TaskStatus.Completed && derived.actualHours == null) {
    derived = { ...derived, actualHours: derived.estimatedHours ?? DEFAULT_ACTUAL_HOURS };
  }

  if (isUrgent(derived.priority) && derived.dueDate == null) {
    derived = { ...derived, dueDate: new Date(now.getTime() + URGENT_DUE_WINDOW_MS).toISOString() };
  }

  return {
    ...derived,
    isOverdue: computeIsOverdue(derived, now),
    updatedAt: now.toISOString(),
  };
}

/** Create a new Task object from validated input, before derivation */
export function createTask(input: NewTask, sortOrder: number, now: Date): Task {
  const timestamp = now.toISOString();
  return {
    id: generateId(),
    title: input.title,
    description: input.description ?? null,
    priority: input.priority ?? Priority.Medium,
    status: TaskStatus.Pending,
    estimatedHours: input.estimatedHours ?? null,
    actualHours: null,
    dueDate: input.dueDate ?? null,
    createdAt: timestamp,
    updatedAt: timestamp,
    isOverdue: false,
    sortOrder,
  };
}

/** Overwrite only the fields present in the patch */
export function mergePatch(task: Task, patch: TaskPatch): Task {
  return {
    ...task,
    ...(patch.title !== undefined ? { title: patch.title } : {}),
    ...(patch.description !== undefined ? { description: patch.description } : {}),
    ...(patch.priority !== undefined ? { priority: patch.priority } : {}),
    ...(patch.status !== undefined ? { status: patch.status } : {}),
    ...(patch.estimatedHours !== undefined ? { estimatedHours: patch.estimatedHours } : {}),
    ...(patch.actualHours !== undefined ? { actualHours: patch.actualHours } : {}),
    ...(patch.dueDate !== undefined ? { dueDate: patch.dueDate } : {}),
  };
}

/** Sort for listing: urgent first, then newest created first */
export function sortTasksForListing(tasks: readonly Task[]): Task[] {
  return [...tasks].sort((a, b) => {
    const ua = isUrgent(a.priority) ? 1 : 0;
    const ub = isUrgent(b.priority) ? 1 : 0;
    if (ua !== ub) return ub - ua;
    // Created: newer first
    const created = b.createdAt.localeCompare(a.createdAt);
    if (created !== 0) return created;
    return b.sortOrder - a.sortOrder;
  });
}

/** Status label for messages */
export function statusLabel(status: TaskStatus): string {
  switch (status) {
    case TaskStatus.Pending: return 'pending';
    case TaskStatus.InProgress: return 'in progress';
    case TaskStatus.Completed: return 'completed';
    case TaskStatus.Cancelled: return 'cancelled';
  }
}
