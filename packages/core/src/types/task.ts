import type { TaskStatus } from './task-status.js';
import type { Priority } from './priority.js';

export type TaskId = string;

export interface Task {
  readonly id: TaskId;
  readonly title: string;
  readonly description: string | null;
  readonly priority: Priority;
  readonly status: TaskStatus;
  readonly estimatedHours: number | null;
  readonly actualHours: number | null;
  readonly dueDate: string | null; // ISO string
  readonly createdAt: string; // ISO string
  readonly updatedAt: string; // ISO string
  readonly isOverdue: boolean;
  /** Highest value = newest. Breaks created_at ties when listing */
  readonly sortOrder: number;
}

/** Fields a client may supply when creating a task */
export interface NewTask {
  readonly title: string;
  readonly description?: string | null;
  readonly priority?: Priority;
  readonly estimatedHours?: number | null;
  readonly dueDate?: string | null;
}

/**
 * Partial update. A missing key leaves the field untouched; `null` clears
 * it, for the fields that may be cleared.
 */
export interface TaskPatch {
  readonly title?: string;
  readonly description?: string | null;
  readonly priority?: Priority;
  readonly status?: TaskStatus;
  readonly estimatedHours?: number | null;
  readonly actualHours?: number | null;
  readonly dueDate?: string | null;
}

export interface TaskFilters {
  readonly status?: TaskStatus;
  readonly priority?: Priority;
  readonly overdueOnly?: boolean;
  readonly limit?: number;
}
