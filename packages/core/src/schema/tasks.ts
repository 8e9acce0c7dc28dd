import { sqliteTable, text, integer, real, index } from 'drizzle-orm/sqlite-core';
import { TASK_STATUSES } from '../types/task-status.js';
import { PRIORITIES } from '../types/priority.js';

export const tasks = sqliteTable('tasks', {
  id: text('id').primaryKey(),
  title: text('title').notNull(),
  description: text('description'),
  priority: text('priority', { enum: PRIORITIES }).notNull().default('medium'),
  status: text('status', { enum: TASK_STATUSES }).notNull().default('pending'),
  estimatedHours: real('estimated_hours'),
  actualHours: real('actual_hours'),
  /** ISO string, always UTC so that string order is time order */
  dueDate: text('due_date'),
  createdAt: text('created_at').notNull(),
  updatedAt: text('updated_at').notNull(),
  /** Cached derived flag. Refreshed by listTasks, never returned as-is */
  isOverdue: integer('is_overdue', { mode: 'boolean' }).notNull().default(false),
  /** Highest value = newest */
  sortOrder: integer('sort_order').notNull().default(0),
}, (table) => [
  index('idx_tasks_status').on(table.status),
  index('idx_tasks_sort').on(table.priority, table.createdAt, table.sortOrder),
]);

export type TaskRow = typeof tasks.$inferSelect;
export type NewTaskRow = typeof tasks.$inferInsert;
