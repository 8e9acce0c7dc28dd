import { z } from 'zod';
import { TASK_STATUSES } from '../types/task-status.js';
import { PRIORITIES } from '../types/priority.js';
import type { Task } from '../types/task.js';

/** The record shape sent over the wire */
export const TaskRecordSchema = z.object({
  id: z.string(),
  title: z.string(),
  description: z.string().nullable(),
  priority: z.enum(PRIORITIES),
  status: z.enum(TASK_STATUSES),
  estimated_hours: z.number().nullable(),
  actual_hours: z.number().nullable(),
  due_date: z.string().nullable(),
  created_at: z.string(),
  updated_at: z.string(),
  is_overdue: z.boolean(),
});

export type TaskRecord = z.infer<typeof TaskRecordSchema>;

export function toTaskRecord(task: Task): TaskRecord {
  return {
    id: task.id,
    title: task.title,
    description: task.description,
    priority: task.priority,
    status: task.status,
    estimated_hours: task.estimatedHours,
    actual_hours: task.actualHours,
    due_date: task.dueDate,
    created_at: task.createdAt,
    updated_at: task.updatedAt,
    is_overdue: task.isOverdue,
  };
}
