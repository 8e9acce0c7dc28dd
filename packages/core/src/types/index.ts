export { TaskStatus, TaskStatusName, TASK_STATUSES } from './task-status.js';
export { Priority, PriorityName, PRIORITIES } from './priority.js';
export type { TaskId, Task, NewTask, TaskPatch, TaskFilters } from './task.js';
export type { TaskResult, DataResult, TaskFailure, ValidationFailure, ValidationIssue } from './results.js';
export { failureMessage, validationError } from './results.js';
