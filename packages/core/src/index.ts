// Types
export * from './types/index.js';

// Schema
export * from './schema/index.js';

// Database
export { createDb, getRawDb, inTransaction, CREATE_SCHEMA_SQL } from './db.js';
export type { TaskDb } from './db.js';

// Validation
export {
  parseNewTask, parseTaskPatch, parseTaskFilters, parseDeleteAllQuery,
  NewTaskSchema, TaskPatchSchema, TaskFiltersSchema,
  MAX_TITLE_LENGTH, MAX_DESCRIPTION_LENGTH, DEFAULT_LIST_LIMIT, MAX_LIST_LIMIT,
} from './validation/task-input.js';
export type { ParseResult, NewTaskPayload, TaskPatchPayload } from './validation/task-input.js';

// Wire format
export { TaskRecordSchema, toTaskRecord } from './wire/task-record.js';
export type { TaskRecord } from './wire/task-record.js';

// Queries
export * from './queries/index.js';
