// Task helpers
export {
  generateId,
  createTask,
  mergePatch,
  applyDerivationRules,
  computeIsOverdue,
  withFreshOverdue,
  canBeOverdue,
  isUrgent,
  sortTasksForListing,
  statusLabel,
  DEFAULT_ACTUAL_HOURS,
  URGENT_DUE_WINDOW_MS,
} from './task-helpers.js';

// Task queries
export {
  findTask,
  getAllTasks,
  countTasks,
  countTasksWithStatus,
  insertTask,
  saveTask,
  deleteTaskPermanently,
  clearAllTasks,
  refreshOverdueFlags,
  addTask,
  listTasks,
  getTask,
  updateTask,
  deleteTask,
  deleteAllTasks,
} from './task-queries.js';
