export { tasks } from './tasks.js';
export type { TaskRow, NewTaskRow } from './tasks.js';
