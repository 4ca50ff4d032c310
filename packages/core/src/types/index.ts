export { Priority, PriorityName, PRIORITIES, isPriority } from './priority.js';
export { DueWindow, DUE_WINDOWS, isDueWindow } from './due-window.js';
export type { TaskId, Task, ArchivedTask, TaskCollection } from './task.js';
