// Task helpers
export {
  getTaskById,
  requireTask,
  replaceTask,
  withDone,
  sortById,
  hasTag,
  inDueWindow,
  DEFAULT_UPCOMING_DAYS,
} from './task-helpers.js';

// Task queries
export {
  addTask,
  editTask,
  setDone,
  setTags,
  deleteTask,
  clearTasks,
  archiveDone,
  filterTasks,
  searchTasks,
  getStats,
  completionPercent,
} from './task-queries.js';
export type {
  NewTask,
  TaskPatch,
  AddResult,
  ArchiveResult,
  TaskFilter,
  StatsOptions,
  StatsSummary,
} from './task-queries.js';
