// Types
export { Priority, PriorityName, PRIORITIES, isPriority, DueWindow, DUE_WINDOWS, isDueWindow } from './types/index.js';
export type { TaskId, Task, ArchivedTask, TaskCollection } from './types/index.js';

// Errors
export { TaskError, ValidationError, NotFoundError, CorruptDataError, IOError } from './errors.js';
export type { TaskErrorKind } from './errors.js';

// Validation
export {
  validateTitle, parsePriority, parseDueWindow, validateDueDate,
  normalizeNote, normalizeTags, parseTaskId, validateUpcomingDays,
} from './validation.js';

// Parsers
export { parseDate, formatDate, addDays, todayString, isIsoDate, shiftDate } from './parsers/index.js';

// Store
export * from './store/index.js';

// Queries
export * from './queries/index.js';

// Export
export * from './export/index.js';

// Config
export {
  CONFIG_FILE, CONFIG_KEYS, DEFAULT_CONFIG,
  isConfigKey, getDefaultDataDir, resolveDataDir, getConfigPath,
  loadConfig, saveConfig, setConfigValue,
} from './config.js';
export type { TinyTaskConfig, ConfigKey } from './config.js';

// Logging
export { createLogger, isDebugEnabled } from './log.js';
export type { Logger } from './log.js';
