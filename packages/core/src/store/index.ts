export { TaskStore, nextId, mergeArchive, TASKS_FILE, ARCHIVE_FILE } from './task-store.js';
export type { StorePaths } from './task-store.js';
export { readJsonDocument, writeJsonDocument, writeFileAtomic, describeIssues } from './json-file.js';
export { TaskRecordSchema, ArchivedTaskRecordSchema, toTask, toRecord } from './records.js';
export type { TaskRecord, ArchivedTaskRecord } from './records.js';
