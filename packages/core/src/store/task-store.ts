/**
 * File-backed persistence for the active collection (tasks.json) and the
 * archive (archive.json). The store holds no collection state of its own:
 * callers load once, run engine operations, and save once.
 */

import { join } from 'node:path';
import { ValidationError } from '../errors.js';
import { createLogger } from '../log.js';
import type { ArchivedTask, TaskCollection, TaskId } from '../types/task.js';
import { readJsonDocument, writeJsonDocument } from './json-file.js';
import {
  ArchiveDocumentSchema, TaskDocumentSchema,
  toArchivedRecord, toArchivedTask, toRecord, toTask,
} from './records.js';

export const TASKS_FILE = 'tasks.json';
export const ARCHIVE_FILE = 'archive.json';

const log = createLogger('STORE');

export interface StorePaths {
  readonly tasks: string;
  readonly archive: string;
}

/** One more than the highest id in the collection, or 1 when empty */
export function nextId(tasks: TaskCollection): TaskId {
  const id = tasks.reduce((max, t) => Math.max(max, t.id), 0) + 1;
  if (!Number.isSafeInteger(id)) {
    throw new ValidationError('No task ids left: the highest id is already the largest safe integer', 'id');
  }
  return id;
}

/** Archive order is the order tasks were archived in; ids and timestamps are kept as-is */
export function mergeArchive(archive: readonly ArchivedTask[], tasks: readonly ArchivedTask[]): ArchivedTask[] {
  return [...archive, ...tasks];
}

export class TaskStore {
  readonly paths: StorePaths;

  constructor(dataDir: string) {
    this.paths = {
      tasks: join(dataDir, TASKS_FILE),
      archive: join(dataDir, ARCHIVE_FILE),
    };
  }

  /** Load the active collection. A missing file is an empty collection. */
  load(): TaskCollection {
    const records = readJsonDocument(this.paths.tasks, TaskDocumentSchema) ?? [];
    log(`loaded ${records.length} task(s) from ${this.paths.tasks}`);
    return records.map(toTask);
  }

  /** Replace the persisted active collection */
  save(tasks: TaskCollection): void {
    writeJsonDocument(this.paths.tasks, tasks.map(toRecord));
    log(`saved ${tasks.length} task(s) to ${this.paths.tasks}`);
  }

  loadArchive(): ArchivedTask[] {
    const records = readJsonDocument(this.paths.archive, ArchiveDocumentSchema) ?? [];
    log(`loaded ${records.length} archived task(s) from ${this.paths.archive}`);
    return records.map(toArchivedTask);
  }

  /**
   * Append tasks to the archive file and return the merged archive.
   * Nothing is written when there is nothing to append.
   */
  appendArchive(tasks: readonly ArchivedTask[]): ArchivedTask[] {
    const existing = this.loadArchive();
    if (tasks.length === 0) return existing;

    const merged = mergeArchive(existing, tasks);
    writeJsonDocument(this.paths.archive, merged.map(toArchivedRecord));
    log(`archived ${tasks.length} task(s) to ${this.paths.archive}`);
    return merged;
  }
}
