/**
 * On-disk record shapes (snake_case, null for absent values) and the mappers
 * between records and in-memory tasks.
 */

import { z } from 'zod';
import { isIsoDate } from '../parsers/date-parser.js';
import { Priority } from '../types/priority.js';
import type { ArchivedTask, Task } from '../types/task.js';
import { normalizeNote } from '../validation.js';

const isoDate = z.string().refine(isIsoDate, 'Expected a yyyy-MM-dd date');
const isoTimestamp = z.string().refine(s => !Number.isNaN(Date.parse(s)), 'Expected an ISO-8601 timestamp');

/** Missing optional keys are accepted for files written by older versions */
export const TaskRecordSchema = z.object({
  id: z.number().int().positive().safe(),
  title: z.string().trim().min(1),
  done: z.boolean(),
  tags: z.array(z.string()).default([]),
  priority: z.nativeEnum(Priority).default(Priority.Medium),
  due_date: isoDate.nullable().default(null),
  note: z.string().nullable().default(null),
  created_at: isoTimestamp,
  completed_at: isoTimestamp.nullable().default(null),
});

export const ArchivedTaskRecordSchema = TaskRecordSchema.extend({
  archived_at: isoTimestamp.nullable().default(null),
});

export type TaskRecord = z.output<typeof TaskRecordSchema>;
export type ArchivedTaskRecord = z.output<typeof ArchivedTaskRecordSchema>;

function checkCompletion(records: readonly TaskRecord[], ctx: z.RefinementCtx): void {
  records.forEach((record, i) => {
    if (record.done !== (record.completed_at !== null)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: [i, 'completed_at'],
        message: 'completed_at must be set exactly when done is true',
      });
    }
  });
}

export const TaskDocumentSchema = z.array(TaskRecordSchema).superRefine((records, ctx) => {
  checkCompletion(records, ctx);
  const seen = new Set<number>();
  records.forEach((record, i) => {
    if (seen.has(record.id)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: [i, 'id'], message: `Duplicate task id ${record.id}` });
    }
    seen.add(record.id);
  });
});

/** Ids may repeat across archive records: an id is only unique while a task is active */
export const ArchiveDocumentSchema = z.array(ArchivedTaskRecordSchema).superRefine(checkCompletion);

export function toTask(record: TaskRecord): Task {
  return {
    id: record.id,
    title: record.title,
    done: record.done,
    tags: record.tags,
    priority: record.priority,
    dueDate: record.due_date,
    note: normalizeNote(record.note),
    createdAt: record.created_at,
    completedAt: record.completed_at,
  };
}

export function toArchivedTask(record: ArchivedTaskRecord): ArchivedTask {
  return { ...toTask(record), archivedAt: record.archived_at };
}

export function toRecord(task: Task): TaskRecord {
  return {
    id: task.id,
    title: task.title,
    done: task.done,
    tags: [...task.tags],
    priority: task.priority,
    due_date: task.dueDate,
    note: task.note,
    created_at: task.createdAt,
    completed_at: task.completedAt,
  };
}

export function toArchivedRecord(task: ArchivedTask): ArchivedTaskRecord {
  return { ...toRecord(task), archived_at: task.archivedAt };
}
