/**
 * Input validation shared by every mutating operation. Each function either
 * returns the normalised value or throws a ValidationError.
 */

import { ValidationError } from './errors.js';
import { parseDate } from './parsers/date-parser.js';
import { PRIORITIES, isPriority } from './types/priority.js';
import type { Priority } from './types/priority.js';
import { DUE_WINDOWS, isDueWindow } from './types/due-window.js';
import type { DueWindow } from './types/due-window.js';
import type { TaskId } from './types/task.js';

const TASK_ID_RE = /^\d+$/;

export function validateTitle(title: string): string {
  const trimmed = title.trim();
  if (!trimmed) throw new ValidationError('Task title cannot be empty', 'title');
  return trimmed;
}

/** Case-insensitive; surrounding whitespace is ignored */
export function parsePriority(value: string): Priority {
  const normalized = value.trim().toLowerCase();
  if (!isPriority(normalized)) {
    throw new ValidationError(`Invalid priority '${value}'. Use: ${PRIORITIES.join(', ')}`, 'priority');
  }
  return normalized;
}

export function parseDueWindow(value: string): DueWindow {
  const normalized = value.trim().toLowerCase();
  if (!isDueWindow(normalized)) {
    throw new ValidationError(`Invalid due window '${value}'. Use: ${DUE_WINDOWS.join(', ')}`, 'due');
  }
  return normalized;
}

export function validateDueDate(input: string, now: Date = new Date()): string {
  const parsed = parseDate(input, now);
  if (parsed === null) {
    throw new ValidationError(
      `Invalid due date '${input}'. Use yyyy-MM-dd, today, tomorrow, +3d, friday or jan15`,
      'dueDate',
    );
  }
  return parsed;
}

/** Blank notes are stored as absent */
export function normalizeNote(note: string | null | undefined): string | null {
  if (note == null) return null;
  return note.trim() ? note : null;
}

/**
 * Trim, strip one leading '#', drop blanks, collapse duplicates keeping first occurrence.
 * Tags differing only in case are duplicates.
 */
export function normalizeTags(tags: readonly string[]): string[] {
  const seen = new Map<string, string>();
  for (const raw of tags) {
    const tag = raw.trim().replace(/^#/, '').trim();
    const key = tag.toLowerCase();
    if (tag && !seen.has(key)) seen.set(key, tag);
  }
  return [...seen.values()];
}

/** Accepts a positive integer or its decimal string form */
export function parseTaskId(value: string | number): TaskId {
  const id = typeof value === 'number'
    ? value
    : TASK_ID_RE.test(value.trim()) ? Number(value.trim()) : NaN;
  if (!Number.isSafeInteger(id) || id < 1) {
    throw new ValidationError(`Invalid task id '${value}'. Task ids are positive integers`, 'id');
  }
  return id;
}

export function validateUpcomingDays(days: number): number {
  if (!Number.isInteger(days) || days < 0) {
    throw new ValidationError(`Invalid upcoming horizon '${days}'. Use a whole number of days`, 'upcomingDays');
  }
  return days;
}
