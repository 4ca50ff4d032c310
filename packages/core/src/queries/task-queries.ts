/**
 * Task operations as pure functions over a collection.
 *
 * Mutations return a new collection and never touch the input; every input is
 * validated before anything changes. Persisting the result is the caller's
 * job (TaskStore.save, once per command).
 */

import { ValidationError } from '../errors.js';
import { todayString } from '../parsers/date-parser.js';
import { nextId } from '../store/task-store.js';
import { DueWindow } from '../types/due-window.js';
import { Priority } from '../types/priority.js';
import type { ArchivedTask, Task, TaskCollection, TaskId } from '../types/task.js';
import {
  normalizeNote, normalizeTags, parseDueWindow, parsePriority,
  validateDueDate, validateTitle, validateUpcomingDays,
} from '../validation.js';
import {
  DEFAULT_UPCOMING_DAYS, hasTag, inDueWindow, replaceTask,
  requireTask, sortById, withDone,
} from './task-helpers.js';

// ---------------------------------------------------------------------------
// Inputs and results
// ---------------------------------------------------------------------------

export interface NewTask {
  title: string;
  tags?: readonly string[];
  /** low | medium | high, case-insensitive. Defaults to medium. */
  priority?: string;
  /** Anything parseDate accepts */
  dueDate?: string | null;
  note?: string | null;
}

/** Fields left undefined are not touched; null clears dueDate/note */
export interface TaskPatch {
  title?: string;
  tags?: readonly string[];
  priority?: string;
  dueDate?: string | null;
  note?: string | null;
}

export interface AddResult {
  tasks: TaskCollection;
  task: Task;
}

export interface ArchiveResult {
  tasks: TaskCollection;
  archived: ArchivedTask[];
}

export interface TaskFilter {
  tag?: string;
  priority?: string;
  due?: string;
  includeDone?: boolean;
  /** Horizon for the upcoming window */
  upcomingDays?: number;
}

export interface StatsOptions {
  /** yyyy-MM-dd; defaults to the local date */
  today?: string;
  upcomingDays?: number;
}

export interface StatsSummary {
  total: number;
  done: number;
  pending: number;
  /** done / total × 100, rounded half-up to one decimal; 0 when empty */
  completionPercent: number;
  pendingByPriority: Record<Priority, number>;
  /** Pending tasks only */
  due: { overdue: number; today: number; upcoming: number };
  /** Distinct tags on active tasks, sorted */
  tags: string[];
}

type Mutable<T> = { -readonly [K in keyof T]: T[K] };
type EditableFields = Pick<Task, 'title' | 'tags' | 'priority' | 'dueDate' | 'note'>;

// ---------------------------------------------------------------------------
// Mutations
// ---------------------------------------------------------------------------

/** Validate and append a new task */
export function addTask(tasks: TaskCollection, input: NewTask, now: Date = new Date()): AddResult {
  const title = validateTitle(input.title);
  const priority = input.priority != null ? parsePriority(input.priority) : Priority.Medium;
  const dueDate = input.dueDate != null ? validateDueDate(input.dueDate, now) : null;

  const task: Task = {
    id: nextId(tasks),
    title,
    done: false,
    tags: normalizeTags(input.tags ?? []),
    priority,
    dueDate,
    note: normalizeNote(input.note),
    createdAt: now.toISOString(),
    completedAt: null,
  };

  return { tasks: [...tasks, task], task };
}

function validatePatch(patch: TaskPatch, now: Date): Partial<EditableFields> {
  const changes: Partial<Mutable<EditableFields>> = {};
  if (patch.title !== undefined) changes.title = validateTitle(patch.title);
  if (patch.tags !== undefined) changes.tags = normalizeTags(patch.tags);
  if (patch.priority !== undefined) changes.priority = parsePriority(patch.priority);
  if (patch.dueDate !== undefined) {
    changes.dueDate = patch.dueDate === null ? null : validateDueDate(patch.dueDate, now);
  }
  if (patch.note !== undefined) changes.note = normalizeNote(patch.note);
  return changes;
}

/** Update the supplied fields of a task. done, createdAt and id are not editable. */
export function editTask(
  tasks: TaskCollection,
  taskId: TaskId,
  patch: TaskPatch,
  now: Date = new Date(),
): TaskCollection {
  const task = requireTask(tasks, taskId);
  const changes = validatePatch(patch, now);
  return replaceTask(tasks, { ...task, ...changes });
}

/**
 * Mark a task done or reopen it.
 * Setting the state a task already has returns the input collection unchanged
 * (an already-done task keeps its original completedAt).
 */
export function setDone(
  tasks: TaskCollection,
  taskId: TaskId,
  done: boolean,
  now: Date = new Date(),
): TaskCollection {
  const task = requireTask(tasks, taskId);
  if (task.done === done) return tasks;
  return replaceTask(tasks, withDone(task, done, now));
}

/** Replace a task's whole tag set; an empty list clears it */
export function setTags(tasks: TaskCollection, taskId: TaskId, tags: readonly string[]): TaskCollection {
  const task = requireTask(tasks, taskId);
  return replaceTask(tasks, { ...task, tags: normalizeTags(tags) });
}

/** Remove a task permanently */
export function deleteTask(tasks: TaskCollection, taskId: TaskId): TaskCollection {
  requireTask(tasks, taskId);
  return tasks.filter(t => t.id !== taskId);
}

/** Remove every task, or only the done ones */
export function clearTasks(tasks: TaskCollection, doneOnly: boolean): TaskCollection {
  return doneOnly ? tasks.filter(t => !t.done) : [];
}

/** Split done tasks off the collection, stamped with archivedAt */
export function archiveDone(tasks: TaskCollection, now: Date = new Date()): ArchiveResult {
  const done = tasks.filter(t => t.done);
  if (done.length === 0) return { tasks, archived: [] };

  const archivedAt = now.toISOString();
  return {
    tasks: tasks.filter(t => !t.done),
    archived: done.map(t => ({ ...t, archivedAt })),
  };
}

// ---------------------------------------------------------------------------
// Read queries
// ---------------------------------------------------------------------------

/**
 * Tasks matching every supplied predicate, ascending by id.
 * Done tasks are left out unless includeDone is set.
 */
export function filterTasks(
  tasks: TaskCollection,
  filter: TaskFilter = {},
  today: string = todayString(),
): Task[] {
  const priority = filter.priority != null ? parsePriority(filter.priority) : null;
  const due = filter.due != null ? parseDueWindow(filter.due) : null;
  const upcomingDays = validateUpcomingDays(filter.upcomingDays ?? DEFAULT_UPCOMING_DAYS);
  const tag = filter.tag;

  return sortById(tasks.filter(t => {
    if (!filter.includeDone && t.done) return false;
    if (tag != null && !hasTag(t, tag)) return false;
    if (priority != null && t.priority !== priority) return false;
    if (due != null && !inDueWindow(t, due, today, upcomingDays)) return false;
    return true;
  }));
}

/** Case-insensitive substring match on title or note, ascending by id */
export function searchTasks(tasks: TaskCollection, keyword: string, includeDone = false): Task[] {
  if (!keyword.trim()) throw new ValidationError('Search keyword cannot be empty', 'keyword');
  const needle = keyword.toLowerCase();

  return sortById(tasks.filter(t => {
    if (!includeDone && t.done) return false;
    return t.title.toLowerCase().includes(needle)
      || (t.note?.toLowerCase().includes(needle) ?? false);
  }));
}

/** Round half-up to one decimal place */
export function completionPercent(done: number, total: number): number {
  if (total === 0) return 0;
  return Math.round((done * 1000) / total) / 10;
}

export function getStats(tasks: TaskCollection, opts: StatsOptions = {}): StatsSummary {
  const today = opts.today ?? todayString();
  const upcomingDays = validateUpcomingDays(opts.upcomingDays ?? DEFAULT_UPCOMING_DAYS);

  const pendingTasks = tasks.filter(t => !t.done);
  const done = tasks.length - pendingTasks.length;

  const pendingByPriority: Record<Priority, number> = {
    [Priority.Low]: 0,
    [Priority.Medium]: 0,
    [Priority.High]: 0,
  };
  for (const t of pendingTasks) pendingByPriority[t.priority] += 1;

  const countIn = (window: DueWindow) =>
    pendingTasks.filter(t => inDueWindow(t, window, today, upcomingDays)).length;

  const tags = new Set<string>();
  for (const t of tasks) for (const tag of t.tags) tags.add(tag);

  return {
    total: tasks.length,
    done,
    pending: pendingTasks.length,
    completionPercent: completionPercent(done, tasks.length),
    pendingByPriority,
    due: {
      overdue: countIn(DueWindow.Overdue),
      today: countIn(DueWindow.Today),
      upcoming: countIn(DueWindow.Upcoming),
    },
    tags: [...tags].sort((a, b) => a.localeCompare(b)),
  };
}
