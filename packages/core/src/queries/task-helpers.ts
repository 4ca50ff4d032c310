import { NotFoundError } from '../errors.js';
import { shiftDate } from '../parsers/date-parser.js';
import { DueWindow } from '../types/due-window.js';
import type { Task, TaskCollection, TaskId } from '../types/task.js';

export const DEFAULT_UPCOMING_DAYS = 7;

/** Find a task by id, or null */
export function getTaskById(tasks: TaskCollection, taskId: TaskId): Task | null {
  return tasks.find(t => t.id === taskId) ?? null;
}

/** Find a task by id or throw NotFoundError */
export function requireTask(tasks: TaskCollection, taskId: TaskId): Task {
  const task = getTaskById(tasks, taskId);
  if (!task) throw new NotFoundError(taskId);
  return task;
}

/** Return a new collection with the task of the same id swapped in */
export function replaceTask(tasks: TaskCollection, updated: Task): TaskCollection {
  return tasks.map(t => (t.id === updated.id ? updated : t));
}

/** Return a copy of the task with a new done flag; completedAt follows it */
export function withDone(task: Task, done: boolean, now: Date): Task {
  return {
    ...task,
    done,
    completedAt: done ? now.toISOString() : null,
  };
}

export function sortById(tasks: readonly Task[]): Task[] {
  return [...tasks].sort((a, b) => a.id - b.id);
}

/** Tag comparison ignores case and a leading '#' */
export function hasTag(task: Task, tag: string): boolean {
  const wanted = tag.trim().replace(/^#/, '').toLowerCase();
  return task.tags.some(t => t.toLowerCase() === wanted);
}

/**
 * Due-window membership for a given "today" (yyyy-MM-dd).
 * Upcoming covers the `upcomingDays` days after today, today excluded.
 */
export function inDueWindow(
  task: Task,
  window: DueWindow,
  today: string,
  upcomingDays: number = DEFAULT_UPCOMING_DAYS,
): boolean {
  const due = task.dueDate;
  switch (window) {
    case DueWindow.None:
      return due === null;
    case DueWindow.Overdue:
      return due !== null && due < today && !task.done;
    case DueWindow.Today:
      return due === today;
    case DueWindow.Upcoming:
      return due !== null && due > today && due <= shiftDate(today, upcomingDays);
  }
}
