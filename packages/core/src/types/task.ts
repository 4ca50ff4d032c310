import type { Priority } from './priority.js';

export type TaskId = number;

export interface Task {
  readonly id: TaskId;
  readonly title: string;
  readonly done: boolean;
  /** Insertion order, no duplicates */
  readonly tags: readonly string[];
  readonly priority: Priority;
  readonly dueDate: string | null; // yyyy-MM-dd
  readonly note: string | null;
  readonly createdAt: string; // ISO string
  readonly completedAt: string | null; // ISO string
}

export interface ArchivedTask extends Task {
  /** Null for records archived before the field existed */
  readonly archivedAt: string | null;
}

/** The active collection, kept in ascending id order */
export type TaskCollection = readonly Task[];
