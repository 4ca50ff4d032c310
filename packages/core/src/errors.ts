import type { TaskId } from './types/task.js';

export type TaskErrorKind = 'validation' | 'not-found' | 'corrupt-data' | 'io';

/** Base class for every error the core raises */
export abstract class TaskError extends Error {
  abstract readonly kind: TaskErrorKind;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Bad user input: empty title, unknown priority, unparseable date, bad id */
export class ValidationError extends TaskError {
  readonly kind = 'validation';
  readonly field: string | null;

  constructor(message: string, field: string | null = null) {
    super(message);
    this.field = field;
  }
}

export class NotFoundError extends TaskError {
  readonly kind = 'not-found';
  readonly taskId: TaskId;

  constructor(taskId: TaskId) {
    super(`Could not find task with id ${taskId}`);
    this.taskId = taskId;
  }
}

/** A persisted file exists but cannot be read back. The file is left untouched. */
export class CorruptDataError extends TaskError {
  readonly kind = 'corrupt-data';
  readonly filePath: string;

  constructor(filePath: string, detail: string, cause?: unknown) {
    super(`Could not read ${filePath}: ${detail}`, { cause });
    this.filePath = filePath;
  }
}

export class IOError extends TaskError {
  readonly kind = 'io';
  readonly filePath: string;

  constructor(filePath: string, action: string, cause?: unknown) {
    const reason = cause instanceof Error ? `: ${cause.message}` : '';
    super(`Failed to ${action} ${filePath}${reason}`, { cause });
    this.filePath = filePath;
  }
}
