/**
 * Flat tabular export of tasks as JSON or CSV.
 */

import { ValidationError } from '../errors.js';
import type { Priority } from '../types/priority.js';
import type { Task } from '../types/task.js';

export const EXPORT_COLUMNS = [
  'id', 'title', 'done', 'tags', 'priority',
  'due_date', 'note', 'created_at', 'completed_at',
] as const;

export type ExportColumn = (typeof EXPORT_COLUMNS)[number];

export interface ExportRow {
  id: number;
  title: string;
  done: boolean;
  tags: string;
  priority: Priority;
  due_date: string | null;
  note: string | null;
  created_at: string;
  completed_at: string | null;
}

export const ExportFormat = {
  Json: 'json',
  Csv: 'csv',
} as const;

export type ExportFormat = (typeof ExportFormat)[keyof typeof ExportFormat];

export interface ExportOptions {
  /** Joins the tag list into one cell. Defaults to ','. */
  tagDelimiter?: string;
}

export const DEFAULT_TAG_DELIMITER = ',';

export function parseExportFormat(value: string): ExportFormat {
  switch (value.trim().toLowerCase()) {
    case 'json': return ExportFormat.Json;
    case 'csv': return ExportFormat.Csv;
    default:
      throw new ValidationError(`Unsupported export format '${value}'. Use: json, csv`, 'format');
  }
}

export function toExportRow(task: Task, tagDelimiter: string = DEFAULT_TAG_DELIMITER): ExportRow {
  return {
    id: task.id,
    title: task.title,
    done: task.done,
    tags: task.tags.join(tagDelimiter),
    priority: task.priority,
    due_date: task.dueDate,
    note: task.note,
    created_at: task.createdAt,
    completed_at: task.completedAt,
  };
}

export function formatJson(tasks: readonly Task[], opts: ExportOptions = {}): string {
  const rows = tasks.map(t => toExportRow(t, opts.tagDelimiter));
  return JSON.stringify(rows, null, 2) + '\n';
}

const CSV_NEEDS_QUOTES = /[",\r\n]/;

function csvCell(value: string | number | boolean | null): string {
  if (value === null) return '';
  const text = String(value);
  return CSV_NEEDS_QUOTES.test(text) ? `"${text.replace(/"/g, '""')}"` : text;
}

/** RFC 4180 quoting, \n line endings, header row first */
export function formatCsv(tasks: readonly Task[], opts: ExportOptions = {}): string {
  const lines = [EXPORT_COLUMNS.join(',')];
  for (const task of tasks) {
    const row = toExportRow(task, opts.tagDelimiter);
    lines.push(EXPORT_COLUMNS.map(col => csvCell(row[col])).join(','));
  }
  return lines.join('\n') + '\n';
}

export function exportTasks(tasks: readonly Task[], format: ExportFormat, opts: ExportOptions = {}): string {
  switch (format) {
    case ExportFormat.Json: return formatJson(tasks, opts);
    case ExportFormat.Csv: return formatCsv(tasks, opts);
  }
}

/** tasks_YYYYMMDD_HHMMSS.<format>, local time */
export function defaultExportFileName(format: ExportFormat, now: Date = new Date()): string {
  const pad = (n: number) => String(n).padStart(2, '0');
  const date = `${now.getFullYear()}${pad(now.getMonth() + 1)}${pad(now.getDate())}`;
  const time = `${pad(now.getHours())}${pad(now.getMinutes())}${pad(now.getSeconds())}`;
  return `tasks_${date}_${time}.${format}`;
}
