/**
 * chalk-based output formatting.
 */

import chalk from 'chalk';
import { Priority, PriorityName } from '@tinytask/core';
import type { Task, StatsSummary } from '@tinytask/core';

// --- Tag colors (deterministic from tag name) ---

const TAG_COLORS = [
  chalk.cyan, chalk.magenta, chalk.blue, chalk.yellow,
  chalk.green, chalk.red, chalk.white, chalk.gray,
];

function tagColor(tag: string): (s: string) => string {
  let hash = 0;
  for (let i = 0; i < tag.length; i++) {
    hash = ((hash << 5) - hash + tag.charCodeAt(i)) | 0;
  }
  return TAG_COLORS[Math.abs(hash) % TAG_COLORS.length] ?? chalk.white;
}

// --- Formatting functions ---

export function formatCheckbox(done: boolean): string {
  return done ? chalk.green('[x]') : chalk.gray('[ ]');
}

export function formatPriority(priority: Priority): string {
  switch (priority) {
    case Priority.High: return chalk.red.bold('>>>');
    case Priority.Medium: return chalk.yellow('>> ');
    case Priority.Low: return chalk.blue('>  ');
  }
}

function toLocalDay(isoDate: string): Date {
  const [y, m, d] = isoDate.split('-').map(Number);
  return new Date(y ?? 0, (m ?? 1) - 1, d ?? 1);
}

function formatMonthDay(d: Date): string {
  return d.toLocaleDateString('en-US', { month: 'short', day: 'numeric' });
}

export function formatDueDate(
  dueDate: string | null,
  done = false,
  completedAt: string | null = null,
  now: Date = new Date(),
): string {
  if (!dueDate) return '';
  const dueD = toLocalDay(dueDate);

  // Done tasks keep the label they had at completion time
  if (done && completedAt) {
    const completed = new Date(completedAt);
    const compD = new Date(completed.getFullYear(), completed.getMonth(), completed.getDate());
    const lateDays = Math.round((compD.getTime() - dueD.getTime()) / 86400000);
    return lateDays > 0
      ? chalk.dim(`  Completed ${lateDays}d late`)
      : chalk.dim(`  Due: ${formatMonthDay(dueD)}`);
  }

  const todayD = new Date(now.getFullYear(), now.getMonth(), now.getDate());
  const diff = Math.round((dueD.getTime() - todayD.getTime()) / 86400000);

  if (diff < 0) return chalk.red(`  OVERDUE (${-diff}d)`);
  if (diff === 0) return chalk.yellow('  Due: Today');
  if (diff === 1) return chalk.dim('  Due: Tomorrow');
  if (diff < 7) return chalk.dim(`  Due: ${dueD.toLocaleDateString('en-US', { weekday: 'long' })}`);
  return chalk.dim(`  Due: ${formatMonthDay(dueD)}`);
}

export function formatTags(tags: readonly string[]): string {
  if (tags.length === 0) return '';
  const formatted = tags.map(t => tagColor(t)(`#${t}`));
  return '  ' + formatted.join(' ');
}

/** "2026-03-01T09:30:00.000Z" -> "2026-03-01 09:30" */
export function formatTimestamp(iso: string): string {
  return iso.replace('T', ' ').slice(0, 16);
}

/** One line per task: (id) priority [ ] title  due  tags */
export function formatTaskLine(task: Task, now: Date = new Date()): string {
  const taskId = chalk.dim(`(${task.id})`);
  const title = task.done ? chalk.dim.strikethrough(task.title) : chalk.bold(task.title);
  const dueDate = formatDueDate(task.dueDate, task.done, task.completedAt, now);
  return `${taskId} ${formatPriority(task.priority)} ${formatCheckbox(task.done)} ${title}${dueDate}${formatTags(task.tags)}`;
}

export function printTasks(tasks: readonly Task[]): void {
  for (const task of tasks) {
    console.log(formatTaskLine(task));
  }
}

export function printTaskDetails(task: Task): void {
  const tags = task.tags.length ? task.tags.map(t => `#${t}`).join(' ') : '-';

  console.log(`${chalk.bold('ID:')}          ${task.id}`);
  console.log(`${chalk.bold('Title:')}       ${task.title}`);
  console.log(`${chalk.bold('Status:')}      ${formatCheckbox(task.done)}`);
  console.log(`${chalk.bold('Priority:')}    ${PriorityName[task.priority]}`);
  console.log(`${chalk.bold('Due:')}         ${task.dueDate ?? '-'}`);
  console.log(`${chalk.bold('Tags:')}        ${tags}`);
  console.log(`${chalk.bold('Created:')}     ${formatTimestamp(task.createdAt)}`);
  if (task.completedAt) {
    console.log(`${chalk.bold('Completed:')}   ${formatTimestamp(task.completedAt)}`);
  }
  if (task.note) {
    console.log(`${chalk.bold('Note:')}`);
    console.log(task.note);
  }
}

export function printStats(stats: StatsSummary): void {
  console.log(chalk.bold.cyan('Task Statistics'));
  console.log(`${chalk.bold('Total:')}     ${stats.total}`);
  console.log(`${chalk.green('Completed:')} ${stats.done} (${stats.completionPercent}%)`);
  console.log(`${chalk.yellow('Pending:')}   ${stats.pending}`);
  console.log();
  console.log(chalk.bold('Pending by priority'));
  console.log(`  ${formatPriority(Priority.High)} High:   ${stats.pendingByPriority.high}`);
  console.log(`  ${formatPriority(Priority.Medium)} Medium: ${stats.pendingByPriority.medium}`);
  console.log(`  ${formatPriority(Priority.Low)} Low:    ${stats.pendingByPriority.low}`);
  console.log();
  console.log(chalk.bold('Due'));
  console.log(`  ${chalk.red('Overdue:')}  ${stats.due.overdue}`);
  console.log(`  ${chalk.yellow('Today:')}    ${stats.due.today}`);
  console.log(`  ${chalk.dim('Upcoming:')} ${stats.due.upcoming}`);
  console.log();
  const tags = stats.tags.length ? stats.tags.map(t => `#${t}`).join(', ') : chalk.dim('none');
  console.log(`${chalk.bold('Tags:')} ${stats.tags.length}  ${tags}`);
}

// --- Basic output ---

export function success(message: string): void {
  console.log(chalk.green(message));
}

export function error(message: string): void {
  console.log(chalk.red(message));
}

export function warning(message: string): void {
  console.log(chalk.yellow(message));
}

export function info(message: string): void {
  console.log(message);
}

// --- Utilities ---

export function truncate(s: string, maxLen: number): string {
  if (s.length <= maxLen) return s;
  return s.slice(0, maxLen - 1) + '…';
}
