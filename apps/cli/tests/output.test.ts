import { describe, it, expect, beforeEach } from 'vitest';
import chalk from 'chalk';
import type { Task } from '@tinytask/core';
import {
  formatCheckbox, formatDueDate, formatPriority, formatTags,
  formatTaskLine, formatTimestamp, truncate,
} from '../src/output.js';

// Sunday, 1 March 2026
const now = new Date(2026, 2, 1, 9, 30);

beforeEach(() => {
  chalk.level = 0;
});

describe('formatCheckbox', () => {
  it('marks done tasks', () => {
    expect(formatCheckbox(true)).toBe('[x]');
    expect(formatCheckbox(false)).toBe('[ ]');
  });
});

describe('formatPriority', () => {
  it('uses a fixed-width marker', () => {
    expect(formatPriority('high')).toBe('>>>');
    expect(formatPriority('medium')).toBe('>> ');
    expect(formatPriority('low')).toBe('>  ');
  });
});

describe('formatDueDate', () => {
  it('is empty without a due date', () => {
    expect(formatDueDate(null, false, null, now)).toBe('');
  });

  it('labels pending tasks relative to today', () => {
    expect(formatDueDate('2026-02-27', false, null, now)).toBe('  OVERDUE (2d)');
    expect(formatDueDate('2026-03-01', false, null, now)).toBe('  Due: Today');
    expect(formatDueDate('2026-03-02', false, null, now)).toBe('  Due: Tomorrow');
    expect(formatDueDate('2026-03-04', false, null, now)).toBe('  Due: Wednesday');
    expect(formatDueDate('2026-03-20', false, null, now)).toBe('  Due: Mar 20');
  });

  it('labels done tasks by when they were completed', () => {
    const completedAt = new Date(2026, 2, 1, 18, 0).toISOString();
    expect(formatDueDate('2026-02-27', true, completedAt, now)).toBe('  Completed 2d late');
    expect(formatDueDate('2026-03-05', true, completedAt, now)).toBe('  Due: Mar 5');
  });
});

describe('formatTags', () => {
  it('prefixes each tag with #', () => {
    expect(formatTags(['home', 'errands'])).toBe('  #home #errands');
    expect(formatTags([])).toBe('');
  });
});

describe('formatTimestamp', () => {
  it('shows date and minutes', () => {
    expect(formatTimestamp('2026-03-01T09:30:12.000Z')).toBe('2026-03-01 09:30');
  });
});

describe('formatTaskLine', () => {
  it('puts id, priority, checkbox, title, due date and tags on one line', () => {
    const task: Task = {
      id: 3,
      title: 'Call plumber',
      done: false,
      tags: ['home'],
      priority: 'high',
      dueDate: '2026-03-01',
      note: null,
      createdAt: '2026-02-28T10:00:00.000Z',
      completedAt: null,
    };
    expect(formatTaskLine(task, now)).toBe('(3) >>> [ ] Call plumber  Due: Today  #home');
  });
});

describe('truncate', () => {
  it('shortens long text with an ellipsis', () => {
    expect(truncate('abcdef', 4)).toBe('abc…');
    expect(truncate('abc', 4)).toBe('abc');
  });
});
