import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, readFileSync, readdirSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { TaskStore, nextId } from '../../src/store/task-store.js';
import { readJsonDocument, writeFileAtomic } from '../../src/store/json-file.js';
import { TaskDocumentSchema } from '../../src/store/records.js';
import { addTask, archiveDone, setDone } from '../../src/queries/task-queries.js';
import { CorruptDataError, IOError, ValidationError } from '../../src/errors.js';
import type { TaskCollection } from '../../src/types/task.js';

const now = new Date('2026-03-01T09:30:00.000Z');

let dir: string;
let store: TaskStore;

beforeEach(() => {
  dir = mkdtempSync(join(tmpdir(), 'tinytask-store-'));
  store = new TaskStore(dir);
});

afterEach(() => {
  rmSync(dir, { recursive: true, force: true });
});

function sample(): TaskCollection {
  let tasks: TaskCollection = [];
  tasks = addTask(tasks, { title: 'Write report', tags: ['work'], priority: 'high', dueDate: '2026-03-10', note: 'line one\nline two' }, now).tasks;
  tasks = addTask(tasks, { title: 'Buy milk' }, now).tasks;
  return setDone(tasks, 2, true, now);
}

describe('nextId', () => {
  it('returns 1 for an empty collection and max + 1 otherwise', () => {
    expect(nextId([])).toBe(1);
    expect(nextId(sample())).toBe(3);
  });

  it('throws once ids would pass the largest safe integer', () => {
    const tasks = sample().map(t => ({ ...t, id: t.id === 2 ? Number.MAX_SAFE_INTEGER : t.id }));
    expect(() => nextId(tasks)).toThrow(ValidationError);
  });
});

describe('TaskStore.load', () => {
  it('returns an empty collection when the file does not exist', () => {
    expect(store.load()).toEqual([]);
  });

  it('fills defaults for missing optional fields', () => {
    writeFileSync(store.paths.tasks, JSON.stringify([
      { id: 4, title: 'Legacy', done: false, created_at: '2026-01-01T00:00:00.000Z' },
    ]));
    expect(store.load()).toEqual([{
      id: 4,
      title: 'Legacy',
      done: false,
      tags: [],
      priority: 'medium',
      dueDate: null,
      note: null,
      createdAt: '2026-01-01T00:00:00.000Z',
      completedAt: null,
    }]);
  });

  it('raises CorruptDataError for invalid JSON and leaves the file alone', () => {
    writeFileSync(store.paths.tasks, '{not json');
    expect(() => store.load()).toThrow(CorruptDataError);
    expect(readFileSync(store.paths.tasks, 'utf8')).toBe('{not json');
  });

  it('reports the offending field', () => {
    writeFileSync(store.paths.tasks, JSON.stringify([
      { id: 1, title: 'a', done: false, priority: 'urgent', created_at: '2026-01-01T00:00:00.000Z' },
    ]));
    expect(() => store.load()).toThrow(`Could not read ${store.paths.tasks}: [0].priority:`);
  });

  it('rejects a done task without completed_at', () => {
    writeFileSync(store.paths.tasks, JSON.stringify([
      { id: 1, title: 'a', done: true, created_at: '2026-01-01T00:00:00.000Z' },
    ]));
    expect(() => store.load()).toThrow('[0].completed_at: completed_at must be set exactly when done is true');
  });

  it('rejects duplicate ids', () => {
    const record = { id: 1, title: 'a', done: false, created_at: '2026-01-01T00:00:00.000Z' };
    writeFileSync(store.paths.tasks, JSON.stringify([record, { ...record, title: 'b' }]));
    expect(() => store.load()).toThrow('[1].id: Duplicate task id 1');
  });

  it('rejects ids beyond the largest safe integer', () => {
    writeFileSync(store.paths.tasks, JSON.stringify([
      { id: 9007199254740992, title: 'a', done: false, created_at: '2026-01-01T00:00:00.000Z' },
    ]));
    expect(() => store.load()).toThrow(CorruptDataError);
  });

  it('loads a blank note as no note', () => {
    writeFileSync(store.paths.tasks, JSON.stringify([
      { id: 1, title: 'a', done: false, note: '', created_at: '2026-01-01T00:00:00.000Z' },
    ]));
    expect(store.load()[0]?.note).toBeNull();
  });

  it('rejects a document that is not an array', () => {
    writeFileSync(store.paths.tasks, JSON.stringify({ tasks: [] }));
    expect(() => store.load()).toThrow(CorruptDataError);
  });
});

describe('TaskStore.save', () => {
  it('round-trips every field', () => {
    const tasks = sample();
    store.save(tasks);
    expect(store.load()).toEqual(tasks);

    store.save(store.load());
    expect(store.load()).toEqual(tasks);
  });

  it('writes snake_case records with null for absent values', () => {
    store.save(sample());
    const raw: unknown = JSON.parse(readFileSync(store.paths.tasks, 'utf8'));
    expect(raw).toEqual([
      {
        id: 1,
        title: 'Write report',
        done: false,
        tags: ['work'],
        priority: 'high',
        due_date: '2026-03-10',
        note: 'line one\nline two',
        created_at: '2026-03-01T09:30:00.000Z',
        completed_at: null,
      },
      {
        id: 2,
        title: 'Buy milk',
        done: true,
        tags: [],
        priority: 'medium',
        due_date: null,
        note: null,
        created_at: '2026-03-01T09:30:00.000Z',
        completed_at: '2026-03-01T09:30:00.000Z',
      },
    ]);
  });

  it('leaves no temp files behind', () => {
    store.save(sample());
    store.save([]);
    expect(readdirSync(dir)).toEqual(['tasks.json']);
  });

  it('creates the data directory when it is missing', () => {
    const nested = new TaskStore(join(dir, 'a', 'b'));
    nested.save(sample());
    expect(nested.load()).toHaveLength(2);
  });
});

describe('TaskStore archive', () => {
  it('returns an empty archive when the file does not exist', () => {
    expect(store.loadArchive()).toEqual([]);
  });

  it('appends in archive order and keeps timestamps', () => {
    const archivedAt = new Date('2026-03-02T10:00:00.000Z');
    const { archived } = archiveDone(sample(), archivedAt);
    store.appendArchive(archived);
    const merged = store.appendArchive(archived.map(t => ({ ...t, title: 'Buy bread' })));

    expect(merged.map(t => t.title)).toEqual(['Buy milk', 'Buy bread']);
    expect(store.loadArchive()).toEqual(merged);
    expect(merged[0]?.archivedAt).toBe('2026-03-02T10:00:00.000Z');
    expect(merged[0]?.completedAt).toBe('2026-03-01T09:30:00.000Z');
  });

  it('refuses to append to a corrupt archive and leaves it untouched', () => {
    writeFileSync(store.paths.archive, '{bad');
    const { archived } = archiveDone(sample(), now);
    expect(() => store.appendArchive(archived)).toThrow(CorruptDataError);
    expect(() => store.loadArchive()).toThrow(CorruptDataError);
    expect(readFileSync(store.paths.archive, 'utf8')).toBe('{bad');
    expect(readdirSync(dir)).toEqual(['archive.json']);
  });

  it('writes nothing when there is nothing to append', () => {
    expect(store.appendArchive([])).toEqual([]);
    expect(readdirSync(dir)).toEqual([]);
  });
});

describe('readJsonDocument', () => {
  it('returns null for a missing file', () => {
    expect(readJsonDocument(join(dir, 'nope.json'), TaskDocumentSchema)).toBeNull();
  });
});

describe('writeFileAtomic', () => {
  it('wraps failures in IOError and removes the temp file', () => {
    // A directory cannot be replaced by a file
    const target = join(dir, 'occupied');
    writeFileAtomic(join(target, 'inner.txt'), 'x');
    expect(() => writeFileAtomic(target, 'y')).toThrow(IOError);
    expect(readdirSync(dir)).toEqual(['occupied']);
  });
});
