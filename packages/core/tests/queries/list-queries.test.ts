import { describe, it, expect, beforeEach } from 'vitest';
import { createTestDb, type TaskDb } from '../../src/db.js';
import { createTask, updateTask } from '../../src/queries/task-queries.js';
import { listTasks, exportTasks } from '../../src/queries/list-queries.js';
import type { TaskInput } from '../../src/validation/task-schemas.js';
import { ValidationError } from '../../src/errors.js';

let db: TaskDb;
let minute = 0;

/** Create a task one minute after the previous one */
function add(input: TaskInput) {
  minute += 1;
  return createTask(db, input, new Date(Date.UTC(2026, 0, 1, 0, minute)));
}

function titles(query: Parameters<typeof listTasks>[1] = {}, now?: Date): string[] {
  return listTasks(db, query, now).data.map(t => t.title);
}

beforeEach(() => {
  db = createTestDb();
  minute = 0;
});

describe('listTasks defaults', () => {
  it('returns an empty page', () => {
    expect(listTasks(db)).toEqual({ data: [], total: 0, limit: 100, offset: 0 });
  });

  it('lists root tasks newest first', () => {
    add({ title: 'First' });
    add({ title: 'Second' });
    add({ title: 'Third' });
    expect(titles()).toEqual(['Third', 'Second', 'First']);
  });

  it('excludes subtasks unless a parent is given', () => {
    const parent = add({ title: 'Parent' });
    add({ title: 'Child', parentId: parent.id });

    expect(titles()).toEqual(['Parent']);
    expect(titles({ parentId: 'null' })).toEqual(['Parent']);
    expect(titles({ parentId: parent.id })).toEqual(['Child']);
  });
});

describe('listTasks filters', () => {
  it('filters by completed, archived and priority', () => {
    add({ title: 'Open' });
    add({ title: 'Done', completed: true });
    add({ title: 'Archived', archived: true });
    add({ title: 'High', priority: 90 });

    expect(titles({ completed: true })).toEqual(['Done']);
    expect(titles({ completed: 'false' })).toEqual(['High', 'Archived', 'Open']);
    expect(titles({ archived: true })).toEqual(['Archived']);
    expect(titles({ priority: '90' })).toEqual(['High']);
  });

  it('requires every tag, case-insensitively', () => {
    add({ title: 'Work only', tags: ['work'] });
    add({ title: 'Work+Urgent', tags: ['Work', 'Urgent', 'extra'] });
    add({ title: 'Home', tags: ['home'] });

    expect(titles({ tag: 'work' })).toEqual(['Work+Urgent', 'Work only']);
    expect(titles({ tag: ['work', 'urgent'] })).toEqual(['Work+Urgent']);
    expect(titles({ tag: ['  WORK '] })).toEqual(['Work+Urgent', 'Work only']);
  });

  it('folds non-ASCII letters when matching tags', () => {
    add({ title: 'Umlaut', tags: ['Über'] });
    add({ title: 'Accent', tags: ['Éte'] });

    expect(titles({ tag: 'Über' })).toEqual(['Umlaut']);
    expect(titles({ tag: 'über' })).toEqual(['Umlaut']);
    expect(titles({ tag: 'éte' })).toEqual(['Accent']);
  });

  it('does not match tags by substring', () => {
    add({ title: 'Homework', tags: ['homework'] });
    expect(titles({ tag: 'work' })).toEqual([]);
  });

  it('searches title or description', () => {
    add({ title: 'Buy groceries' });
    add({ title: 'Call mom', description: 'About the groceries list' });
    add({ title: 'Walk dog' });

    expect(titles({ search: 'grocer' })).toEqual(['Call mom', 'Buy groceries']);
    expect(titles({ search: 'WALK' })).toEqual(['Walk dog']);
  });

  it('treats LIKE wildcards in the search term literally', () => {
    add({ title: '100% done' });
    add({ title: '1000 things' });
    expect(titles({ search: '100%' })).toEqual(['100% done']);
  });

  it('filters by due date range', () => {
    add({ title: 'Jan', dueDate: '2026-01-15T00:00:00Z' });
    add({ title: 'Feb', dueDate: '2026-02-15T00:00:00Z' });
    add({ title: 'Mar', dueDate: '2026-03-15T00:00:00Z' });
    add({ title: 'None' });

    expect(titles({ dueBefore: '2026-02-01T00:00:00Z' })).toEqual(['Jan']);
    expect(titles({ dueAfter: '2026-02-01T00:00:00Z' })).toEqual(['Mar', 'Feb']);
    expect(titles({ dueAfter: '2026-01-20T00:00:00Z', dueBefore: '2026-03-01T00:00:00Z' })).toEqual(['Feb']);
  });

  it('filters overdue: past due and not completed', () => {
    add({ title: 'Late', dueDate: '2026-01-01T00:00:00Z' });
    add({ title: 'Late but done', dueDate: '2026-01-01T00:00:00Z', completed: true });
    add({ title: 'Future', dueDate: '2026-12-01T00:00:00Z' });
    add({ title: 'No due date' });

    const now = new Date('2026-06-01T00:00:00.000Z');
    expect(titles({ overdue: true }, now)).toEqual(['Late']);
    expect(titles({ overdue: false }, now)).toHaveLength(4);
  });

  it('combines filters conjunctively', () => {
    add({ title: 'Match', tags: ['work'], priority: 5 });
    add({ title: 'Wrong priority', tags: ['work'], priority: 1 });
    add({ title: 'Wrong tag', tags: ['home'], priority: 5 });

    expect(titles({ tag: 'work', priority: 5 })).toEqual(['Match']);
  });
});

describe('listTasks sorting', () => {
  it('sorts by priority in both directions', () => {
    add({ title: 'Low', priority: 1 });
    add({ title: 'High', priority: 90 });
    add({ title: 'Med', priority: 50 });

    expect(titles({ sortBy: 'priority', order: 'desc' })).toEqual(['High', 'Med', 'Low']);
    expect(titles({ sortBy: 'priority', order: 'asc' })).toEqual(['Low', 'Med', 'High']);
  });

  it('puts null due dates last in both directions', () => {
    add({ title: 'No due date' });
    add({ title: 'Due later', dueDate: '2026-03-01T00:00:00Z' });
    add({ title: 'Due soon', dueDate: '2026-02-01T00:00:00Z' });

    expect(titles({ sortBy: 'due_date', order: 'asc' })).toEqual(['Due soon', 'Due later', 'No due date']);
    expect(titles({ sortBy: 'due_date', order: 'desc' })).toEqual(['Due later', 'Due soon', 'No due date']);
  });

  it('sorts by title', () => {
    add({ title: 'banana' });
    add({ title: 'apple' });
    add({ title: 'cherry' });
    expect(titles({ sortBy: 'title', order: 'asc' })).toEqual(['apple', 'banana', 'cherry']);
  });

  it('breaks ties by created_at descending', () => {
    add({ title: 'Older', priority: 5 });
    add({ title: 'Newer', priority: 5 });
    add({ title: 'Top', priority: 9 });

    expect(titles({ sortBy: 'priority', order: 'asc' })).toEqual(['Newer', 'Older', 'Top']);
    expect(titles({ sortBy: 'priority', order: 'desc' })).toEqual(['Top', 'Newer', 'Older']);
  });

  it('sorts by completed and updated_at', () => {
    const a = add({ title: 'A' });
    add({ title: 'B', completed: true });
    add({ title: 'C' });
    updateTask(db, a.id, { priority: 1 }, { now: new Date('2026-05-01T00:00:00.000Z') });

    expect(titles({ sortBy: 'completed', order: 'desc' })).toEqual(['B', 'C', 'A']);
    expect(titles({ sortBy: 'updated_at', order: 'desc' })).toEqual(['A', 'C', 'B']);
  });
});

describe('listTasks pagination', () => {
  beforeEach(() => {
    for (let i = 1; i <= 10; i++) add({ title: `Task ${i}` });
  });

  it('pages through the filtered set and reports the full total', () => {
    const first = listTasks(db, { limit: 5 });
    expect(first.total).toBe(10);
    expect(first.limit).toBe(5);
    expect(first.data.map(t => t.title)).toEqual(['Task 10', 'Task 9', 'Task 8', 'Task 7', 'Task 6']);

    const second = listTasks(db, { limit: '5', offset: '5' });
    expect(second.total).toBe(10);
    expect(second.offset).toBe(5);
    expect(second.data.map(t => t.title)).toEqual(['Task 5', 'Task 4', 'Task 3', 'Task 2', 'Task 1']);
  });

  it('returns an empty page past the end', () => {
    const page = listTasks(db, { offset: 50 });
    expect(page.data).toEqual([]);
    expect(page.total).toBe(10);
  });

  it('rejects out-of-range limits and offsets', () => {
    expect(() => listTasks(db, { limit: 0 })).toThrow(ValidationError);
    expect(() => listTasks(db, { limit: 1001 })).toThrow(ValidationError);
    expect(() => listTasks(db, { offset: -1 })).toThrow(ValidationError);
    expect(listTasks(db, { limit: 1000 }).data).toHaveLength(10);
  });

  it('rejects offsets beyond the safe integer range', () => {
    expect(() => listTasks(db, { offset: 1e20 })).toThrow(ValidationError);
    expect(() => listTasks(db, { offset: '100000000000000000000' })).toThrow(ValidationError);
  });

  it('accepts the largest safe offset', () => {
    expect(listTasks(db, { offset: Number.MAX_SAFE_INTEGER })).toMatchObject({ data: [], total: 10 });
  });
});

describe('exportTasks', () => {
  it('returns an empty list for an empty store', () => {
    expect(exportTasks(db)).toEqual([]);
  });

  it('lists root tasks before subtasks, each oldest first', () => {
    const parent = add({ title: 'Parent' });
    const child = add({ title: 'Child', parentId: parent.id });
    add({ title: 'Late root' });
    add({ title: 'Grandchild', parentId: child.id });

    expect(exportTasks(db).map(t => t.title)).toEqual(['Parent', 'Late root', 'Child', 'Grandchild']);
  });
});
