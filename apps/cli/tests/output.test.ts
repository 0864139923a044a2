import { describe, it, expect } from 'vitest';
import { stripVTControlCharacters } from 'node:util';
import type { Task } from '@tasklane/core';
import {
  formatCheckbox,
  formatPriority,
  formatDueDate,
  formatTags,
  formatTask,
  formatPageSummary,
} from '../src/output.js';

const plain = stripVTControlCharacters;
const NOW = new Date('2026-03-10T12:00:00.000Z');

function makeTask(overrides: Partial<Task> = {}): Task {
  return {
    id: 't1',
    title: 'Write report',
    description: null,
    completed: false,
    archived: false,
    priority: 0,
    dueDate: null,
    completionDate: null,
    parentId: null,
    tags: [],
    metadata: null,
    createdAt: '2026-03-01T00:00:00.000Z',
    updatedAt: '2026-03-01T00:00:00.000Z',
    ...overrides,
  };
}

describe('formatCheckbox', () => {
  it('marks completed tasks', () => {
    expect(plain(formatCheckbox(true))).toBe('[x]');
    expect(plain(formatCheckbox(false))).toBe('[ ]');
  });
});

describe('formatPriority', () => {
  it('maps priority bands to gauges', () => {
    expect(plain(formatPriority(99))).toBe('>>>');
    expect(plain(formatPriority(70))).toBe('>>>');
    expect(plain(formatPriority(40))).toBe('>> ');
    expect(plain(formatPriority(1))).toBe('>  ');
    expect(plain(formatPriority(0))).toBe('·  ');
  });
});

describe('formatDueDate', () => {
  it('is empty without a due date', () => {
    expect(formatDueDate(null, false, NOW)).toBe('');
  });

  it('counts overdue days', () => {
    expect(plain(formatDueDate('2026-03-07T09:00:00Z', false, NOW))).toBe('  OVERDUE (3d)');
    expect(plain(formatDueDate('2026-03-10T08:00:00Z', false, NOW))).toBe('  OVERDUE');
  });

  it('names today and tomorrow', () => {
    expect(plain(formatDueDate('2026-03-10T18:00:00Z', false, NOW))).toBe('  Due: Today');
    expect(plain(formatDueDate('2026-03-11T18:00:00Z', false, NOW))).toBe('  Due: Tomorrow');
  });

  it('shows month and day otherwise', () => {
    expect(plain(formatDueDate('2026-04-02T00:00:00Z', false, NOW))).toBe('  Due: Apr 2');
    expect(plain(formatDueDate('2026-03-01T00:00:00Z', true, NOW))).toBe('  Due: Mar 1');
  });

  it('shows unparseable dates verbatim', () => {
    expect(plain(formatDueDate('next week', false, NOW))).toBe('  Due: next week');
  });
});

describe('formatTags', () => {
  it('prefixes each tag with #', () => {
    expect(formatTags([])).toBe('');
    expect(plain(formatTags(['work', 'home']))).toBe('  #work #home');
  });
});

describe('formatTask', () => {
  it('renders one line', () => {
    const task = makeTask({ priority: 50, tags: ['work'], dueDate: '2026-03-11T10:00:00Z', parentId: 'p1' });
    expect(plain(formatTask(task, NOW))).toBe('(t1) >>  [ ] Write report  Due: Tomorrow  #work  ↑ p1');
  });
});

describe('formatPageSummary', () => {
  it('describes the visible window', () => {
    expect(formatPageSummary({ data: [makeTask(), makeTask({ id: 't2' })], total: 7, limit: 2, offset: 4 }))
      .toBe('Showing 5-6 of 7');
    expect(formatPageSummary({ data: [], total: 0, limit: 100, offset: 0 })).toBe('No tasks found');
    expect(formatPageSummary({ data: [], total: 3, limit: 100, offset: 10 })).toBe('No tasks past offset 10 (3 total)');
  });
});
