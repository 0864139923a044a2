import { describe, it, expect } from 'vitest';
import { fromWire, fromWireList, toWireFieldErrors, snakeToCamel, camelToSnake } from '../src/wire.js';
import { parseBearer } from '../src/auth.js';

describe('key renaming', () => {
  it('converts between snake_case and camelCase', () => {
    expect(snakeToCamel('completion_date')).toBe('completionDate');
    expect(snakeToCamel('title')).toBe('title');
    expect(camelToSnake('parentId')).toBe('parent_id');
    expect(camelToSnake('If-Match')).toBe('If-Match');
  });

  it('renames top-level keys only', () => {
    expect(fromWire({ due_date: 'x', metadata: { nested_key: 1 } })).toEqual({
      dueDate: 'x',
      metadata: { nested_key: 1 },
    });
  });

  it('passes non-objects through', () => {
    expect(fromWire('text')).toBe('text');
    expect(fromWire(null)).toBeNull();
    expect(fromWireList({ parent_id: 'a' })).toEqual({ parent_id: 'a' });
    expect(fromWireList([{ parent_id: 'a' }])).toEqual([{ parentId: 'a' }]);
  });

  it('maps field error paths back to wire names', () => {
    expect(toWireFieldErrors([
      { field: '2.parentId', message: 'm1' },
      { field: '(root)', message: 'm2' },
      { field: 'tags.0', message: 'm3' },
    ])).toEqual([
      { field: '2.parent_id', message: 'm1' },
      { field: '(root)', message: 'm2' },
      { field: 'tags.0', message: 'm3' },
    ]);
  });
});

describe('parseBearer', () => {
  it('reads the credential of a bearer header', () => {
    expect(parseBearer('Bearer test-token')).toBe('test-token');
    expect(parseBearer('bearer   test-token ')).toBe('test-token');
  });

  it('returns null for anything else', () => {
    expect(parseBearer(undefined)).toBeNull();
    expect(parseBearer('Basic abc')).toBeNull();
    expect(parseBearer('Bearer')).toBeNull();
  });
});
