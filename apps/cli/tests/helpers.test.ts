import { describe, it, expect, vi, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { InvalidArgumentError } from 'commander';
import { ImportConflictError, TaskNotFoundError, ValidationError } from '@tasklane/core';
import {
  resolveDbPath,
  parseIntArg,
  collect,
  parseConflictPolicy,
  describeError,
  $try,
  $tryAsync,
} from '../src/helpers.js';

afterEach(() => {
  process.exitCode = undefined;
  vi.restoreAllMocks();
});

describe('resolveDbPath', () => {
  it('prefers --db', () => {
    expect(resolveDbPath({ db: 'flag.db' }, { TASKLANE_DB: 'env.db' })).toBe('flag.db');
  });

  it('falls back to TASKLANE_DB', () => {
    expect(resolveDbPath({}, { TASKLANE_DB: 'env.db' })).toBe('env.db');
  });

  it('reads the config file last', () => {
    const dir = mkdtempSync(join(tmpdir(), 'tasklane-cli-'));
    try {
      const config = join(dir, 'tasks.yaml');
      writeFileSync(config, 'database:\n  path: store.db\nauth:\n  tokens: [test-token]\n');
      expect(resolveDbPath({ config }, {})).toBe(join(dir, 'store.db'));
    } finally {
      rmSync(dir, { recursive: true, force: true });
    }
  });
});

describe('parseIntArg', () => {
  it('parses non-negative integers', () => {
    expect(parseIntArg('0')).toBe(0);
    expect(parseIntArg('25')).toBe(25);
  });

  it('rejects anything else', () => {
    expect(() => parseIntArg('-1')).toThrow(InvalidArgumentError);
    expect(() => parseIntArg('2.5')).toThrow(InvalidArgumentError);
    expect(() => parseIntArg('ten')).toThrow(InvalidArgumentError);
  });
});

describe('collect', () => {
  it('accumulates repeated values', () => {
    expect(collect('b', collect('a', []))).toEqual(['a', 'b']);
  });
});

describe('parseConflictPolicy', () => {
  it('accepts the three policies, case-insensitively', () => {
    expect(parseConflictPolicy('fail')).toBe('fail');
    expect(parseConflictPolicy('SKIP')).toBe('skip');
    expect(parseConflictPolicy('upsert')).toBe('upsert');
  });

  it('rejects other values', () => {
    expect(() => parseConflictPolicy('merge')).toThrow('Expected one of: fail, skip, upsert.');
  });
});

describe('describeError', () => {
  it('lists field errors under a validation error', () => {
    const err = new ValidationError('Invalid import payload', [{ field: '0.title', message: 'Title cannot be empty' }]);
    expect(describeError(err)).toEqual(['Invalid import payload', '  0.title: Title cannot be empty']);
  });

  it('lists conflicting ids', () => {
    expect(describeError(new ImportConflictError(['a', 'b']))).toEqual([
      'One or more task IDs already exist',
      '  Conflicting ids: a, b',
    ]);
  });

  it('uses the message of other errors', () => {
    expect(describeError(new TaskNotFoundError('x'))).toEqual(['Task x not found']);
    expect(describeError(new Error('boom'))).toEqual(['boom']);
    expect(describeError('plain')).toEqual(['plain']);
  });
});

describe('$try', () => {
  it('calls the wrapped function', () => {
    const fn = vi.fn();
    $try(fn);
    expect(fn).toHaveBeenCalledOnce();
    expect(process.exitCode).toBeUndefined();
  });

  it('catches errors, prints them and sets the exit code', () => {
    const consoleSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
    $try(() => {
      throw new Error('test error');
    });
    expect(consoleSpy).toHaveBeenCalledOnce();
    expect(process.exitCode).toBe(1);
  });
});

describe('$tryAsync', () => {
  it('catches rejected promises', async () => {
    const consoleSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
    await $tryAsync(async () => {
      throw new TaskNotFoundError('x');
    });
    expect(consoleSpy).toHaveBeenCalledOnce();
    expect(process.exitCode).toBe(1);
  });
});
