/**
 * CLI helpers: database resolution, argument parsing, error handling.
 */

import { InvalidArgumentError } from 'commander';
import { createDb, getRawDb, isTaskError, CONFLICT_POLICIES, ImportConflictError, ValidationError } from '@tasklane/core';
import type { TaskDb, ConflictPolicy } from '@tasklane/core';
import { loadConfig } from '@tasklane/server';
import * as out from './output.js';

export interface GlobalOptions {
  config?: string;
  db?: string;
}

/**
 * Resolve the database path.
 * Priority: --db > TASKLANE_DB > the config file's database.path.
 */
export function resolveDbPath(globals: GlobalOptions, env: NodeJS.ProcessEnv = process.env): string {
  if (globals.db) return globals.db;
  if (env.TASKLANE_DB) return env.TASKLANE_DB;
  return loadConfig({ configPath: globals.config, env }).config.database.path;
}

/** Open the database for the length of `fn` */
export function withDb<T>(globals: GlobalOptions, fn: (db: TaskDb) => T): T {
  const db = createDb(resolveDbPath(globals));
  try {
    return fn(db);
  } finally {
    getRawDb(db).close();
  }
}

/** commander argument parser for non-negative integers */
export function parseIntArg(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw new InvalidArgumentError('Expected a non-negative integer.');
  }
  return parsed;
}

/** commander accumulator for repeatable options */
export function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

export function parseConflictPolicy(value: string): ConflictPolicy {
  const policy = CONFLICT_POLICIES.find(p => p === value.toLowerCase());
  if (!policy) {
    throw new InvalidArgumentError(`Expected one of: ${CONFLICT_POLICIES.join(', ')}.`);
  }
  return policy;
}

/** Message lines for an error: domain errors add their field errors or conflicting ids */
export function describeError(err: unknown): string[] {
  if (!isTaskError(err)) {
    return [err instanceof Error ? err.message : String(err)];
  }
  const lines = [err.message];
  if (err instanceof ValidationError) {
    for (const { field, message } of err.fieldErrors) lines.push(`  ${field}: ${message}`);
  }
  if (err instanceof ImportConflictError) {
    lines.push(`  Conflicting ids: ${err.conflictingIds.join(', ')}`);
  }
  return lines;
}

function reportError(err: unknown): void {
  for (const line of describeError(err)) out.error(line);
  process.exitCode = 1;
}

/**
 * Run a command action, printing any error in red and setting exit code 1.
 */
export function $try(fn: () => void): void {
  try {
    fn();
  } catch (err: unknown) {
    reportError(err);
  }
}

export async function $tryAsync(fn: () => Promise<void>): Promise<void> {
  try {
    await fn();
  } catch (err: unknown) {
    reportError(err);
  }
}
