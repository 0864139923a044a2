/**
 * Bulk import: duplicate detection, conflict policy, parent validation
 * against the store plus the batch, and parent-before-child ordering.
 *
 * `planImport` is pure; `importTasks` reads the store, plans, and writes
 * the plan in one transaction.
 */

import type { TaskDb } from '../db.js';
import { getRawDb, inTransaction } from '../db.js';
import type { Task, TaskId } from '../types/task.js';
import type { ConflictPolicy, ImportResult } from '../types/import.js';
import type { FieldError } from '../errors.js';
import { ImportConflictError, ValidationError } from '../errors.js';
import { validateParent, parentFieldError } from '../hierarchy/hierarchy-validator.js';
import { parseOrThrow, importBatchSchema, importOptionsSchema } from '../validation/task-schemas.js';
import type { ImportRecord, ImportRecordInput, ImportOptions } from '../validation/task-schemas.js';
import { findExistingIds, insertTask, replaceTask } from '../queries/task-queries.js';
import { normalizeMetadata } from '../queries/task-helpers.js';

export interface ImportStep {
  /** `replace` overwrites a pre-existing row (upsert); `insert` adds a new one */
  readonly kind: 'insert' | 'replace';
  readonly record: ImportRecord;
}

export interface ImportPlan {
  /** Steps in write order: every in-batch parent precedes its children */
  readonly steps: readonly ImportStep[];
  /** Batch ids already in the store */
  readonly existingIds: readonly TaskId[];
  /** Records left out under the `skip` policy */
  readonly skippedIds: readonly TaskId[];
}

interface Parented {
  readonly id: TaskId;
  readonly parentId?: TaskId | null;
}

// ---------------------------------------------------------------------------
// Planning
// ---------------------------------------------------------------------------

/** Ids occurring more than once, each reported once, in first-seen order */
export function findDuplicateIds(records: readonly Parented[]): TaskId[] {
  const seen = new Set<TaskId>();
  const duplicates = new Set<TaskId>();
  for (const { id } of records) {
    if (seen.has(id)) duplicates.add(id);
    seen.add(id);
  }
  return [...duplicates];
}

/**
 * Reorder so that a record whose parent is also in the batch comes after
 * that parent. Records keep their relative order otherwise; a record whose
 * parent is outside the batch is not moved. A parent cycle inside the batch
 * is cut where it closes.
 */
export function orderParentsFirst<T extends Parented>(records: readonly T[]): T[] {
  const byId = new Map(records.map(record => [record.id, record]));
  const placed = new Set<TaskId>();
  const ordered: T[] = [];

  for (const record of records) {
    // Walk up to the first ancestor that is placed, outside the batch, or already on this chain
    const chain: T[] = [];
    const onChain = new Set<TaskId>();
    let cursor: T | undefined = record;
    while (cursor && !placed.has(cursor.id) && !onChain.has(cursor.id)) {
      chain.push(cursor);
      onChain.add(cursor.id);
      cursor = cursor.parentId ? byId.get(cursor.parentId) : undefined;
    }
    for (const item of chain.reverse()) {
      placed.add(item.id);
      ordered.push(item);
    }
  }

  return ordered;
}

export function planImport(
  records: readonly ImportRecord[],
  storedIds: ReadonlySet<TaskId>,
  policy: ConflictPolicy,
): ImportPlan {
  const duplicates = findDuplicateIds(records);
  if (duplicates.length > 0) {
    throw new ValidationError(
      'Duplicate IDs in import payload',
      duplicates.map(id => ({ field: 'id', message: `Duplicate id ${id}` })),
    );
  }

  const existingIds = records.map(r => r.id).filter(id => storedIds.has(id));
  if (existingIds.length > 0 && policy === 'fail') {
    throw new ImportConflictError(existingIds);
  }

  const isSkipped = (record: ImportRecord) => policy === 'skip' && storedIds.has(record.id);
  const candidates = records.filter(r => !isSkipped(r));
  const skippedIds = policy === 'skip' ? existingIds : [];

  // Parents may be in the store or anywhere in the batch (skipped records are in the store)
  const batchIds = new Set(records.map(r => r.id));
  const known = (id: TaskId) => batchIds.has(id) || storedIds.has(id);
  const fieldErrors: FieldError[] = [];
  records.forEach((record, index) => {
    if (isSkipped(record)) return;
    const error = parentFieldError(validateParent(record.parentId, record.id, known), `${index}.parentId`);
    if (error) fieldErrors.push(error);
  });
  if (fieldErrors.length > 0) {
    throw new ValidationError('Invalid parent reference in import payload', fieldErrors);
  }

  const steps = orderParentsFirst(candidates).map((record): ImportStep => ({
    kind: storedIds.has(record.id) ? 'replace' : 'insert',
    record,
  }));

  return { steps, existingIds, skippedIds };
}

// ---------------------------------------------------------------------------
// Execution
// ---------------------------------------------------------------------------

/** Imported records keep their id, timestamps and completion date verbatim */
export function fromImportRecord(record: ImportRecord): Task {
  return {
    id: record.id,
    title: record.title,
    description: record.description ?? null,
    completed: record.completed,
    archived: record.archived,
    priority: record.priority,
    dueDate: record.dueDate ?? null,
    completionDate: record.completionDate ?? null,
    parentId: record.parentId ?? null,
    tags: record.tags ?? [],
    metadata: normalizeMetadata(record.metadata),
    createdAt: record.createdAt,
    updatedAt: record.updatedAt,
  };
}

/**
 * Import a batch atomically. With `validateOnly`, runs every check and
 * reports the count that would be written without writing anything.
 */
export function importTasks(
  db: TaskDb,
  payload: readonly ImportRecordInput[],
  options: ImportOptions = {},
): ImportResult {
  const records = parseOrThrow(importBatchSchema, payload, 'Invalid import payload');
  const { onConflict, validateOnly } = parseOrThrow(importOptionsSchema, options, 'Invalid import options');

  return inTransaction(db, () => {
    const storedIds = new Set(findExistingIds(db, records.map(r => r.id)));
    const plan = planImport(records, storedIds, onConflict);
    if (validateOnly) {
      return { importedCount: plan.steps.length, validateOnly: true };
    }

    // Parent references are checked at commit, once the whole batch is written
    getRawDb(db).pragma('defer_foreign_keys = ON');
    for (const step of plan.steps) {
      const task = fromImportRecord(step.record);
      if (step.kind === 'replace') {
        replaceTask(db, task);
      } else {
        insertTask(db, task);
      }
    }

    return { importedCount: plan.steps.length, validateOnly: false };
  });
}
