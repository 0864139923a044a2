/**
 * Task record store: the only place that writes the tasks table.
 * Every mutation runs in one transaction; a thrown error leaves the
 * table as it was.
 */

import { eq, inArray } from 'drizzle-orm';
import type { TaskDb } from '../db.js';
import { getRawDb, inTransaction } from '../db.js';
import type { Task, TaskId } from '../types/task.js';
import { tasks } from '../schema/tasks.js';
import { TaskNotFoundError } from '../errors.js';
import { validateParent, assertParentCheck } from '../hierarchy/hierarchy-validator.js';
import { checkPreconditions } from '../concurrency/preconditions.js';
import type { Preconditions } from '../concurrency/preconditions.js';
import { parseOrThrow, taskInputSchema, taskPatchSchema } from '../validation/task-schemas.js';
import type { TaskInput, TaskChanges } from '../validation/task-schemas.js';
import {
  generateId, timestamp, normalizeMetadata,
  serializeTags, deserializeTags, serializeMetadata, deserializeMetadata,
} from './task-helpers.js';

// SQLite's bound-parameter limit is far above this; keeps IN lists short
const ID_CHUNK_SIZE = 500;

// ---------------------------------------------------------------------------
// Row mappers
// ---------------------------------------------------------------------------

/** Map a Drizzle row to a Task object (tags and metadata need deserialization) */
export function toTask(row: typeof tasks.$inferSelect): Task {
  return {
    ...row,
    tags: deserializeTags(row.tags),
    metadata: deserializeMetadata(row.metadata),
  };
}

function toRow(task: Task): typeof tasks.$inferInsert {
  return {
    ...task,
    tags: serializeTags(task.tags),
    metadata: serializeMetadata(task.metadata),
  };
}

// ---------------------------------------------------------------------------
// Read queries
// ---------------------------------------------------------------------------

/** Get a single task by ID */
export function getTaskById(db: TaskDb, taskId: TaskId): Task | null {
  const row = db.select().from(tasks).where(eq(tasks.id, taskId)).get();
  return row ? toTask(row) : null;
}

/** Get a single task by ID, throwing TaskNotFoundError when absent */
export function requireTask(db: TaskDb, taskId: TaskId): Task {
  const task = getTaskById(db, taskId);
  if (!task) throw new TaskNotFoundError(taskId);
  return task;
}

function taskExists(db: TaskDb, taskId: TaskId): boolean {
  return db.select({ id: tasks.id }).from(tasks).where(eq(tasks.id, taskId)).get() !== undefined;
}

/** The subset of `taskIds` already present in the store, in input order */
export function findExistingIds(db: TaskDb, taskIds: readonly TaskId[]): TaskId[] {
  const found = new Set<TaskId>();
  for (let i = 0; i < taskIds.length; i += ID_CHUNK_SIZE) {
    const chunk = taskIds.slice(i, i + ID_CHUNK_SIZE);
    const rows = db.select({ id: tasks.id }).from(tasks).where(inArray(tasks.id, chunk)).all();
    for (const row of rows) found.add(row.id);
  }
  return taskIds.filter(id => found.has(id));
}

/** All transitive descendants of a task (children first, then their children) */
export function getAllDescendantIds(db: TaskDb, parentId: TaskId): TaskId[] {
  // Raw SQL: drizzle has no WITH RECURSIVE builder
  // UNION (not UNION ALL) so a parent cycle terminates.
  const rows = getRawDb(db).prepare<[TaskId, TaskId], { id: TaskId }>(`
    WITH RECURSIVE descendants(id) AS (
      SELECT id FROM tasks WHERE parent_id = ?
      UNION
      SELECT t.id FROM tasks t JOIN descendants d ON t.parent_id = d.id
    )
    SELECT id FROM descendants WHERE id != ?
  `).all(parentId, parentId);
  return rows.map(r => r.id);
}

// ---------------------------------------------------------------------------
// Row writes (no validation; callers run inside a transaction)
// ---------------------------------------------------------------------------

export function insertTask(db: TaskDb, task: Task): void {
  db.insert(tasks).values(toRow(task)).run();
}

/**
 * Overwrite every column of an existing row. An UPDATE, not INSERT OR
 * REPLACE: REPLACE deletes the row first, which cascades to its children.
 */
export function replaceTask(db: TaskDb, task: Task): void {
  const { id, ...columns } = toRow(task);
  db.update(tasks).set(columns).where(eq(tasks.id, id)).run();
}

// ---------------------------------------------------------------------------
// Store operations
// ---------------------------------------------------------------------------

function assertParentExists(db: TaskDb, parentId: TaskId | null, selfId: TaskId): void {
  assertParentCheck(validateParent(parentId, selfId, id => taskExists(db, id)));
}

/**
 * Create a task. Assigns the id and both timestamps, applies defaults and
 * sets `completionDate` when created already completed.
 */
export function createTask(db: TaskDb, input: TaskInput, now?: Date): Task {
  const fields = parseOrThrow(taskInputSchema, input);
  const stamp = timestamp(now);
  const completed = fields.completed ?? false;

  const task: Task = {
    id: generateId(),
    title: fields.title,
    description: fields.description ?? null,
    completed,
    archived: fields.archived ?? false,
    priority: fields.priority ?? 0,
    dueDate: fields.dueDate ?? null,
    completionDate: completed ? stamp : null,
    parentId: fields.parentId ?? null,
    tags: fields.tags ?? [],
    metadata: normalizeMetadata(fields.metadata),
    createdAt: stamp,
    updatedAt: stamp,
  };

  return inTransaction(db, () => {
    assertParentExists(db, task.parentId, task.id);
    insertTask(db, task);
    return requireTask(db, task.id);
  });
}

/** `value` unless it is absent */
function keep<T>(value: T | undefined, current: T): T {
  return value === undefined ? current : value;
}

/** Apply a parsed patch. `completionDate` only moves on a change of `completed` */
export function applyChanges(task: Task, changes: TaskChanges, stamp: string): Task {
  const completed = keep(changes.completed, task.completed);
  let completionDate = task.completionDate;
  if (completed !== task.completed) {
    completionDate = completed ? stamp : null;
  }

  return {
    ...task,
    title: keep(changes.title, task.title),
    description: keep(changes.description, task.description),
    completed,
    archived: keep(changes.archived, task.archived),
    priority: keep(changes.priority, task.priority),
    dueDate: keep(changes.dueDate, task.dueDate),
    completionDate,
    parentId: keep(changes.parentId, task.parentId),
    tags: changes.tags === undefined ? task.tags : changes.tags ?? [],
    metadata: changes.metadata === undefined ? task.metadata : normalizeMetadata(changes.metadata),
    updatedAt: stamp,
  };
}

export interface UpdateOptions {
  readonly preconditions?: Preconditions;
  readonly now?: Date;
}

/**
 * Partially update a task: only the keys present in `patch` change.
 * `patch` is the raw patch body; it is parsed as a `TaskPatch` only after
 * the existence and precondition checks. Checks run in order (existence,
 * preconditions, fields, parent) and the first failure aborts the update.
 */
export function updateTask(db: TaskDb, taskId: TaskId, patch: unknown, options: UpdateOptions = {}): Task {
  return inTransaction(db, () => {
    const current = requireTask(db, taskId);
    if (options.preconditions) {
      checkPreconditions(current, options.preconditions);
    }

    const changes = parseOrThrow(taskPatchSchema, patch);
    const next = applyChanges(current, changes, timestamp(options.now));
    if (changes.parentId !== undefined) {
      assertParentExists(db, next.parentId, taskId);
    }

    replaceTask(db, next);
    return requireTask(db, taskId);
  });
}

export interface DeleteResult {
  readonly taskId: TaskId;
  /** Descendants removed by the cascade */
  readonly descendantCount: number;
}

/** Delete a task and, through the foreign-key cascade, all its descendants */
export function deleteTask(db: TaskDb, taskId: TaskId): DeleteResult {
  return inTransaction(db, () => {
    requireTask(db, taskId);
    const descendantIds = getAllDescendantIds(db, taskId);
    db.delete(tasks).where(eq(tasks.id, taskId)).run();
    return { taskId, descendantCount: descendantIds.length };
  });
}
