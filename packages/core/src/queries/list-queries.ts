/**
 * Filtered, sorted and paginated task listings, plus the export ordering.
 */

import { eq, and, asc, desc, gt, lt, isNull, isNotNull, count, sql } from 'drizzle-orm';
import type { SQL } from 'drizzle-orm';
import type { AnySQLiteColumn } from 'drizzle-orm/sqlite-core';
import type { TaskDb } from '../db.js';
import { inTransaction } from '../db.js';
import type { Task } from '../types/task.js';
import type { SortField, SortOrder, TaskPage } from '../types/query.js';
import { tasks } from '../schema/tasks.js';
import { parseOrThrow, taskListQuerySchema } from '../validation/task-schemas.js';
import type { TaskListQuery, ResolvedTaskListQuery } from '../validation/task-schemas.js';
import { toTask } from './task-queries.js';
import { escapeLike, timestamp } from './task-helpers.js';

const SORT_COLUMNS: Record<SortField, AnySQLiteColumn> = {
  created_at: tasks.createdAt,
  updated_at: tasks.updatedAt,
  title: tasks.title,
  priority: tasks.priority,
  due_date: tasks.dueDate,
  completed: tasks.completed,
};

/** Nullable sort keys; their nulls go last in both directions */
const NULLS_LAST = new Set<SortField>(['title', 'due_date']);

// ---------------------------------------------------------------------------
// Query planning
// ---------------------------------------------------------------------------

/** WHERE conditions for a resolved query; always at least the parent condition */
export function buildConditions(query: ResolvedTaskListQuery, now: string): SQL[] {
  const conditions: SQL[] = [];

  if (query.completed !== undefined) {
    conditions.push(eq(tasks.completed, query.completed));
  }
  if (query.archived !== undefined) {
    conditions.push(eq(tasks.archived, query.archived));
  }
  if (query.priority !== undefined) {
    conditions.push(eq(tasks.priority, query.priority));
  }

  // Listings never span depths implicitly: no parent filter means root tasks
  conditions.push(query.parentId === null ? isNull(tasks.parentId) : eq(tasks.parentId, query.parentId));

  // Every tag must be present (case-insensitive)
  for (const tag of query.tag ?? []) {
    const wanted = tag.trim().toLowerCase();
    conditions.push(sql`exists (select 1 from json_each(${tasks.tags}) where casefold(trim(json_each.value)) = ${wanted})`);
  }

  if (query.search !== undefined) {
    const pattern = `%${escapeLike(query.search)}%`;
    conditions.push(sql`(${tasks.title} like ${pattern} escape '\\' or ${tasks.description} like ${pattern} escape '\\')`);
  }

  // ISO-8601 strings compare lexicographically
  if (query.dueBefore !== undefined) {
    conditions.push(lt(tasks.dueDate, query.dueBefore));
  }
  if (query.dueAfter !== undefined) {
    conditions.push(gt(tasks.dueDate, query.dueAfter));
  }

  if (query.overdue) {
    conditions.push(lt(tasks.dueDate, now), eq(tasks.completed, false));
  }

  return conditions;
}

/** ORDER BY terms: the sort key, then `created_at` descending as tie-break */
export function buildOrder(sortBy: SortField, order: SortOrder): SQL[] {
  const column = SORT_COLUMNS[sortBy];
  const primary = NULLS_LAST.has(sortBy)
    ? sql`${column} ${sql.raw(order)} nulls last`
    : order === 'asc' ? asc(column) : desc(column);
  return [primary, desc(tasks.createdAt)];
}

// ---------------------------------------------------------------------------
// Listing
// ---------------------------------------------------------------------------

/** List tasks matching `query`. `total` counts the filtered set before paging */
export function listTasks(db: TaskDb, query: TaskListQuery = {}, now?: Date): TaskPage {
  const resolved = parseOrThrow(taskListQuerySchema, query, 'Invalid list query');
  const where = and(...buildConditions(resolved, timestamp(now)));

  return inTransaction(db, () => {
    const total = db.select({ total: count() }).from(tasks).where(where).get()?.total ?? 0;
    const rows = db.select().from(tasks)
      .where(where)
      .orderBy(...buildOrder(resolved.sortBy, resolved.order))
      .limit(resolved.limit)
      .offset(resolved.offset)
      .all();

    return {
      data: rows.map(toTask),
      total,
      limit: resolved.limit,
      offset: resolved.offset,
    };
  });
}

/**
 * Every task: root tasks first, then all others, each group oldest first.
 * Guarantees a parent precedes its direct children; deeper chains are not
 * topologically ordered (import reorders them anyway).
 */
export function exportTasks(db: TaskDb): Task[] {
  return inTransaction(db, () => {
    const roots = db.select().from(tasks)
      .where(isNull(tasks.parentId))
      .orderBy(asc(tasks.createdAt), asc(tasks.id))
      .all();
    const children = db.select().from(tasks)
      .where(isNotNull(tasks.parentId))
      .orderBy(asc(tasks.createdAt), asc(tasks.id))
      .all();
    return [...roots, ...children].map(toTask);
  });
}
