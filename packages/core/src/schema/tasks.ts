import { sqliteTable, text, integer, index } from 'drizzle-orm/sqlite-core';
import type { AnySQLiteColumn } from 'drizzle-orm/sqlite-core';

export const tasks = sqliteTable('tasks', {
  id: text('id').primaryKey(),
  title: text('title').notNull(),
  description: text('description'),
  completed: integer('completed', { mode: 'boolean' }).notNull().default(false),
  archived: integer('archived', { mode: 'boolean' }).notNull().default(false),
  priority: integer('priority').notNull().default(0),
  /** ISO-8601 string, compared lexicographically by the due filters */
  dueDate: text('due_date'),
  /** Set on the false -> true edge of `completed`, cleared on the reverse edge */
  completionDate: text('completion_date'),
  parentId: text('parent_id').references((): AnySQLiteColumn => tasks.id, {
    onDelete: 'cascade',
  }),
  /** JSON array of strings, stored as TEXT. NULL when there are no tags */
  tags: text('tags'),
  /** Opaque JSON object, stored as TEXT */
  metadata: text('metadata'),
  createdAt: text('created_at').notNull(),
  updatedAt: text('updated_at').notNull(),
}, (table) => [
  index('idx_tasks_parent_id').on(table.parentId),
  index('idx_tasks_completed').on(table.completed),
  index('idx_tasks_archived').on(table.archived),
  index('idx_tasks_priority').on(table.priority),
  index('idx_tasks_due_date').on(table.dueDate),
  index('idx_tasks_created_at').on(table.createdAt),
]);
