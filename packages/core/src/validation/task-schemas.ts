/**
 * zod schemas for everything that enters the store: task create/update
 * payloads, import records, list queries and import options.
 *
 * Keys are camelCase; the HTTP layer renames the wire's snake_case keys
 * before parsing. Payload schemas reject unknown keys, the list query
 * ignores them.
 */

import { z } from 'zod';
import { ValidationError } from '../errors.js';
import type { FieldError } from '../errors.js';
import { SORT_FIELDS, SORT_ORDERS } from '../types/query.js';
import { CONFLICT_POLICIES } from '../types/import.js';

export const TITLE_MAX_LENGTH = 500;
export const DESCRIPTION_MAX_LENGTH = 5000;
export const PRIORITY_MIN = 0;
export const PRIORITY_MAX = 99;
export const MAX_TAGS = 100;
export const TAG_MAX_LENGTH = 64;
export const LIST_LIMIT_MAX = 1000;
export const LIST_LIMIT_DEFAULT = 100;

// ---------------------------------------------------------------------------
// Field schemas
// ---------------------------------------------------------------------------

const titleSchema = z.string().min(1, 'Title cannot be empty').max(TITLE_MAX_LENGTH);
const descriptionSchema = z.string().max(DESCRIPTION_MAX_LENGTH);
const prioritySchema = z.number().int().min(PRIORITY_MIN).max(PRIORITY_MAX);
const taskIdSchema = z.string().min(1);

/** Tags are validated untrimmed, stored trimmed */
export const tagsSchema = z
  .array(
    z.string()
      .max(TAG_MAX_LENGTH, `Tags cannot exceed ${TAG_MAX_LENGTH} characters`)
      .refine(tag => tag.trim().length > 0, 'Tags cannot be empty'),
  )
  .max(MAX_TAGS, `At most ${MAX_TAGS} tags are allowed`)
  .transform(tags => tags.map(tag => tag.trim()));

export const metadataSchema = z.record(z.string(), z.unknown());

const BOOLEAN_WORDS = {
  true: true, '1': true, yes: true, on: true,
  false: false, '0': false, no: false, off: false,
} as const;

function isBooleanWord(value: string): value is keyof typeof BOOLEAN_WORDS {
  return Object.prototype.hasOwnProperty.call(BOOLEAN_WORDS, value);
}

/** A boolean, or one of the words a query string uses for one */
export const booleanParamSchema = z.union([
  z.boolean(),
  z.string()
    .transform(value => value.trim().toLowerCase())
    .refine(isBooleanWord, 'Expected a boolean (true/false, 1/0, yes/no, on/off)')
    .transform(value => BOOLEAN_WORDS[value]),
]);

// ---------------------------------------------------------------------------
// Task payloads
// ---------------------------------------------------------------------------

/** Create payload. Nulls on defaulted fields mean "use the default" */
export const taskInputSchema = z.object({
  title: titleSchema,
  description: descriptionSchema.nullable().optional(),
  completed: z.boolean().nullable().optional(),
  archived: z.boolean().nullable().optional(),
  priority: prioritySchema.nullable().optional(),
  dueDate: z.string().nullable().optional(),
  tags: tagsSchema.nullable().optional(),
  metadata: metadataSchema.nullable().optional(),
  parentId: taskIdSchema.nullable().optional(),
}).strict();

/**
 * Partial update payload. An absent key leaves the field untouched, an
 * explicit null clears a nullable one. `tags: null` clears the tags.
 */
export const taskPatchSchema = z.object({
  title: titleSchema.optional(),
  description: descriptionSchema.nullable().optional(),
  completed: z.boolean().optional(),
  archived: z.boolean().optional(),
  priority: prioritySchema.optional(),
  dueDate: z.string().nullable().optional(),
  tags: tagsSchema.nullable().optional(),
  metadata: metadataSchema.nullable().optional(),
  parentId: taskIdSchema.nullable().optional(),
}).strict();

/** A full task record as produced by export; ids and timestamps are kept verbatim */
export const importRecordSchema = z.object({
  id: taskIdSchema,
  title: titleSchema,
  description: descriptionSchema.nullable().optional(),
  completed: z.boolean(),
  archived: z.boolean(),
  priority: prioritySchema,
  dueDate: z.string().nullable().optional(),
  completionDate: z.string().nullable().optional(),
  parentId: taskIdSchema.nullable().optional(),
  tags: tagsSchema.nullable().optional(),
  metadata: metadataSchema.nullable().optional(),
  createdAt: z.string().min(1),
  updatedAt: z.string().min(1),
}).strict();

export const importBatchSchema = z.array(importRecordSchema);

export const importOptionsSchema = z.object({
  onConflict: z.enum(CONFLICT_POLICIES).default('fail'),
  validateOnly: booleanParamSchema.default(false),
});

export type TaskInput = z.input<typeof taskInputSchema>;
export type TaskPatch = z.input<typeof taskPatchSchema>;
export type TaskChanges = z.output<typeof taskPatchSchema>;
export type ImportRecordInput = z.input<typeof importRecordSchema>;
export type ImportRecord = z.output<typeof importRecordSchema>;
export type ImportOptions = z.input<typeof importOptionsSchema>;

// ---------------------------------------------------------------------------
// List query
// ---------------------------------------------------------------------------

const intParamSchema = z.union([z.number(), z.string().trim().min(1)]).pipe(z.coerce.number().int());

/** Query-string parameters may repeat; a single value still means a list */
const tagParamSchema = z.union([z.string(), z.array(z.string())])
  .transform(value => (Array.isArray(value) ? value : [value]));

export const taskListQuerySchema = z.object({
  completed: booleanParamSchema.optional(),
  archived: booleanParamSchema.optional(),
  priority: intParamSchema.pipe(prioritySchema).optional(),
  /** Absent, null or the literal "null" select root tasks */
  parentId: z.string().nullable().optional()
    .transform(value => (value === undefined || value === null || value === 'null' ? null : value)),
  tag: tagParamSchema.optional(),
  search: z.string().min(1).max(TITLE_MAX_LENGTH).optional(),
  dueBefore: z.string().min(1).optional(),
  dueAfter: z.string().min(1).optional(),
  overdue: booleanParamSchema.optional(),
  sortBy: z.enum(SORT_FIELDS).default('created_at'),
  order: z.enum(SORT_ORDERS).default('desc'),
  limit: intParamSchema.pipe(z.number().min(1).max(LIST_LIMIT_MAX)).default(LIST_LIMIT_DEFAULT),
  offset: intParamSchema.pipe(z.number().min(0).max(Number.MAX_SAFE_INTEGER)).default(0),
});

export type TaskListQuery = z.input<typeof taskListQuerySchema>;
export type ResolvedTaskListQuery = z.output<typeof taskListQuerySchema>;

// ---------------------------------------------------------------------------
// Parsing
// ---------------------------------------------------------------------------

/** Convert zod issues to field errors ('' paths become '(root)') */
export function toFieldErrors(error: z.ZodError): FieldError[] {
  return error.issues.map(issue => ({
    field: issue.path.length > 0 ? issue.path.join('.') : '(root)',
    message: issue.message,
  }));
}

/** Parse `value` with `schema`, throwing a ValidationError on failure */
export function parseOrThrow<S extends z.ZodTypeAny>(schema: S, value: unknown, message = 'Validation failed'): z.output<S> {
  const result = schema.safeParse(value);
  if (!result.success) {
    throw new ValidationError(message, toFieldErrors(result.error));
  }
  return result.data;
}
