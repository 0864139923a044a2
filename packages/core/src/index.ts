export { createDb, createTestDb, getRawDb, inTransaction, CREATE_SCHEMA_SQL } from './db.js';
export type { TaskDb } from './db.js';

export { tasks } from './schema/index.js';

export * from './types/index.js';
export * from './errors.js';
export * from './queries/index.js';

export {
  validateParent,
  parentFieldError,
  assertParentCheck,
} from './hierarchy/hierarchy-validator.js';
export type { KnownIds, ParentCheck } from './hierarchy/hierarchy-validator.js';

export { etagFor, checkPreconditions } from './concurrency/preconditions.js';
export type { Preconditions } from './concurrency/preconditions.js';

export {
  findDuplicateIds,
  orderParentsFirst,
  planImport,
  fromImportRecord,
  importTasks,
} from './import/import-planner.js';
export type { ImportStep, ImportPlan } from './import/import-planner.js';

export {
  taskInputSchema,
  taskPatchSchema,
  importRecordSchema,
  importBatchSchema,
  importOptionsSchema,
  taskListQuerySchema,
  booleanParamSchema,
  tagsSchema,
  metadataSchema,
  toFieldErrors,
  parseOrThrow,
  TITLE_MAX_LENGTH,
  DESCRIPTION_MAX_LENGTH,
  PRIORITY_MIN,
  PRIORITY_MAX,
  MAX_TAGS,
  TAG_MAX_LENGTH,
  LIST_LIMIT_MAX,
  LIST_LIMIT_DEFAULT,
} from './validation/task-schemas.js';
export type {
  TaskInput,
  TaskPatch,
  TaskChanges,
  ImportRecord,
  ImportRecordInput,
  ImportOptions,
  TaskListQuery,
  ResolvedTaskListQuery,
} from './validation/task-schemas.js';
