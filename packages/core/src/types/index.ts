export type { TaskId, TaskMetadata, Task } from './task.js';
export { SORT_FIELDS, SORT_ORDERS } from './query.js';
export type { SortField, SortOrder, TaskPage } from './query.js';
export { CONFLICT_POLICIES } from './import.js';
export type { ConflictPolicy, ImportResult } from './import.js';
