// Task helpers
export {
  generateId,
  timestamp,
  serializeTags,
  deserializeTags,
  normalizeMetadata,
  serializeMetadata,
  deserializeMetadata,
  escapeLike,
} from './task-helpers.js';

// Task store
export {
  toTask,
  getTaskById,
  requireTask,
  findExistingIds,
  getAllDescendantIds,
  insertTask,
  replaceTask,
  createTask,
  applyChanges,
  updateTask,
  deleteTask,
} from './task-queries.js';
export type { UpdateOptions, DeleteResult } from './task-queries.js';

// Listing and export
export {
  buildConditions,
  buildOrder,
  listTasks,
  exportTasks,
} from './list-queries.js';
