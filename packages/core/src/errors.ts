import type { TaskId } from './types/task.js';

export type TaskErrorCode = 'not_found' | 'validation_error' | 'conflict' | 'precondition_failed';

export interface FieldError {
  readonly field: string;
  readonly message: string;
}

/**
 * Base class for the domain failures of the task store. Anything thrown that
 * is not a TaskError (SQLite errors included) is an internal failure.
 */
export abstract class TaskError extends Error {
  abstract readonly code: TaskErrorCode;
}

export class TaskNotFoundError extends TaskError {
  readonly code = 'not_found';

  constructor(public readonly taskId: TaskId) {
    super(`Task ${taskId} not found`);
    this.name = 'TaskNotFoundError';
  }
}

export class ValidationError extends TaskError {
  readonly code = 'validation_error';

  constructor(message: string, public readonly fieldErrors: readonly FieldError[] = []) {
    super(message);
    this.name = 'ValidationError';
  }
}

/** Import ids already present in the store under the `fail` policy */
export class ImportConflictError extends TaskError {
  readonly code = 'conflict';

  constructor(public readonly conflictingIds: readonly TaskId[]) {
    super('One or more task IDs already exist');
    this.name = 'ImportConflictError';
  }
}

export class PreconditionFailedError extends TaskError {
  readonly code = 'precondition_failed';

  constructor(message: string) {
    super(message);
    this.name = 'PreconditionFailedError';
  }
}

export function isTaskError(err: unknown): err is TaskError {
  return err instanceof TaskError;
}
