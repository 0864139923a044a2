import type { Task } from '../types/task.js';
import { PreconditionFailedError, ValidationError } from '../errors.js';

export interface Preconditions {
  /** ISO-8601 timestamp or HTTP-date */
  readonly ifUnmodifiedSince?: string;
  /** ETag as returned by `etagFor` */
  readonly ifMatch?: string;
}

const ISO_DATE = /^\d{4}-\d{2}-\d{2}/;

/** The version tag of a task: its quoted `updatedAt` */
export function etagFor(task: Pick<Task, 'updatedAt'>): string {
  return `"${task.updatedAt}"`;
}

/**
 * Throw PreconditionFailedError when the stored task fails any supplied
 * precondition. Empty values count as absent.
 */
export function checkPreconditions(task: Task, preconditions: Preconditions): void {
  const { ifUnmodifiedSince, ifMatch } = preconditions;

  if (ifUnmodifiedSince) {
    const clientTime = Date.parse(ifUnmodifiedSince);
    if (Number.isNaN(clientTime)) {
      throw new ValidationError('Invalid If-Unmodified-Since timestamp', [
        { field: 'If-Unmodified-Since', message: `Cannot parse '${ifUnmodifiedSince}' as a timestamp` },
      ]);
    }
    // Imported tasks may carry an updatedAt that is not a timestamp; nothing to compare then
    let storedTime = Date.parse(task.updatedAt);
    // HTTP-dates carry whole seconds
    if (!ISO_DATE.test(ifUnmodifiedSince.trim())) {
      storedTime = Math.floor(storedTime / 1000) * 1000;
    }
    if (!Number.isNaN(storedTime) && storedTime > clientTime) {
      throw new PreconditionFailedError('Task has been modified since specified time');
    }
  }

  if (ifMatch && ifMatch !== etagFor(task)) {
    throw new PreconditionFailedError('ETag does not match current resource');
  }
}
