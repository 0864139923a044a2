/**
 * Parent reference checks shared by create, update and import.
 *
 * Only the direct self-reference is rejected. Longer cycles (A -> B -> A)
 * are not looked for.
 */

import type { TaskId } from '../types/task.js';
import type { FieldError } from '../errors.js';
import { ValidationError } from '../errors.js';

/** The id universe a parent must belong to: a set, or a lookup into the store */
export type KnownIds = ReadonlySet<TaskId> | ((id: TaskId) => boolean);

export type ParentCheck =
  | { readonly type: 'ok' }
  | { readonly type: 'parent-not-found'; readonly parentId: TaskId }
  | { readonly type: 'self-parent'; readonly taskId: TaskId };

function isKnown(known: KnownIds, id: TaskId): boolean {
  return typeof known === 'function' ? known(id) : known.has(id);
}

/** Check a candidate parent reference. A null or absent parent is always ok */
export function validateParent(
  candidateParentId: TaskId | null | undefined,
  selfId: TaskId,
  known: KnownIds,
): ParentCheck {
  if (candidateParentId == null) return { type: 'ok' };
  if (candidateParentId === selfId) return { type: 'self-parent', taskId: selfId };
  if (!isKnown(known, candidateParentId)) return { type: 'parent-not-found', parentId: candidateParentId };
  return { type: 'ok' };
}

/** Field error for a failed check; `field` names where the reference came from */
export function parentFieldError(check: ParentCheck, field = 'parentId'): FieldError | null {
  switch (check.type) {
    case 'ok': return null;
    case 'parent-not-found': return { field, message: `Parent task ${check.parentId} not found` };
    case 'self-parent': return { field, message: 'Task cannot be its own parent' };
  }
}

/** Throw a ValidationError unless the check passed */
export function assertParentCheck(check: ParentCheck): void {
  const fieldError = parentFieldError(check);
  if (fieldError) {
    throw new ValidationError(fieldError.message, [fieldError]);
  }
}
