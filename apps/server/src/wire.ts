/**
 * The HTTP representation: snake_case keys on the wire, camelCase in the
 * core. Only top-level keys are renamed; metadata passes through as is.
 */

import type { Task, TaskPage, FieldError } from '@tasklane/core';

export interface WireTask {
  id: string;
  title: string;
  description: string | null;
  completed: boolean;
  archived: boolean;
  priority: number;
  due_date: string | null;
  completion_date: string | null;
  parent_id: string | null;
  tags: string[];
  metadata: Record<string, unknown> | null;
  created_at: string;
  updated_at: string;
}

export interface WireTaskPage {
  data: WireTask[];
  total: number;
  limit: number;
  offset: number;
}

export function toWireTask(task: Task): WireTask {
  return {
    id: task.id,
    title: task.title,
    description: task.description,
    completed: task.completed,
    archived: task.archived,
    priority: task.priority,
    due_date: task.dueDate,
    completion_date: task.completionDate,
    parent_id: task.parentId,
    tags: [...task.tags],
    metadata: task.metadata,
    created_at: task.createdAt,
    updated_at: task.updatedAt,
  };
}

export function toWirePage(page: TaskPage): WireTaskPage {
  return { ...page, data: page.data.map(toWireTask) };
}

export function snakeToCamel(key: string): string {
  return key.replace(/_([a-z0-9])/g, (_match, char: string) => char.toUpperCase());
}

/** Leaves names that do not start lowercase (header names, `(root)`) alone */
export function camelToSnake(key: string): string {
  if (!/^[a-z]/.test(key)) return key;
  return key.replace(/[A-Z]/g, char => `_${char.toLowerCase()}`);
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Rename the top-level keys of an object from snake_case; anything else is returned as is */
export function fromWire(value: unknown): unknown {
  if (!isPlainObject(value)) return value;
  return Object.fromEntries(Object.entries(value).map(([key, item]) => [snakeToCamel(key), item]));
}

/** `fromWire` applied to every element of an array body */
export function fromWireList(value: unknown): unknown {
  return Array.isArray(value) ? value.map(fromWire) : value;
}

/** Field paths back to wire names: `0.parentId` becomes `0.parent_id` */
export function toWireFieldErrors(fieldErrors: readonly FieldError[]): FieldError[] {
  return fieldErrors.map(({ field, message }) => ({
    field: field.split('.').map(camelToSnake).join('.'),
    message,
  }));
}
