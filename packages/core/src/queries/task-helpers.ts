import { randomUUID } from 'node:crypto';
import type { TaskId, TaskMetadata } from '../types/task.js';

/** Generate a new task ID */
export function generateId(): TaskId {
  return randomUUID();
}

/** Current instant in the stored timestamp format */
export function timestamp(now: Date = new Date()): string {
  return now.toISOString();
}

export function serializeTags(tags: readonly string[]): string | null {
  return tags.length > 0 ? JSON.stringify(tags) : null;
}

export function deserializeTags(raw: string | null): string[] {
  if (!raw) return [];
  const parsed: unknown = JSON.parse(raw);
  return Array.isArray(parsed) ? parsed.filter((tag): tag is string => typeof tag === 'string') : [];
}

function isRecord(value: unknown): value is TaskMetadata {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** An empty metadata object is stored, and read back, as null */
export function normalizeMetadata(metadata: TaskMetadata | null | undefined): TaskMetadata | null {
  return metadata && Object.keys(metadata).length > 0 ? metadata : null;
}

export function serializeMetadata(metadata: TaskMetadata | null): string | null {
  const normalized = normalizeMetadata(metadata);
  return normalized ? JSON.stringify(normalized) : null;
}

export function deserializeMetadata(raw: string | null): TaskMetadata | null {
  if (!raw) return null;
  const parsed: unknown = JSON.parse(raw);
  return isRecord(parsed) ? parsed : null;
}

/** Escape LIKE wildcards so the term matches literally (used with ESCAPE '\') */
export function escapeLike(term: string): string {
  return term.replace(/\\/g, '\\\\').replace(/%/g, '\\%').replace(/_/g, '\\_');
}
