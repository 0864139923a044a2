import type { Task } from './task.js';

export const SORT_FIELDS = ['created_at', 'updated_at', 'title', 'priority', 'due_date', 'completed'] as const;
export type SortField = typeof SORT_FIELDS[number];

export const SORT_ORDERS = ['asc', 'desc'] as const;
export type SortOrder = typeof SORT_ORDERS[number];

export interface TaskPage {
  readonly data: Task[];
  /** Size of the filtered set before limit/offset */
  readonly total: number;
  readonly limit: number;
  readonly offset: number;
}
