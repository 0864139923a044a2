export type TaskId = string;

/** Open-ended key/value map. Stored serialized, never interpreted */
export type TaskMetadata = Record<string, unknown>;

export interface Task {
  readonly id: TaskId;
  readonly title: string;
  readonly description: string | null;
  readonly completed: boolean;
  readonly archived: boolean;
  readonly priority: number;
  readonly dueDate: string | null; // ISO-8601
  readonly completionDate: string | null; // ISO-8601
  readonly parentId: TaskId | null;
  readonly tags: string[];
  readonly metadata: TaskMetadata | null;
  readonly createdAt: string; // ISO-8601
  readonly updatedAt: string; // ISO-8601
}
