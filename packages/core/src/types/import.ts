export const CONFLICT_POLICIES = ['fail', 'skip', 'upsert'] as const;
export type ConflictPolicy = typeof CONFLICT_POLICIES[number];

export interface ImportResult {
  /** Records written, or that would be written when `validateOnly` is set */
  readonly importedCount: number;
  readonly validateOnly: boolean;
}
