/**
 * In-memory unit of scheduling work: "run the pipeline for document X".
 *
 * Tasks are never persisted; after a restart the scheduler rebuilds its
 * working set from the document store.
 */
export interface Task {
  documentId: number;

  /**
   * Lower runs first within the same trigger class
   */
  priority: number;

  /**
   * Manually triggered tasks run before automatic ones
   */
  manual: boolean;

  /**
   * Epoch milliseconds, used as the final tie-breaker
   */
  enqueuedAt: number;
}
