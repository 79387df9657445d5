/**
 * Default scheduler settings
 */
export const SCHEDULER = {
  CONCURRENCY: 3,
  BATCH_SIZE: 10,
  POLL_INTERVAL_MS: 1000,

  /**
   * Documents stuck in `processing` are no longer picked up once their retry
   * count reaches this, and LLM exhaustion turns into a terminal failure
   */
  RETRY_LIMIT: 5,
} as const;

/**
 * Task priorities. Lower runs first within the same trigger class.
 */
export const TASK_PRIORITY = {
  MANUAL: 0,
  FAVORITE: 1,
  DEFAULT: 5,
} as const;

/**
 * File extensions accepted for ingestion
 */
export const SUPPORTED_EXTENSIONS = [
  '.pdf',
  '.png',
  '.jpg',
  '.jpeg',
  '.webp',
  '.tif',
  '.tiff',
  '.bmp',
] as const;
