/**
 * Configuration constants for PropertyExtractionClient
 */
export const PROPERTY_EXTRACTION = {
  /**
   * A candidate that answered HTTP 429 is skipped for this long
   */
  COOLDOWN_MS: 60_000,

  /**
   * Responses with fewer meaningful fields are rejected as too sparse
   */
  MIN_MEANINGFUL_FIELDS: 3,

  /**
   * Timeout for a single candidate call in milliseconds
   */
  TIMEOUT_MS: 120_000,

  TEMPERATURE: 0.1,

  MAX_OUTPUT_TOKENS: 4096,
} as const;

/**
 * First year of each Japanese era, newest first
 */
export const ERA_START_YEARS = {
  令和: 2019,
  平成: 1989,
  昭和: 1926,
  大正: 1912,
  明治: 1868,
} as const;

export type EraName = keyof typeof ERA_START_YEARS;
