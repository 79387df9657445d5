/**
 * Configuration constants for TextExtractionClient
 */
export const TEXT_EXTRACTION = {
  /**
   * Timeout for a single page OCR call in milliseconds
   */
  DEFAULT_TIMEOUT_MS: 300_000,

  /**
   * Pages sent to the OCR service at the same time for one document
   */
  DEFAULT_PAGE_CONCURRENCY: 1,

  /**
   * Sampling temperature for the OCR model
   */
  TEMPERATURE: 0.1,

  /**
   * Retries the AI SDK performs on transient errors before giving up
   */
  MAX_RETRIES: 2,
} as const;

/**
 * Configuration constants for PageRenderer
 */
export const PAGE_RENDERER = {
  /**
   * Rasterization density for PDF pages
   */
  PDF_DPI: 200,

  /**
   * Longest edge of a page image in pixels; larger pages are scaled down
   */
  MAX_IMAGE_SIZE: 1400,

  /**
   * Kill ImageMagick if it runs longer than this
   */
  RENDER_TIMEOUT_MS: 120_000,
} as const;

/**
 * File extensions handled as raster images (everything else must be a PDF)
 */
export const IMAGE_EXTENSIONS = [
  '.png',
  '.jpg',
  '.jpeg',
  '.webp',
  '.tif',
  '.tiff',
  '.bmp',
] as const;
