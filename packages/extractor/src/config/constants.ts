/**
 * Configuration constants for ExtractionClient
 */
export const EXTRACTION_CLIENT = {
  /**
   * Per-call timeout in milliseconds
   */
  DEFAULT_TIMEOUT_MS: 180_000,

  /**
   * Retries for transient service failures
   */
  DEFAULT_MAX_RETRIES: 3,

  /**
   * Backoff unit for retries in milliseconds
   */
  RETRY_BASE_DELAY_MS: 1000,

  /**
   * Temperature for extraction calls
   */
  TEMPERATURE: 0,

  /**
   * Media type assumed for files with an unknown extension
   */
  FALLBACK_MEDIA_TYPE: 'image/png',
} as const;

/**
 * Configuration constants for ExtractionPipeline
 */
export const EXTRACTION_PIPELINE = {
  /**
   * Worker concurrency
   */
  DEFAULT_WORKERS: 4,

  /**
   * Longest sleep between gate checks while paused
   */
  DEFAULT_POLL_INTERVAL_MS: 500,
} as const;

/**
 * Configuration constants for PdfImageSource
 */
export const PDF_IMAGE_SOURCE = {
  /**
   * Full-page render resolution
   */
  DEFAULT_DPI: 200,
} as const;

/**
 * Configuration constants for TaskRegistry
 */
export const TASK_REGISTRY = {
  /**
   * How long finished tasks stay queryable
   */
  DEFAULT_RETENTION_MS: 60 * 60 * 1000,

  /**
   * Interval between eviction sweeps
   */
  EVICTION_INTERVAL_MS: 60 * 1000,
} as const;

/**
 * Image extension to media type
 */
export const IMAGE_MEDIA_TYPES: Readonly<Record<string, string>> = {
  '.png': 'image/png',
  '.jpg': 'image/jpeg',
  '.jpeg': 'image/jpeg',
  '.gif': 'image/gif',
  '.webp': 'image/webp',
  '.bmp': 'image/bmp',
  '.tif': 'image/tiff',
  '.tiff': 'image/tiff',
};

/**
 * Which PDF images become work items
 *
 * - `embedded`: pictures embedded in the PDF
 * - `page`: full-page renders
 * - `both`: embedded pictures first, then full pages
 */
export const SOURCE_MODES = ['embedded', 'page', 'both'] as const;

export type SourceMode = (typeof SOURCE_MODES)[number];
