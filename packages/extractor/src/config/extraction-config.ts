import type { LogLevel } from '@pagescribe/logger';

import { parseLogLevel } from '@pagescribe/logger';
import { z } from 'zod';

import { ConfigError } from '../errors/extraction-error';
import {
  EXTRACTION_CLIENT,
  EXTRACTION_PIPELINE,
  PDF_IMAGE_SOURCE,
  SOURCE_MODES,
  type SourceMode,
  TASK_REGISTRY,
} from './constants';

/**
 * Validated runtime configuration
 */
export interface ExtractionConfig {
  apiKey: string;

  /** OpenAI-compatible endpoint, e.g. https://api.example.com/v1 */
  baseUrl: string;

  model: string;
  timeoutMs: number;
  retries: number;
  workers: number;
  dpi: number;
  sourceMode: SourceMode;
  pollIntervalMs: number;
  retentionMs: number;
  logLevel: LogLevel;
}

// Unset and blank variables both fall back to the default
const blankAsUndefined = (value: unknown) =>
  typeof value === 'string' && value.trim() === '' ? undefined : value;

const integerVar = (defaultValue: number, min: number) =>
  z.preprocess(
    blankAsUndefined,
    z.coerce.number().int().min(min).default(defaultValue),
  );

/**
 * Environment variable schema
 */
export const extractionEnvSchema = z
  .object({
    PAGESCRIBE_API_KEY: z.string().trim().min(1),
    PAGESCRIBE_BASE_URL: z.string().trim().url(),
    PAGESCRIBE_MODEL: z.preprocess(
      blankAsUndefined,
      z.string().trim().default('gpt-4o-mini'),
    ),
    PAGESCRIBE_TIMEOUT_MS: integerVar(EXTRACTION_CLIENT.DEFAULT_TIMEOUT_MS, 1),
    PAGESCRIBE_RETRIES: integerVar(EXTRACTION_CLIENT.DEFAULT_MAX_RETRIES, 0),
    PAGESCRIBE_WORKERS: integerVar(EXTRACTION_PIPELINE.DEFAULT_WORKERS, 1),
    PAGESCRIBE_DPI: integerVar(PDF_IMAGE_SOURCE.DEFAULT_DPI, 1),
    PAGESCRIBE_SOURCE: z.preprocess(
      blankAsUndefined,
      z.enum(SOURCE_MODES).default('both'),
    ),
    PAGESCRIBE_POLL_MS: integerVar(
      EXTRACTION_PIPELINE.DEFAULT_POLL_INTERVAL_MS,
      1,
    ),
    PAGESCRIBE_RETENTION_MS: integerVar(TASK_REGISTRY.DEFAULT_RETENTION_MS, 0),
    PAGESCRIBE_LOG_LEVEL: z.string().optional(),
  })
  .transform(
    (env): ExtractionConfig => ({
      apiKey: env.PAGESCRIBE_API_KEY,
      baseUrl: env.PAGESCRIBE_BASE_URL.replace(/\/+$/, ''),
      model: env.PAGESCRIBE_MODEL,
      timeoutMs: env.PAGESCRIBE_TIMEOUT_MS,
      retries: env.PAGESCRIBE_RETRIES,
      workers: env.PAGESCRIBE_WORKERS,
      dpi: env.PAGESCRIBE_DPI,
      sourceMode: env.PAGESCRIBE_SOURCE,
      pollIntervalMs: env.PAGESCRIBE_POLL_MS,
      retentionMs: env.PAGESCRIBE_RETENTION_MS,
      logLevel: parseLogLevel(env.PAGESCRIBE_LOG_LEVEL),
    }),
  );

/**
 * Read and validate configuration from environment variables.
 *
 * @throws ConfigError listing every invalid or missing setting
 */
export function loadExtractionConfig(
  env: Record<string, string | undefined> = process.env,
): ExtractionConfig {
  const result = extractionEnvSchema.safeParse(env);
  if (!result.success) {
    throw new ConfigError(
      result.error.issues.map(
        (issue) => `${issue.path.join('.')}: ${issue.message}`,
      ),
    );
  }
  return result.data;
}
