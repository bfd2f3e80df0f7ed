import type { TokenUsage } from '@pagescribe/model';

import { type LanguageModel, generateText } from 'ai';

import { extractResponseText, normalizeUsage } from './response-normalizer';
import { withRetries } from './retry';

/**
 * Image bytes sent alongside the prompt
 */
export interface VisionImage {
  data: Uint8Array;
  mediaType: string;
}

/**
 * Configuration for one vision call
 */
export interface VisionCallConfig {
  model: LanguageModel;

  /**
   * Instruction sent after the image
   */
  prompt: string;

  image: VisionImage;

  /**
   * Retries for transient failures (default: 3)
   */
  maxRetries?: number;

  /**
   * Per-attempt timeout
   */
  timeoutMs: number;

  /**
   * Backoff unit in milliseconds (default: 1000)
   */
  retryBaseDelayMs?: number;

  /**
   * Upper bound of random jitter added to each backoff (default: 500)
   */
  retryMaxJitterMs?: number;

  temperature?: number;

  /**
   * Stop signal. An attempt already in flight is not cancelled, but no retry
   * is started once it is aborted.
   */
  stopSignal?: AbortSignal;

  /**
   * Component name for tracking (e.g., 'ExtractionClient')
   */
  component: string;

  /**
   * Phase name for tracking (e.g., 'text-extraction', 'table-extraction')
   */
  phase: string;

  onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
}

/**
 * Token usage with call attribution
 */
export interface ExtendedTokenUsage extends TokenUsage {
  component: string;
  phase: string;
  modelName: string;
}

export interface VisionCallResult {
  /**
   * Raw model output, '' when the response carried no text
   */
  text: string;
  usage: ExtendedTokenUsage;

  /**
   * Attempts made, including the successful one
   */
  attempts: number;
}

export const DEFAULT_VISION_MAX_RETRIES = 3;

/**
 * VisionCaller - single-image vision request with transient-failure retries
 *
 * Wraps AI SDK's generateText with its own retry policy instead of the
 * SDK's: SDK retries are disabled, each attempt gets its own timeout, and
 * only timeouts, connection failures and HTTP 408/429/5xx are retried with
 * exponential backoff plus jitter. Response text and usage are normalized
 * so OpenAI-compatible endpoints with unusual response shapes still work.
 *
 * @example
 * ```typescript
 * const result = await VisionCaller.callVision({
 *   model: openai.chat('gpt-4o-mini'),
 *   prompt: 'Transcribe this page as JSON',
 *   image: { data: bytes, mediaType: 'image/png' },
 *   timeoutMs: 180_000,
 *   component: 'ExtractionClient',
 *   phase: 'text-extraction',
 * });
 *
 * console.log(result.text);   // Raw model output
 * console.log(result.usage);  // { prompt, completion, total, ... }
 * ```
 */
export class VisionCaller {
  /**
   * Model id for usage attribution
   */
  static extractModelName(model: LanguageModel): string {
    return typeof model === 'string' ? model : model.modelId;
  }

  /**
   * Send one image and prompt, retrying transient failures.
   *
   * @throws The last error when retries are exhausted or the failure is
   * permanent
   */
  static async callVision(config: VisionCallConfig): Promise<VisionCallResult> {
    let attempts = 0;

    const result = await withRetries(
      () => {
        attempts++;
        return generateText({
          model: config.model,
          messages: [
            {
              role: 'user',
              content: [
                {
                  type: 'image',
                  image: config.image.data,
                  mediaType: config.image.mediaType,
                },
                { type: 'text', text: config.prompt },
              ],
            },
          ],
          temperature: config.temperature,
          maxRetries: 0,
          abortSignal: AbortSignal.timeout(config.timeoutMs),
        });
      },
      {
        retries: config.maxRetries ?? DEFAULT_VISION_MAX_RETRIES,
        baseDelayMs: config.retryBaseDelayMs,
        maxJitterMs: config.retryMaxJitterMs,
        signal: config.stopSignal,
        onRetry: config.onRetry,
      },
    );

    return {
      text: extractResponseText(result),
      usage: {
        component: config.component,
        phase: config.phase,
        modelName: this.extractModelName(config.model),
        ...normalizeUsage(result),
      },
      attempts,
    };
  }
}
