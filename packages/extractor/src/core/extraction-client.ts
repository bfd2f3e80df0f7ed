import type { LoggerMethods } from '@pagescribe/logger';
import type {
  ExtractionMode,
  ExtractionOutcome,
  ExtractionPayload,
  TokenUsage,
  WorkItem,
} from '@pagescribe/model';
import type {
  TokenUsageAggregator,
  VisionCallResult,
  VisionImage,
} from '@pagescribe/shared';
import type { LanguageModel } from 'ai';

import { EMPTY_RESULT_REASONS, EMPTY_USAGE } from '@pagescribe/model';
import { VisionCaller } from '@pagescribe/shared';
import * as fs from 'node:fs/promises';
import * as path from 'node:path';

import { EXTRACTION_CLIENT, IMAGE_MEDIA_TYPES } from '../config/constants';
import {
  TABLE_EXTRACTION_PROMPT,
  TEXT_EXTRACTION_PROMPT,
} from '../config/prompts';
import {
  ExtractionError,
  WorkItemSourceError,
} from '../errors/extraction-error';
import { ContentParser } from '../parsers/content-parser';

const PROMPTS: Record<ExtractionMode, string> = {
  text: TEXT_EXTRACTION_PROMPT,
  table: TABLE_EXTRACTION_PROMPT,
};

const PHASES: Record<ExtractionMode, string> = {
  text: 'text-extraction',
  table: 'table-extraction',
};

/**
 * Options for ExtractionClient
 */
export interface ExtractionClientOptions<M extends ExtractionMode> {
  model: LanguageModel;
  mode: M;

  /**
   * Per-call timeout (default: 180000)
   */
  timeoutMs?: number;

  /**
   * Retries for transient failures (default: 3)
   */
  maxRetries?: number;

  /**
   * Backoff unit in milliseconds (default: 1000)
   */
  retryBaseDelayMs?: number;

  /**
   * Upper bound of random backoff jitter (default: 500)
   */
  retryMaxJitterMs?: number;

  /**
   * Once aborted, calls in flight finish but no retry is started
   */
  stopSignal?: AbortSignal;

  /**
   * Receives the usage of every answered call
   */
  aggregator?: TokenUsageAggregator;
}

/**
 * ExtractionClient - one work item in, one outcome out
 *
 * Loads the image, asks the vision model for the configured mode's format,
 * and parses the answer. Every failure becomes a failure outcome, so
 * `extract` never rejects:
 *
 * - parsed content → success
 * - nothing recognized → failure `no_content` / `no_tables` with the call's usage
 * - error (after transient retries) → failure with the error message, zero usage
 */
export class ExtractionClient<M extends ExtractionMode> {
  private readonly componentName = 'ExtractionClient';

  constructor(
    private readonly logger: LoggerMethods,
    private readonly options: ExtractionClientOptions<M>,
  ) {}

  get mode(): M {
    return this.options.mode;
  }

  async extract(
    item: WorkItem,
  ): Promise<ExtractionOutcome<ExtractionPayload<M>>> {
    const { mode } = this.options;

    let result: VisionCallResult;
    try {
      const image = await this.loadImage(item);
      result = await this.callModel(item, image);
    } catch (error) {
      const reason = ExtractionError.getErrorMessage(error);
      this.logger.warn(
        `[${this.componentName}] ${item.name} failed: ${reason}`,
      );
      return { kind: 'failure', reason, usage: { ...EMPTY_USAGE } };
    }

    this.options.aggregator?.track(result.usage);
    const usage: TokenUsage = {
      prompt: result.usage.prompt,
      completion: result.usage.completion,
      total: result.usage.total,
    };

    const content = ContentParser.parse(result.text, mode);
    if (content.length === 0) {
      const reason = EMPTY_RESULT_REASONS[mode];
      this.logger.info(`[${this.componentName}] ${item.name}: ${reason}`);
      return { kind: 'failure', reason, usage };
    }

    this.logger.debug(
      `[${this.componentName}] ${item.name}: ${content.length} ${mode === 'text' ? 'nodes' : 'tables'} (${result.attempts} attempts)`,
    );
    return { kind: 'success', content, usage };
  }

  private callModel(
    item: WorkItem,
    image: VisionImage,
  ): Promise<VisionCallResult> {
    const { mode } = this.options;
    return VisionCaller.callVision({
      model: this.options.model,
      prompt: PROMPTS[mode],
      image,
      maxRetries:
        this.options.maxRetries ?? EXTRACTION_CLIENT.DEFAULT_MAX_RETRIES,
      timeoutMs:
        this.options.timeoutMs ?? EXTRACTION_CLIENT.DEFAULT_TIMEOUT_MS,
      retryBaseDelayMs:
        this.options.retryBaseDelayMs ?? EXTRACTION_CLIENT.RETRY_BASE_DELAY_MS,
      retryMaxJitterMs: this.options.retryMaxJitterMs,
      temperature: EXTRACTION_CLIENT.TEMPERATURE,
      stopSignal: this.options.stopSignal,
      component: this.componentName,
      phase: PHASES[mode],
      onRetry: (error, attempt, delayMs) => {
        this.logger.warn(
          `[${this.componentName}] ${item.name}: retry ${attempt} in ${delayMs}ms after ${ExtractionError.getErrorMessage(error)}`,
        );
      },
    });
  }

  /**
   * Read the bytes behind a work item
   */
  private async loadImage(item: WorkItem): Promise<VisionImage> {
    const ref = item.sourceRef;
    if (ref.kind === 'buffer') {
      return { data: ref.data, mediaType: ref.mediaType };
    }

    try {
      const data = await fs.readFile(ref.path);
      return { data, mediaType: mediaTypeOf(ref.path) };
    } catch (error) {
      throw new WorkItemSourceError(
        `Cannot read image ${ref.path}: ${ExtractionError.getErrorMessage(error)}`,
        { cause: error },
      );
    }
  }
}

/**
 * Media type from the file extension, PNG when unknown
 */
export function mediaTypeOf(filePath: string): string {
  return (
    IMAGE_MEDIA_TYPES[path.extname(filePath).toLowerCase()] ??
    EXTRACTION_CLIENT.FALLBACK_MEDIA_TYPE
  );
}
