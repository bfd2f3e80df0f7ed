import type { LoggerMethods } from '@pagescribe/logger';
import type {
  ExtractionMode,
  TaskState,
  WorkItemBatch,
} from '@pagescribe/model';
import type { LanguageModel } from 'ai';

import { createConsoleLogger } from '@pagescribe/logger';
import { ControlGate, TokenUsageAggregator } from '@pagescribe/shared';

import type { ExtractionConfig } from '../config/extraction-config';
import type { PdfImageSourceOptions } from '../sources/pdf-image-source';
import type { WorkItemSource } from '../sources/work-item-source';
import type {
  DocumentWriter,
  ExtractedDocument,
} from '../writers/document-writer';
import type { ItemExtractor, PipelineRunResult } from './extraction-pipeline';

import { TASK_REGISTRY } from '../config/constants';
import { createExtractionModel } from '../config/model-factory';
import { ExtractionError } from '../errors/extraction-error';
import { PipelineEventChannel } from '../pipeline/pipeline-event-channel';
import { ProgressAggregator } from '../pipeline/progress-aggregator';
import { TaskRegistry } from '../pipeline/task-registry';
import { PdfImageSource } from '../sources/pdf-image-source';
import { ExtractionClient } from './extraction-client';
import { ExtractionPipeline } from './extraction-pipeline';

export interface ExtractionServiceOptions {
  model: LanguageModel;
  logger: LoggerMethods;

  /** Shared task store (default: a private registry) */
  registry?: TaskRegistry;

  /** Worker concurrency per task (default: 4) */
  workers?: number;

  /** Per-call timeout (default: 180000) */
  timeoutMs?: number;

  /** Retries for transient failures (default: 3) */
  retries?: number;

  /** Longest sleep between gate checks while paused (default: 500) */
  pollIntervalMs?: number;

  /** Image selection and render resolution for `pdfSource` */
  pdf?: PdfImageSourceOptions;

  retryBaseDelayMs?: number;
  retryMaxJitterMs?: number;
  now?: () => number;
}

export interface SubmitRequest {
  /** Task id (default: generated) */
  id?: string;

  /** Display name, also the output file stem */
  name: string;

  mode: ExtractionMode;
  source: WorkItemSource;

  /** Receives the ordered results when the run ends */
  writer?: DocumentWriter;
}

/**
 * Task state as seen by pollers
 */
export interface TaskStatusView extends TaskState {
  /** Wall time since start, minus time spent paused */
  elapsedMs: number;
}

/**
 * How a task's run ended. `error` is set when the task failed.
 */
export interface TaskRun {
  taskId: string;
  document?: ExtractedDocument;
  outputPath?: string;
  error?: string;
}

interface ActiveRun {
  gate: ControlGate;
  done: Promise<TaskRun>;
}

/**
 * Wall time since start minus paused time, including a pause still running
 */
export function computeElapsedMs(state: TaskState, now: number): number {
  if (state.startedAt === undefined) {
    return 0;
  }
  const end = state.finishedAt ?? now;
  const runningPause =
    state.pauseStartedAt !== undefined ? end - state.pauseStartedAt : 0;
  return Math.max(0, end - state.startedAt - state.pausedMs - runningPause);
}

/**
 * ExtractionService - submits tasks and exposes their status and controls
 *
 * Each task gets its own control gate, event channel and progress
 * aggregator. Runs are started on submit and never reject: failures of the
 * driving logic (source, writer) end the task as `failed`.
 *
 * @example
 * ```typescript
 * const service = ExtractionService.fromConfig(loadExtractionConfig(), logger);
 * const taskId = service.submit({
 *   name: 'report',
 *   mode: 'text',
 *   source: service.pdfSource('./report.pdf', './tmp/report'),
 *   writer: new MarkdownDocumentWriter('./output'),
 * });
 *
 * service.pause(taskId);
 * service.getStatus(taskId); // { status: 'paused', done: 1, total: 2, ... }
 * service.resume(taskId);
 * await service.waitFor(taskId);
 * ```
 */
export class ExtractionService {
  private readonly registry: TaskRegistry;
  private readonly now: () => number;
  private readonly runs = new Map<string, ActiveRun>();
  private readonly detachRegistry: () => void;

  constructor(private readonly options: ExtractionServiceOptions) {
    this.now = options.now ?? Date.now;
    this.registry =
      options.registry ??
      new TaskRegistry({ logger: options.logger, now: this.now });
    // Runs hold whole documents; drop them with their task
    this.detachRegistry = this.registry.onRemoved((id) => {
      this.runs.delete(id);
    });
  }

  /**
   * Build a service from validated configuration. Without a registry, a new
   * one is created that evicts finished tasks after `config.retentionMs`;
   * without a logger, a console logger at `config.logLevel` is used.
   */
  static fromConfig(
    config: ExtractionConfig,
    logger: LoggerMethods = createConsoleLogger(config.logLevel),
    registry?: TaskRegistry,
  ): ExtractionService {
    if (!registry) {
      registry = new TaskRegistry({ logger });
      registry.startEviction(
        TASK_REGISTRY.EVICTION_INTERVAL_MS,
        config.retentionMs,
      );
    }
    return new ExtractionService({
      model: createExtractionModel(config),
      logger,
      registry,
      workers: config.workers,
      timeoutMs: config.timeoutMs,
      retries: config.retries,
      pollIntervalMs: config.pollIntervalMs,
      pdf: { sourceMode: config.sourceMode, dpi: config.dpi },
    });
  }

  get tasks(): TaskRegistry {
    return this.registry;
  }

  /**
   * Work items of one PDF, using the configured source mode and DPI.
   * Temporary images go under `workDir` and are removed when the run ends.
   */
  pdfSource(pdfPath: string, workDir: string): PdfImageSource {
    return new PdfImageSource(
      this.options.logger,
      pdfPath,
      workDir,
      this.options.pdf,
    );
  }

  /**
   * Register a task and start running it.
   *
   * @returns The task id
   */
  submit(request: SubmitRequest): string {
    const state = this.registry.create({
      id: request.id,
      name: request.name,
      mode: request.mode,
    });
    const gate = new ControlGate();
    const done = this.execute(state.id, request, gate);
    this.runs.set(state.id, { gate, done });

    this.options.logger.info(
      `[ExtractionService] Task ${state.id} submitted: ${request.name} (${request.mode})`,
    );
    return state.id;
  }

  /**
   * Hold dispatching. Returns false for an unknown task.
   */
  pause(taskId: string): boolean {
    const gate = this.gateFor(taskId);
    gate?.pause();
    return gate !== undefined;
  }

  /**
   * Continue dispatching. Returns false for an unknown task.
   */
  resume(taskId: string): boolean {
    const gate = this.gateFor(taskId);
    gate?.resume();
    return gate !== undefined;
  }

  /**
   * Stop dispatching; work in flight finishes. Returns false for an unknown
   * task.
   */
  stop(taskId: string): boolean {
    const gate = this.gateFor(taskId);
    gate?.stop();
    return gate !== undefined;
  }

  getStatus(taskId: string): TaskStatusView | undefined {
    const state = this.registry.snapshot(taskId);
    return state
      ? { ...state, elapsedMs: computeElapsedMs(state, this.now()) }
      : undefined;
  }

  listTasks(): TaskStatusView[] {
    const now = this.now();
    return this.registry
      .list()
      .map((state) => ({ ...state, elapsedMs: computeElapsedMs(state, now) }));
  }

  /**
   * Resolves when the task's run has ended, undefined for an unknown task
   */
  async waitFor(taskId: string): Promise<TaskRun | undefined> {
    return this.runs.get(taskId)?.done;
  }

  /**
   * Stop every task, wait for all runs to end and stop registry eviction
   */
  async shutdown(): Promise<void> {
    const runs = [...this.runs.values()];
    for (const run of runs) {
      run.gate.stop();
    }
    await Promise.all(runs.map((run) => run.done));
    this.registry.stopEviction();
    this.detachRegistry();
  }

  private gateFor(taskId: string): ControlGate | undefined {
    return this.runs.get(taskId)?.gate;
  }

  private async execute(
    taskId: string,
    request: SubmitRequest,
    gate: ControlGate,
  ): Promise<TaskRun> {
    const { logger } = this.options;
    const channel = new PipelineEventChannel();
    const progress = new ProgressAggregator({
      registry: this.registry,
      taskId,
      gate,
      logger,
      now: this.now,
    });
    progress.attach(channel);
    const usage = new TokenUsageAggregator();

    try {
      const batch = await request.source.collect();
      const document = await this.extract(
        request,
        batch,
        gate,
        channel,
        usage,
      );
      const outputPath = await request.writer?.write(document);
      if (outputPath) {
        logger.info(
          `[ExtractionService] Task ${taskId} written to ${outputPath}`,
        );
      }
      usage.logSummary(logger, 'ExtractionService');
      return { taskId, document, outputPath };
    } catch (error) {
      progress.fail(error);
      return { taskId, error: ExtractionError.getErrorMessage(error) };
    } finally {
      progress.detach();
      await this.disposeSource(taskId, request.source);
    }
  }

  private async disposeSource(
    taskId: string,
    source: WorkItemSource,
  ): Promise<void> {
    try {
      await source.dispose?.();
    } catch (error) {
      this.options.logger.warn(
        `[ExtractionService] Task ${taskId} cleanup failed: ${ExtractionError.getErrorMessage(error)}`,
      );
    }
  }

  private async extract(
    request: SubmitRequest,
    batch: WorkItemBatch,
    gate: ControlGate,
    channel: PipelineEventChannel,
    usage: TokenUsageAggregator,
  ): Promise<ExtractedDocument> {
    const { name } = request;
    if (request.mode === 'text') {
      const run = await this.runPipeline(
        this.createClient('text', gate, usage),
        batch,
        gate,
        channel,
      );
      return { name, mode: 'text', results: run.results };
    }

    const run = await this.runPipeline(
      this.createClient('table', gate, usage),
      batch,
      gate,
      channel,
    );
    return { name, mode: 'table', results: run.results };
  }

  private createClient<M extends ExtractionMode>(
    mode: M,
    gate: ControlGate,
    aggregator: TokenUsageAggregator,
  ): ExtractionClient<M> {
    return new ExtractionClient(this.options.logger, {
      model: this.options.model,
      mode,
      timeoutMs: this.options.timeoutMs,
      maxRetries: this.options.retries,
      retryBaseDelayMs: this.options.retryBaseDelayMs,
      retryMaxJitterMs: this.options.retryMaxJitterMs,
      stopSignal: gate.signal,
      aggregator,
    });
  }

  private runPipeline<P>(
    extractor: ItemExtractor<P>,
    batch: WorkItemBatch,
    gate: ControlGate,
    channel: PipelineEventChannel,
  ): Promise<PipelineRunResult<P>> {
    const pipeline = new ExtractionPipeline(this.options.logger, {
      extractor,
      gate,
      channel,
      concurrency: this.options.workers,
      pollIntervalMs: this.options.pollIntervalMs,
    });
    return pipeline.run(batch);
  }
}
