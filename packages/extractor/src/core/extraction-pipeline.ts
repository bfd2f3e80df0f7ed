import type { LoggerMethods } from '@pagescribe/logger';
import type {
  ExtractionOutcome,
  TokenUsage,
  WorkItem,
  WorkItemBatch,
} from '@pagescribe/model';
import type { ControlGate } from '@pagescribe/shared';

import { EMPTY_USAGE, addUsage } from '@pagescribe/model';
import { WorkerPool } from '@pagescribe/shared';

import type { PipelineEventChannel } from '../pipeline/pipeline-event-channel';

import { EXTRACTION_PIPELINE } from '../config/constants';
import { ExtractionError } from '../errors/extraction-error';
import { type OrderedResult, ResultOrderer } from '../pipeline/result-orderer';

/**
 * Anything that turns one work item into an outcome without rejecting
 */
export interface ItemExtractor<P> {
  extract(item: WorkItem): Promise<ExtractionOutcome<P>>;
}

export interface ExtractionPipelineOptions<P> {
  extractor: ItemExtractor<P>;
  gate: ControlGate;
  channel: PipelineEventChannel;

  /**
   * Worker concurrency (default: 4)
   */
  concurrency?: number;

  /**
   * Longest sleep between gate checks while paused (default: 500)
   */
  pollIntervalMs?: number;
}

export interface PipelineRunResult<P> {
  /** Successful items in source order */
  results: OrderedResult<P>[];
  total: number;
  done: number;

  /** Items never dispatched because stop was requested */
  dropped: number;

  usage: TokenUsage;
  stopped: boolean;
}

/**
 * ExtractionPipeline - runs one batch through the worker pool
 *
 * Publishes `start`, then one `step` per completed item in completion order,
 * then exactly one `finish`. Item failures are reported in their step and
 * never end the run. Results are restored to source order at the end.
 */
export class ExtractionPipeline<P> {
  constructor(
    private readonly logger: LoggerMethods,
    private readonly options: ExtractionPipelineOptions<P>,
  ) {}

  async run(batch: WorkItemBatch): Promise<PipelineRunResult<P>> {
    const { channel, gate, extractor } = this.options;
    const total = batch.items.length;
    const concurrency =
      this.options.concurrency ?? EXTRACTION_PIPELINE.DEFAULT_WORKERS;

    this.logger.info(
      `[ExtractionPipeline] Processing ${total} items with ${concurrency} workers`,
    );
    channel.emit({
      type: 'start',
      total,
      embedded: batch.embeddedCount,
      pages: batch.pageCount,
    });

    const pool = new WorkerPool({
      concurrency,
      gate,
      pollIntervalMs:
        this.options.pollIntervalMs ??
        EXTRACTION_PIPELINE.DEFAULT_POLL_INTERVAL_MS,
    });
    const orderer = new ResultOrderer<P>();
    let done = 0;
    let usage: TokenUsage = { ...EMPTY_USAGE };

    for await (const completion of pool.process(batch.items, (item) =>
      extractor.extract(item),
    )) {
      const outcome = settledOutcome(completion.outcome);
      done++;
      usage = addUsage(usage, outcome.usage);
      orderer.record(completion.item, outcome);
      channel.emit({
        type: 'step',
        done,
        total,
        image: completion.item.name,
        error: outcome.kind === 'failure' ? outcome.reason : null,
      });
    }

    const stopped = gate.isStopped;
    channel.emit({ type: 'finish', done, total, usage, stopped });

    const results = orderer.ordered();
    this.logger.info(
      `[ExtractionPipeline] ${stopped ? 'Stopped' : 'Finished'}: ${done}/${total} processed, ${results.length} succeeded, ${pool.droppedCount} dropped`,
    );

    return {
      results,
      total,
      done,
      dropped: pool.droppedCount,
      usage,
      stopped,
    };
  }
}

/**
 * A rejected extraction still counts as a processed item
 */
function settledOutcome<P>(
  settled: PromiseSettledResult<ExtractionOutcome<P>>,
): ExtractionOutcome<P> {
  if (settled.status === 'fulfilled') {
    return settled.value;
  }
  return {
    kind: 'failure',
    reason: ExtractionError.getErrorMessage(settled.reason),
    usage: { ...EMPTY_USAGE },
  };
}
