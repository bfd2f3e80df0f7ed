import type { LoggerMethods } from '@pagescribe/logger';
import type {
  FinishEvent,
  ProgressEvent,
  StartEvent,
  StepEvent,
  TaskState,
} from '@pagescribe/model';
import type { ControlChange, ControlGate } from '@pagescribe/shared';

import { isEmptyResultReason, isTerminalStatus } from '@pagescribe/model';

import type { PipelineEventChannel } from './pipeline-event-channel';
import type { TaskRegistry } from './task-registry';

import { ExtractionError } from '../errors/extraction-error';

export interface ProgressAggregatorOptions {
  registry: TaskRegistry;
  taskId: string;
  gate: ControlGate;
  logger: LoggerMethods;
  now?: () => number;
}

/**
 * Move a running pause into `pausedMs`
 */
function closePause(state: TaskState, now: number): void {
  if (state.pauseStartedAt !== undefined) {
    state.pausedMs += now - state.pauseStartedAt;
    state.pauseStartedAt = undefined;
  }
}

/**
 * ProgressAggregator - folds one task's events into its registry entry
 *
 * The only writer of that entry. Listens to the pipeline's events and to the
 * task's control gate. Once the task is terminal, events are ignored.
 */
export class ProgressAggregator {
  private readonly registry: TaskRegistry;
  private readonly taskId: string;
  private readonly gate: ControlGate;
  private readonly logger: LoggerMethods;
  private readonly now: () => number;
  private unsubscribers: Array<() => void> = [];

  constructor(options: ProgressAggregatorOptions) {
    this.registry = options.registry;
    this.taskId = options.taskId;
    this.gate = options.gate;
    this.logger = options.logger;
    this.now = options.now ?? Date.now;
  }

  attach(channel: PipelineEventChannel): void {
    this.detach();
    this.unsubscribers = [
      channel.subscribe((event) => this.handle(event)),
      this.gate.onChange((change) => this.handleControl(change)),
    ];
  }

  detach(): void {
    for (const unsubscribe of this.unsubscribers) {
      unsubscribe();
    }
    this.unsubscribers = [];
  }

  handle(event: ProgressEvent): void {
    switch (event.type) {
      case 'start':
        this.onStart(event);
        break;
      case 'step':
        this.onStep(event);
        break;
      case 'finish':
        this.onFinish(event);
        break;
    }
  }

  /**
   * Record a failure of the driving logic (source, writer). Overrides a
   * completed or stopped status; a failed task stays as it is.
   */
  fail(error: unknown): void {
    const reason = ExtractionError.getErrorMessage(error);
    this.logger.error(
      `[ProgressAggregator] Task ${this.taskId} failed:`,
      reason,
    );

    const now = this.now();
    this.registry.update(this.taskId, (state) => {
      if (state.status === 'failed') {
        return;
      }
      closePause(state, now);
      state.status = 'failed';
      state.errors.push({ item: null, reason });
      state.control = this.gate.snapshot();
      state.finishedAt = now;
      state.updatedAt = now;
    });
  }

  private apply(mutator: (state: TaskState, now: number) => void): void {
    const now = this.now();
    this.registry.update(this.taskId, (state) => {
      if (isTerminalStatus(state.status)) {
        return;
      }
      mutator(state, now);
      state.control = this.gate.snapshot();
      state.updatedAt = now;
    });
  }

  private runningStatus(): 'paused' | 'in_progress' {
    return this.gate.isPaused ? 'paused' : 'in_progress';
  }

  private onStart(event: StartEvent): void {
    this.apply((state, now) => {
      state.total = event.total;
      state.embedded = event.embedded;
      state.pages = event.pages;
      state.startedAt = now;
      state.status = this.runningStatus();
      // Elapsed time counts from start, so pauses before it do not count
      state.pausedMs = 0;
      state.pauseStartedAt = this.gate.isPaused ? now : undefined;
    });
    this.logger.info(
      `[ProgressAggregator] Task ${this.taskId} started: ${event.total} items (${event.embedded} embedded, ${event.pages} pages)`,
    );
  }

  private onStep(event: StepEvent): void {
    this.apply((state) => {
      state.done = Math.max(state.done, event.done);
      if (event.error !== null) {
        state.errors.push({ item: event.image, reason: event.error });
        if (isEmptyResultReason(event.error)) {
          state.emptyResults++;
        }
      }
      state.status = this.runningStatus();
    });
  }

  private onFinish(event: FinishEvent): void {
    this.apply((state, now) => {
      closePause(state, now);
      state.usageTotals = { ...event.usage };
      if (event.stopped) {
        state.status = 'stopped';
        state.done = Math.max(state.done, event.done);
      } else {
        state.status = 'completed';
        state.done = Math.max(state.done, event.done, state.total);
      }
      state.finishedAt = now;
    });
    this.logger.info(
      `[ProgressAggregator] Task ${this.taskId} ${event.stopped ? 'stopped' : 'completed'}: ${event.done}/${event.total} items`,
    );
  }

  private handleControl(change: ControlChange): void {
    this.apply((state, now) => {
      switch (change) {
        case 'pause':
          if (state.pauseStartedAt === undefined) {
            state.pauseStartedAt = now;
          }
          state.status = 'paused';
          break;
        case 'resume':
          closePause(state, now);
          state.status =
            state.startedAt === undefined ? 'pending' : 'in_progress';
          break;
        case 'stop':
          break;
      }
    });
    this.logger.info(`[ProgressAggregator] Task ${this.taskId}: ${change}`);
  }
}
