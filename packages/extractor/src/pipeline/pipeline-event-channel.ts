import type { ProgressEvent } from '@pagescribe/model';

import { EventEmitter } from 'node:events';

export type ProgressListener = (event: ProgressEvent) => void;

const PROGRESS_EVENT = 'progress';

/**
 * Typed fan-out of one task's progress events.
 *
 * Listeners run synchronously in subscription order. There is no buffering
 * or replay: a listener sees only events emitted after it subscribed.
 */
export class PipelineEventChannel {
  private readonly emitter = new EventEmitter();

  constructor() {
    this.emitter.setMaxListeners(100);
  }

  emit(event: ProgressEvent): void {
    this.emitter.emit(PROGRESS_EVENT, event);
  }

  /**
   * Returns the unsubscribe function
   */
  subscribe(listener: ProgressListener): () => void {
    this.emitter.on(PROGRESS_EVENT, listener);
    return () => {
      this.emitter.off(PROGRESS_EVENT, listener);
    };
  }
}
