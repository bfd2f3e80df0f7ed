import type { TaskControlFlags } from '@pagescribe/model';

export type ControlChange = 'pause' | 'resume' | 'stop';

export type ControlChangeListener = (change: ControlChange) => void;

/**
 * Pending wait on a ControlGate. `cancel` clears the poll timer when the
 * caller stops waiting for some other reason.
 */
export interface GateWait {
  promise: Promise<void>;
  cancel: () => void;
}

/**
 * ControlGate - pause/stop signal shared between a running pipeline and an
 * external controller.
 *
 * The controller flips flags with `pause()`, `resume()` and `stop()`; the
 * pipeline reads them before every dispatch. Waiters are woken by a change
 * notification and, as a fallback, by a poll timer, so a controller that
 * only writes flags is still observed within one poll interval.
 *
 * Stop is backed by an AbortSignal so it can be handed to code that already
 * understands cancellation tokens. Stop is final.
 *
 * @example
 * ```typescript
 * const gate = new ControlGate();
 * gate.pause();
 * setTimeout(() => gate.resume(), 1000);
 * const canDispatch = await gate.waitUntilDispatchable(500); // true
 * ```
 */
export class ControlGate {
  private paused = false;
  private readonly abortController = new AbortController();
  private readonly listeners = new Set<ControlChangeListener>();

  get isPaused(): boolean {
    return this.paused;
  }

  get isStopped(): boolean {
    return this.abortController.signal.aborted;
  }

  /**
   * Aborted once stop is requested
   */
  get signal(): AbortSignal {
    return this.abortController.signal;
  }

  /**
   * Block new dispatches. Returns false when already paused or stopped.
   */
  pause(): boolean {
    if (this.paused || this.isStopped) {
      return false;
    }
    this.paused = true;
    this.notify('pause');
    return true;
  }

  /**
   * Allow dispatching again. Returns false when not paused.
   */
  resume(): boolean {
    if (!this.paused) {
      return false;
    }
    this.paused = false;
    this.notify('resume');
    return true;
  }

  /**
   * Stop dispatching for good. Returns false when already stopped.
   */
  stop(): boolean {
    if (this.isStopped) {
      return false;
    }
    this.abortController.abort();
    this.notify('stop');
    return true;
  }

  snapshot(): TaskControlFlags {
    return { paused: this.paused, stop: this.isStopped };
  }

  /**
   * Subscribe to flag changes. Returns an unsubscribe function.
   */
  onChange(listener: ControlChangeListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /**
   * Resolve on the next flag change or after `timeoutMs`, whichever is first.
   */
  waitForChange(timeoutMs: number): GateWait {
    let timer: ReturnType<typeof setTimeout> | undefined;
    let unsubscribe: (() => void) | undefined;

    const cleanup = () => {
      if (timer !== undefined) {
        clearTimeout(timer);
        timer = undefined;
      }
      unsubscribe?.();
      unsubscribe = undefined;
    };

    const promise = new Promise<void>((resolve) => {
      const done = () => {
        cleanup();
        resolve();
      };
      timer = setTimeout(done, timeoutMs);
      unsubscribe = this.onChange(done);
    });

    return { promise, cancel: cleanup };
  }

  /**
   * Wait while paused. Resolves true when dispatching may continue, false
   * when stop was requested.
   */
  async waitUntilDispatchable(pollIntervalMs: number): Promise<boolean> {
    while (this.paused && !this.isStopped) {
      await this.waitForChange(pollIntervalMs).promise;
    }
    return !this.isStopped;
  }

  private notify(change: ControlChange): void {
    for (const listener of [...this.listeners]) {
      listener(change);
    }
  }
}
