import type { ControlGate } from './control-gate';

export interface WorkerPoolOptions {
  /** Maximum number of `fn` calls in flight */
  concurrency: number;
  /** Optional pause/stop gate consulted before every dispatch */
  gate?: ControlGate;
  /** Upper bound on how long a paused pool sleeps between gate checks */
  pollIntervalMs?: number;
}

/**
 * One settled unit of work, reported in completion order
 */
export interface PoolCompletion<T, R> {
  item: T;
  index: number;
  outcome: PromiseSettledResult<R>;
}

const DEFAULT_POLL_INTERVAL_MS = 500;

/**
 * WorkerPool - bounded, controllable fan-out over a list of items.
 *
 * Keeps up to `concurrency` calls active at all times: when one settles the
 * window is refilled with the next item. Completions are yielded as they
 * settle, so the caller sees results in completion order and restores input
 * order itself if it needs to.
 *
 * With a gate attached the pool checks pause/stop before every dispatch.
 * Stop drops the undispatched tail but in-flight work still drains and is
 * yielded. Pause holds dispatching while in-flight completions keep flowing.
 */
export class WorkerPool {
  private readonly concurrency: number;
  private readonly gate?: ControlGate;
  private readonly pollIntervalMs: number;

  private dropped = 0;

  constructor(options: WorkerPoolOptions) {
    if (!Number.isInteger(options.concurrency) || options.concurrency < 1) {
      throw new RangeError(
        `[WorkerPool] concurrency must be a positive integer, got ${options.concurrency}`,
      );
    }
    this.concurrency = options.concurrency;
    this.gate = options.gate;
    this.pollIntervalMs = options.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS;
  }

  /** Items skipped because stop was requested */
  get droppedCount(): number {
    return this.dropped;
  }

  async *process<T, R>(
    items: readonly T[],
    fn: (item: T, index: number) => Promise<R>,
  ): AsyncGenerator<PoolCompletion<T, R>, void, undefined> {
    this.dropped = 0;

    const inFlight = new Map<number, Promise<PoolCompletion<T, R>>>();
    let nextIndex = 0;

    while (true) {
      while (
        inFlight.size < this.concurrency &&
        nextIndex < items.length &&
        this.canDispatch()
      ) {
        const index = nextIndex++;
        inFlight.set(index, this.run(items[index], index, fn));
      }

      if (this.gate?.isStopped && nextIndex < items.length) {
        this.dropped += items.length - nextIndex;
        nextIndex = items.length;
      }

      const hasPending = nextIndex < items.length;

      if (inFlight.size === 0) {
        if (!hasPending) {
          return;
        }
        // Paused with an idle window
        await this.gate?.waitUntilDispatchable(this.pollIntervalMs);
        continue;
      }

      const completion = await this.nextCompletion(inFlight, hasPending);
      if (completion === undefined) {
        continue;
      }
      inFlight.delete(completion.index);
      yield completion;
    }
  }

  private canDispatch(): boolean {
    return !this.gate || (!this.gate.isPaused && !this.gate.isStopped);
  }

  private run<T, R>(
    item: T,
    index: number,
    fn: (item: T, index: number) => Promise<R>,
  ): Promise<PoolCompletion<T, R>> {
    return Promise.resolve()
      .then(() => fn(item, index))
      .then(
        (value): PromiseSettledResult<R> => ({ status: 'fulfilled', value }),
        (reason: unknown): PromiseSettledResult<R> => ({
          status: 'rejected',
          reason,
        }),
      )
      .then((outcome) => ({ item, index, outcome }));
  }

  /**
   * Next settled completion. While paused with work still pending, a gate
   * change or poll tick also wakes the loop (resolving undefined) so that a
   * resume refills the window without waiting on in-flight work.
   */
  private async nextCompletion<T, R>(
    inFlight: Map<number, Promise<PoolCompletion<T, R>>>,
    hasPending: boolean,
  ): Promise<PoolCompletion<T, R> | undefined> {
    const settled = [...inFlight.values()];
    if (!this.gate?.isPaused || !hasPending) {
      return Promise.race(settled);
    }

    const wait = this.gate.waitForChange(this.pollIntervalMs);
    try {
      return await Promise.race([
        ...settled,
        wait.promise.then(() => undefined),
      ]);
    } finally {
      wait.cancel();
    }
  }
}
