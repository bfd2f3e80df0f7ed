import type { LoggerMethods } from '@pagescribe/logger';
import type { ExtractionMode, TaskState } from '@pagescribe/model';

import { EMPTY_USAGE, isTerminalStatus } from '@pagescribe/model';
import { randomUUID } from 'node:crypto';

export interface TaskInit {
  /** Defaults to `task_<uuid>` */
  id?: string;
  name: string;
  mode: ExtractionMode;
}

export type TaskRemovedListener = (id: string) => void;

export interface TaskRegistryOptions {
  logger?: LoggerMethods;
  now?: () => number;
}

/**
 * TaskRegistry - in-memory store of task states
 *
 * Created by the host and shared by every task it runs. Each entry has a
 * single writer (its ProgressAggregator); readers take snapshots.
 * Terminal tasks are evicted once their retention has passed.
 */
export class TaskRegistry {
  private readonly tasks = new Map<string, TaskState>();
  private readonly logger?: LoggerMethods;
  private readonly now: () => number;
  private readonly removedListeners = new Set<TaskRemovedListener>();
  private evictionTimer: NodeJS.Timeout | null = null;

  constructor(options: TaskRegistryOptions = {}) {
    this.logger = options.logger;
    this.now = options.now ?? Date.now;
  }

  create(init: TaskInit): TaskState {
    const id = init.id ?? `task_${randomUUID()}`;
    if (this.tasks.has(id)) {
      throw new Error(`[TaskRegistry] Task ${id} already exists`);
    }

    const now = this.now();
    const state: TaskState = {
      id,
      name: init.name,
      mode: init.mode,
      total: 0,
      done: 0,
      embedded: 0,
      pages: 0,
      status: 'pending',
      errors: [],
      emptyResults: 0,
      control: { paused: false, stop: false },
      usageTotals: { ...EMPTY_USAGE },
      createdAt: now,
      updatedAt: now,
      pausedMs: 0,
    };
    this.tasks.set(id, state);
    return state;
  }

  /**
   * Live record. Callers other than the task's writer should use `snapshot`.
   */
  get(id: string): TaskState | undefined {
    return this.tasks.get(id);
  }

  snapshot(id: string): TaskState | undefined {
    const state = this.tasks.get(id);
    return state ? structuredClone(state) : undefined;
  }

  /**
   * Apply a mutation to a live record.
   *
   * @returns false when the task is unknown
   */
  update(id: string, mutator: (state: TaskState) => void): boolean {
    const state = this.tasks.get(id);
    if (!state) {
      return false;
    }
    mutator(state);
    return true;
  }

  list(): TaskState[] {
    return [...this.tasks.values()].map((state) => structuredClone(state));
  }

  delete(id: string): boolean {
    const deleted = this.tasks.delete(id);
    if (deleted) {
      this.notifyRemoved(id);
    }
    return deleted;
  }

  /**
   * Called for every task that leaves the registry, deleted or evicted
   *
   * @returns Unsubscribe function
   */
  onRemoved(listener: TaskRemovedListener): () => void {
    this.removedListeners.add(listener);
    return () => {
      this.removedListeners.delete(listener);
    };
  }

  get size(): number {
    return this.tasks.size;
  }

  /**
   * Remove terminal tasks that finished more than `retentionMs` ago.
   *
   * @returns Ids of the removed tasks
   */
  evictExpired(retentionMs: number, now: number = this.now()): string[] {
    const evicted: string[] = [];
    for (const [id, state] of this.tasks) {
      if (
        isTerminalStatus(state.status) &&
        state.finishedAt !== undefined &&
        now - state.finishedAt > retentionMs
      ) {
        this.tasks.delete(id);
        this.notifyRemoved(id);
        evicted.push(id);
      }
    }

    if (evicted.length > 0) {
      this.logger?.debug(
        `[TaskRegistry] Evicted ${evicted.length} expired tasks`,
      );
    }
    return evicted;
  }

  /**
   * Sweep periodically. The timer does not keep the process alive.
   */
  startEviction(intervalMs: number, retentionMs: number): void {
    this.stopEviction();
    this.evictionTimer = setInterval(() => {
      this.evictExpired(retentionMs);
    }, intervalMs);
    this.evictionTimer.unref();
  }

  stopEviction(): void {
    if (this.evictionTimer) {
      clearInterval(this.evictionTimer);
      this.evictionTimer = null;
    }
  }

  private notifyRemoved(id: string): void {
    for (const listener of this.removedListeners) {
      listener(id);
    }
  }
}
