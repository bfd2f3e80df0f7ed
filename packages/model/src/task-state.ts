import type { ExtractionMode } from './content-node';
import type { TokenUsage } from './token-usage';

/**
 * Lifecycle of one extraction task
 *
 * `completed`, `stopped` and `failed` are terminal. `stopped` means the user
 * stopped the run early and whatever was produced up to then was kept.
 */
export type TaskStatus =
  | 'pending'
  | 'in_progress'
  | 'paused'
  | 'completed'
  | 'stopped'
  | 'failed';

export const TERMINAL_TASK_STATUSES: readonly TaskStatus[] = [
  'completed',
  'stopped',
  'failed',
];

export function isTerminalStatus(status: TaskStatus): boolean {
  return TERMINAL_TASK_STATUSES.includes(status);
}

/**
 * One recorded failure. `item` is null for task-level failures.
 */
export interface TaskError {
  item: string | null;
  reason: string;
}

export interface TaskControlFlags {
  paused: boolean;
  stop: boolean;
}

/**
 * Live, pollable state of one extraction task
 */
export interface TaskState {
  id: string;

  /** Display name (PDF file stem or image batch name) */
  name: string;

  mode: ExtractionMode;

  total: number;

  /** Items processed so far, successful or not. Never decreases. */
  done: number;

  embedded: number;
  pages: number;
  status: TaskStatus;
  errors: TaskError[];

  /**
   * Items the service answered without anything recognizable. They are in
   * `errors` as well but do not point at a fault.
   */
  emptyResults: number;

  control: TaskControlFlags;
  usageTotals: TokenUsage;

  /** Epoch milliseconds */
  createdAt: number;
  updatedAt: number;
  startedAt?: number;
  finishedAt?: number;

  /** Time spent paused, excluding a pause that is still running */
  pausedMs: number;

  /** Start of the current pause, if paused */
  pauseStartedAt?: number;
}
