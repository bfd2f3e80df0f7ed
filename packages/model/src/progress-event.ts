import type { TokenUsage } from './token-usage';

export interface StartEvent {
  type: 'start';
  total: number;
  embedded: number;
  pages: number;
}

export interface StepEvent {
  type: 'step';
  done: number;
  total: number;

  /** Work item name */
  image: string;

  error: string | null;
}

export interface FinishEvent {
  type: 'finish';
  done: number;
  total: number;
  usage: TokenUsage;

  /** True when dispatching ended because stop was requested */
  stopped: boolean;
}

/**
 * Telemetry published by the extraction pipeline
 */
export type ProgressEvent = StartEvent | StepEvent | FinishEvent;

export type ProgressEventType = ProgressEvent['type'];
