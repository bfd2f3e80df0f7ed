import type { TokenUsage } from './token-usage';

/**
 * Reasons reported when the service answered but nothing usable was found.
 * They show up in diagnostics without counting as a systemic fault.
 */
export const EMPTY_RESULT_REASONS = {
  text: 'no_content',
  table: 'no_tables',
} as const;

export type EmptyResultReason =
  (typeof EMPTY_RESULT_REASONS)[keyof typeof EMPTY_RESULT_REASONS];

export interface ExtractionSuccess<P> {
  kind: 'success';
  content: P;
  usage: TokenUsage;
}

export interface ExtractionFailure {
  kind: 'failure';
  reason: string;

  /**
   * Tokens consumed before the failure was known (0 when no response arrived)
   */
  usage: TokenUsage;
}

/**
 * Result of running one work item through the extraction service
 */
export type ExtractionOutcome<P> = ExtractionSuccess<P> | ExtractionFailure;

export function isEmptyResultReason(
  reason: string,
): reason is EmptyResultReason {
  return (
    reason === EMPTY_RESULT_REASONS.text ||
    reason === EMPTY_RESULT_REASONS.table
  );
}
