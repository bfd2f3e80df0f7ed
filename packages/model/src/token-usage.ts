/**
 * Token usage types
 *
 * Usage numbers are best-effort aggregates reported by the extraction
 * service; absent counters are recorded as 0.
 */

/**
 * Token counts for one call or an aggregate of calls
 */
export interface TokenUsage {
  prompt: number;
  completion: number;
  total: number;
}

/**
 * Usage of one phase of one component (e.g. VisionCaller / text-extraction)
 */
export interface PhaseUsageReport {
  component: string;
  phase: string;
  modelName: string;
  calls: number;
  usage: TokenUsage;
}

/**
 * Usage breakdown for a whole run
 */
export interface TokenUsageReport {
  phases: PhaseUsageReport[];
  total: TokenUsage;
}

export const EMPTY_USAGE: Readonly<TokenUsage> = Object.freeze({
  prompt: 0,
  completion: 0,
  total: 0,
});

/**
 * Sum two usage records into a new one
 */
export function addUsage(a: TokenUsage, b: TokenUsage): TokenUsage {
  return {
    prompt: a.prompt + b.prompt,
    completion: a.completion + b.completion,
    total: a.total + b.total,
  };
}
