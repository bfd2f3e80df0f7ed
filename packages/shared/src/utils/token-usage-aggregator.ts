import type { LoggerMethods } from '@pagescribe/logger';
import type {
  PhaseUsageReport,
  TokenUsage,
  TokenUsageReport,
} from '@pagescribe/model';

import { EMPTY_USAGE, addUsage } from '@pagescribe/model';

import type { ExtendedTokenUsage } from './vision-caller';

/**
 * Format token usage as a human-readable string
 *
 * @returns Formatted string like "1500 prompt, 300 completion, 1800 total"
 */
function formatTokens(usage: TokenUsage): string {
  return `${usage.prompt} prompt, ${usage.completion} completion, ${usage.total} total`;
}

/**
 * TokenUsageAggregator - Sums token usage across all calls of a run
 *
 * Collects usage from every vision call and reports it per
 * component/phase/model, plus a grand total, at the end of the run.
 *
 * @example
 * ```typescript
 * const aggregator = new TokenUsageAggregator();
 *
 * aggregator.track({
 *   component: 'ExtractionClient',
 *   phase: 'text-extraction',
 *   modelName: 'gpt-4o-mini',
 *   prompt: 1500,
 *   completion: 300,
 *   total: 1800,
 * });
 *
 * aggregator.logSummary(logger, 'ExtractionPipeline');
 * // [ExtractionPipeline] Token usage summary:
 * //   - ExtractionClient/text-extraction (gpt-4o-mini, 1 calls): 1500 prompt, 300 completion, 1800 total
 * // [ExtractionPipeline] Grand total: 1500 prompt, 300 completion, 1800 total
 * ```
 */
export class TokenUsageAggregator {
  private phases = new Map<string, PhaseUsageReport>();

  /**
   * Track token usage from one call
   */
  track(usage: ExtendedTokenUsage): void {
    const key = `${usage.component}\u0000${usage.phase}\u0000${usage.modelName}`;
    const existing = this.phases.get(key);
    const delta: TokenUsage = {
      prompt: usage.prompt,
      completion: usage.completion,
      total: usage.total,
    };

    if (existing) {
      existing.calls++;
      existing.usage = addUsage(existing.usage, delta);
      return;
    }

    this.phases.set(key, {
      component: usage.component,
      phase: usage.phase,
      modelName: usage.modelName,
      calls: 1,
      usage: delta,
    });
  }

  /**
   * Total usage across all tracked calls
   */
  getTotalUsage(): TokenUsage {
    let total: TokenUsage = { ...EMPTY_USAGE };
    for (const phase of this.phases.values()) {
      total = addUsage(total, phase.usage);
    }
    return total;
  }

  /**
   * Breakdown in first-tracked order, detached from internal state
   */
  getReport(): TokenUsageReport {
    return {
      phases: [...this.phases.values()].map((phase) => ({
        ...phase,
        usage: { ...phase.usage },
      })),
      total: this.getTotalUsage(),
    };
  }

  /**
   * Log the breakdown. Call once at the end of a run.
   */
  logSummary(logger: LoggerMethods, owner: string): void {
    if (this.phases.size === 0) {
      logger.info(`[${owner}] No token usage to report`);
      return;
    }

    logger.info(`[${owner}] Token usage summary:`);
    for (const phase of this.phases.values()) {
      logger.info(
        `  - ${phase.component}/${phase.phase} (${phase.modelName}, ${phase.calls} calls): ${formatTokens(phase.usage)}`,
      );
    }
    logger.info(`[${owner}] Grand total: ${formatTokens(this.getTotalUsage())}`);
  }

  /**
   * Reset all tracked usage
   */
  reset(): void {
    this.phases = new Map();
  }
}
