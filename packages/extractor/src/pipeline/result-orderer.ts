import type { ExtractionOutcome, WorkItem } from '@pagescribe/model';

/**
 * One successful item, in source position
 */
export interface OrderedResult<P> {
  sequenceIndex: number;
  name: string;
  content: P;
}

/**
 * ResultOrderer - restores source order after concurrent processing
 *
 * Outcomes arrive in completion order and are keyed by `sequenceIndex`.
 * Only successes are kept; failures show up in the task's error list.
 */
export class ResultOrderer<P> {
  private readonly results = new Map<number, OrderedResult<P>>();

  record(item: WorkItem, outcome: ExtractionOutcome<P>): void {
    if (outcome.kind !== 'success') {
      return;
    }
    this.results.set(item.sequenceIndex, {
      sequenceIndex: item.sequenceIndex,
      name: item.name,
      content: outcome.content,
    });
  }

  ordered(): OrderedResult<P>[] {
    return [...this.results.values()].sort(
      (a, b) => a.sequenceIndex - b.sequenceIndex,
    );
  }
}
