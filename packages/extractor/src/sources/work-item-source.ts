import type { WorkItemBatch } from '@pagescribe/model';

/**
 * Produces the ordered work items of one task
 */
export interface WorkItemSource {
  /**
   * @throws WorkItemSourceError when the inputs cannot be read
   */
  collect(): Promise<WorkItemBatch>;

  /**
   * Release what `collect` left behind, such as temporary files. Called once
   * the run has ended, whatever the outcome.
   */
  dispose?(): Promise<void>;
}

/**
 * Compare file names in human order (`img2` before `img10`)
 */
export function compareNatural(a: string, b: string): number {
  return a.localeCompare(b, undefined, { numeric: true, sensitivity: 'base' });
}
