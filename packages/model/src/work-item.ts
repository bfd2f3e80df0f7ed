/**
 * Work item types
 *
 * A work item is one image submitted for extraction. Its `sequenceIndex` is
 * the only key used to restore source order after concurrent processing.
 */

/**
 * Handle to the bytes of one image.
 *
 * - `file`: an image on disk, read lazily when the item is dispatched
 * - `buffer`: image bytes already held in memory
 */
export type ImageRef =
  | { kind: 'file'; path: string }
  | { kind: 'buffer'; data: Uint8Array; mediaType: string };

/**
 * One image queued for extraction
 */
export interface WorkItem {
  /**
   * 0-based position in the submitted batch
   */
  readonly sequenceIndex: number;

  /**
   * Where the image bytes come from
   */
  readonly sourceRef: ImageRef;

  /**
   * Display name used in progress events and error lists
   * (e.g. "page-3-img-1.png")
   */
  readonly name: string;
}

/**
 * Ordered work items together with the counts reported in the `start` event
 */
export interface WorkItemBatch {
  items: WorkItem[];

  /**
   * Number of items that are embedded pictures (or directly supplied images)
   */
  embeddedCount: number;

  /**
   * Number of items that are full-page renders
   */
  pageCount: number;
}
