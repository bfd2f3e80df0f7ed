import type { ContentBatch, TableSet } from '@pagescribe/model';

import type { OrderedResult } from '../pipeline/result-orderer';

export interface TextDocument {
  name: string;
  mode: 'text';
  results: OrderedResult<ContentBatch>[];
}

export interface TableDocument {
  name: string;
  mode: 'table';
  results: OrderedResult<TableSet>[];
}

/**
 * Ordered results of one finished task
 */
export type ExtractedDocument = TextDocument | TableDocument;

/**
 * Output backend for finished tasks
 */
export interface DocumentWriter {
  /**
   * @returns Path of the written file
   */
  write(document: ExtractedDocument): Promise<string>;
}
