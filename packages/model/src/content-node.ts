/**
 * Structured content interchange format
 *
 * These shapes are exactly what a document writer receives, so they double as
 * the JSON format the extraction model is asked to produce.
 */

export type HeadingType = 'h1' | 'h2' | 'h3';

export interface HeadingNode {
  type: HeadingType;
  text: string;
}

export interface ParagraphNode {
  type: 'paragraph';
  text: string;
}

export interface ListNode {
  type: 'list';
  items: string[];
}

/**
 * Table node. Every row has the same length as the first row.
 */
export interface TableNode {
  type: 'table';
  rows: string[][];
}

export type ContentNode = HeadingNode | ParagraphNode | ListNode | TableNode;

/**
 * Content recognized in one image, in reading order. Empty means nothing was
 * recognized.
 */
export type ContentBatch = ContentNode[];

/**
 * A table extracted in table mode
 */
export interface NamedTable {
  name: string;
  rows: string[][];
}

export type TableSet = NamedTable[];

/**
 * What to extract from each image
 *
 * - `text`: full document structure (headings, paragraphs, lists, tables)
 * - `table`: tables only, for spreadsheet output
 */
export type ExtractionMode = 'text' | 'table';

/**
 * Payload produced for one image in the given mode
 */
export type ExtractionPayload<M extends ExtractionMode = ExtractionMode> =
  M extends 'text' ? ContentBatch : TableSet;

const HEADING_LEVELS: Record<HeadingType, 1 | 2 | 3> = {
  h1: 1,
  h2: 2,
  h3: 3,
};

export function isHeadingNode(node: ContentNode): node is HeadingNode {
  return node.type === 'h1' || node.type === 'h2' || node.type === 'h3';
}

/**
 * Heading depth (1 = top-level) of a heading node
 */
export function headingLevel(node: HeadingNode): 1 | 2 | 3 {
  return HEADING_LEVELS[node.type];
}
