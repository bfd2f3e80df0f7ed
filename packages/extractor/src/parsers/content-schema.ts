import type {
  ContentBatch,
  ContentNode,
  NamedTable,
  TableSet,
} from '@pagescribe/model';

import { z } from 'zod';

import { repairNamedTable, repairTable } from './table-repair';

/**
 * Model output in text mode: an object with a `content` array.
 * Other keys (e.g. `status`) are ignored.
 */
export const textPayloadSchema = z.object({
  content: z.array(z.unknown()),
});

/**
 * Model output in table mode: an object with a `tables` array
 */
export const tablePayloadSchema = z.object({
  tables: z.array(z.unknown()),
});

const nonBlankString = z
  .string()
  .refine((value) => value.trim() !== '', { message: 'Blank text' });

function cellText(cell: unknown): string {
  if (cell === null || cell === undefined) {
    return '';
  }
  if (typeof cell === 'string') {
    return cell;
  }
  if (typeof cell === 'object') {
    return JSON.stringify(cell);
  }
  return String(cell);
}

/**
 * Rows that are not arrays are dropped; cells become strings
 */
const rowsSchema = z
  .array(z.unknown())
  .transform((rows) =>
    rows
      .filter((row): row is unknown[] => Array.isArray(row))
      .map((row) => row.map(cellText)),
  );

const headingNodeSchema = z.object({
  type: z.enum(['h1', 'h2', 'h3']),
  text: nonBlankString,
});

const paragraphNodeSchema = z.object({
  type: z.literal('paragraph'),
  text: nonBlankString,
});

const listNodeSchema = z.object({
  type: z.literal('list'),
  items: z.array(z.unknown()).transform((items) =>
    items
      .map((item) =>
        typeof item === 'number' && Number.isFinite(item)
          ? String(item)
          : item,
      )
      .filter(
        (item): item is string =>
          typeof item === 'string' && item.trim() !== '',
      ),
  ),
});

const tableNodeSchema = z.object({
  type: z.literal('table'),
  rows: rowsSchema,
});

// Unknown node types that still carry text are kept as paragraphs
const textFallbackSchema = z.object({
  text: nonBlankString,
});

const namedTableSchema = z.object({
  name: z.unknown().optional(),
  rows: rowsSchema,
});

function nodeType(raw: unknown): unknown {
  return typeof raw === 'object' && raw !== null && 'type' in raw
    ? raw.type
    : undefined;
}

/**
 * Normalize one raw node, or undefined when it cannot be used.
 * A bare string is a paragraph.
 */
export function normalizeContentNode(raw: unknown): ContentNode | undefined {
  if (typeof raw === 'string') {
    const text = raw.trim();
    return text !== '' ? { type: 'paragraph', text } : undefined;
  }

  switch (nodeType(raw)) {
    case 'h1':
    case 'h2':
    case 'h3': {
      const heading = headingNodeSchema.safeParse(raw);
      return heading.success ? heading.data : undefined;
    }
    case 'paragraph': {
      const paragraph = paragraphNodeSchema.safeParse(raw);
      return paragraph.success ? paragraph.data : undefined;
    }
    case 'list': {
      const list = listNodeSchema.safeParse(raw);
      return list.success && list.data.items.length > 0
        ? list.data
        : undefined;
    }
    case 'table': {
      const table = tableNodeSchema.safeParse(raw);
      return table.success && table.data.rows.length > 0
        ? { type: 'table', rows: repairTable(table.data.rows) }
        : undefined;
    }
    default: {
      const textual = textFallbackSchema.safeParse(raw);
      return textual.success
        ? { type: 'paragraph', text: textual.data.text }
        : undefined;
    }
  }
}

export function normalizeContentNodes(raw: readonly unknown[]): ContentBatch {
  const nodes: ContentBatch = [];
  for (const item of raw) {
    const node = normalizeContentNode(item);
    if (node) {
      nodes.push(node);
    }
  }
  return nodes;
}

/**
 * Normalize raw tables. Unnamed tables are named `Table <n>` after their
 * 1-based position in the raw list; tables without rows are dropped.
 */
export function normalizeTableSet(raw: readonly unknown[]): TableSet {
  const tables: NamedTable[] = [];
  raw.forEach((item, index) => {
    const parsed = namedTableSchema.safeParse(item);
    if (!parsed.success || parsed.data.rows.length === 0) {
      return;
    }
    const { name } = parsed.data;
    tables.push(
      repairNamedTable({
        name:
          typeof name === 'string' && name.trim() !== ''
            ? name.trim()
            : `Table ${index + 1}`,
        rows: parsed.data.rows,
      }),
    );
  });
  return tables;
}
