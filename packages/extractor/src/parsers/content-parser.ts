import type {
  ContentBatch,
  ContentNode,
  ExtractionMode,
  ExtractionPayload,
  TableSet,
} from '@pagescribe/model';
import type { z } from 'zod';

import {
  normalizeContentNodes,
  normalizeTableSet,
  tablePayloadSchema,
  textPayloadSchema,
} from './content-schema';
import {
  parseCommaSeparated,
  parseMarkdownTable,
} from './delimited-table-parser';
import { repairNamedTable } from './table-repair';

const JSON_FENCE = /```json\s*([\s\S]*?)```/gi;
const ANY_FENCE = /```\s*([\s\S]*?)```/g;

function tryParseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

/**
 * Candidate JSON texts in the order they are tried: the whole output, the
 * fenced blocks (```json fences, else any fence), then the span from the
 * first `{` to the last `}`.
 */
function* jsonCandidates(raw: string): Generator<string> {
  yield raw;

  const jsonFences = [...raw.matchAll(JSON_FENCE)].map((m) => m[1]);
  const fences =
    jsonFences.length > 0
      ? jsonFences
      : [...raw.matchAll(ANY_FENCE)].map((m) => m[1]);
  yield* fences;

  const start = raw.indexOf('{');
  const end = raw.lastIndexOf('}');
  if (start !== -1 && end > start) {
    yield raw.slice(start, end + 1);
  }
}

function findPayload<T>(raw: string, schema: z.ZodType<T>): T | undefined {
  for (const candidate of jsonCandidates(raw)) {
    const parsed = schema.safeParse(tryParseJson(candidate));
    if (parsed.success) {
      return parsed.data;
    }
  }
  return undefined;
}

/**
 * ContentParser - turns raw model output into the interchange format
 *
 * Model output is often not clean JSON: it may be wrapped in code fences,
 * surrounded by prose, or not JSON at all. Strategies are tried in order and
 * the first success wins:
 *
 * 1. the whole text as JSON
 * 2. each fenced block as JSON
 * 3. the `{ ... }` span as JSON
 * 4. table mode: markdown pipe table, then comma-separated lines
 * 5. text mode: one paragraph per non-blank line
 *
 * An accepted JSON payload with an empty list is an empty result, not a
 * reason to try the next strategy. A non-empty list in which no node is
 * usable falls through to the plain-text strategies. Every table that leaves
 * the parser is repaired to a rectangular shape.
 *
 * @example
 * ```typescript
 * ContentParser.parse('```json\n{"content":[{"type":"h1","text":"Intro"}]}\n```', 'text');
 * // [{ type: 'h1', text: 'Intro' }]
 * ```
 */
export class ContentParser {
  static parse(raw: string, mode: 'text'): ContentBatch;
  static parse(raw: string, mode: 'table'): TableSet;
  static parse<M extends ExtractionMode>(
    raw: string,
    mode: M,
  ): ExtractionPayload<M>;
  static parse(raw: string, mode: ExtractionMode): ContentBatch | TableSet {
    return mode === 'text' ? this.parseContent(raw) : this.parseTables(raw);
  }

  /**
   * Text mode: headings, paragraphs, lists and tables in reading order
   */
  static parseContent(raw: string): ContentBatch {
    const payload = findPayload(raw, textPayloadSchema);
    if (payload) {
      const nodes = normalizeContentNodes(payload.content);
      if (nodes.length > 0 || payload.content.length === 0) {
        return nodes;
      }
    }

    return raw
      .split(/\r?\n/)
      .map((line) => line.trim())
      .filter((line) => line !== '')
      .map((text): ContentNode => ({ type: 'paragraph', text }));
  }

  /**
   * Table mode: named tables only. Nothing found is an empty set.
   */
  static parseTables(raw: string): TableSet {
    const payload = findPayload(raw, tablePayloadSchema);
    if (payload) {
      return normalizeTableSet(payload.tables);
    }

    const markdownRows = parseMarkdownTable(raw);
    if (markdownRows.length > 0) {
      return [repairNamedTable({ name: 'Table 1', rows: markdownRows })];
    }

    const csvRows = parseCommaSeparated(raw);
    if (csvRows.length > 0) {
      return [repairNamedTable({ name: 'Table 1', rows: csvRows })];
    }

    return [];
  }
}
