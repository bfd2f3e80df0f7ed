import type { ContentNode, NamedTable } from '@pagescribe/model';

import { headingLevel, isHeadingNode } from '@pagescribe/model';

import type { ExtractedDocument } from './document-writer';

export const EMPTY_DOCUMENT_NOTICE = 'No content was recognized.';

/**
 * MarkdownRenderer
 *
 * Renders ordered extraction results as one Markdown document. Blocks are
 * separated by a blank line; results of consecutive images follow each
 * other without a separator.
 */
export class MarkdownRenderer {
  static render(document: ExtractedDocument): string {
    const blocks =
      document.mode === 'text'
        ? document.results.flatMap((result) =>
            result.content.map((node) => MarkdownRenderer.nodeToMarkdown(node)),
          )
        : document.results.flatMap((result) =>
            result.content.map((table) =>
              MarkdownRenderer.namedTableToMarkdown(table),
            ),
          );

    const nonEmpty = blocks.filter((block) => block !== '');
    if (nonEmpty.length === 0) {
      return `${EMPTY_DOCUMENT_NOTICE}\n`;
    }
    return `${nonEmpty.join('\n\n')}\n`;
  }

  static nodeToMarkdown(node: ContentNode): string {
    if (isHeadingNode(node)) {
      return `${'#'.repeat(headingLevel(node))} ${node.text.trim()}`;
    }
    switch (node.type) {
      case 'paragraph':
        return node.text.trim();
      case 'list':
        return node.items.map((item) => `- ${item.trim()}`).join('\n');
      case 'table':
        return MarkdownRenderer.tableToMarkdown(node.rows);
    }
  }

  static namedTableToMarkdown(table: NamedTable): string {
    const body = MarkdownRenderer.tableToMarkdown(table.rows);
    return body ? `## ${table.name}\n\n${body}` : `## ${table.name}`;
  }

  /**
   * Pipe table with the first row as header
   *
   * @example
   * Output:
   * | Item | Cost |
   * | --- | --- |
   * | tea | 2 |
   */
  static tableToMarkdown(rows: readonly (readonly string[])[]): string {
    if (rows.length === 0 || rows[0].length === 0) {
      return '';
    }

    const lines: string[] = [];
    rows.forEach((row, rowIdx) => {
      const cells = row.map((cell) => MarkdownRenderer.escapeTableCell(cell));
      lines.push(`| ${cells.join(' | ')} |`);

      // Separator after header row
      if (rowIdx === 0) {
        lines.push(`| ${row.map(() => '---').join(' | ')} |`);
      }
    });
    return lines.join('\n');
  }

  private static escapeTableCell(text: string): string {
    return text.replace(/\|/g, '\\|').replace(/\r?\n/g, ' ').trim();
  }
}
