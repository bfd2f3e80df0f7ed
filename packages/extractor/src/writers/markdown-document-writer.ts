import * as fs from 'node:fs/promises';
import * as path from 'node:path';

import type { DocumentWriter, ExtractedDocument } from './document-writer';

import { MarkdownRenderer } from './markdown-renderer';

/**
 * Writes `<outputDir>/<name>.md`
 */
export class MarkdownDocumentWriter implements DocumentWriter {
  constructor(private readonly outputDir: string) {}

  async write(document: ExtractedDocument): Promise<string> {
    const outputPath = path.join(this.outputDir, `${document.name}.md`);
    await fs.mkdir(this.outputDir, { recursive: true });
    await fs.writeFile(outputPath, MarkdownRenderer.render(document), 'utf-8');
    return outputPath;
  }
}
