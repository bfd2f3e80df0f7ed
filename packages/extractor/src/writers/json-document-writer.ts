import * as fs from 'node:fs/promises';
import * as path from 'node:path';

import type { DocumentWriter, ExtractedDocument } from './document-writer';

/**
 * Writes `<outputDir>/<name>.json` holding `{ name, mode, results }`
 */
export class JsonDocumentWriter implements DocumentWriter {
  constructor(private readonly outputDir: string) {}

  async write(document: ExtractedDocument): Promise<string> {
    const outputPath = path.join(this.outputDir, `${document.name}.json`);
    await fs.mkdir(this.outputDir, { recursive: true });
    await fs.writeFile(
      outputPath,
      `${JSON.stringify(document, null, 2)}\n`,
      'utf-8',
    );
    return outputPath;
  }
}
