import type { LoggerMethods } from '@pagescribe/logger';
import type { WorkItem, WorkItemBatch } from '@pagescribe/model';

import { spawnChecked } from '@pagescribe/shared';
import * as fs from 'node:fs/promises';
import * as path from 'node:path';

import type { SourceMode } from '../config/constants';
import type { WorkItemSource } from './work-item-source';

import { PDF_IMAGE_SOURCE } from '../config/constants';
import {
  ExtractionError,
  WorkItemSourceError,
} from '../errors/extraction-error';

export interface PdfImageSourceOptions {
  /** Which images become work items (default: both) */
  sourceMode?: SourceMode;

  /** Full-page render resolution (default: 200) */
  dpi?: number;
}

interface ImageFile {
  path: string;
  name: string;
}

interface NumberedFile {
  file: string;
  page: number;
  number: number;
}

// pdfimages -p names files <root>-<page>-<number>.png
const EMBEDDED_FILE = /^img-(\d+)-(\d+)\.png$/;
const PAGE_FILE = /^page-(\d+)\.png$/;

const EMBEDDED_DIR = 'embedded';
const PAGES_DIR = 'pages';

/**
 * Images of one PDF: embedded pictures, full-page renders, or both.
 *
 * Embedded pictures come first, ordered by page, then full pages in page
 * order.
 *
 * ## System Requirements
 * - poppler-utils for `pdfimages`
 * - ImageMagick and Ghostscript for page renders
 */
export class PdfImageSource implements WorkItemSource {
  private readonly sourceMode: SourceMode;
  private readonly dpi: number;

  constructor(
    private readonly logger: LoggerMethods,
    private readonly pdfPath: string,
    private readonly workDir: string,
    options: PdfImageSourceOptions = {},
  ) {
    this.sourceMode = options.sourceMode ?? 'both';
    this.dpi = options.dpi ?? PDF_IMAGE_SOURCE.DEFAULT_DPI;
  }

  async collect(): Promise<WorkItemBatch> {
    const embedded =
      this.sourceMode === 'page' ? [] : await this.extractEmbedded();
    const pages =
      this.sourceMode === 'embedded' ? [] : await this.renderPages();

    const items: WorkItem[] = [...embedded, ...pages].map((file, index) => ({
      sequenceIndex: index,
      sourceRef: { kind: 'file', path: file.path },
      name: file.name,
    }));

    this.logger.info(
      `[PdfImageSource] ${path.basename(this.pdfPath)}: ${embedded.length} embedded, ${pages.length} pages`,
    );

    return {
      items,
      embeddedCount: embedded.length,
      pageCount: pages.length,
    };
  }

  /**
   * Remove the extracted and rendered images. `workDir` itself is kept.
   */
  async dispose(): Promise<void> {
    for (const dir of [EMBEDDED_DIR, PAGES_DIR]) {
      await fs.rm(path.join(this.workDir, dir), {
        recursive: true,
        force: true,
      });
    }
  }

  private async extractEmbedded(): Promise<ImageFile[]> {
    const dir = path.join(this.workDir, EMBEDDED_DIR);
    await this.run(dir, 'pdfimages', [
      '-png',
      '-p',
      this.pdfPath,
      path.join(dir, 'img'),
    ]);

    const files = (await fs.readdir(dir))
      .map((file): NumberedFile | undefined => {
        const match = EMBEDDED_FILE.exec(file);
        return match
          ? { file, page: Number(match[1]), number: Number(match[2]) }
          : undefined;
      })
      .filter((entry): entry is NumberedFile => entry !== undefined)
      .sort((a, b) => a.page - b.page || a.number - b.number);

    const perPage = new Map<number, number>();
    return files.map(({ file, page }) => {
      const index = (perPage.get(page) ?? 0) + 1;
      perPage.set(page, index);
      return {
        path: path.join(dir, file),
        name: `page-${page}-img-${index}.png`,
      };
    });
  }

  private async renderPages(): Promise<ImageFile[]> {
    const dir = path.join(this.workDir, PAGES_DIR);
    await this.run(dir, 'magick', [
      '-density',
      this.dpi.toString(),
      this.pdfPath,
      '-background',
      'white',
      '-alpha',
      'remove',
      '-alpha',
      'off',
      '-scene',
      '1',
      path.join(dir, 'page-%d.png'),
    ]);

    return (await fs.readdir(dir))
      .map((file): NumberedFile | undefined => {
        const match = PAGE_FILE.exec(file);
        return match ? { file, page: Number(match[1]), number: 0 } : undefined;
      })
      .filter((entry): entry is NumberedFile => entry !== undefined)
      .sort((a, b) => a.page - b.page)
      .map(({ file, page }) => ({
        path: path.join(dir, file),
        name: `page-${page}-full.png`,
      }));
  }

  private async run(
    dir: string,
    command: string,
    args: string[],
  ): Promise<void> {
    try {
      await fs.mkdir(dir, { recursive: true });
      await spawnChecked(command, args);
    } catch (error) {
      throw new WorkItemSourceError(
        `Failed to read images from ${this.pdfPath}: ${ExtractionError.getErrorMessage(error)}`,
        { cause: error },
      );
    }
  }
}
