import type { WorkItem, WorkItemBatch } from '@pagescribe/model';

import * as fs from 'node:fs/promises';
import * as path from 'node:path';

import type { WorkItemSource } from './work-item-source';

import { WorkItemSourceError } from '../errors/extraction-error';
import { compareNatural } from './work-item-source';

/**
 * Directly supplied image files, processed in natural filename order.
 * Every image counts as embedded.
 */
export class ImageFileSource implements WorkItemSource {
  constructor(private readonly paths: readonly string[]) {}

  async collect(): Promise<WorkItemBatch> {
    const sorted = [...this.paths].sort(
      (a, b) =>
        compareNatural(path.basename(a), path.basename(b)) ||
        compareNatural(a, b),
    );

    for (const filePath of sorted) {
      await assertFile(filePath);
    }

    const items: WorkItem[] = sorted.map((filePath, index) => ({
      sequenceIndex: index,
      sourceRef: { kind: 'file', path: filePath },
      name: path.basename(filePath),
    }));

    return { items, embeddedCount: items.length, pageCount: 0 };
  }
}

async function assertFile(filePath: string): Promise<void> {
  let isFile: boolean;
  try {
    isFile = (await fs.stat(filePath)).isFile();
  } catch (error) {
    throw new WorkItemSourceError(`Image not found: ${filePath}`, {
      cause: error,
    });
  }
  if (!isFile) {
    throw new WorkItemSourceError(`Not a file: ${filePath}`);
  }
}
