import * as fs from 'node:fs/promises';
import { type Mock, beforeEach, describe, expect, test, vi } from 'vitest';

import { WorkItemSourceError } from '../errors/extraction-error';
import { ImageFileSource } from './image-file-source';
import { compareNatural } from './work-item-source';

vi.mock('node:fs/promises', () => ({
  stat: vi.fn(),
}));

const mockStat = fs.stat as unknown as Mock;

describe('ImageFileSource', () => {
  beforeEach(() => {
    vi.clearAllMocks();
    mockStat.mockResolvedValue({ isFile: () => true });
  });

  test('orders files naturally and numbers them', async () => {
    const source = new ImageFileSource([
      '/in/img10.png',
      '/in/img2.png',
      '/other/IMG1.jpg',
    ]);

    const batch = await source.collect();

    expect(batch).toEqual({
      items: [
        {
          sequenceIndex: 0,
          sourceRef: { kind: 'file', path: '/other/IMG1.jpg' },
          name: 'IMG1.jpg',
        },
        {
          sequenceIndex: 1,
          sourceRef: { kind: 'file', path: '/in/img2.png' },
          name: 'img2.png',
        },
        {
          sequenceIndex: 2,
          sourceRef: { kind: 'file', path: '/in/img10.png' },
          name: 'img10.png',
        },
      ],
      embeddedCount: 3,
      pageCount: 0,
    });
  });

  test('returns an empty batch for no paths', async () => {
    expect(await new ImageFileSource([]).collect()).toEqual({
      items: [],
      embeddedCount: 0,
      pageCount: 0,
    });
  });

  test('rejects a missing file', async () => {
    mockStat.mockRejectedValue(new Error('ENOENT'));

    await expect(
      new ImageFileSource(['/in/missing.png']).collect(),
    ).rejects.toThrow(new WorkItemSourceError('Image not found: /in/missing.png'));
  });

  test('rejects a directory', async () => {
    mockStat.mockResolvedValue({ isFile: () => false });

    await expect(new ImageFileSource(['/in']).collect()).rejects.toThrow(
      'Not a file: /in',
    );
  });
});

describe('compareNatural', () => {
  test('compares digit runs by value', () => {
    expect(
      ['page-10', 'page-9', 'page-1'].sort(compareNatural),
    ).toEqual(['page-1', 'page-9', 'page-10']);
  });
});
