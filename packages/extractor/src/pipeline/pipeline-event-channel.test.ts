import type { ProgressEvent } from '@pagescribe/model';

import { describe, expect, test, vi } from 'vitest';

import { PipelineEventChannel } from './pipeline-event-channel';

const start: ProgressEvent = { type: 'start', total: 2, embedded: 1, pages: 1 };
const step: ProgressEvent = {
  type: 'step',
  done: 1,
  total: 2,
  image: 'a.png',
  error: null,
};

describe('PipelineEventChannel', () => {
  test('delivers every event to subscribers in order', () => {
    const channel = new PipelineEventChannel();
    const seen: string[] = [];
    channel.subscribe((event) => seen.push(`first:${event.type}`));
    channel.subscribe((event) => seen.push(`second:${event.type}`));

    channel.emit(start);
    channel.emit(step);

    expect(seen).toEqual([
      'first:start',
      'second:start',
      'first:step',
      'second:step',
    ]);
  });

  test('unsubscribes one listener only', () => {
    const channel = new PipelineEventChannel();
    const removed = vi.fn();
    const kept = vi.fn();
    const unsubscribe = channel.subscribe(removed);
    channel.subscribe(kept);

    unsubscribe();
    channel.emit(start);

    expect(removed).not.toHaveBeenCalled();
    expect(kept).toHaveBeenCalledWith(start);
  });
});
