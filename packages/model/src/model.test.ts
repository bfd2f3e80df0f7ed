import { describe, expect, test } from 'vitest';

import {
  EMPTY_USAGE,
  addUsage,
  headingLevel,
  isEmptyResultReason,
  isHeadingNode,
  isTerminalStatus,
} from './index';

describe('content nodes', () => {
  test('recognizes heading nodes', () => {
    expect(isHeadingNode({ type: 'h2', text: 'Scope' })).toBe(true);
    expect(isHeadingNode({ type: 'paragraph', text: 'Body' })).toBe(false);
    expect(isHeadingNode({ type: 'list', items: [] })).toBe(false);
  });

  test('maps heading types to levels', () => {
    expect(headingLevel({ type: 'h1', text: 'a' })).toBe(1);
    expect(headingLevel({ type: 'h2', text: 'b' })).toBe(2);
    expect(headingLevel({ type: 'h3', text: 'c' })).toBe(3);
  });
});

describe('addUsage', () => {
  test('sums each counter', () => {
    expect(
      addUsage(
        { prompt: 10, completion: 5, total: 15 },
        { prompt: 1, completion: 2, total: 3 },
      ),
    ).toEqual({ prompt: 11, completion: 7, total: 18 });
  });

  test('leaves the empty usage untouched', () => {
    addUsage(EMPTY_USAGE, { prompt: 1, completion: 1, total: 2 });

    expect(EMPTY_USAGE).toEqual({ prompt: 0, completion: 0, total: 0 });
  });
});

describe('isEmptyResultReason', () => {
  test('accepts the empty-result sentinels only', () => {
    expect(isEmptyResultReason('no_content')).toBe(true);
    expect(isEmptyResultReason('no_tables')).toBe(true);
    expect(isEmptyResultReason('timeout')).toBe(false);
  });
});

describe('isTerminalStatus', () => {
  test('treats completed, stopped and failed as terminal', () => {
    expect(isTerminalStatus('completed')).toBe(true);
    expect(isTerminalStatus('stopped')).toBe(true);
    expect(isTerminalStatus('failed')).toBe(true);
    expect(isTerminalStatus('paused')).toBe(false);
    expect(isTerminalStatus('in_progress')).toBe(false);
    expect(isTerminalStatus('pending')).toBe(false);
  });
});
