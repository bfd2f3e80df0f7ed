import { describe, expect, test } from 'vitest';

import {
  extractEnvelopeText,
  extractResponseText,
  normalizeUsage,
} from './response-normalizer';

describe('extractEnvelopeText', () => {
  test('reads a string message content', () => {
    const body = { choices: [{ message: { content: '{"content":[]}' } }] };

    expect(extractEnvelopeText(body)).toBe('{"content":[]}');
  });

  test('joins message content segments', () => {
    const body = {
      choices: [
        {
          message: {
            content: [{ text: 'Hello, ' }, { image: 'x' }, { text: 'world' }],
          },
        },
      ],
    };

    expect(extractEnvelopeText(body)).toBe('Hello, world');
  });

  test('falls back to output_text', () => {
    expect(extractEnvelopeText({ choices: [], output_text: 'plain' })).toBe(
      'plain',
    );
  });

  test('parses a JSON string body', () => {
    const body = JSON.stringify({ output_text: 'from string' });

    expect(extractEnvelopeText(body)).toBe('from string');
  });

  test('returns a non-JSON string body as is', () => {
    expect(extractEnvelopeText('upstream said hi')).toBe('upstream said hi');
  });

  test('returns empty string when nothing is found', () => {
    expect(extractEnvelopeText(undefined)).toBe('');
    expect(extractEnvelopeText({ choices: [{ message: {} }] })).toBe('');
    expect(extractEnvelopeText([1, 2])).toBe('');
  });
});

describe('extractResponseText', () => {
  test('prefers result text', () => {
    expect(
      extractResponseText({
        text: 'primary',
        response: { body: { output_text: 'ignored' } },
      }),
    ).toBe('primary');
  });

  test('joins text content parts when text is empty', () => {
    expect(
      extractResponseText({
        text: '',
        content: [
          { type: 'reasoning', text: 'thinking' },
          { type: 'text', text: 'a' },
          { type: 'text', text: 'b' },
        ],
      }),
    ).toBe('ab');
  });

  test('falls back to the response body', () => {
    expect(
      extractResponseText({
        text: '  ',
        content: [],
        response: {
          body: { choices: [{ message: { content: 'from body' } }] },
        },
      }),
    ).toBe('from body');
  });

  test('returns empty string for an empty result', () => {
    expect(extractResponseText({})).toBe('');
  });
});

describe('normalizeUsage', () => {
  test('maps SDK usage fields', () => {
    expect(
      normalizeUsage({
        usage: { inputTokens: 120, outputTokens: 30, totalTokens: 150 },
      }),
    ).toEqual({ prompt: 120, completion: 30, total: 150 });
  });

  test('derives an absent total', () => {
    expect(
      normalizeUsage({ usage: { inputTokens: 10, outputTokens: 5 } }),
    ).toEqual({ prompt: 10, completion: 5, total: 15 });
  });

  test('defaults absent fields to zero', () => {
    expect(normalizeUsage({ usage: { outputTokens: 7 } })).toEqual({
      prompt: 0,
      completion: 7,
      total: 7,
    });
    expect(normalizeUsage({})).toEqual({ prompt: 0, completion: 0, total: 0 });
  });

  test('reads body usage when the SDK reports none', () => {
    expect(
      normalizeUsage({
        usage: {},
        response: {
          body: {
            usage: {
              prompt_tokens: 40,
              completion_tokens: 2,
              total_tokens: 42,
            },
          },
        },
      }),
    ).toEqual({ prompt: 40, completion: 2, total: 42 });
  });
});
