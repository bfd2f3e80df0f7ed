import { describe, expect, test } from 'vitest';

import { ContentParser } from './content-parser';

describe('ContentParser', () => {
  describe('text mode', () => {
    test('parses a clean JSON payload', () => {
      const raw = JSON.stringify({
        status: 'ok',
        content: [
          { type: 'h1', text: 'Annual Report' },
          { type: 'paragraph', text: 'Revenue grew.' },
          { type: 'list', items: ['one', 'two'] },
        ],
      });

      expect(ContentParser.parse(raw, 'text')).toEqual([
        { type: 'h1', text: 'Annual Report' },
        { type: 'paragraph', text: 'Revenue grew.' },
        { type: 'list', items: ['one', 'two'] },
      ]);
    });

    test('parses JSON inside a json fence', () => {
      const raw =
        'Here you go:\n```json\n{"content":[{"type":"paragraph","text":"x"}]}\n```';

      expect(ContentParser.parse(raw, 'text')).toEqual([
        { type: 'paragraph', text: 'x' },
      ]);
    });

    test('parses JSON inside an untagged fence', () => {
      const raw = '```\n{"content":[{"type":"h2","text":"Scope"}]}\n```';

      expect(ContentParser.parse(raw, 'text')).toEqual([
        { type: 'h2', text: 'Scope' },
      ]);
    });

    test('parses the brace span inside prose', () => {
      const raw =
        'Sure! {"content":[{"type":"h3","text":"Notes"}]} Hope this helps.';

      expect(ContentParser.parse(raw, 'text')).toEqual([
        { type: 'h3', text: 'Notes' },
      ]);
    });

    test('turns non-JSON output into one paragraph per line', () => {
      const raw = 'first line\n\n   second line  \r\nthird';

      expect(ContentParser.parse(raw, 'text')).toEqual([
        { type: 'paragraph', text: 'first line' },
        { type: 'paragraph', text: 'second line' },
        { type: 'paragraph', text: 'third' },
      ]);
    });

    test('treats an accepted empty content list as nothing recognized', () => {
      const raw = '{"status":"no_text","content":[]}';

      expect(ContentParser.parse(raw, 'text')).toEqual([]);
    });

    test('returns nothing for blank output', () => {
      expect(ContentParser.parse('  \n ', 'text')).toEqual([]);
    });

    test('normalizes nodes', () => {
      const raw = JSON.stringify({
        content: [
          { type: 'h1', text: '' },
          { type: 'paragraph', text: 7 },
          { type: 'list', items: ['a', null, 3, { x: 1 }, ' '] },
          { type: 'list', items: [null] },
          { type: 'table', rows: [['h1', 'h2'], 'junk', [null, 5, true]] },
          { type: 'table', rows: [] },
          { type: 'caption', text: 'Figure 1' },
          { type: 'picture' },
          'stray string',
        ],
      });

      expect(ContentParser.parse(raw, 'text')).toEqual([
        { type: 'list', items: ['a', '3'] },
        {
          type: 'table',
          rows: [
            ['h1', 'h2'],
            ['', '5'],
          ],
        },
        { type: 'paragraph', text: 'Figure 1' },
        { type: 'paragraph', text: 'stray string' },
      ]);
    });

    test('keeps bare strings in the content list as paragraphs', () => {
      const raw = '{"content":["Intro line","  Body line ",""]}';

      expect(ContentParser.parse(raw, 'text')).toEqual([
        { type: 'paragraph', text: 'Intro line' },
        { type: 'paragraph', text: 'Body line' },
      ]);
    });

    test('falls back to lines when no listed node is usable', () => {
      const raw = 'Page 4\n{"content":[{"type":"image","caption":"Fig 1"}]}';

      expect(ContentParser.parse(raw, 'text')).toEqual([
        { type: 'paragraph', text: 'Page 4' },
        {
          type: 'paragraph',
          text: '{"content":[{"type":"image","caption":"Fig 1"}]}',
        },
      ]);
    });

    test('repairs tables in text mode', () => {
      const raw = JSON.stringify({
        content: [
          {
            type: 'table',
            rows: [
              ['a', 'b', 'c'],
              ['1', '2'],
            ],
          },
        ],
      });

      expect(ContentParser.parse(raw, 'text')).toEqual([
        {
          type: 'table',
          rows: [
            ['a', 'b', 'c'],
            ['1', '2', ''],
          ],
        },
      ]);
    });
  });

  describe('table mode', () => {
    test('parses named tables and names unnamed ones by position', () => {
      const raw = JSON.stringify({
        status: 'ok',
        tables: [
          { name: 'Prices', rows: [['item', 'cost'], ['tea', '2']] },
          { rows: [['x'], ['y', 'extra']] },
          { name: '  ', rows: [['only']] },
        ],
      });

      expect(ContentParser.parse(raw, 'table')).toEqual([
        {
          name: 'Prices',
          rows: [
            ['item', 'cost'],
            ['tea', '2'],
          ],
        },
        { name: 'Table 2', rows: [['x'], ['y']] },
        { name: 'Table 3', rows: [['only']] },
      ]);
    });

    test('drops tables without rows', () => {
      const raw = JSON.stringify({
        tables: [{ name: 'Empty', rows: [] }, 'junk', { rows: [['a']] }],
      });

      expect(ContentParser.parse(raw, 'table')).toEqual([
        { name: 'Table 3', rows: [['a']] },
      ]);
    });

    test('treats an accepted empty table list as no tables', () => {
      const raw = '{"status":"no_table","tables":[]}';

      expect(ContentParser.parse(raw, 'table')).toEqual([]);
    });

    test('parses fenced JSON', () => {
      const raw = '```json\n{"tables":[{"rows":[["a","b"]]}]}\n```';

      expect(ContentParser.parse(raw, 'table')).toEqual([
        { name: 'Table 1', rows: [['a', 'b']] },
      ]);
    });

    test('falls back to a markdown pipe table', () => {
      const raw = [
        'The table:',
        '| Name | Qty |',
        '|------|:---:|',
        '| bolt | 4 |',
        '| nut |',
      ].join('\n');

      expect(ContentParser.parse(raw, 'table')).toEqual([
        {
          name: 'Table 1',
          rows: [
            ['Name', 'Qty'],
            ['bolt', '4'],
            ['nut', ''],
          ],
        },
      ]);
    });

    test('falls back to comma-separated lines', () => {
      const raw = 'name, qty\nbolt,4\nnut';

      expect(ContentParser.parse(raw, 'table')).toEqual([
        {
          name: 'Table 1',
          rows: [
            ['name', 'qty'],
            ['bolt', '4'],
            ['nut', ''],
          ],
        },
      ]);
    });

    test('returns an empty set when nothing is found', () => {
      expect(ContentParser.parse('no tables on this page', 'table')).toEqual(
        [],
      );
    });
  });
});
