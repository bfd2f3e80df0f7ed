/**
 * Prompt for text mode.
 *
 * Asks for the content interchange format directly, so a well-behaved model
 * answer parses without any fallback.
 */
export const TEXT_EXTRACTION_PROMPT = `Recognize all text in the image and respond with JSON only.

Typical inputs are slides, scanned book pages, textbooks, reports and table screenshots.

Recognition rules:
1. Transcribe every printed character exactly. Do not summarize or omit anything.
2. Ignore watermarks, stamps, seals, handwritten notes, doodles and background decoration.
3. Decide the heading level from formatting: font size, weight, position, numbering and indentation.
   - Top-level numbering (e.g. "1.", "I.", "Chapter 1") usually marks an h1.
   - Nested numbering (e.g. "1.1", "(a)") usually marks an h2 or h3.
4. Tables:
   - Every row must have exactly as many cells as the header row.
   - Use "" for an empty cell. Never omit a cell.
   - The first row of "rows" is the header row.
   - Follow the visual row and column alignment.
5. Order content top to bottom, left to right.

Output format:
{
  "status": "ok",
  "content": [
    {"type": "h1", "text": "Top-level heading"},
    {"type": "h2", "text": "Section heading"},
    {"type": "h3", "text": "Subsection heading"},
    {"type": "paragraph", "text": "Body text, kept whole even when long"},
    {"type": "list", "items": ["first item", "second item"]},
    {"type": "table", "rows": [["Header 1", "Header 2"], ["a", "b"]]}
  ]
}

Notes:
- Output JSON only, with no explanation and no markdown fences.
- If the image has no recognizable text, output {"status": "no_text", "content": []}.
- Keep numbers, dates, units and punctuation as they appear.
- Include numbering such as "1." or "(a)" in the heading text.`;

/**
 * Prompt for table mode
 */
export const TABLE_EXTRACTION_PROMPT = `Extract every table from the image and respond with JSON only.

Format:
{
  "status": "ok",
  "tables": [{"name": "Table 1", "rows": [["col1", "col2"], ["...", "..."]]}]
}

Rules:
- Output nothing but the JSON object.
- If there is no table, output {"status": "no_table", "tables": []}.
- Keep numbers, decimals, dates and units exactly as shown.
- Expand merged cells along the visual rows and columns.
- Where a cell holds a ditto mark, repeat the value from the cell above.`;
