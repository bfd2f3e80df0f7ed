const SEPARATOR_CELL = /^[-:]*$/;

function nonBlankLines(text: string): string[] {
  return text
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line !== '');
}

/**
 * Rows of a markdown pipe table: lines that start and end with `|`, with
 * alignment rows (`|---|:-:|`) removed. Returns [] when there is none.
 */
export function parseMarkdownTable(text: string): string[][] {
  return nonBlankLines(text)
    .filter(
      (line) => line.length > 1 && line.startsWith('|') && line.endsWith('|'),
    )
    .map((line) =>
      line
        .slice(1, -1)
        .split('|')
        .map((cell) => cell.trim()),
    )
    .filter((cells) => !cells.every((cell) => SEPARATOR_CELL.test(cell)));
}

/**
 * Comma-separated rows, only when the first non-blank line has a comma.
 * Quoting is not interpreted.
 */
export function parseCommaSeparated(text: string): string[][] {
  const lines = nonBlankLines(text);
  if (lines.length === 0 || !lines[0].includes(',')) {
    return [];
  }
  return lines.map((line) => line.split(',').map((cell) => cell.trim()));
}
