import type { NamedTable } from '@pagescribe/model';

/**
 * Make every row as wide as the first row: short rows are padded with '',
 * long rows are truncated. Returns new arrays; the input is left untouched.
 *
 * Idempotent: `repairTable(repairTable(rows))` equals `repairTable(rows)`.
 */
export function repairTable(rows: readonly (readonly string[])[]): string[][] {
  if (rows.length === 0) {
    return [];
  }
  const width = rows[0].length;
  return rows.map((row) => {
    const repaired = row.slice(0, width);
    while (repaired.length < width) {
      repaired.push('');
    }
    return repaired;
  });
}

export function repairNamedTable(table: NamedTable): NamedTable {
  return { name: table.name, rows: repairTable(table.rows) };
}
