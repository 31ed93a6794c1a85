/**
 * CSV serialization
 */

/**
 * Quote a value when it contains a comma, quote or line break
 */
export function escapeCsvValue(value: string): string {
  if (/[",\r\n]/.test(value)) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

/**
 * Header line followed by one line per row, columns in the given order
 */
export function toCsv<C extends string>(columns: readonly C[], rows: ReadonlyArray<Record<C, string>>): string {
  const lines = [columns.map(escapeCsvValue).join(',')];
  for (const row of rows) {
    lines.push(columns.map((column) => escapeCsvValue(row[column])).join(','));
  }
  return `${lines.join('\n')}\n`;
}
