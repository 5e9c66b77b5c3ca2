/**
 * Minimal CSV writer (RFC 4180 quoting, `\n` line endings).
 */

const NEEDS_QUOTES = /[",\r\n]/;

export function escapeCsvField(value: string): string {
  if (!NEEDS_QUOTES.test(value)) return value;
  return `"${value.replace(/"/g, '""')}"`;
}

export function formatCsvRow(fields: readonly string[]): string {
  return fields.map(escapeCsvField).join(',');
}

/** Header plus rows, every line terminated by `\n`. */
export function formatCsv(header: readonly string[], rows: readonly (readonly string[])[]): string {
  const lines = [formatCsvRow(header), ...rows.map(formatCsvRow)];
  return lines.map((line) => `${line}\n`).join('');
}
