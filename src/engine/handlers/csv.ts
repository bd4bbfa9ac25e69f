/**
 * Minimal CSV serialization for result artifacts (RFC 4180 quoting).
 */

export type CsvValue = string | number | boolean;

function escapeField(value: CsvValue): string {
  const text = String(value);
  return /[",\r\n]/.test(text) ? `"${text.replace(/"/g, '""')}"` : text;
}

/** Render rows under a header line; each row lists values in header order. */
export function toCsv(header: string[], rows: CsvValue[][]): string {
  const lines = [header, ...rows].map((row) => row.map(escapeField).join(','));
  return lines.join('\r\n') + '\r\n';
}
