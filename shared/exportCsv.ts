import type { StoredTimeEntry } from '../types';

export type CsvCell = string | number | boolean | null | undefined;

function escapeCsvValue(value: CsvCell) {
  if (value === null || value === undefined) return '';
  const text = String(value);
  if (/[",\n\r]/.test(text)) {
    return `"${text.replace(/"/g, '""')}"`;
  }
  return text;
}

export function toCsv(rows: CsvCell[][]) {
  return rows.map((row) => row.map(escapeCsvValue).join(',')).join('\n');
}

export const LEDGER_CSV_HEADER = ['Date', 'Duration', 'Account', 'Category', 'Comment'];

export function ledgerToCsv(entries: readonly StoredTimeEntry[]): string {
  return toCsv([
    LEDGER_CSV_HEADER,
    ...entries.map((e) => [e.date, e.duration, e.accountName, e.categoryName, e.comment]),
  ]);
}
