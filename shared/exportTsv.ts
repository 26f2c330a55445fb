import type { Registries, TimeEntry } from '../types';

// Tabs and newlines inside a field would split the row.
function cleanField(value: string): string {
  return value.replace(/[\t\r\n]+/g, ' ');
}

export function toTsvRow(entry: TimeEntry, registries: Registries): string {
  return [
    entry.date,
    String(entry.duration),
    registries.categories.get(entry.category) ?? String(entry.category),
    registries.accounts.get(entry.account) ?? entry.account,
    entry.comment,
  ]
    .map(cleanField)
    .join('\t');
}

/** One row per entry, every row newline-terminated; no entries renders as ''. */
export function renderTsv(entries: readonly TimeEntry[], registries: Registries): string {
  return entries.map((entry) => `${toTsvRow(entry, registries)}\n`).join('');
}
