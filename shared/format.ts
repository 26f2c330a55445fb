import type { Registries, TimeEntry } from '../types';
import type { DeepWorkSummary, Timecard } from './reports';

const COLUMN_WIDTHS = [12, 8, 22, 22, 24] as const;
const COMMENT_INDENT = COLUMN_WIDTHS[0] + COLUMN_WIDTHS[1] + COLUMN_WIDTHS[2] + COLUMN_WIDTHS[3];

function fit(text: string, width: number): string {
  const limit = width - 1;
  const shortened = text.length > limit ? `${text.slice(0, Math.max(0, limit - 1))}…` : text;
  return shortened.padEnd(width);
}

function wrap(text: string, width: number): string[] {
  const lines: string[] = [];
  let line = '';
  for (const word of text.split(/\s+/).filter(Boolean)) {
    if (line && line.length + 1 + word.length > width) {
      lines.push(line);
      line = word;
    } else {
      line = line ? `${line} ${word}` : word;
    }
  }
  if (line) lines.push(line);
  return lines;
}

export function formatHours(hours: number): string {
  return hours.toFixed(2);
}

export function formatEntry(entry: TimeEntry, registries: Registries): string {
  const [w0, w1, w2, w3, w4] = COLUMN_WIDTHS;
  const [first = '', ...others] = wrap(entry.comment, w4);
  const head =
    entry.date.padEnd(w0) +
    formatHours(entry.duration).padEnd(w1) +
    fit(registries.accounts.get(entry.account) ?? entry.account, w2) +
    fit(registries.categories.get(entry.category) ?? String(entry.category), w3) +
    first;
  return [head.trimEnd(), ...others.map((l) => ' '.repeat(COMMENT_INDENT) + l)].join('\n');
}

export function formatPreview(
  entries: readonly TimeEntry[],
  total: number,
  registries: Registries
): string {
  const header = ['#', 'DATE', 'HOURS', 'ACCOUNT', 'CATEGORY', 'COMMENT'];
  const lines = [
    header[0].padEnd(4) + header.slice(1).map((h, i) => h.padEnd(COLUMN_WIDTHS[i])).join('').trimEnd(),
    ...entries.map((e, i) =>
      formatEntry(e, registries)
        .split('\n')
        .map((l, j) => (j === 0 ? String(i + 1).padEnd(4) : '    ') + l)
        .join('\n')
    ),
    '    ' + 'TOTAL'.padEnd(COLUMN_WIDTHS[0]) + formatHours(total),
  ];
  return lines.join('\n');
}

export function formatRegistries(registries: Registries): string {
  const lines = ['ACCOUNTS:'];
  for (const [key, name] of registries.accounts) lines.push(`  ${key}: ${name}`);
  lines.push('', 'CATEGORIES:');
  for (const [key, name] of registries.categories) lines.push(`  ${key}: ${name}`);
  return lines.join('\n');
}

export function formatTimecard(card: Timecard): string {
  const widths = [30, 8, 15, 12];
  const lines = [
    ['ACCOUNT', 'HOURS', 'ADJ. HOURS', 'PERCENTAGE'].map((h, i) => h.padEnd(widths[i])).join('').trimEnd(),
  ];
  for (const row of card.rows) {
    lines.push(
      fit(row.accountName, widths[0]) +
        formatHours(row.hours).padEnd(widths[1]) +
        formatHours(row.adjustedHours).padEnd(widths[2]) +
        `${(row.share * 100).toFixed(2)}%`
    );
  }
  lines.push(' '.repeat(widths[0]) + formatHours(card.total));
  return lines.join('\n');
}

export function formatDeepWork(summary: DeepWorkSummary): string {
  const widths = [15, 12, 18, 15];
  return [
    ['DEEP WORK', 'TOTAL', 'LAST 365 DAYS', 'GOAL'].map((h, i) => h.padEnd(widths[i])).join('').trimEnd(),
    '----------'.padEnd(widths[0]) +
      summary.total.toFixed(1).padEnd(widths[1]) +
      summary.lastYear.toFixed(1).padEnd(widths[2]) +
      summary.goal.toFixed(0),
  ].join('\n');
}
