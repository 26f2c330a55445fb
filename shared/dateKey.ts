export function isIsoDate(value: string): boolean {
  return /^\d{4}-\d{2}-\d{2}$/.test(value);
}

export function formatDateKeyLocal(date: Date): string {
  const y = date.getFullYear();
  const m = String(date.getMonth() + 1).padStart(2, '0');
  const day = String(date.getDate()).padStart(2, '0');
  return `${y}-${m}-${day}`;
}

export function parseDateKeyLocal(dateKey: string): Date {
  return new Date(`${dateKey}T00:00:00`);
}

export function addDaysLocal(date: Date, days: number): Date {
  const d = new Date(date);
  d.setDate(d.getDate() + days);
  return d;
}

export function addDaysToKey(dateKey: string, days: number): string {
  return formatDateKeyLocal(addDaysLocal(parseDateKeyLocal(dateKey), days));
}

/**
 * Parses a YYYY-MM-DD key and returns it only if it names a real calendar day
 * (so 2024-02-30 is rejected rather than rolled over into March).
 */
export function parseIsoDateKey(value: string): string | null {
  if (!isIsoDate(value)) return null;
  const d = parseDateKeyLocal(value);
  if (Number.isNaN(d.getTime())) return null;
  return formatDateKeyLocal(d) === value ? value : null;
}

// Weeks start on Monday.
export function weekBounds(dateKey: string): { start: string; end: string } {
  const d = parseDateKeyLocal(dateKey);
  const offset = (d.getDay() + 6) % 7;
  const start = addDaysLocal(d, -offset);
  return { start: formatDateKeyLocal(start), end: formatDateKeyLocal(addDaysLocal(start, 6)) };
}
