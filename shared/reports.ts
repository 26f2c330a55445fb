import type { StoredTimeEntry } from '../types';
import { addDaysToKey } from './dateKey';

export type TimecardRow = {
  account: string;
  accountName: string;
  hours: number;
  adjustedHours: number;
  share: number;
};

export type Timecard = {
  rows: TimecardRow[];
  total: number;
  incidental: number;
};

/**
 * Totals a week of stored entries by account. Hours booked to incidental
 * accounts are spread over the other accounts in proportion to their hours.
 */
export function summarizeWeek(
  entries: readonly StoredTimeEntry[],
  incidentalAccounts: readonly string[]
): Timecard {
  const incidentalSet = new Set(incidentalAccounts.map((a) => a.toLowerCase()));
  const byAccount = new Map<string, { accountName: string; hours: number }>();
  let total = 0;
  let incidental = 0;
  for (const e of entries) {
    const row = byAccount.get(e.account) ?? { accountName: e.accountName, hours: 0 };
    row.hours += e.duration;
    byAccount.set(e.account, row);
    total += e.duration;
    if (incidentalSet.has(e.account)) incidental += e.duration;
  }

  const base = total - incidental;
  const rows = Array.from(byAccount.entries())
    .sort((a, b) => (a[0] < b[0] ? -1 : 1))
    .map(([account, { accountName, hours }]) => {
      if (incidentalSet.has(account) || base <= 0) {
        return { account, accountName, hours, adjustedHours: 0, share: 0 };
      }
      const share = hours / base;
      return { account, accountName, hours, adjustedHours: hours + incidental * share, share };
    });

  return { rows, total, incidental };
}

export type DeepWorkSummary = {
  total: number;
  lastYear: number;
  goal: number;
};

export function summarizeDeepWork(
  entries: readonly StoredTimeEntry[],
  params: { categoryName: string; today: string; goal: number }
): DeepWorkSummary {
  const name = params.categoryName.toLowerCase();
  const yearAgo = addDaysToKey(params.today, -365);
  let total = 0;
  let lastYear = 0;
  for (const e of entries) {
    if (e.categoryName.toLowerCase() !== name) continue;
    total += e.duration;
    if (e.date >= yearAgo) lastYear += e.duration;
  }
  return { total, lastYear, goal: params.goal };
}
