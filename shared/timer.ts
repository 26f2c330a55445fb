import type { OpenTimer, PendingTimer, TimeEntry } from '../types';
import { InputError } from './errors';
import { formatDateKeyLocal } from './dateKey';
import { parseEntryLine, type TokenizerContext } from './tokenizer';

const MS_PER_HOUR = 60 * 60 * 1000;

// Timer lines carry no duration of their own; a leading zero lets the entry
// tokenizer read the rest.
function parseTimerLine(line: string, context: TokenizerContext) {
  return parseEntryLine(`0 ${line}`, { registries: context.registries });
}

/** Fields the line leaves out stay unset so the stop line or the defaults can fill them. */
export function startTimer(line: string, context: TokenizerContext, now: Date): PendingTimer {
  const fields = parseTimerLine(line, context);
  return {
    startTs: now.toISOString(),
    category: fields.category,
    account: fields.account,
    comment: fields.comment ?? '',
  };
}

function pick<T>(closing: T | undefined, opening: T | undefined, fallback: T, known: (value: T) => boolean): T {
  if (closing !== undefined) return closing;
  if (opening !== undefined && known(opening)) return opening;
  return fallback;
}

/**
 * Turns an open timer into an entry dated on the day it stops. Category and
 * account come from the stop line first, then the start line, then the
 * defaults; the two comments are joined.
 */
export function finishTimer(
  timer: OpenTimer,
  line: string,
  context: TokenizerContext & { defaultCategory: number; defaultAccount: string },
  now: Date
): TimeEntry {
  const fields = parseTimerLine(line, context);
  const start = new Date(timer.startTs);
  const duration = (now.getTime() - start.getTime()) / MS_PER_HOUR;
  if (!Number.isFinite(duration) || duration <= 0) {
    throw new InputError(`Timer started at ${timer.startTs} has not run for any time.`);
  }

  const { registries } = context;
  return {
    date: formatDateKeyLocal(now),
    duration,
    category: pick(fields.category, timer.category, context.defaultCategory, (key) => registries.categories.has(key)),
    account: pick(fields.account, timer.account, context.defaultAccount, (key) => registries.accounts.has(key)),
    comment: [timer.comment, fields.comment ?? ''].filter(Boolean).join(' '),
    startTs: timer.startTs,
    endTs: now.toISOString(),
  };
}
