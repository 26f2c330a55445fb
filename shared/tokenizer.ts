import type { Registries, TimeEntry } from '../types';
import { InputError, ParseError } from './errors';

export type TokenClass =
  | { kind: 'category'; key: number }
  | { kind: 'account'; key: string }
  | { kind: 'comment' };

/** Fields a line actually specified. Omitted ones are filled by the caller. */
export type EntryFields = {
  duration: number;
  category?: number;
  account?: string;
  comment?: string;
};

export type TokenizerContext = {
  registries: Registries;
  maxDuration?: number;
};

const DECIMAL_RE = /^[+-]?(\d+\.?\d*|\.\d+)(e[+-]?\d+)?$/i;
const INTEGER_RE = /^\d+$/;

export function isDecimalToken(token: string): boolean {
  return DECIMAL_RE.test(token);
}

export function isNumberToken(token: string): boolean {
  return isDecimalToken(token) || token.toLowerCase() === 'nan';
}

export function splitTokens(line: string): string[] {
  const trimmed = line.trim();
  return trimmed ? trimmed.split(/\s+/) : [];
}

export function parseDuration(token: string | undefined): number {
  if (token === undefined) {
    throw new ParseError('A duration is required.');
  }
  if (token.toLowerCase() === 'nan') {
    throw new ParseError('Duration cannot be NaN.');
  }
  if (!DECIMAL_RE.test(token)) {
    throw new ParseError(`Cannot read "${token}" as a duration.`);
  }
  const duration = Number(token);
  if (!Number.isFinite(duration)) {
    throw new ParseError(`Duration "${token}" is out of range.`);
  }
  if (duration < 0) {
    throw new ParseError("You can't unwork.");
  }
  return duration;
}

export function classifyToken(token: string, registries: Registries): TokenClass {
  if (INTEGER_RE.test(token)) {
    const key = Number(token);
    if (registries.categories.has(key)) return { kind: 'category', key };
  }
  if (token.length === 1) {
    const key = token.toLowerCase();
    if (registries.accounts.has(key)) return { kind: 'account', key };
  }
  return { kind: 'comment' };
}

/**
 * Reads `<duration> [category] [account] [comment...]`. Category and account
 * may come in either order; the first token that is neither (or repeats a
 * kind already taken) starts the comment, which runs to the end of the line.
 */
export function parseEntryLine(line: string, context: TokenizerContext): EntryFields {
  const [first, ...rest] = splitTokens(line);
  const duration = parseDuration(first);
  if (context.maxDuration !== undefined && duration > context.maxDuration) {
    throw new InputError("You're working too much.");
  }

  const fields: EntryFields = { duration };
  for (let i = 0; i < rest.length; i++) {
    const token = rest[i];
    const cls = classifyToken(token, context.registries);
    if (cls.kind === 'category' && fields.category === undefined) {
      fields.category = cls.key;
    } else if (cls.kind === 'account' && fields.account === undefined) {
      fields.account = cls.key;
    } else {
      fields.comment = rest.slice(i).join(' ');
      break;
    }
  }
  return fields;
}

export function resolveEntry(
  fields: EntryFields,
  fallback: Omit<TimeEntry, 'duration'>
): TimeEntry {
  return {
    ...fallback,
    duration: fields.duration,
    category: fields.category ?? fallback.category,
    account: fields.account ?? fallback.account,
    comment: fields.comment ?? fallback.comment,
  };
}
