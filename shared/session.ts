import type {
  DefaultKind,
  EditableField,
  Registries,
  SessionState,
  TimeEntry,
} from '../types';
import { addDaysToKey, parseIsoDateKey } from './dateKey';
import { InputError } from './errors';
import { parseDuration, parseEntryLine, resolveEntry, type TokenizerContext } from './tokenizer';

export type SessionContext = TokenizerContext;

export interface EntrySink {
  save(entries: TimeEntry[], registries: Registries): Promise<void>;
}

export function createSession(params: {
  today: string;
  defaultCategory: number;
  defaultAccount: string;
  registries: Registries;
}): SessionState {
  const { today, defaultCategory, defaultAccount, registries } = params;
  if (!registries.categories.has(defaultCategory)) {
    throw new InputError(`Default category ${defaultCategory} is not a known category.`);
  }
  const account = defaultAccount.toLowerCase();
  if (!registries.accounts.has(account)) {
    throw new InputError(`Default account "${defaultAccount}" is not a known account.`);
  }
  return { activeDate: today, defaultCategory, defaultAccount: account, entries: [] };
}

export function setDate(state: SessionState, input: string, today: string): SessionState {
  const trimmed = input.trim();
  let next: string | null;
  if (!trimmed) {
    next = today;
  } else if (/^[+-]?\d+$/.test(trimmed)) {
    next = parseIsoDateKey(addDaysToKey(today, Number(trimmed)));
    if (!next) {
      throw new InputError(`Cannot read "${trimmed}" as a day offset; it falls outside the calendar.`);
    }
  } else {
    next = parseIsoDateKey(trimmed);
    if (!next) {
      throw new InputError(`Cannot read "${trimmed}" as a day offset or YYYY-MM-DD date.`);
    }
  }
  // Keys are zero-padded, so string order is date order.
  if (next > today) {
    throw new InputError('Date cannot be in the future.');
  }
  return { ...state, activeDate: next };
}

export function setDefault(
  state: SessionState,
  kind: DefaultKind,
  value: string,
  registries: Registries
): SessionState {
  const trimmed = value.trim();
  if (kind === 'category') {
    const key = Number(trimmed);
    if (!/^\d+$/.test(trimmed) || !registries.categories.has(key)) {
      throw new InputError(`Unknown category "${trimmed}".`);
    }
    return { ...state, defaultCategory: key };
  }
  const key = trimmed.toLowerCase();
  if (key.length !== 1 || !registries.accounts.has(key)) {
    throw new InputError(`Unknown account "${trimmed}".`);
  }
  return { ...state, defaultAccount: key };
}

/** Appends the entry a line describes. A zero duration adds nothing. */
export function addEntry(state: SessionState, line: string, context: SessionContext): SessionState {
  const fields = parseEntryLine(line, context);
  if (fields.duration === 0) return state;
  const entry = resolveEntry(fields, {
    date: state.activeDate,
    category: state.defaultCategory,
    account: state.defaultAccount,
    comment: '',
  });
  return { ...state, entries: [...state.entries, entry] };
}

function checkIndex(state: SessionState, index: number): number {
  if (!Number.isInteger(index) || index < 1 || index > state.entries.length) {
    throw new InputError(
      state.entries.length === 0
        ? 'There are no entries.'
        : `Entry ${index} does not exist; choose 1 to ${state.entries.length}.`
    );
  }
  return index - 1;
}

export function removeEntry(state: SessionState, index: number): SessionState {
  const i = checkIndex(state, index);
  return { ...state, entries: state.entries.filter((_, j) => j !== i) };
}

export function editEntry(
  state: SessionState,
  index: number,
  field: EditableField,
  value: string,
  context: SessionContext
): SessionState {
  const { registries, maxDuration } = context;
  const i = checkIndex(state, index);
  const current = state.entries[i];
  let updated: TimeEntry;
  switch (field) {
    case 'duration': {
      const duration = parseDuration(value.trim() || undefined);
      if (duration === 0) {
        throw new InputError('Duration must be greater than zero; remove the entry instead.');
      }
      if (maxDuration !== undefined && duration > maxDuration) {
        throw new InputError("You're working too much.");
      }
      updated = { ...current, duration };
      break;
    }
    case 'category': {
      const trimmed = value.trim();
      const key = Number(trimmed);
      if (!/^\d+$/.test(trimmed) || !registries.categories.has(key)) {
        throw new InputError(`Unknown category "${trimmed}".`);
      }
      updated = { ...current, category: key };
      break;
    }
    case 'account': {
      const key = value.trim().toLowerCase();
      if (key.length !== 1 || !registries.accounts.has(key)) {
        throw new InputError(`Unknown account "${value.trim()}".`);
      }
      updated = { ...current, account: key };
      break;
    }
    case 'comment':
      updated = { ...current, comment: value.trim() };
      break;
    default:
      throw new InputError(`Unknown field "${String(field)}".`);
  }
  return { ...state, entries: state.entries.map((e, j) => (j === i ? updated : e)) };
}

export function undoLast(state: SessionState): SessionState {
  return { ...state, entries: state.entries.slice(0, -1) };
}

export function clearEntries(state: SessionState): SessionState {
  return { ...state, entries: [] };
}

export function totalDuration(entries: readonly TimeEntry[]): number {
  return entries.reduce((sum, e) => sum + e.duration, 0);
}

export function preview(state: SessionState): { entries: readonly TimeEntry[]; total: number } {
  return { entries: state.entries.slice(), total: totalDuration(state.entries) };
}

/**
 * Saves the working set and returns the state with it cleared. If the save
 * throws, the error propagates and the caller still holds the old state.
 */
export async function commit(
  state: SessionState,
  sink: EntrySink,
  registries: Registries
): Promise<SessionState> {
  if (state.entries.length === 0) {
    throw new InputError('Nothing to commit. Get back to work.');
  }
  await sink.save(state.entries, registries);
  return clearEntries(state);
}

export function isEditableField(value: string): value is EditableField {
  return value === 'duration' || value === 'category' || value === 'account' || value === 'comment';
}
