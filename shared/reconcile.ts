import type { CalendarBlock, Registries, SessionState, TimeEntry } from '../types';
import { SessionError } from './errors';
import { parseEntryLine, resolveEntry, splitTokens, type TokenizerContext } from './tokenizer';

const MS_PER_HOUR = 60 * 60 * 1000;

export type ReconcileOptions = {
  includeAllDay?: boolean;
  includeOutOfOffice?: boolean;
  skipEventNames?: readonly string[];
};

export type ReconcileContext = TokenizerContext & ReconcileOptions;

export type Resolution =
  | { kind: 'accepted'; entry: TimeEntry }
  | { kind: 'overridden'; entry: TimeEntry }
  | { kind: 'skipped' };

/** One block waiting on a line of input. `state` holds every decision so far. */
export type ReconcilePrompt = {
  block: CalendarBlock;
  candidate: TimeEntry;
  state: SessionState;
  position: number;
  pending: number;
  error?: SessionError;
};

export function blockHours(block: CalendarBlock): number {
  return (block.end.getTime() - block.start.getTime()) / MS_PER_HOUR;
}

function matchCategory(suggested: string | undefined, registries: Registries): number | undefined {
  const name = suggested?.split(',')[0]?.trim();
  if (!name) return undefined;
  if (/^\d+$/.test(name) && registries.categories.has(Number(name))) {
    return Number(name);
  }
  const lower = name.toLowerCase();
  for (const [key, categoryName] of registries.categories) {
    if (categoryName.toLowerCase() === lower) return key;
  }
  return undefined;
}

export function buildCandidate(
  block: CalendarBlock,
  state: SessionState,
  registries: Registries
): TimeEntry {
  return {
    date: state.activeDate,
    duration: blockHours(block),
    category: matchCategory(block.suggestedCategory, registries) ?? state.defaultCategory,
    account: state.defaultAccount,
    comment: block.subject,
    startTs: block.start.toISOString(),
    endTs: block.end.toISOString(),
  };
}

function isRepresented(block: CalendarBlock, state: SessionState): boolean {
  const startTs = block.start.toISOString();
  const endTs = block.end.toISOString();
  return state.entries.some(
    (e) => e.date === state.activeDate && e.startTs === startTs && e.endTs === endTs
  );
}

export function pendingBlocks(
  blocks: readonly CalendarBlock[],
  state: SessionState,
  options: ReconcileOptions = {}
): CalendarBlock[] {
  const skipNames = new Set(options.skipEventNames ?? []);
  return blocks
    .filter((block) => {
      if (block.allDay && !options.includeAllDay) return false;
      if (block.outOfOffice && !options.includeOutOfOffice) return false;
      if (skipNames.has(block.subject)) return false;
      if (!(blockHours(block) > 0)) return false;
      return !isRepresented(block, state);
    })
    .sort((a, b) => a.start.getTime() - b.start.getTime());
}

/**
 * Applies one line of input to a candidate. Fields the line names replace the
 * candidate's; the rest are kept (not the session defaults).
 */
export function resolveBlock(
  candidate: TimeEntry,
  input: string,
  context: TokenizerContext
): Resolution {
  if (splitTokens(input).length === 0) {
    return { kind: 'accepted', entry: candidate };
  }
  const fields = parseEntryLine(input, context);
  if (fields.duration === 0) {
    return { kind: 'skipped' };
  }
  return { kind: 'overridden', entry: resolveEntry(fields, candidate) };
}

export function* reconcile(
  state: SessionState,
  blocks: readonly CalendarBlock[],
  context: ReconcileContext
): Generator<ReconcilePrompt, SessionState, string> {
  const pending = pendingBlocks(blocks, state, context);
  let current = state;
  for (let i = 0; i < pending.length; i++) {
    const block = pending[i];
    const candidate = buildCandidate(block, current, context.registries);
    let error: SessionError | undefined;
    for (;;) {
      const input: string = yield { block, candidate, state: current, position: i + 1, pending: pending.length, error };
      let resolution: Resolution;
      try {
        resolution = resolveBlock(candidate, input, context);
      } catch (err) {
        if (err instanceof SessionError) {
          error = err;
          continue;
        }
        throw err;
      }
      if (resolution.kind !== 'skipped') {
        current = { ...current, entries: [...current.entries, resolution.entry] };
      }
      break;
    }
  }
  return current;
}
