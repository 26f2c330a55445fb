import type { SessionState } from '../types';
import { InputError } from './errors';
import { totalDuration } from './session';
import { isDecimalToken } from './tokenizer';

/**
 * Multiplies every duration by `target / total` so the entries sum to
 * `target`. Either every entry is rescaled or none is.
 */
export function scaleEntries(state: SessionState, target: number): SessionState {
  if (!Number.isFinite(target) || target <= 0) {
    throw new InputError('Cannot scale to zero.');
  }
  if (state.entries.length === 0) {
    throw new InputError('No entries to scale.');
  }

  const total = totalDuration(state.entries);
  const factor = target / total;
  if (factor === 1) return state;
  if (!Number.isFinite(factor) || factor <= 0) {
    throw new InputError(`Cannot scale from ${total} hours to ${target} hours.`);
  }

  const scaled = state.entries.map((entry) => ({ ...entry, duration: entry.duration * factor }));
  if (scaled.some((entry) => !Number.isFinite(entry.duration) || entry.duration <= 0)) {
    throw new InputError(`Scaling by ${factor} leaves a duration out of range.`);
  }
  return { ...state, entries: scaled };
}

export function parseScaleTarget(value: string | undefined): number {
  const trimmed = (value ?? '').trim();
  if (!isDecimalToken(trimmed)) {
    throw new InputError(`Cannot read "${trimmed}" as a target number of hours.`);
  }
  return Number(trimmed);
}
