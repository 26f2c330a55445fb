import test from 'node:test';
import assert from 'node:assert/strict';
import type { CalendarBlock, Registries, SessionState } from '../types';
import { ParseError } from './errors';
import { buildCandidate, pendingBlocks, reconcile, resolveBlock } from './reconcile';

const registries: Registries = {
  categories: new Map([
    [1, 'Admin'],
    [2, 'Deep Work'],
    [4, 'Meetings'],
  ]),
  accounts: new Map([
    ['t', 'Training'],
    ['i', 'Incidental'],
  ]),
};

const state: SessionState = {
  activeDate: '2026-10-19',
  defaultCategory: 1,
  defaultAccount: 't',
  entries: [],
};

function block(start: string, end: string, subject: string, extra: Partial<CalendarBlock> = {}): CalendarBlock {
  return {
    start: new Date(`2026-10-19T${start}:00Z`),
    end: new Date(`2026-10-19T${end}:00Z`),
    subject,
    allDay: false,
    outOfOffice: false,
    ...extra,
  };
}

test('buildCandidate maps the block onto an entry', () => {
  const candidate = buildCandidate(
    block('09:00', '10:30', 'Planning', { suggestedCategory: 'deep work, Meetings' }),
    state,
    registries
  );
  assert.deepEqual(candidate, {
    date: '2026-10-19',
    duration: 1.5,
    category: 2,
    account: 't',
    comment: 'Planning',
    startTs: '2026-10-19T09:00:00.000Z',
    endTs: '2026-10-19T10:30:00.000Z',
  });
});

test('buildCandidate falls back to the default category', () => {
  const candidate = buildCandidate(block('09:00', '09:15', 'Chat', { suggestedCategory: 'Travel' }), state, registries);
  assert.equal(candidate.category, 1);
  assert.equal(candidate.duration, 0.25);
});

test('pendingBlocks filters and sorts', () => {
  const standup = block('09:00', '09:30', 'Standup');
  const review = block('14:00', '15:00', 'Review');
  const blocks = [
    review,
    block('00:00', '23:59', 'Holiday', { allDay: true }),
    block('11:00', '12:00', 'Dentist', { outOfOffice: true }),
    block('12:00', '13:00', 'Lunch'),
    block('16:00', '16:00', 'Empty'),
    standup,
  ];
  assert.deepEqual(pendingBlocks(blocks, state, { skipEventNames: ['Lunch'] }), [standup, review]);

  const withFlags = pendingBlocks(blocks, state, { includeAllDay: true, includeOutOfOffice: true });
  assert.deepEqual(
    withFlags.map((b) => b.subject),
    ['Holiday', 'Standup', 'Dentist', 'Lunch', 'Review']
  );
});

test('blocks already entered for the active date are not presented again', () => {
  const standup = block('09:00', '09:30', 'Standup');
  const entered: SessionState = { ...state, entries: [buildCandidate(standup, state, registries)] };
  assert.deepEqual(pendingBlocks([standup], entered), []);
  assert.deepEqual(pendingBlocks([standup], { ...entered, activeDate: '2026-10-18' }), [standup]);
});

test('resolveBlock: empty accepts, zero skips, anything else overrides named fields', () => {
  const candidate = buildCandidate(block('09:00', '10:00', 'Sync', { suggestedCategory: 'Meetings' }), state, registries);
  const ctx = { registries };

  assert.deepEqual(resolveBlock(candidate, '', ctx), { kind: 'accepted', entry: candidate });
  assert.deepEqual(resolveBlock(candidate, '   ', ctx), { kind: 'accepted', entry: candidate });
  assert.deepEqual(resolveBlock(candidate, '0', ctx), { kind: 'skipped' });
  assert.deepEqual(resolveBlock(candidate, '.75 i', ctx), {
    kind: 'overridden',
    entry: { ...candidate, duration: 0.75, account: 'i' },
  });
  assert.deepEqual(resolveBlock(candidate, '1 2 new subject', ctx), {
    kind: 'overridden',
    entry: { ...candidate, duration: 1, category: 2, comment: 'new subject' },
  });
  assert.throws(() => resolveBlock(candidate, 'later', ctx), ParseError);
});

test('reconcile walks blocks in order and applies each resolution', () => {
  const pass = reconcile(
    state,
    [block('13:00', '14:00', 'Review'), block('09:00', '09:30', 'Standup'), block('10:00', '11:00', 'Noise')],
    { registries }
  );

  let step = pass.next('');
  assert.equal(step.done, false);
  if (step.done) return;
  assert.equal(step.value.candidate.comment, 'Standup');
  assert.equal(step.value.position, 1);
  assert.equal(step.value.pending, 3);
  const standup = step.value.candidate;

  step = pass.next('');
  if (step.done) return assert.fail('expected a second block');
  assert.equal(step.value.candidate.comment, 'Noise');
  assert.deepEqual(step.value.state.entries, [standup]);

  step = pass.next('0');
  if (step.done) return assert.fail('expected a third block');
  assert.equal(step.value.candidate.comment, 'Review');

  step = pass.next('1.5 2');
  assert.equal(step.done, true);
  if (!step.done) return;
  assert.deepEqual(step.value.entries, [
    standup,
    {
      date: '2026-10-19',
      duration: 1.5,
      category: 2,
      account: 't',
      comment: 'Review',
      startTs: '2026-10-19T13:00:00.000Z',
      endTs: '2026-10-19T14:00:00.000Z',
    },
  ]);
  assert.deepEqual(state.entries, []);
});

test('a bad line re-presents the same block with the error', () => {
  const pass = reconcile(state, [block('09:00', '10:00', 'Sync')], { registries });
  pass.next('');
  const retry = pass.next('soon');
  if (retry.done) return assert.fail('expected the block again');
  assert.equal(retry.value.candidate.comment, 'Sync');
  assert.ok(retry.value.error instanceof ParseError);
  const done = pass.next('');
  assert.equal(done.done, true);
  if (done.done) assert.equal(done.value.entries.length, 1);
});

test('stopping midway keeps the decisions made so far', () => {
  const pass = reconcile(state, [block('09:00', '10:00', 'One'), block('10:00', '11:00', 'Two')], { registries });
  pass.next('');
  const second = pass.next('');
  if (second.done) return assert.fail('expected the second block');
  assert.deepEqual(
    second.value.state.entries.map((e) => e.comment),
    ['One']
  );
});

test('no pending blocks finishes immediately with the same state', () => {
  const first = reconcile(state, [], { registries }).next('');
  assert.equal(first.done, true);
  if (first.done) assert.equal(first.value, state);
});
