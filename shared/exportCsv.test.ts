import test from 'node:test';
import assert from 'node:assert/strict';
import type { StoredTimeEntry } from '../types';
import { ledgerToCsv, toCsv } from './exportCsv';

test('toCsv escapes commas and quotes', () => {
  const csv = toCsv([
    ['name', 'note'],
    ['Alice', 'hello, "world"'],
  ]);
  assert.equal(csv, 'name,note\nAlice,"hello, ""world"""');
});

test('toCsv renders empty cells for null and undefined', () => {
  assert.equal(toCsv([['a', null, undefined, 2, true]]), 'a,,,2,true');
});

test('ledgerToCsv writes a header and one row per entry', () => {
  const entries: StoredTimeEntry[] = [
    {
      id: 'entry-1',
      sessionId: 'session-1',
      date: '2026-10-16',
      duration: 2.25,
      category: 2,
      categoryName: 'Deep Work',
      account: 't',
      accountName: 'Training',
      comment: 'notes, draft 2',
    },
  ];
  assert.equal(
    ledgerToCsv(entries),
    'Date,Duration,Account,Category,Comment\n2026-10-16,2.25,Training,Deep Work,"notes, draft 2"'
  );
  assert.equal(ledgerToCsv([]), 'Date,Duration,Account,Category,Comment');
});
