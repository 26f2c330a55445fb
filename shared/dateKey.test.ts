import test from 'node:test';
import assert from 'node:assert/strict';
import { addDaysToKey, formatDateKeyLocal, parseIsoDateKey, weekBounds } from './dateKey';

test('formatDateKeyLocal pads month and day', () => {
  assert.equal(formatDateKeyLocal(new Date(2026, 0, 5)), '2026-01-05');
});

test('addDaysToKey crosses month and year boundaries', () => {
  assert.equal(addDaysToKey('2026-10-19', -19), '2026-09-30');
  assert.equal(addDaysToKey('2026-12-31', 1), '2027-01-01');
  assert.equal(addDaysToKey('2024-03-01', -1), '2024-02-29');
});

test('parseIsoDateKey rejects days that do not exist', () => {
  assert.equal(parseIsoDateKey('2024-02-29'), '2024-02-29');
  assert.equal(parseIsoDateKey('2026-02-29'), null);
  assert.equal(parseIsoDateKey('2026-13-01'), null);
  assert.equal(parseIsoDateKey('2026-1-5'), null);
  assert.equal(parseIsoDateKey('today'), null);
});

test('weekBounds runs Monday through Sunday', () => {
  assert.deepEqual(weekBounds('2026-10-19'), { start: '2026-10-19', end: '2026-10-25' });
  assert.deepEqual(weekBounds('2026-10-25'), { start: '2026-10-19', end: '2026-10-25' });
  assert.deepEqual(weekBounds('2026-11-01'), { start: '2026-10-26', end: '2026-11-01' });
});
