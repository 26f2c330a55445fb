import test from 'node:test';
import assert from 'node:assert/strict';
import type { Registries } from '../types';
import { InputError, ParseError } from './errors';
import { classifyToken, parseEntryLine, resolveEntry } from './tokenizer';

const registries: Registries = {
  categories: new Map([
    [1, 'Admin'],
    [2, 'Deep Work'],
    [3, 'Email'],
  ]),
  accounts: new Map([
    ['t', 'Training'],
    ['i', 'Incidental'],
  ]),
};

const defaults = { date: '2026-10-19', category: 1, account: 't', comment: '' };

test('parseEntryLine reads duration, category, account and comment', () => {
  const fields = parseEntryLine('.5 2 i call notes', { registries });
  assert.deepEqual(fields, { duration: 0.5, category: 2, account: 'i', comment: 'call notes' });
  assert.deepEqual(resolveEntry(fields, defaults), {
    date: '2026-10-19',
    duration: 0.5,
    category: 2,
    account: 'i',
    comment: 'call notes',
  });
});

test('a bare duration takes every other field from the fallback', () => {
  const fields = parseEntryLine('1', { registries });
  assert.deepEqual(fields, { duration: 1 });
  assert.deepEqual(resolveEntry(fields, defaults), {
    date: '2026-10-19',
    duration: 1,
    category: 1,
    account: 't',
    comment: '',
  });
});

test('account may come before category', () => {
  assert.deepEqual(parseEntryLine('2 I 3 inbox zero', { registries }), {
    duration: 2,
    category: 3,
    account: 'i',
    comment: 'inbox zero',
  });
});

test('a second category token starts the comment', () => {
  assert.deepEqual(parseEntryLine('1 2 3 i', { registries }), {
    duration: 1,
    category: 2,
    comment: '3 i',
  });
});

test('unknown integers and letters fall through to the comment', () => {
  assert.deepEqual(parseEntryLine('1.25 7 x wrote 2 tests', { registries }), {
    duration: 1.25,
    comment: '7 x wrote 2 tests',
  });
  assert.deepEqual(parseEntryLine('1 i 5 reviews', { registries }), {
    duration: 1,
    account: 'i',
    comment: '5 reviews',
  });
});

test('extra whitespace collapses to single spaces in the comment', () => {
  assert.deepEqual(parseEntryLine('  3   2   long    gap  ', { registries }), {
    duration: 3,
    category: 2,
    comment: 'long gap',
  });
});

test('zero is a well-formed duration', () => {
  assert.deepEqual(parseEntryLine('0', { registries }), { duration: 0 });
});

test('malformed durations raise ParseError', () => {
  for (const line of ['', 'abc 2', '-1', 'nan', '1.2.3', '2h']) {
    assert.throws(() => parseEntryLine(line, { registries }), ParseError, `line "${line}"`);
  }
});

test('durations above the limit raise InputError', () => {
  assert.throws(() => parseEntryLine('10', { registries, maxDuration: 9 }), InputError);
  assert.equal(parseEntryLine('9', { registries, maxDuration: 9 }).duration, 9);
});

test('classifyToken returns a tagged result', () => {
  assert.deepEqual(classifyToken('2', registries), { kind: 'category', key: 2 });
  assert.deepEqual(classifyToken('T', registries), { kind: 'account', key: 't' });
  assert.deepEqual(classifyToken('9', registries), { kind: 'comment' });
  assert.deepEqual(classifyToken('ti', registries), { kind: 'comment' });
  assert.deepEqual(classifyToken('2.0', registries), { kind: 'comment' });
});
