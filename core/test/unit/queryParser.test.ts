import test from 'node:test';
import assert from 'node:assert/strict';

import { fieldTable } from '../../src/filter/types.js';
import { RequestParseError } from '../../src/query/errors.js';
import { parsePaging, parseSort } from '../../src/query/parser.js';

test('parseSort: parses comma list and -prefix for desc', () => {
  assert.deepEqual(parseSort('a,-b'), [
    { field: 'a', dir: 'asc' },
    { field: 'b', dir: 'desc' },
  ]);
});

test('parseSort: accepts a list and association paths', () => {
  assert.deepEqual(parseSort(['+name', '-company.name']), [
    { field: 'name', dir: 'asc' },
    { field: 'company.name', dir: 'desc' },
  ]);
});

test('parseSort: empty input yields no sort', () => {
  assert.deepEqual(parseSort(undefined), []);
  assert.deepEqual(parseSort(' , '), []);
});

test('parseSort: rejects invalid and unknown fields', () => {
  assert.throws(
    () => parseSort('a;drop'),
    (e: unknown) => e instanceof RequestParseError && e.part === 'sort' && e.input === 'a;drop' && e.message === 'Invalid sort field: a;drop',
  );
  const fields = fieldTable([{ name: 'age', kind: 'integer' }]);
  assert.throws(() => parseSort('-name', fields), { message: 'Unknown sort field: name' });
  assert.deepEqual(parseSort('-age', fields), [{ field: 'age', dir: 'desc' }]);
});

test('parsePaging: defaults, clamping and offset from page', () => {
  assert.deepEqual(parsePaging({}), { page: 1, limit: 50, offset: 0 });
  assert.deepEqual(parsePaging({ page: '3', limit: '10' }), { page: 3, limit: 10, offset: 20 });
  assert.deepEqual(parsePaging({ page: 2, limit: 5000 }, { maxLimit: 100 }), { page: 2, limit: 100, offset: 100 });
  assert.deepEqual(parsePaging({ page: '-4', limit: '-1' }), { page: 1, limit: 1, offset: 0 });
});

test('parsePaging: limit=0 means unbounded', () => {
  assert.deepEqual(parsePaging({ page: '2', limit: '0' }), { page: 2, offset: 0 });
});

test('parsePaging: ignores non-integer input', () => {
  assert.deepEqual(parsePaging({ page: 'x', limit: '2.5' }, { defaultLimit: 20 }), { page: 1, limit: 20, offset: 0 });
});
