import test from 'node:test';
import assert from 'node:assert/strict';

import {
  MemoryFilterAdapter,
  evaluate,
  filterRows,
  levenshtein,
  runMemoryQuery,
  trigramSimilarity,
  type MemoryPredicate,
  type Row,
} from '../../src/adapters/memory.js';
import { compileFilter } from '../../src/compiler/compile.js';
import { and, cond, leaf, not, or } from '../../src/filter/builders.js';
import type { Operator } from '../../src/filter/operators.js';
import { parseFilter } from '../../src/filter/parser.js';
import { authorizeAll, fieldTable, type FilterExpression, type FilterValue } from '../../src/filter/types.js';

const fields = fieldTable([
  { name: 'id', kind: 'id' },
  { name: 'name', kind: 'string' },
  { name: 'age', kind: 'integer' },
  { name: 'tags', kind: { array: 'string' } },
  { name: 'meta', kind: 'json' },
  { name: 'created', kind: 'datetime' },
  { name: 'loc', kind: 'geo' },
  { name: 'company.name', kind: 'string', association: 'company', column: 'name' },
  { name: 'orders.total', kind: 'integer', association: 'orders', column: 'total' },
]);

const rows: Row[] = [
  {
    id: 1,
    name: 'Alice Smith',
    age: 34,
    tags: ['admin', 'ops'],
    meta: { team: 'core', level: 3 },
    created: '2024-01-10T00:00:00Z',
    loc: { lat: 52.52, lng: 13.405 },
    company: { name: 'Acme' },
    orders: [{ total: 5 }, { total: 50 }],
  },
  {
    id: 2,
    name: 'Bob Jones',
    age: 27,
    tags: ['ops'],
    meta: { team: 'edge' },
    created: '2024-03-01T00:00:00Z',
    loc: { lat: 48.8566, lng: 2.3522 },
    company: { name: 'Globex' },
    orders: [{ total: 8 }],
  },
  { id: 3, name: 'Carol', age: null, tags: [], meta: null, created: '2023-12-31T00:00:00Z', loc: null, company: null, orders: [] },
];

const adapter = new MemoryFilterAdapter();

function predicate(expr: FilterExpression): MemoryPredicate {
  const r = compileFilter(expr, fields, authorizeAll(), adapter);
  if (!r.ok) throw r.error;
  return r.value;
}

function ids(field: string, op: Operator, value: FilterValue): unknown[] {
  return filterRows(rows, predicate(cond(field, op, value))).map((r) => r.id);
}

test('memory: comparison operators skip missing values', () => {
  assert.deepEqual(ids('age', 'eq', 34), [1]);
  assert.deepEqual(ids('age', 'neq', 34), [2]);
  assert.deepEqual(ids('age', 'gt', 30), [1]);
  assert.deepEqual(ids('age', 'lte', 34), [1, 2]);
  assert.deepEqual(ids('age', 'in', [27, 34]), [1, 2]);
  assert.deepEqual(ids('age', 'nin', [27]), [1]);
  assert.deepEqual(ids('age', 'isNull', true), [3]);
  assert.deepEqual(ids('age', 'isNull', false), [1, 2]);
  assert.deepEqual(ids('age', 'eq', null), [3]);
});

test('memory: empty membership lists reduce to constants', () => {
  assert.deepEqual(ids('age', 'in', []), []);
  assert.deepEqual(ids('age', 'nin', []), [1, 2, 3]);
  assert.deepEqual(ids('tags', 'includesAny', []), []);
  assert.deepEqual(ids('tags', 'includesAll', []), [1, 2, 3]);
  assert.deepEqual(ids('tags', 'excludesAll', []), [1, 2, 3]);
  assert.deepEqual(ids('tags', 'excludesAny', []), []);
});

test('memory: text operators', () => {
  assert.deepEqual(ids('name', 'like', 'A%'), [1]);
  assert.deepEqual(ids('name', 'like', 'a%'), []);
  assert.deepEqual(ids('name', 'ilike', 'a%'), [1]);
  assert.deepEqual(ids('name', 'like', '%o%'), [2, 3]);
  assert.deepEqual(ids('name', 'like', 'Car_l'), [3]);
  assert.deepEqual(ids('name', 'contains', 'Jon'), [2]);
  assert.deepEqual(ids('name', 'icontains', 'SMITH'), [1]);
  assert.deepEqual(ids('name', 'startsWith', 'Car'), [3]);
  assert.deepEqual(ids('name', 'endsWith', 'es'), [2]);
  assert.deepEqual(ids('name', 'match', 'smith alice'), [1]);
  assert.deepEqual(ids('name', 'fuzzy', 'karol'), [3]);
  assert.deepEqual(ids('name', 'similar', 'Alice Smith'), [1]);
});

test('memory: array operators', () => {
  assert.deepEqual(ids('tags', 'includes', 'ops'), [1, 2]);
  assert.deepEqual(ids('tags', 'excludes', 'ops'), [3]);
  assert.deepEqual(ids('tags', 'includesAll', ['admin', 'ops']), [1]);
  assert.deepEqual(ids('tags', 'includesAny', ['admin', 'x']), [1]);
  assert.deepEqual(ids('tags', 'excludesAll', ['admin']), [2, 3]);
  assert.deepEqual(ids('tags', 'excludesAny', ['admin', 'ops']), [2, 3]);
  assert.deepEqual(ids('tags', 'isEmpty', true), [3]);
  assert.deepEqual(ids('tags', 'isEmpty', false), [1, 2]);
});

test('memory: json and geo operators', () => {
  assert.deepEqual(ids('meta', 'hasKey', 'level'), [1]);
  assert.deepEqual(ids('meta', 'containsJson', { team: 'edge' }), [2]);
  assert.deepEqual(ids('meta', 'isNull', true), [3]);
  assert.deepEqual(ids('loc', 'withinDistance', { lat: 52.5, lng: 13.4, distance: 10_000 }), [1]);
});

test('memory: jsonPath is rejected at compile time', () => {
  const r = compileFilter(cond('meta', 'jsonPath', '$.team'), fields, authorizeAll(), adapter);
  assert.equal(r.ok, false);
  if (r.ok) return;
  assert.equal(r.error.message, 'memory does not support jsonPath on meta');
});

test('memory: datetime strings compare against Date values', () => {
  assert.deepEqual(ids('created', 'gte', '2024-01-01T00:00:00Z'), [1, 2]);
  const p = predicate(cond('created', 'eq', '2024-01-10T00:00:00Z'));
  assert.equal(evaluate(p, { created: new Date('2024-01-10T00:00:00Z') }), true);
  assert.equal(evaluate(p, { created: new Date('2024-01-11T00:00:00Z') }), false);
});

test('memory: association paths reach nested rows', () => {
  assert.deepEqual(ids('company.name', 'eq', 'Acme'), [1]);
  assert.deepEqual(ids('orders.total', 'gt', 10), [1]);
});

test('memory: boolean structure', () => {
  const either = or([cond('age', 'eq', 27), cond('name', 'startsWith', 'Car')]);
  assert.deepEqual(filterRows(rows, predicate(either)).map((r) => r.id), [2, 3]);
  assert.deepEqual(filterRows(rows, predicate(not(cond('age', 'eq', 34)))).map((r) => r.id), [2, 3]);
  const range = leaf('age', [
    ['gte', 20],
    ['lt', 30],
  ]);
  assert.deepEqual(filterRows(rows, predicate(range)).map((r) => r.id), [2]);
});

// Rows with null and missing values, for the algebra below.
const sparseFields = fieldTable([
  { name: 'id', kind: 'id' },
  { name: 'age', kind: 'integer' },
  { name: 'status', kind: 'string' },
  { name: 'tags', kind: { array: 'string' } },
]);

const sparse: Row[] = [
  { id: 1, age: 30, status: 'active', tags: ['a'] },
  { id: 2, age: 16, status: 'trial', tags: [] },
  { id: 3, age: 40, status: 'banned', tags: null },
  { id: 4, status: 'active' },
  { id: 5, age: null, status: null, tags: ['b', 'a'] },
];

function sparseIds(expr: FilterExpression): unknown[] {
  const r = compileFilter(expr, sparseFields, authorizeAll(), adapter);
  if (!r.ok) throw r.error;
  return filterRows(sparse, r.value).map((row) => row.id);
}

test('memory: adult active or trial accounts', () => {
  const parsed = parseFilter(
    { age: { _gte: 18 }, _or: [{ status: { _eq: 'active' } }, { status: { _eq: 'trial' } }] },
    sparseFields,
  );
  assert.ok(parsed.ok);
  assert.deepEqual(sparseIds(parsed.value), [1]);
});

test('memory: and, or and not are intersection, union and complement', () => {
  const leaves = [
    cond('age', 'gte', 18),
    cond('status', 'eq', 'active'),
    cond('tags', 'includes', 'a'),
    cond('age', 'isNull', true),
    cond('status', 'nin', ['banned']),
  ];
  const every = sparse.map((row) => row.id);
  for (const a of leaves) {
    const inA = new Set(sparseIds(a));
    assert.deepEqual(sparseIds(not(a)), every.filter((id) => !inA.has(id)));
    for (const b of leaves) {
      const inB = new Set(sparseIds(b));
      assert.deepEqual(sparseIds(and([a, b])), every.filter((id) => inA.has(id) && inB.has(id)));
      assert.deepEqual(sparseIds(or([a, b])), every.filter((id) => inA.has(id) || inB.has(id)));
    }
  }
});

test('memory: isEmpty and isNull split rows into two disjoint halves', () => {
  assert.deepEqual(sparseIds(cond('tags', 'isEmpty', true)), [2, 3, 4]);
  assert.deepEqual(sparseIds(cond('tags', 'isEmpty', false)), [1, 5]);
  assert.deepEqual(sparseIds(cond('age', 'isNull', true)), [4, 5]);
  assert.deepEqual(sparseIds(cond('age', 'isNull', false)), [1, 2, 3]);
});

test('MemoryFilterAdapter: combinators fold constants', () => {
  assert.deepEqual(adapter.combineAnd([]), { kind: 'all' });
  assert.deepEqual(adapter.combineOr([]), { kind: 'none' });
  assert.deepEqual(adapter.combineOr([adapter.matchNone(), adapter.matchAll()]), { kind: 'all' });
  assert.deepEqual(adapter.negate(adapter.matchAll()), { kind: 'none' });
  assert.deepEqual(adapter.negate(adapter.matchNone()), { kind: 'all' });
});

test('runMemoryQuery: sorts, pages and counts matches', () => {
  const all = adapter.matchAll();
  const asc = runMemoryQuery(rows, { predicate: all, sort: [{ field: 'age', dir: 'asc' }] });
  assert.deepEqual(asc.rows.map((r) => r.id), [2, 1, 3]);
  const desc = runMemoryQuery(rows, { predicate: all, sort: [{ field: 'age', dir: 'desc' }] });
  assert.deepEqual(desc.rows.map((r) => r.id), [3, 1, 2]);

  const page = runMemoryQuery(rows, { predicate: all, sort: [{ field: 'age', dir: 'asc' }], limit: 1, offset: 1 });
  assert.deepEqual(page.rows.map((r) => r.id), [1]);
  assert.equal(page.total, 3);
});

test('custom predicates run their own test', () => {
  const p: MemoryPredicate = { kind: 'custom', label: 'odd id', test: (row) => Number(row.id) % 2 === 1 };
  assert.deepEqual(filterRows(rows, p).map((r) => r.id), [1, 3]);
});

test('levenshtein and trigramSimilarity', () => {
  assert.equal(levenshtein('kitten', 'sitting'), 3);
  assert.equal(levenshtein('', 'abc'), 3);
  assert.equal(trigramSimilarity('abc', 'abc'), 1);
  assert.equal(trigramSimilarity('abc', 'xyz'), 0);
  assert.equal(trigramSimilarity('', 'abc'), 0);
});
