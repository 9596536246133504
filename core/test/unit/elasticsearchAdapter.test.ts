import test from 'node:test';
import assert from 'node:assert/strict';

import { MemoryFilterAdapter, filterRows, type Row } from '../../src/adapters/memory.js';
import { ElasticsearchFilterAdapter, likeToWildcard, toSearchBody, type EsQuery } from '../../src/adapters/elasticsearch.js';
import { buildCapabilities } from '../../src/capabilities/tables.js';
import { compileFilter } from '../../src/compiler/compile.js';
import { and, cond, leaf, not, or } from '../../src/filter/builders.js';
import { authorizeAll, fieldTable, type FilterExpression } from '../../src/filter/types.js';

const fields = fieldTable([
  { name: 'age', kind: 'integer' },
  { name: 'status', kind: 'string' },
  { name: 'name', kind: 'string' },
  { name: 'tags', kind: { array: 'string' } },
  { name: 'meta', kind: 'json' },
  { name: 'loc', kind: 'geo' },
  { name: 'company.name', kind: 'string', association: 'company', column: 'name' },
]);

const adapter = new ElasticsearchFilterAdapter(
  buildCapabilities(
    'elasticsearch',
    { arrays: true, json: true, fullText: true, fuzzy: true, geo: true, jsonOverlaps: true },
    { version: '8.12.0', detectedAt: 0 },
  ),
);

function query(expr: FilterExpression): EsQuery {
  const r = compileFilter(expr, fields, authorizeAll(), adapter);
  if (!r.ok) throw r.error;
  return r.value;
}

function failure(expr: FilterExpression): string {
  const r = compileFilter(expr, fields, authorizeAll(), adapter);
  if (r.ok) throw new Error('expected a compile error');
  return r.error.message;
}

test('elasticsearch: equality and ranges', () => {
  assert.deepEqual(query(cond('status', 'eq', 'active')), { term: { status: 'active' } });
  assert.deepEqual(query(cond('status', 'eq', null)), { bool: { must_not: [{ exists: { field: 'status' } }] } });
  assert.deepEqual(query(cond('status', 'neq', 'active')), {
    bool: { must: [{ exists: { field: 'status' } }], must_not: [{ term: { status: 'active' } }] },
  });
  assert.deepEqual(query(cond('age', 'gte', 18)), { range: { age: { gte: 18 } } });
  assert.deepEqual(query(cond('status', 'nin', ['a', 'b'])), {
    bool: { must: [{ exists: { field: 'status' } }], must_not: [{ terms: { status: ['a', 'b'] } }] },
  });
  assert.deepEqual(query(cond('company.name', 'eq', 'Acme')), { term: { 'company.name': 'Acme' } });
});

test('elasticsearch: null checks use exists', () => {
  assert.deepEqual(query(cond('age', 'isNull', false)), { exists: { field: 'age' } });
  assert.deepEqual(query(cond('age', 'isNull', true)), { bool: { must_not: [{ exists: { field: 'age' } }] } });
});

test('elasticsearch: text operators', () => {
  assert.deepEqual(query(cond('name', 'like', 'a_b%')), { wildcard: { name: { value: 'a?b*' } } });
  assert.deepEqual(query(cond('name', 'icontains', 'Bo')), {
    wildcard: { name: { value: '*Bo*', case_insensitive: true } },
  });
  assert.deepEqual(query(cond('name', 'startsWith', 'Al')), { prefix: { name: { value: 'Al' } } });
  assert.deepEqual(query(cond('name', 'endsWith', 'a*')), { wildcard: { name: { value: '*a\\*' } } });
  assert.deepEqual(query(cond('name', 'match', 'big data')), { match: { name: { query: 'big data', operator: 'and' } } });
  assert.deepEqual(query(cond('name', 'fuzzy', 'bob')), { fuzzy: { name: { value: 'bob', fuzziness: 'AUTO' } } });
});

test('likeToWildcard: escapes wildcard metacharacters first', () => {
  assert.equal(likeToWildcard('x*%'), 'x\\**');
  assert.equal(likeToWildcard('a?_'), 'a\\??');
});

test('elasticsearch: array, json and geo operators', () => {
  assert.deepEqual(query(cond('tags', 'includes', 'ops')), { term: { tags: 'ops' } });
  assert.deepEqual(query(cond('tags', 'includesAll', ['a', 'b'])), {
    bool: { must: [{ term: { tags: 'a' } }, { term: { tags: 'b' } }] },
  });
  assert.deepEqual(query(cond('tags', 'includesAny', ['a', 'b'])), { terms: { tags: ['a', 'b'] } });
  assert.deepEqual(query(cond('tags', 'isEmpty', true)), { bool: { must_not: [{ exists: { field: 'tags' } }] } });
  assert.deepEqual(query(cond('meta', 'hasKey', 'team')), { exists: { field: 'meta.team' } });
  assert.deepEqual(query(cond('loc', 'withinDistance', { lat: 1, lng: 2, distance: 500 })), {
    geo_distance: { distance: '500m', loc: { lat: 1, lon: 2 } },
  });
});

test('elasticsearch: boolean structure', () => {
  const range = leaf('age', [
    ['gte', 18],
    ['lt', 65],
  ]);
  assert.deepEqual(query(range), { bool: { must: [{ range: { age: { gte: 18 } } }, { range: { age: { lt: 65 } } }] } });
  assert.deepEqual(query(or([cond('status', 'eq', 'a'), cond('status', 'eq', 'b')])), {
    bool: { should: [{ term: { status: 'a' } }, { term: { status: 'b' } }], minimum_should_match: 1 },
  });
  assert.deepEqual(query(not(cond('status', 'eq', 'a'))), { bool: { must_not: [{ term: { status: 'a' } }] } });
  assert.deepEqual(query(and([])), { match_all: {} });
  assert.deepEqual(query(cond('status', 'in', [])), { match_none: {} });
});

test('elasticsearch: unsupported operators and null terms fail to compile', () => {
  assert.equal(failure(cond('name', 'similar', 'bob')), 'elasticsearch does not support similar on name');
  assert.equal(failure(cond('meta', 'containsJson', { a: 1 })), 'elasticsearch does not support containsJson on meta');
  assert.equal(
    failure(cond('status', 'in', ['a', null])),
    'elasticsearch cannot match null in a term query (status); use _is_null',
  );
});

test('toSearchBody: paging and sort', () => {
  const q: EsQuery = { match_all: {} };
  assert.deepEqual(toSearchBody(q, { limit: 10, offset: 20, sort: [{ field: 'age', dir: 'desc' }] }), {
    query: q,
    size: 10,
    from: 20,
    sort: [{ age: { order: 'desc' } }],
  });
  assert.deepEqual(toSearchBody(q, { offset: 0 }), { query: q });
});

// Just enough of Elasticsearch's matching rules to compare result sets in-process.
function matches(q: EsQuery, doc: Row): boolean {
  const present = (field: string) => doc[field] !== null && doc[field] !== undefined;
  if ('match_all' in q) return true;
  if ('match_none' in q) return false;
  if ('exists' in q) return present(q.exists.field);
  if ('term' in q) return Object.entries(q.term).every(([f, v]) => doc[f] === v);
  if ('terms' in q) return Object.entries(q.terms).every(([f, vs]) => vs.some((v) => doc[f] === v));
  if ('bool' in q) {
    const { must = [], must_not = [], should } = q.bool;
    return (
      must.every((m) => matches(m, doc)) &&
      !must_not.some((m) => matches(m, doc)) &&
      (should === undefined || should.some((m) => matches(m, doc)))
    );
  }
  throw new Error(`unhandled query ${JSON.stringify(q)}`);
}

test('elasticsearch: negations agree with the memory adapter on null and missing values', () => {
  const docs: Row[] = [{ id: 1, age: 30 }, { id: 2, age: null }, { id: 3 }, { id: 4, age: 25 }];
  const memory = new MemoryFilterAdapter();
  const esIds = (expr: FilterExpression) => docs.filter((d) => matches(query(expr), d)).map((d) => d.id);
  const memoryIds = (expr: FilterExpression) => {
    const r = compileFilter(expr, fields, authorizeAll(), memory);
    if (!r.ok) throw r.error;
    return filterRows(docs, r.value).map((d) => d.id);
  };

  assert.deepEqual(esIds(cond('age', 'neq', 30)), [4]);
  assert.deepEqual(memoryIds(cond('age', 'neq', 30)), [4]);
  assert.deepEqual(esIds(cond('age', 'nin', [30, 40])), [4]);
  assert.deepEqual(memoryIds(cond('age', 'nin', [30, 40])), [4]);
  // plain negation keeps null and missing rows on both
  assert.deepEqual(esIds(not(cond('age', 'eq', 30))), [2, 3, 4]);
  assert.deepEqual(memoryIds(not(cond('age', 'eq', 30))), [2, 3, 4]);
});
