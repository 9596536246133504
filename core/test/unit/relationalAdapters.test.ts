import test from 'node:test';
import assert from 'node:assert/strict';

import { Op, cast, col, fn, literal, where, type WhereOptions } from 'sequelize';

import { columnRef, isEmptyWhere, toFindOptions, type RelationalFilterAdapter } from '../../src/adapters/relational/base.js';
import { MysqlFilterAdapter, jsonKeyPath } from '../../src/adapters/relational/mysql.js';
import { PostgresFilterAdapter } from '../../src/adapters/relational/postgres.js';
import { SqliteFilterAdapter } from '../../src/adapters/relational/sqlite.js';
import { buildCapabilities } from '../../src/capabilities/tables.js';
import { compileFilter } from '../../src/compiler/compile.js';
import { and, cond, not, or } from '../../src/filter/builders.js';
import { authorizeAll, fieldTable, type FilterExpression } from '../../src/filter/types.js';
import type { SqlLiteral } from '../../src/orm/types.js';

const fields = fieldTable([
  { name: 'age', kind: 'integer' },
  { name: 'name', kind: 'string' },
  { name: 'tags', kind: { array: 'string' } },
  { name: 'meta', kind: 'json' },
  { name: 'loc', kind: 'geo' },
  { name: 'company.name', kind: 'string', association: 'company', column: 'name' },
]);

const escape = (v: SqlLiteral): string => (typeof v === 'number' ? String(v) : `'${v.replace(/'/g, "''")}'`);

const postgres = new PostgresFilterAdapter(
  buildCapabilities(
    'postgres',
    { arrays: true, json: true, jsonPath: true, jsonOverlaps: true, fullText: true, fuzzy: true, trigram: true },
    { detectedAt: 0 },
  ),
  { escape },
);

const mysql = new MysqlFilterAdapter(
  buildCapabilities('mysql', { arrays: true, json: true, jsonPath: true, jsonOverlaps: true, fullText: true }, { detectedAt: 0 }),
  { escape },
);

const sqliteCaps = buildCapabilities('sqlite', { arrays: true, json: true, jsonPath: true }, { detectedAt: 0 });
const sqlite = new SqliteFilterAdapter(sqliteCaps, { escape });

function compiled(adapter: RelationalFilterAdapter, expr: FilterExpression): WhereOptions {
  const r = compileFilter(expr, fields, authorizeAll(), adapter);
  if (!r.ok) throw r.error;
  return r.value;
}

function failure(adapter: RelationalFilterAdapter, expr: FilterExpression): string {
  const r = compileFilter(expr, fields, authorizeAll(), adapter);
  if (r.ok) throw new Error('expected a compile error');
  return r.error.message;
}

test('columnRef: the storage column, falling back to the field name', () => {
  assert.equal(columnRef({ name: 'age', kind: 'integer' }), 'age');
  assert.equal(columnRef({ name: 'createdAt', kind: 'datetime', column: 'created_at' }), 'created_at');
});

test('toFindOptions: drops a zero offset and maps sort direction', () => {
  assert.deepEqual(toFindOptions({ age: 1 }, { limit: 10, offset: 0, sort: [{ field: 'age', dir: 'desc' }] }), {
    where: { age: 1 },
    limit: 10,
    order: [['age', 'DESC']],
  });
  assert.deepEqual(toFindOptions({}, { offset: 20 }), { where: {}, offset: 20 });
});

test('isEmptyWhere: only a bare empty object counts', () => {
  assert.equal(isEmptyWhere({}), true);
  assert.equal(isEmptyWhere(literal('1=1')), false);
  assert.equal(isEmptyWhere({ [Op.and]: [] }), false);
});

test('postgres: scalar comparisons become where hashes', () => {
  assert.deepEqual(compiled(postgres, cond('age', 'eq', 34)), { age: { [Op.eq]: 34 } });
  assert.deepEqual(compiled(postgres, cond('age', 'isNull', true)), { age: { [Op.is]: null } });
  assert.deepEqual(compiled(postgres, cond('age', 'isNull', false)), { age: { [Op.not]: null } });
  assert.deepEqual(compiled(postgres, cond('name', 'ilike', 'bo%')), { name: { [Op.iLike]: 'bo%' } });
  assert.deepEqual(compiled(postgres, cond('name', 'icontains', 'bo')), { name: { [Op.iLike]: '%bo%' } });
  assert.deepEqual(compiled(postgres, cond('name', 'contains', 'bo')), { name: { [Op.substring]: 'bo' } });
});

test('postgres: boolean structure', () => {
  const both = and([cond('age', 'gt', 18), cond('name', 'startsWith', 'A')]);
  assert.deepEqual(compiled(postgres, both), {
    [Op.and]: [{ age: { [Op.gt]: 18 } }, { name: { [Op.startsWith]: 'A' } }],
  });
  const either = or([cond('age', 'lt', 10), cond('age', 'gt', 90)]);
  assert.deepEqual(compiled(postgres, either), {
    [Op.or]: [{ age: { [Op.lt]: 10 } }, { age: { [Op.gt]: 90 } }],
  });
  assert.deepEqual(compiled(postgres, not(cond('age', 'eq', 1))), { [Op.not]: { age: { [Op.eq]: 1 } } });
  assert.deepEqual(compiled(postgres, and([])), literal('1=1'));
  assert.deepEqual(compiled(postgres, or([])), literal('1=0'));
  assert.deepEqual(compiled(postgres, cond('age', 'in', [])), literal('1=0'));
});

test('postgres: text search functions', () => {
  assert.deepEqual(
    compiled(postgres, cond('name', 'similar', 'bob')),
    where(fn('similarity', col('name'), 'bob'), Op.gt, 0.3),
  );
  assert.deepEqual(
    compiled(postgres, cond('name', 'fuzzy', 'BOB')),
    where(fn('levenshtein', fn('lower', col('name')), 'bob'), Op.lte, 2),
  );
});

test('postgres: array and json operators', () => {
  assert.deepEqual(compiled(postgres, cond('tags', 'includes', 'ops')), { tags: { [Op.contains]: ['ops'] } });
  assert.deepEqual(compiled(postgres, cond('tags', 'includesAny', ['a', 'b'])), { tags: { [Op.overlap]: ['a', 'b'] } });
  assert.deepEqual(compiled(postgres, cond('tags', 'excludesAll', ['a', 'b'])), {
    [Op.or]: [{ tags: null }, { [Op.not]: { tags: { [Op.overlap]: ['a', 'b'] } } }],
  });
  assert.deepEqual(
    compiled(postgres, cond('meta', 'jsonPath', '$.team')),
    where(fn('jsonb_path_exists', col('meta'), cast('$.team', 'jsonpath')), true),
  );
});

test('postgres: unsupported features and oversized lists fail to compile', () => {
  assert.equal(
    failure(postgres, cond('loc', 'withinDistance', { lat: 1, lng: 2, distance: 3 })),
    'postgres does not support withinDistance on loc',
  );
  const huge = Array.from({ length: 32768 }, (_, i) => i);
  assert.equal(failure(postgres, cond('age', 'in', huge)), 'in on age exceeds 32767 items for postgres');
});

test('relational: association fields are refused rather than rendered without a join', () => {
  assert.equal(
    failure(postgres, cond('company.name', 'eq', 'Acme')),
    'postgres cannot filter through association company (company.name)',
  );
  assert.equal(
    failure(mysql, or([cond('age', 'eq', 1), cond('company.name', 'eq', 'Acme')])),
    'mysql cannot filter through association company (company.name)',
  );
});

test('mysql: full-text MATCH and JSON arrays', () => {
  assert.deepEqual(
    compiled(mysql, cond('name', 'match', "o'brien")),
    literal("MATCH (`name`) AGAINST ('o''brien' IN NATURAL LANGUAGE MODE)"),
  );
  assert.deepEqual(
    compiled(mysql, cond('tags', 'includes', 'ops')),
    where(fn('JSON_CONTAINS', col('tags'), fn('JSON_ARRAY', 'ops')), 1),
  );
  assert.deepEqual(
    compiled(mysql, cond('meta', 'hasKey', 'team')),
    where(fn('JSON_CONTAINS_PATH', col('meta'), 'one', '$."team"'), 1),
  );
  assert.deepEqual(compiled(mysql, cond('name', 'ilike', 'b%')), { name: { [Op.like]: 'b%' } });
  assert.equal(failure(mysql, cond('tags', 'includesAll', ['a'])), 'mysql does not support includesAll on tags');
  assert.equal(failure(mysql, cond('name', 'fuzzy', 'bob')), 'mysql does not support fuzzy on name');
});

test('jsonKeyPath: quotes the key', () => {
  assert.equal(jsonKeyPath('team'), '$."team"');
  assert.equal(jsonKeyPath('a"b'), '$."a\\"b"');
});

test('sqlite: array membership through json_each', () => {
  const exists = `EXISTS (SELECT 1 FROM json_each("tags") WHERE json_each.value = 'ops')`;
  assert.deepEqual(compiled(sqlite, cond('tags', 'includes', 'ops')), literal(exists));
  assert.deepEqual(compiled(sqlite, cond('tags', 'excludes', 'ops')), {
    [Op.or]: [{ tags: null }, literal(`NOT ${exists}`)],
  });
  assert.deepEqual(
    compiled(sqlite, cond('meta', 'hasKey', 'team')),
    where(fn('json_type', col('meta'), '$."team"'), { [Op.ne]: null }),
  );
  assert.equal(failure(sqlite, cond('name', 'match', 'bob')), 'sqlite does not support match on name');
});

test('sqlite: raw fragments need an escape function', () => {
  const bare = new SqliteFilterAdapter(sqliteCaps);
  assert.throws(
    () => compileFilter(cond('tags', 'includes', 'ops'), fields, authorizeAll(), bare),
    /sqlite adapter needs an escape function for raw SQL fragments/,
  );
});
