import test, { after, before } from 'node:test';
import assert from 'node:assert/strict';
import http from 'node:http';

import {
  authorizeFields,
  createQueryEngine,
  fieldTable,
  isPlainObject,
  silentLogger,
  type QueryEngine,
  type Row,
} from '@querygate/core';

import { createQueryApp } from '../../src/http/createQueryApp.js';
import { COMPLEXITY_WARNING_HEADER } from '../../src/middleware/responseEnvelope.js';

const people: Row[] = [
  { id: 1, name: 'Alice', age: 34 },
  { id: 2, name: 'Bob', age: 27 },
  { id: 3, name: 'Carol', age: null },
];

const fields = fieldTable([
  { name: 'id', kind: 'id' },
  { name: 'name', kind: 'string' },
  { name: 'age', kind: 'integer' },
  { name: 'meta', kind: 'json' },
]);

function buildEngine(): QueryEngine {
  const engine = createQueryEngine(
    { app: { name: 'test-app', env: 'test' }, complexity: { adaptiveLimits: false, baseLimit: 50 } },
    { logger: silentLogger },
  );
  engine.registerEntity({ name: 'people', fields, connection: null, rows: () => people });
  engine.registerEntity({
    name: 'strict',
    fields,
    connection: null,
    rows: () => people,
    complexityLimit: 10,
  });
  return engine;
}

function listen(server: http.Server): Promise<string> {
  return new Promise((resolve, reject) => {
    server.listen(0, '127.0.0.1', () => {
      const addr = server.address();
      if (!addr || typeof addr === 'string') return reject(new Error('No address'));
      resolve(`http://${addr.address}:${addr.port}`);
    });
  });
}

function close(server: http.Server): Promise<void> {
  return new Promise((resolve, reject) => server.close((e) => (e ? reject(e) : resolve())));
}

const open = http.createServer(createQueryApp({ engine: buildEngine() }));
const restricted = http.createServer(
  createQueryApp({ engine: buildEngine(), resolveFields: () => authorizeFields(['name']) }),
);
let baseUrl = '';
let restrictedUrl = '';

before(async () => {
  baseUrl = await listen(open);
  restrictedUrl = await listen(restricted);
});

after(async () => {
  await close(open);
  await close(restricted);
});

function post(base: string, path: string, body: unknown): Promise<Response> {
  return fetch(`${base}${path}`, {
    method: 'POST',
    headers: { 'content-type': 'application/json' },
    body: typeof body === 'string' ? body : JSON.stringify(body),
  });
}

async function readBody(res: Response): Promise<Record<string, unknown>> {
  const json: unknown = await res.json();
  assert.ok(isPlainObject(json));
  return json;
}

test('GET /health: reports the app name', async () => {
  const res = await fetch(`${baseUrl}/health`);
  assert.equal(res.status, 200);
  assert.deepEqual(await readBody(res), { success: true, code: 200, data: { ok: true, app: 'test-app' }, pagination: null });
});

test('POST /api/:entity/search: filters and paginates', async () => {
  const res = await post(baseUrl, '/api/people/search', { filter: { age: { _gte: 30 } }, limit: 10 });
  assert.equal(res.status, 200);
  assert.equal(res.headers.get(COMPLEXITY_WARNING_HEADER), null);
  assert.deepEqual(await readBody(res), {
    success: true,
    code: 200,
    data: [{ id: 1, name: 'Alice', age: 34 }],
    pagination: { limit: 10, totalCount: 1, totalPages: 1, currentPage: 1, nextPage: null, previousPage: null },
    complexity: { outcome: 'accept', score: 5, limit: 50, method: 'heuristic' },
  });
});

test('POST /api/:entity/search: sort and page through results', async () => {
  const first = await post(baseUrl, '/api/people/search', { sort: 'age', limit: 2 });
  const firstBody = await readBody(first);
  assert.deepEqual(firstBody.data, [
    { id: 2, name: 'Bob', age: 27 },
    { id: 1, name: 'Alice', age: 34 },
  ]);
  assert.deepEqual(firstBody.pagination, {
    limit: 2,
    totalCount: 3,
    totalPages: 2,
    currentPage: 1,
    nextPage: 2,
    previousPage: null,
  });

  const second = await post(baseUrl, '/api/people/search', { sort: 'age', limit: 2, page: 2 });
  const secondBody = await readBody(second);
  assert.deepEqual(secondBody.data, [{ id: 3, name: 'Carol', age: null }]);
  assert.deepEqual(secondBody.pagination, {
    limit: 2,
    totalCount: 3,
    totalPages: 2,
    currentPage: 2,
    nextPage: null,
    previousPage: 1,
  });
});

test('POST /api/:entity/search: a query near the limit carries a warning header', async () => {
  const res = await post(baseUrl, '/api/people/search', { filter: { age: { _eq: 1 } }, sort: 'age', limit: 0 });
  assert.equal(res.status, 200);
  assert.equal(res.headers.get(COMPLEXITY_WARNING_HEADER), 'Query complexity 50 is close to the limit 50');
  const body = await readBody(res);
  assert.equal(body.pagination, null);
  assert.deepEqual(body.complexity, {
    outcome: 'warn',
    score: 50,
    limit: 50,
    method: 'heuristic',
    warning: 'Query complexity 50 is close to the limit 50',
  });
});

test('400: unknown filter fields', async () => {
  const res = await post(baseUrl, '/api/people/search', { filter: { height: { _eq: 1 } } });
  assert.equal(res.status, 400);
  assert.deepEqual(await readBody(res), {
    success: false,
    code: 400,
    errors: { root: 'Bad request', path: '$.height', field: 'height' },
    message: 'Unknown filter field: height',
  });
});

test('400: unknown sort fields and adapters', async () => {
  const sort = await post(baseUrl, '/api/people/search', { sort: '-height' });
  assert.equal(sort.status, 400);
  const sortBody = await readBody(sort);
  assert.equal(sortBody.message, 'Unknown sort field: height');
  assert.deepEqual(sortBody.errors, { root: 'Bad request', sort: 'height' });

  const adapter = await post(baseUrl, '/api/people/search', { adapter: 'oracle' });
  assert.equal(adapter.status, 400);
  assert.deepEqual((await readBody(adapter)).errors, { root: 'Bad request', adapter: 'oracle' });
});

test('400: malformed JSON bodies', async () => {
  const res = await post(baseUrl, '/api/people/search', '{"filter":');
  assert.equal(res.status, 400);
  const body = await readBody(res);
  assert.equal(body.success, false);
  assert.deepEqual(body.errors, { root: 'Bad request' });
});

test('403: filtering on fields the actor may not use', async () => {
  const res = await post(restrictedUrl, '/api/people/search', { filter: { age: { _eq: 1 } } });
  assert.equal(res.status, 403);
  assert.deepEqual(await readBody(res), {
    success: false,
    code: 403,
    errors: { root: 'Forbidden', fields: ['age'] },
    message: 'Not authorized to filter on: age',
  });
});

test('403: sorting on fields the actor may not use', async () => {
  const res = await post(restrictedUrl, '/api/people/search', { sort: '-age' });
  assert.equal(res.status, 403);
  assert.deepEqual(await readBody(res), {
    success: false,
    code: 403,
    errors: { root: 'Forbidden', fields: ['age'] },
    message: 'Not authorized to sort on: age',
  });
});

test('404: unknown entities', async () => {
  const res = await post(baseUrl, '/api/nope/search', {});
  assert.equal(res.status, 404);
  assert.equal((await readBody(res)).message, 'Unknown entity: nope');
});

test('422: operators the adapter cannot run', async () => {
  const res = await post(baseUrl, '/api/people/search', { filter: { meta: { _json_path: '$.a' } } });
  assert.equal(res.status, 422);
  assert.deepEqual(await readBody(res), {
    success: false,
    code: 422,
    errors: { root: 'Unsupported', field: 'meta', operator: 'jsonPath', adapter: 'memory' },
    message: 'memory does not support jsonPath on meta',
  });
});

test('422: queries over the complexity limit', async () => {
  const filter = { _or: [{ age: { _eq: 1 } }, { age: { _eq: 2 } }], name: { _contains: 'a' } };
  const res = await post(baseUrl, '/api/strict/search', { filter });
  assert.equal(res.status, 422);
  assert.deepEqual(await readBody(res), {
    success: false,
    code: 422,
    errors: {
      root: 'Too complex',
      code: 'QUERY_TOO_COMPLEX',
      message: 'Query is too complex (score 20 exceeds limit 10)',
      score: 20,
      cost: 2000,
      limit: 10,
      suggestions: ['Simplify the filter or add a limit'],
    },
    message: 'Query is too complex (score 20 exceeds limit 10)',
  });
});

test('GET /api/:entity/capabilities: the resolved adapter', async () => {
  const res = await fetch(`${baseUrl}/api/people/capabilities`);
  assert.equal(res.status, 200);
  const caps = (await readBody(res)).data;
  assert.ok(isPlainObject(caps));
  assert.equal(caps.adapter, 'memory');
  assert.deepEqual(caps.limits, { maxInItems: null });

  const bad = await fetch(`${baseUrl}/api/people/capabilities?adapter=oracle`);
  assert.equal(bad.status, 400);
});
