import crypto from 'node:crypto';

import type { FilterExpression } from '../filter/types.js';
import type { PreparedQuery } from './types.js';

/** JSON with object keys sorted, so equal structures serialize identically. */
export function canonicalJson(value: unknown): string {
  if (value === undefined) return 'null';
  if (value === null || typeof value !== 'object') return JSON.stringify(value);
  if (Array.isArray(value)) return `[${value.map(canonicalJson).join(',')}]`;
  const entries = Object.entries(value)
    .filter(([, v]) => v !== undefined)
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
  return `{${entries.map(([k, v]) => `${JSON.stringify(k)}:${canonicalJson(v)}`).join(',')}}`;
}

function expressionSignature(e: FilterExpression): unknown {
  switch (e.kind) {
    case 'and':
    case 'or':
      return { [e.kind]: e.children.map(expressionSignature) };
    case 'not':
      return { not: expressionSignature(e.child) };
    case 'leaf':
      return { field: e.field, ops: e.ops };
  }
}

export function querySignature(query: PreparedQuery<unknown>, adapterId: string): string {
  return canonicalJson({
    adapter: adapterId,
    target: query.target,
    filter: expressionSignature(query.expression),
    limit: query.limit ?? null,
    offset: query.offset ?? 0,
    sort: query.sort ?? [],
  });
}

export function cacheKey(query: PreparedQuery<unknown>, adapterId: string): string {
  return crypto.createHash('sha256').update(querySignature(query, adapterId)).digest('hex');
}
