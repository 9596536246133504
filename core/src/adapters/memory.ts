import type { AdapterCapabilities } from '../capabilities/types.js';
import { memoryCapabilities } from '../capabilities/tables.js';
import { FilterCapabilityError } from '../filter/errors.js';
import type { Operator } from '../filter/operators.js';
import type { FieldDescriptor, FilterValue, Scalar } from '../filter/types.js';
import {
  asBoolean,
  asGeoDistance,
  asScalar,
  asScalarList,
  asString,
  isPlainObject,
  isValueList,
  isValueRecord,
} from '../filter/values.js';
import type { SortSpec } from '../query/types.js';
import type { FilterAdapter } from './types.js';

export type Row = Readonly<Record<string, unknown>>;

export type MemoryPredicate =
  | { readonly kind: 'all' }
  | { readonly kind: 'none' }
  | {
      readonly kind: 'test';
      readonly path: readonly string[];
      readonly operator: Operator;
      readonly value: FilterValue;
    }
  | { readonly kind: 'and'; readonly children: readonly MemoryPredicate[] }
  | { readonly kind: 'or'; readonly children: readonly MemoryPredicate[] }
  | { readonly kind: 'not'; readonly child: MemoryPredicate }
  | { readonly kind: 'custom'; readonly label: string; readonly test: (row: Row) => boolean };

const ALL: MemoryPredicate = Object.freeze({ kind: 'all' });
const NONE: MemoryPredicate = Object.freeze({ kind: 'none' });

const EARTH_RADIUS_M = 6_371_000;
const MAX_EDIT_DISTANCE = 2;
const TRIGRAM_THRESHOLD = 0.3;

/** Evaluates filters against plain objects, for tests and small in-process datasets. */
export class MemoryFilterAdapter implements FilterAdapter<MemoryPredicate> {
  readonly id = 'memory';
  readonly family = 'memory';

  private readonly caps: AdapterCapabilities;

  constructor(caps: AdapterCapabilities = memoryCapabilities()) {
    this.caps = caps;
  }

  capabilities(): AdapterCapabilities {
    return this.caps;
  }

  empty(): MemoryPredicate {
    return ALL;
  }

  matchAll(): MemoryPredicate {
    return ALL;
  }

  matchNone(): MemoryPredicate {
    return NONE;
  }

  applyOperator(query: MemoryPredicate, field: FieldDescriptor, operator: Operator, value: FilterValue): MemoryPredicate {
    if (operator === 'jsonPath') {
      throw new FilterCapabilityError(`memory cannot apply jsonPath to ${field.name}`, {
        field: field.name,
        operator,
        adapter: this.id,
      });
    }
    const path = field.association ? [field.association, field.column ?? field.name] : [field.column ?? field.name];
    return this.combineAnd([query, Object.freeze({ kind: 'test', path, operator, value })]);
  }

  combineAnd(queries: readonly MemoryPredicate[]): MemoryPredicate {
    const parts = queries.filter((q) => q.kind !== 'all');
    const only = parts[0];
    if (!only) return ALL;
    if (parts.length === 1) return only;
    return Object.freeze({ kind: 'and', children: Object.freeze(parts) });
  }

  combineOr(queries: readonly MemoryPredicate[]): MemoryPredicate {
    const parts = queries.filter((q) => q.kind !== 'none');
    const only = parts[0];
    if (!only) return NONE;
    if (parts.some((q) => q.kind === 'all')) return ALL;
    if (parts.length === 1) return only;
    return Object.freeze({ kind: 'or', children: Object.freeze(parts) });
  }

  negate(query: MemoryPredicate): MemoryPredicate {
    if (query.kind === 'all') return NONE;
    if (query.kind === 'none') return ALL;
    return Object.freeze({ kind: 'not', child: query });
  }
}

function normalize(v: unknown): unknown {
  return v instanceof Date ? v.getTime() : v;
}

function sameValue(actual: unknown, expected: Scalar): boolean {
  if (actual instanceof Date && typeof expected === 'string') return actual.getTime() === Date.parse(expected);
  return normalize(actual) === expected;
}

function compare(actual: unknown, expected: Scalar): number | null {
  if (actual === null || actual === undefined || expected === null) return null;
  const a = normalize(actual);
  const b = actual instanceof Date && typeof expected === 'string' ? Date.parse(expected) : expected;
  if (typeof a === 'number' && typeof b === 'number') return a - b;
  if (typeof a === 'string' && typeof b === 'string') return a < b ? -1 : a > b ? 1 : 0;
  if (typeof a === 'boolean' && typeof b === 'boolean') return Number(a) - Number(b);
  return null;
}

function likeToRegExp(pattern: string, flags: string): RegExp {
  let source = '';
  for (const ch of pattern) {
    if (ch === '%') source += '.*';
    else if (ch === '_') source += '.';
    else source += ch.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
  }
  return new RegExp(`^${source}$`, `s${flags}`);
}

export function levenshtein(a: string, b: string): number {
  let prev = Array.from({ length: b.length + 1 }, (_, j) => j);
  for (let i = 1; i <= a.length; i++) {
    const row = [i];
    for (let j = 1; j <= b.length; j++) {
      const sub = (prev[j - 1] ?? 0) + (a[i - 1] === b[j - 1] ? 0 : 1);
      row.push(Math.min((prev[j] ?? 0) + 1, (row[j - 1] ?? 0) + 1, sub));
    }
    prev = row;
  }
  return prev[b.length] ?? 0;
}

function trigrams(s: string): Set<string> {
  const out = new Set<string>();
  for (const word of s.toLowerCase().split(/[^\p{L}\p{N}]+/u).filter(Boolean)) {
    const padded = `  ${word} `;
    for (let i = 0; i + 3 <= padded.length; i++) out.add(padded.slice(i, i + 3));
  }
  return out;
}

/** Trigram similarity in the manner of pg_trgm: shared / union. */
export function trigramSimilarity(a: string, b: string): number {
  const ta = trigrams(a);
  const tb = trigrams(b);
  if (!ta.size || !tb.size) return 0;
  let shared = 0;
  for (const t of ta) if (tb.has(t)) shared++;
  return shared / (ta.size + tb.size - shared);
}

function words(s: string): string[] {
  return s.toLowerCase().split(/[^\p{L}\p{N}]+/u).filter(Boolean);
}

function containsJson(actual: unknown, expected: FilterValue): boolean {
  if (isValueRecord(expected)) {
    if (!isPlainObject(actual)) return false;
    return Object.entries(expected).every(([k, v]) => containsJson(actual[k], v));
  }
  if (isValueList(expected)) {
    if (!Array.isArray(actual)) return false;
    return expected.every((e) => actual.some((a) => containsJson(a, e)));
  }
  return actual === expected;
}

function distanceMeters(a: { lat: number; lng: number }, b: { lat: number; lng: number }): number {
  const rad = (d: number) => (d * Math.PI) / 180;
  const dLat = rad(b.lat - a.lat);
  const dLng = rad(b.lng - a.lng);
  const h = Math.sin(dLat / 2) ** 2 + Math.cos(rad(a.lat)) * Math.cos(rad(b.lat)) * Math.sin(dLng / 2) ** 2;
  return 2 * EARTH_RADIUS_M * Math.asin(Math.sqrt(h));
}

function testValue(actual: unknown, operator: Operator, value: FilterValue, label: string): boolean {
  const missing = actual === null || actual === undefined;
  switch (operator) {
    case 'eq': {
      const v = asScalar(value, label);
      return v === null ? missing : sameValue(actual, v);
    }
    case 'neq': {
      const v = asScalar(value, label);
      return v === null ? !missing : !missing && !sameValue(actual, v);
    }
    case 'gt':
    case 'gte':
    case 'lt':
    case 'lte': {
      const c = compare(actual, asScalar(value, label));
      if (c === null) return false;
      if (operator === 'gt') return c > 0;
      if (operator === 'gte') return c >= 0;
      if (operator === 'lt') return c < 0;
      return c <= 0;
    }
    case 'in':
      return !missing && asScalarList(value, label).some((v) => sameValue(actual, v));
    case 'nin':
      return !missing && !asScalarList(value, label).some((v) => sameValue(actual, v));
    case 'isNull':
      return missing === asBoolean(value, label);
    case 'like':
      return typeof actual === 'string' && likeToRegExp(asString(value, label), '').test(actual);
    case 'ilike':
      return typeof actual === 'string' && likeToRegExp(asString(value, label), 'i').test(actual);
    case 'contains':
      return typeof actual === 'string' && actual.includes(asString(value, label));
    case 'icontains':
      return typeof actual === 'string' && actual.toLowerCase().includes(asString(value, label).toLowerCase());
    case 'startsWith':
      return typeof actual === 'string' && actual.startsWith(asString(value, label));
    case 'endsWith':
      return typeof actual === 'string' && actual.endsWith(asString(value, label));
    case 'match': {
      if (typeof actual !== 'string') return false;
      const have = new Set(words(actual));
      const want = words(asString(value, label));
      return want.length > 0 && want.every((w) => have.has(w));
    }
    case 'fuzzy':
      return (
        typeof actual === 'string' &&
        levenshtein(actual.toLowerCase(), asString(value, label).toLowerCase()) <= MAX_EDIT_DISTANCE
      );
    case 'similar':
      return typeof actual === 'string' && trigramSimilarity(actual, asString(value, label)) > TRIGRAM_THRESHOLD;
    case 'includes':
      return Array.isArray(actual) && actual.some((a) => sameValue(a, asScalar(value, label)));
    case 'excludes':
      return !testValue(actual, 'includes', value, label);
    case 'includesAll':
      return (
        Array.isArray(actual) && asScalarList(value, label).every((v) => actual.some((a) => sameValue(a, v)))
      );
    case 'includesAny':
      return Array.isArray(actual) && asScalarList(value, label).some((v) => actual.some((a) => sameValue(a, v)));
    case 'excludesAll':
      return !testValue(actual, 'includesAny', value, label);
    case 'excludesAny':
      return !testValue(actual, 'includesAll', value, label);
    case 'isEmpty': {
      const empty = missing || (Array.isArray(actual) && actual.length === 0);
      return empty === asBoolean(value, label);
    }
    case 'hasKey':
      return isPlainObject(actual) && Object.prototype.hasOwnProperty.call(actual, asString(value, label));
    case 'containsJson':
      return containsJson(actual, value);
    case 'withinDistance': {
      if (!isPlainObject(actual)) return false;
      const { lat, lng } = actual;
      if (typeof lat !== 'number' || typeof lng !== 'number') return false;
      const target = asGeoDistance(value, label);
      return distanceMeters({ lat, lng }, target) <= target.distance;
    }
    case 'jsonPath':
      return false;
  }
}

function valuesAt(row: unknown, path: readonly string[]): unknown[] {
  const [head, ...rest] = path;
  if (head === undefined) return [row];
  if (Array.isArray(row)) return row.flatMap((item) => valuesAt(item, path));
  if (row === null || typeof row !== 'object') return [undefined];
  return valuesAt(Reflect.get(row, head), rest);
}

export function evaluate(predicate: MemoryPredicate, row: Row): boolean {
  switch (predicate.kind) {
    case 'all':
      return true;
    case 'none':
      return false;
    case 'and':
      return predicate.children.every((c) => evaluate(c, row));
    case 'or':
      return predicate.children.some((c) => evaluate(c, row));
    case 'not':
      return !evaluate(predicate.child, row);
    case 'custom':
      return predicate.test(row);
    case 'test': {
      const label = predicate.path.join('.');
      // through a to-many association, any related row may satisfy the test
      const direct = predicate.path.length === 1;
      const candidates = direct ? [row[predicate.path[0] ?? '']] : valuesAt(row, predicate.path);
      if (!candidates.length) return testValue(undefined, predicate.operator, predicate.value, label);
      return candidates.some((v) => testValue(v, predicate.operator, predicate.value, label));
    }
  }
}

export function filterRows<T extends Row>(rows: readonly T[], predicate: MemoryPredicate): T[] {
  return rows.filter((r) => evaluate(predicate, r));
}

export function sortRows<T extends Row>(rows: readonly T[], sort: readonly SortSpec[]): T[] {
  const cmp = (a: unknown, b: unknown): number => {
    if (a === b) return 0;
    if (a === null || a === undefined) return 1;
    if (b === null || b === undefined) return -1;
    const x = normalize(a);
    const y = normalize(b);
    if (typeof x === 'number' && typeof y === 'number') return x - y;
    return String(x).localeCompare(String(y));
  };
  // `association.column` sorts by the first related value
  const at = (row: Row, field: string): unknown => (field.includes('.') ? valuesAt(row, field.split('.'))[0] : row[field]);
  return [...rows].sort((a, b) => {
    for (const s of sort) {
      const c = cmp(at(a, s.field), at(b, s.field));
      if (c !== 0) return s.dir === 'desc' ? -c : c;
    }
    return 0;
  });
}

export type MemoryQuery = {
  predicate: MemoryPredicate;
  sort?: readonly SortSpec[];
  limit?: number;
  offset?: number;
};

export function runMemoryQuery<T extends Row>(rows: readonly T[], query: MemoryQuery): { rows: T[]; total: number } {
  const matched = filterRows(rows, query.predicate);
  const sorted = query.sort?.length ? sortRows(matched, query.sort) : matched;
  const start = query.offset ?? 0;
  const end = query.limit === undefined ? undefined : start + query.limit;
  return { rows: sorted.slice(start, end), total: matched.length };
}
