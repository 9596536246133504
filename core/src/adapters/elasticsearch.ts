import type { AdapterCapabilities } from '../capabilities/types.js';
import { FilterCapabilityError } from '../filter/errors.js';
import type { Operator } from '../filter/operators.js';
import { categoryOf, storagePath, type FieldDescriptor, type FilterValue, type Scalar } from '../filter/types.js';
import { asBoolean, asGeoDistance, asScalar, asScalarList, asString } from '../filter/values.js';
import type { SortSpec } from '../query/types.js';
import type { FilterAdapter } from './types.js';

export type EsScalar = string | number | boolean;

export type EsBool = {
  must?: EsQuery[];
  filter?: EsQuery[];
  should?: EsQuery[];
  must_not?: EsQuery[];
  minimum_should_match?: number;
};

export type EsQuery =
  | { match_all: Record<string, never> }
  | { match_none: Record<string, never> }
  | { term: Record<string, EsScalar> }
  | { terms: Record<string, EsScalar[]> }
  | { range: Record<string, { gt?: EsScalar; gte?: EsScalar; lt?: EsScalar; lte?: EsScalar }> }
  | { exists: { field: string } }
  | { wildcard: Record<string, { value: string; case_insensitive?: boolean }> }
  | { prefix: Record<string, { value: string }> }
  | { match: Record<string, { query: string; operator?: 'and' | 'or' }> }
  | { fuzzy: Record<string, { value: string; fuzziness: 'AUTO' }> }
  | { geo_distance: { distance: string; [field: string]: string | { lat: number; lon: number } } }
  | { bool: EsBool };

export type EsSearchBody = {
  query: EsQuery;
  size?: number;
  from?: number;
  sort?: Array<Record<string, { order: 'asc' | 'desc' }>>;
};

function toEsScalar(value: Scalar, field: string): EsScalar {
  if (value === null) {
    throw new FilterCapabilityError(`elasticsearch cannot match null in a term query (${field}); use _is_null`, {
      field,
      adapter: 'elasticsearch',
    });
  }
  return value;
}

/** SQL LIKE pattern to an Elasticsearch wildcard pattern. */
export function likeToWildcard(pattern: string): string {
  return pattern.replace(/[*?\\]/g, (c) => `\\${c}`).replace(/%/g, '*').replace(/_/g, '?');
}

function escapeWildcard(value: string): string {
  return value.replace(/[*?\\]/g, (c) => `\\${c}`);
}

function mustNot(query: EsQuery): EsQuery {
  return { bool: { must_not: [query] } };
}

// `must_not` alone also matches documents missing the field; SQL `<>` and `NOT IN` do not.
function presentAndNot(path: string, query: EsQuery): EsQuery {
  return { bool: { must: [{ exists: { field: path } }], must_not: [query] } };
}

function isMatchAll(q: EsQuery): boolean {
  return 'match_all' in q;
}

export class ElasticsearchFilterAdapter implements FilterAdapter<EsQuery> {
  readonly id = 'elasticsearch';
  readonly family = 'search';

  private readonly caps: AdapterCapabilities;

  constructor(caps: AdapterCapabilities) {
    this.caps = caps;
  }

  capabilities(): AdapterCapabilities {
    return this.caps;
  }

  empty(): EsQuery {
    return { match_all: {} };
  }

  matchAll(): EsQuery {
    return { match_all: {} };
  }

  matchNone(): EsQuery {
    return { match_none: {} };
  }

  applyOperator(query: EsQuery, field: FieldDescriptor, operator: Operator, value: FilterValue): EsQuery {
    return this.combineAnd([query, this.condition(field, operator, value)]);
  }

  combineAnd(queries: readonly EsQuery[]): EsQuery {
    const parts = queries.filter((q) => !isMatchAll(q));
    const only = parts[0];
    if (!only) return this.matchAll();
    if (parts.length === 1) return only;
    return { bool: { must: parts } };
  }

  combineOr(queries: readonly EsQuery[]): EsQuery {
    const only = queries[0];
    if (!only) return this.matchNone();
    if (queries.some(isMatchAll)) return this.matchAll();
    if (queries.length === 1) return only;
    return { bool: { should: [...queries], minimum_should_match: 1 } };
  }

  negate(query: EsQuery): EsQuery {
    if (isMatchAll(query)) return this.matchNone();
    return mustNot(query);
  }

  private unsupported(field: FieldDescriptor, operator: Operator): never {
    throw new FilterCapabilityError(`elasticsearch cannot apply ${operator} to ${field.name}`, {
      field: field.name,
      operator,
      adapter: this.id,
    });
  }

  private term(path: string, value: Scalar, field: string): EsQuery {
    return { term: { [path]: toEsScalar(value, field) } };
  }

  private terms(path: string, values: Scalar[], field: string): EsQuery {
    return { terms: { [path]: values.map((v) => toEsScalar(v, field)) } };
  }

  private exists(path: string, present: boolean): EsQuery {
    const q: EsQuery = { exists: { field: path } };
    return present ? q : mustNot(q);
  }

  private condition(field: FieldDescriptor, operator: Operator, value: FilterValue): EsQuery {
    const path = storagePath(field);
    const name = field.name;

    if (operator === 'isNull') return this.exists(path, !asBoolean(value, name));

    switch (categoryOf(field.kind)) {
      case 'array':
        return this.arrayCondition(field, path, operator, value);
      case 'json':
        if (operator === 'hasKey') return this.exists(`${path}.${asString(value, name)}`, true);
        return this.unsupported(field, operator);
      case 'geo': {
        if (operator !== 'withinDistance') return this.unsupported(field, operator);
        const { lat, lng, distance } = asGeoDistance(value, name);
        return { geo_distance: { distance: `${distance}m`, [path]: { lat, lon: lng } } };
      }
      default:
        break;
    }

    switch (operator) {
      case 'eq': {
        const v = asScalar(value, name);
        return v === null ? this.exists(path, false) : this.term(path, v, name);
      }
      case 'neq': {
        const v = asScalar(value, name);
        return v === null ? this.exists(path, true) : presentAndNot(path, this.term(path, v, name));
      }
      case 'gt':
      case 'gte':
      case 'lt':
      case 'lte':
        return { range: { [path]: { [operator]: toEsScalar(asScalar(value, name), name) } } };
      case 'in':
        return this.terms(path, asScalarList(value, name), name);
      case 'nin':
        return presentAndNot(path, this.terms(path, asScalarList(value, name), name));
      case 'like':
        return { wildcard: { [path]: { value: likeToWildcard(asString(value, name)) } } };
      case 'ilike':
        return { wildcard: { [path]: { value: likeToWildcard(asString(value, name)), case_insensitive: true } } };
      case 'contains':
        return { wildcard: { [path]: { value: `*${escapeWildcard(asString(value, name))}*` } } };
      case 'icontains':
        return { wildcard: { [path]: { value: `*${escapeWildcard(asString(value, name))}*`, case_insensitive: true } } };
      case 'startsWith':
        return { prefix: { [path]: { value: asString(value, name) } } };
      case 'endsWith':
        return { wildcard: { [path]: { value: `*${escapeWildcard(asString(value, name))}` } } };
      case 'match':
        return { match: { [path]: { query: asString(value, name), operator: 'and' } } };
      case 'fuzzy':
        return { fuzzy: { [path]: { value: asString(value, name), fuzziness: 'AUTO' } } };
      default:
        return this.unsupported(field, operator);
    }
  }

  private arrayCondition(field: FieldDescriptor, path: string, operator: Operator, value: FilterValue): EsQuery {
    const name = field.name;
    switch (operator) {
      case 'includes':
        return this.term(path, asScalar(value, name), name);
      case 'excludes':
        return mustNot(this.term(path, asScalar(value, name), name));
      case 'includesAll':
        return { bool: { must: asScalarList(value, name).map((v) => this.term(path, v, name)) } };
      case 'includesAny':
        return this.terms(path, asScalarList(value, name), name);
      case 'excludesAll':
        return mustNot(this.terms(path, asScalarList(value, name), name));
      case 'excludesAny':
        return mustNot({ bool: { must: asScalarList(value, name).map((v) => this.term(path, v, name)) } });
      case 'isEmpty':
        // `exists` is false for missing, null and [] alike
        return this.exists(path, !asBoolean(value, name));
      default:
        return this.unsupported(field, operator);
    }
  }
}

export function toSearchBody(
  query: EsQuery,
  opts: { limit?: number; offset?: number; sort?: readonly SortSpec[] } = {},
): EsSearchBody {
  const body: EsSearchBody = { query };
  if (opts.limit !== undefined) body.size = opts.limit;
  if (opts.offset) body.from = opts.offset;
  if (opts.sort?.length) body.sort = opts.sort.map((s) => ({ [s.field]: { order: s.dir } }));
  return body;
}
