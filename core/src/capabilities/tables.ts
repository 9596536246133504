import type { Operator, OperatorCategory } from '../filter/operators.js';
import { categoryOf, kindKey, type FieldKind } from '../filter/types.js';
import type { AdapterCapabilities, AdapterId, FeatureName, FeatureSet, OperatorTable } from './types.js';

const ORDERED: readonly Operator[] = ['eq', 'neq', 'gt', 'gte', 'lt', 'lte', 'in', 'nin', 'isNull'];
const EQUALITY: readonly Operator[] = ['eq', 'neq', 'in', 'nin', 'isNull'];
const TEXT: readonly Operator[] = ['like', 'ilike', 'contains', 'icontains', 'startsWith', 'endsWith'];

const NUMERIC_KINDS = ['integer', 'float', 'decimal', 'date', 'datetime', 'time'] as const;

export const NO_FEATURES: FeatureSet = {
  arrays: false,
  json: false,
  jsonPath: false,
  jsonOverlaps: false,
  fullText: false,
  fuzzy: false,
  trigram: false,
  geo: false,
};

const MAX_IN_ITEMS: Readonly<Record<AdapterId, number | null>> = {
  postgres: 32767,
  mysql: 65535,
  sqlite: 999,
  elasticsearch: 65536,
  memory: null,
};

function when(enabled: boolean, ops: readonly Operator[]): readonly Operator[] {
  return enabled ? ops : [];
}

function stringOperators(adapter: AdapterId, f: FeatureSet): readonly Operator[] {
  return [
    ...ORDERED,
    ...TEXT,
    // full-text MATCH needs a dedicated virtual table on sqlite
    ...when(f.fullText && adapter !== 'sqlite', ['match']),
    ...when(f.fuzzy, ['fuzzy']),
    ...when(f.trigram, ['similar']),
  ];
}

function arrayOperators(adapter: AdapterId, f: FeatureSet): readonly Operator[] {
  if (!f.arrays) return ['isNull'];
  switch (adapter) {
    case 'mysql':
      return ['includes', 'excludes', 'isEmpty', 'isNull', ...when(f.jsonOverlaps, ['includesAny', 'excludesAll'])];
    case 'sqlite':
      return ['includes', 'excludes', 'isEmpty', 'isNull'];
    default:
      return ['includes', 'excludes', 'includesAll', 'excludesAll', 'includesAny', 'excludesAny', 'isEmpty', 'isNull'];
  }
}

function jsonOperators(adapter: AdapterId, f: FeatureSet): readonly Operator[] {
  if (!f.json) return ['isNull'];
  const containment = adapter === 'postgres' || adapter === 'mysql' || adapter === 'memory';
  return ['hasKey', ...when(containment, ['containsJson']), ...when(f.jsonPath, ['jsonPath']), 'isNull'];
}

export function buildOperatorTable(adapter: AdapterId, features: FeatureSet): OperatorTable {
  const scalar: Record<string, readonly Operator[]> = {
    string: stringOperators(adapter, features),
    id: EQUALITY,
    enum: EQUALITY,
    boolean: ['eq', 'neq', 'isNull'],
  };
  for (const kind of NUMERIC_KINDS) scalar[kind] = ORDERED;

  return {
    scalar,
    array: { array: arrayOperators(adapter, features) },
    json: { json: jsonOperators(adapter, features) },
    geo: { geo: ['isNull', ...when(features.geo, ['withinDistance'])] },
  };
}

export function buildCapabilities(
  adapter: AdapterId,
  features: Partial<Record<FeatureName, boolean>>,
  opts: { version?: string; detectedAt?: number } = {},
): AdapterCapabilities {
  const merged: FeatureSet = { ...NO_FEATURES, ...features };
  return Object.freeze({
    adapter,
    ...(opts.version ? { version: opts.version } : {}),
    features: Object.freeze(merged),
    operators: buildOperatorTable(adapter, merged),
    limits: { maxInItems: MAX_IN_ITEMS[adapter] },
    detectedAt: opts.detectedAt ?? Date.now(),
  });
}

export function memoryCapabilities(now: number = Date.now()): AdapterCapabilities {
  return buildCapabilities(
    'memory',
    { arrays: true, json: true, fullText: true, fuzzy: true, trigram: true, geo: true, jsonOverlaps: true },
    { detectedAt: now },
  );
}

export function supportedOperators(
  capabilities: AdapterCapabilities,
  category: OperatorCategory,
  kind: string,
): ReadonlySet<Operator> {
  return new Set(capabilities.operators[category][kind] ?? []);
}

export function supportsOperator(capabilities: AdapterCapabilities, kind: FieldKind, op: Operator): boolean {
  return supportedOperators(capabilities, categoryOf(kind), kindKey(kind)).has(op);
}
