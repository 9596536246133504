export const SCALAR_OPERATORS = [
  'eq',
  'neq',
  'gt',
  'gte',
  'lt',
  'lte',
  'in',
  'nin',
  'isNull',
  'like',
  'ilike',
  'contains',
  'icontains',
  'startsWith',
  'endsWith',
  'match',
  'fuzzy',
  'similar',
] as const;

export const ARRAY_OPERATORS = [
  'includes',
  'excludes',
  'includesAll',
  'excludesAll',
  'includesAny',
  'excludesAny',
  'isEmpty',
  'isNull',
] as const;

export const JSON_OPERATORS = ['hasKey', 'containsJson', 'jsonPath', 'isNull'] as const;

export const GEO_OPERATORS = ['withinDistance', 'isNull'] as const;

export type ScalarOperator = (typeof SCALAR_OPERATORS)[number];
export type ArrayOperator = (typeof ARRAY_OPERATORS)[number];
export type JsonOperator = (typeof JSON_OPERATORS)[number];
export type GeoOperator = (typeof GEO_OPERATORS)[number];
export type Operator = ScalarOperator | ArrayOperator | JsonOperator | GeoOperator;

export type OperatorCategory = 'scalar' | 'array' | 'json' | 'geo';

export const OPERATORS_BY_CATEGORY: Readonly<Record<OperatorCategory, readonly Operator[]>> = {
  scalar: SCALAR_OPERATORS,
  array: ARRAY_OPERATORS,
  json: JSON_OPERATORS,
  geo: GEO_OPERATORS,
};

// Operators whose value is a list of candidates.
export const LIST_OPERATORS: ReadonlySet<Operator> = new Set<Operator>([
  'in',
  'nin',
  'includesAll',
  'excludesAll',
  'includesAny',
  'excludesAny',
]);

export const BOOLEAN_OPERATORS: ReadonlySet<Operator> = new Set<Operator>(['isNull', 'isEmpty']);

export function operatorToWire(op: Operator): string {
  return `_${op.replace(/[A-Z]/g, (c) => `_${c.toLowerCase()}`)}`;
}

const WIRE_TO_OPERATOR = new Map<string, Operator>(
  [...SCALAR_OPERATORS, ...ARRAY_OPERATORS, ...JSON_OPERATORS, ...GEO_OPERATORS].map((op) => [
    operatorToWire(op),
    op,
  ]),
);

export function operatorFromWire(key: string): Operator | undefined {
  return WIRE_TO_OPERATOR.get(key);
}

export function isCategoryOperator(category: OperatorCategory, op: Operator): boolean {
  return OPERATORS_BY_CATEGORY[category].includes(op);
}
