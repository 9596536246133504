import type { Operator, OperatorCategory } from './operators.js';

export type ScalarKind =
  | 'string'
  | 'integer'
  | 'float'
  | 'decimal'
  | 'boolean'
  | 'date'
  | 'datetime'
  | 'time'
  | 'id';

export type FieldKind = ScalarKind | 'json' | 'geo' | { array: ScalarKind } | { enum: string };

export type FieldStorage = 'column' | 'custom';

export type FieldDescriptor = {
  name: string;
  kind: FieldKind;
  storage?: FieldStorage;
  /** Storage column when it differs from `name`. */
  column?: string;
  /** Association the field is reached through (one join away from the root entity). */
  association?: string;
  /** External value -> stored value, for enum fields. */
  enumValues?: Readonly<Record<string, string | number>>;
};

export type FieldTable = ReadonlyMap<string, FieldDescriptor>;

export type Scalar = string | number | boolean | null;

export type FilterValue = Scalar | readonly FilterValue[] | { readonly [key: string]: FilterValue };

export type OperatorEntry = readonly [Operator, FilterValue];

export type AndNode = { readonly kind: 'and'; readonly children: readonly FilterExpression[] };
export type OrNode = { readonly kind: 'or'; readonly children: readonly FilterExpression[] };
export type NotNode = { readonly kind: 'not'; readonly child: FilterExpression };
export type LeafNode = { readonly kind: 'leaf'; readonly field: string; readonly ops: readonly OperatorEntry[] };

export type FilterExpression = AndNode | OrNode | NotNode | LeafNode;

export type AuthorizedFieldSet = { kind: 'all' } | { kind: 'fields'; fields: ReadonlySet<string> };

export type GeoDistance = { lat: number; lng: number; distance: number };

export function fieldTable(fields: Iterable<FieldDescriptor>): FieldTable {
  const out = new Map<string, FieldDescriptor>();
  for (const f of fields) out.set(f.name, f);
  return out;
}

/** `column`, or `association.column` for fields reached through a join. */
export function storagePath(field: FieldDescriptor): string {
  const column = field.column ?? field.name;
  return field.association ? `${field.association}.${column}` : column;
}

export function categoryOf(kind: FieldKind): OperatorCategory {
  if (typeof kind === 'object') return 'array' in kind ? 'array' : 'scalar';
  if (kind === 'json' || kind === 'geo') return kind;
  return 'scalar';
}

/** Key into an adapter's operator table for a field kind. */
export function kindKey(kind: FieldKind): string {
  if (typeof kind === 'object') return 'array' in kind ? 'array' : 'enum';
  return kind;
}

export function isCustomField(field: FieldDescriptor): boolean {
  return field.storage === 'custom';
}

export function authorizeAll(): AuthorizedFieldSet {
  return { kind: 'all' };
}

export function authorizeFields(fields: Iterable<string>): AuthorizedFieldSet {
  return { kind: 'fields', fields: new Set(fields) };
}

export function isAuthorized(set: AuthorizedFieldSet, field: string): boolean {
  return set.kind === 'all' || set.fields.has(field);
}
