import type { FieldDescriptor, FieldKind, FieldTable, ScalarKind } from '../filter/types.js';
import { fieldTable } from '../filter/types.js';
import { DslConstraintError } from './errors.js';
import { modelsOf } from './registry.js';
import type { DslFieldSpec, DslModelSpec, DslRoot } from './types.js';

const SCALAR_TYPES: Record<string, ScalarKind> = {
  string: 'string',
  text: 'string',
  varchar: 'string',
  char: 'string',
  int: 'integer',
  integer: 'integer',
  smallint: 'integer',
  bigint: 'integer',
  float: 'float',
  double: 'float',
  real: 'float',
  number: 'float',
  decimal: 'decimal',
  numeric: 'decimal',
  bool: 'boolean',
  boolean: 'boolean',
  date: 'date',
  datetime: 'datetime',
  timestamp: 'datetime',
  time: 'time',
  id: 'id',
  uuid: 'id',
};

const JSON_TYPES = new Set(['json', 'jsonb']);
const GEO_TYPES = new Set(['geo', 'point', 'geography']);

export type FieldsFromDslOptions = {
  /** The whole DSL, so `source` references can be followed one level deep. */
  dsl?: DslRoot;
};

function enumValues(values: DslFieldSpec['values']): Record<string, string | number> | undefined {
  if (!values) return undefined;
  if (Array.isArray(values)) return Object.fromEntries(values.map((v) => [v, v]));
  return { ...values };
}

function kindOf(modelKey: string, name: string, spec: DslFieldSpec): Pick<FieldDescriptor, 'kind' | 'enumValues'> {
  const type = (spec.type ?? 'string').trim().toLowerCase();
  const where = { modelKey, field: name, type };

  if (type === 'enum') {
    const values = enumValues(spec.values);
    if (!values) throw new DslConstraintError(`Enum field needs values (${modelKey}.${name})`, where);
    if (spec.multi) throw new DslConstraintError(`Enum field cannot be multi (${modelKey}.${name})`, where);
    return { kind: { enum: name }, enumValues: values };
  }

  let kind: FieldKind;
  if (JSON_TYPES.has(type)) kind = 'json';
  else if (GEO_TYPES.has(type)) kind = 'geo';
  else {
    const scalar = SCALAR_TYPES[type];
    if (!scalar) throw new DslConstraintError(`Unknown field type ${type} (${modelKey}.${name})`, where);
    return { kind: spec.multi ? { array: scalar } : scalar };
  }

  if (spec.multi) throw new DslConstraintError(`Field type ${type} cannot be multi (${modelKey}.${name})`, where);
  return { kind };
}

function descriptor(modelKey: string, name: string, spec: DslFieldSpec, association?: string): FieldDescriptor {
  const d: FieldDescriptor = {
    name: association ? `${association}.${name}` : name,
    ...kindOf(modelKey, name, spec),
  };
  if (spec.filter === 'custom') d.storage = 'custom';
  if (spec.columnName) d.column = spec.columnName;
  else if (association) d.column = name;
  if (association) d.association = association;
  return d;
}

function filterable(spec: DslFieldSpec): boolean {
  if (spec.filter === false) return false;
  // Virtual fields have no column; only a custom filter can serve them.
  return spec.save !== false || spec.filter === 'custom';
}

/**
 * Derives the filterable field table of one model. Fields with `source` also
 * expose the referenced model's plain fields as `<as>.<field>`.
 */
export function fieldsFromDslModel(modelKey: string, spec: DslModelSpec, opts: FieldsFromDslOptions = {}): FieldTable {
  const models = opts.dsl ? modelsOf(opts.dsl) : new Map<string, DslModelSpec>();
  const out: FieldDescriptor[] = [];

  for (const name of Object.keys(spec.fields).sort((a, b) => a.localeCompare(b))) {
    const field = spec.fields[name];
    if (!field || !filterable(field)) continue;
    out.push(descriptor(modelKey, name, field));

    if (!field.source) continue;
    const target = models.get(field.source);
    if (!target) {
      if (opts.dsl) {
        throw new DslConstraintError(`Unknown source model ${field.source} (${modelKey}.${name})`, {
          modelKey,
          field: name,
          source: field.source,
        });
      }
      continue;
    }
    const association = field.as ?? field.source;
    for (const targetName of Object.keys(target.fields).sort((a, b) => a.localeCompare(b))) {
      const targetField = target.fields[targetName];
      if (!targetField || !filterable(targetField) || targetField.filter === 'custom') continue;
      out.push(descriptor(field.source, targetName, targetField, association));
    }
  }

  return fieldTable(out);
}
