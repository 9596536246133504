import { err, ok, type Result } from '../result.js';
import { and, leaf, not, or } from './builders.js';
import { FilterParseError } from './errors.js';
import {
  BOOLEAN_OPERATORS,
  LIST_OPERATORS,
  isCategoryOperator,
  operatorFromWire,
  type Operator,
} from './operators.js';
import { categoryOf, type FieldDescriptor, type FieldTable, type FilterExpression, type FilterValue } from './types.js';
import { isPlainObject, isValueList, isValueRecord, toFilterValue } from './values.js';

function parseList(raw: unknown, key: string, fields: FieldTable, path: string): FilterExpression[] {
  if (!Array.isArray(raw)) throw new FilterParseError(`${key} expects a list at ${path}`, { path, key });
  return raw.map((item, i) => parseNode(item, fields, `${path}.${key}[${i}]`));
}

function checkValueShape(field: FieldDescriptor, op: Operator, value: FilterValue, path: string): void {
  if (LIST_OPERATORS.has(op) && !isValueList(value)) {
    throw new FilterParseError(`Operator ${op} on ${field.name} expects a list`, { path, field: field.name, operator: op });
  }
  if (BOOLEAN_OPERATORS.has(op) && typeof value !== 'boolean') {
    throw new FilterParseError(`Operator ${op} on ${field.name} expects true or false`, {
      path,
      field: field.name,
      operator: op,
    });
  }
  if ((op === 'hasKey' || op === 'jsonPath') && typeof value !== 'string') {
    throw new FilterParseError(`Operator ${op} on ${field.name} expects a string`, { path, field: field.name, operator: op });
  }
  if (op === 'withinDistance' && !isValueRecord(value)) {
    throw new FilterParseError(`Operator ${op} on ${field.name} expects { lat, lng, distance }`, {
      path,
      field: field.name,
      operator: op,
    });
  }
}

function parseLeaf(name: string, raw: unknown, fields: FieldTable, path: string): FilterExpression {
  const field = fields.get(name);
  if (!field) throw new FilterParseError(`Unknown filter field: ${name}`, { path, field: name });
  if (!isPlainObject(raw)) {
    throw new FilterParseError(`Field ${name} expects an operator map`, { path, field: name });
  }

  const entries = Object.entries(raw);
  if (!entries.length) throw new FilterParseError(`Field ${name} has no operators`, { path, field: name });

  const category = categoryOf(field.kind);
  const ops: Array<readonly [Operator, FilterValue]> = [];
  for (const [key, rawValue] of entries) {
    const op = operatorFromWire(key);
    if (!op) throw new FilterParseError(`Unknown operator ${key} on ${name}`, { path, field: name, operator: key });
    if (!isCategoryOperator(category, op)) {
      throw new FilterParseError(`Operator ${key} does not apply to ${category} field ${name}`, {
        path,
        field: name,
        operator: key,
        category,
      });
    }
    const value = toFilterValue(rawValue, `${path}.${key}`);
    checkValueShape(field, op, value, `${path}.${key}`);
    ops.push([op, value]);
  }
  return leaf(name, ops);
}

function parseNode(raw: unknown, fields: FieldTable, path: string): FilterExpression {
  if (raw === null || raw === undefined) return and([]);
  if (!isPlainObject(raw)) throw new FilterParseError(`Filter must be an object at ${path}`, { path });

  const children: FilterExpression[] = [];
  for (const [key, value] of Object.entries(raw)) {
    if (!key) throw new FilterParseError(`Empty field name at ${path}`, { path });
    if (key === '_and') children.push(and(parseList(value, key, fields, path)));
    else if (key === '_or') children.push(or(parseList(value, key, fields, path)));
    else if (key === '_not') children.push(not(parseNode(value, fields, `${path}._not`)));
    else if (key.startsWith('_')) {
      throw new FilterParseError(`Unknown combinator ${key} at ${path}`, { path, combinator: key });
    } else children.push(parseLeaf(key, value, fields, `${path}.${key}`));
  }

  const only = children[0];
  if (children.length === 1 && only) return only;
  return and(children);
}

/**
 * Parses a raw filter object (`{ _and: [...], _or: [...], _not: {...}, field: { _op: value } }`)
 * into an immutable FilterExpression. Keys on one object are ANDed together.
 */
export function parseFilter(raw: unknown, fields: FieldTable): Result<FilterExpression, FilterParseError> {
  try {
    return ok(parseNode(raw, fields, '$'));
  } catch (e) {
    if (e instanceof FilterParseError) return err(e);
    throw e;
  }
}
