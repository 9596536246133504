import type { FilterAdapter } from '../adapters/types.js';
import { supportsOperator } from '../capabilities/tables.js';
import { FilterAuthorizationError, FilterCapabilityError, FilterParseError, type CompileError } from '../filter/errors.js';
import { LIST_OPERATORS, type Operator } from '../filter/operators.js';
import {
  isAuthorized,
  isCustomField,
  type AuthorizedFieldSet,
  type FieldDescriptor,
  type FieldTable,
  type FilterExpression,
  type FilterValue,
  type LeafNode,
} from '../filter/types.js';
import { isValueList } from '../filter/values.js';
import { err, ok, type Result } from '../result.js';
import type { CustomFilterRegistry } from './customFilters.js';

export type CompileOptions<Q> = {
  customFilters?: CustomFilterRegistry<Q>;
};

// Membership operators given an empty list: which constant they reduce to.
const EMPTY_LIST_MATCHES_ALL: Partial<Record<Operator, boolean>> = {
  in: false,
  nin: true,
  includesAll: true,
  includesAny: false,
  excludesAll: true,
  excludesAny: false,
};

function unauthorizedFields(expr: FilterExpression, authorized: AuthorizedFieldSet): string[] {
  if (authorized.kind === 'all') return [];
  const out = new Set<string>();
  const visit = (e: FilterExpression): void => {
    if (e.kind === 'leaf') {
      if (!isAuthorized(authorized, e.field)) out.add(e.field);
    } else if (e.kind === 'not') visit(e.child);
    else e.children.forEach(visit);
  };
  visit(expr);
  return [...out].sort((a, b) => a.localeCompare(b));
}

// Operators whose operand is an enum label; the rest (isNull) take booleans.
const ENUM_VALUE_OPERATORS: ReadonlySet<Operator> = new Set<Operator>(['eq', 'neq', 'in', 'nin']);

function coerceEnum(field: FieldDescriptor, value: FilterValue): FilterValue {
  const mapping = field.enumValues;
  if (!mapping) return value;
  const one = (v: FilterValue): FilterValue => {
    if (v === null) return v;
    if (typeof v === 'string' && Object.prototype.hasOwnProperty.call(mapping, v)) return mapping[v] ?? v;
    throw new FilterParseError(`Unknown value for enum field ${field.name}`, { field: field.name, value: v });
  };
  return isValueList(value) ? value.map(one) : one(value);
}

class Compiler<Q> {
  private readonly fields: FieldTable;
  private readonly adapter: FilterAdapter<Q>;
  private readonly opts: CompileOptions<Q>;

  constructor(fields: FieldTable, adapter: FilterAdapter<Q>, opts: CompileOptions<Q>) {
    this.fields = fields;
    this.adapter = adapter;
    this.opts = opts;
  }

  compile(expr: FilterExpression): Q {
    switch (expr.kind) {
      case 'and':
        if (!expr.children.length) return this.adapter.matchAll();
        return this.adapter.combineAnd(expr.children.map((c) => this.compile(c)));
      case 'or':
        if (!expr.children.length) return this.adapter.matchNone();
        return this.adapter.combineOr(expr.children.map((c) => this.compile(c)));
      case 'not':
        return this.adapter.negate(this.compile(expr.child));
      case 'leaf':
        return this.leaf(expr);
    }
  }

  private leaf(node: LeafNode): Q {
    const field = this.fields.get(node.field);
    if (!field) throw new FilterParseError(`Unknown filter field: ${node.field}`, { field: node.field });
    if (isCustomField(field)) return this.custom(field, node);

    const caps = this.adapter.capabilities();
    const max = caps.limits.maxInItems;

    let query = this.adapter.empty();
    for (const [op, raw] of node.ops) {
      if (!supportsOperator(caps, field.kind, op)) {
        throw new FilterCapabilityError(`${this.adapter.id} does not support ${op} on ${field.name}`, {
          field: field.name,
          operator: op,
          adapter: this.adapter.id,
        });
      }
      const value = ENUM_VALUE_OPERATORS.has(op) ? coerceEnum(field, raw) : raw;

      if (LIST_OPERATORS.has(op) && isValueList(value)) {
        if (max !== null && value.length > max) {
          throw new FilterCapabilityError(`${op} on ${field.name} exceeds ${max} items for ${this.adapter.id}`, {
            field: field.name,
            operator: op,
            adapter: this.adapter.id,
            limit: max,
          });
        }
        if (!value.length) {
          const constant = EMPTY_LIST_MATCHES_ALL[op] ? this.adapter.matchAll() : this.adapter.matchNone();
          query = this.adapter.combineAnd([query, constant]);
          continue;
        }
      }
      query = this.adapter.applyOperator(query, field, op, value);
    }
    return query;
  }

  private custom(field: FieldDescriptor, node: LeafNode): Q {
    const fn = this.opts.customFilters?.get(field.name);
    if (!fn) {
      throw new FilterCapabilityError(`No custom filter registered for ${field.name}`, {
        field: field.name,
        adapter: this.adapter.id,
      });
    }
    let query = this.adapter.empty();
    for (const [op, value] of node.ops) query = fn(query, op, value);
    return query;
  }
}

/**
 * Compiles a FilterExpression into the adapter's native query.
 * Authorization is checked for every leaf before anything is dispatched to the adapter.
 */
export function compileFilter<Q>(
  expr: FilterExpression,
  fields: FieldTable,
  authorized: AuthorizedFieldSet,
  adapter: FilterAdapter<Q>,
  opts: CompileOptions<Q> = {},
): Result<Q, CompileError> {
  const denied = unauthorizedFields(expr, authorized);
  if (denied.length) return err(new FilterAuthorizationError(denied));

  try {
    return ok(new Compiler(fields, adapter, opts).compile(expr));
  } catch (e) {
    if (e instanceof FilterParseError || e instanceof FilterCapabilityError) return err(e);
    throw e;
  }
}
