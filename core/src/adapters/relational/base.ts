import { Op, col, literal, type WhereOptions } from 'sequelize';

import type { AdapterCapabilities, RelationalAdapterId } from '../../capabilities/types.js';
import type { Explainer } from '../../complexity/types.js';
import { FilterCapabilityError } from '../../filter/errors.js';
import type { Operator } from '../../filter/operators.js';
import { categoryOf, type FieldDescriptor, type FilterValue, type Scalar } from '../../filter/types.js';
import { asBoolean, asScalar, asScalarList, asString } from '../../filter/values.js';
import type { SelectOptions, SelectOrder, SqlLiteral } from '../../orm/types.js';
import type { SortSpec } from '../../query/types.js';
import type { FilterAdapter } from '../types.js';

export type RelationalAdapterOptions = {
  explainer?: Explainer<WhereOptions>;
  escape?: (value: SqlLiteral) => string;
};

/** Storage column of a root-table field: the where-hash key and the col()/fn() argument. */
export function columnRef(field: FieldDescriptor): string {
  return field.column ?? field.name;
}

export function isEmptyWhere(where: WhereOptions): boolean {
  if (!where || typeof where !== 'object' || Array.isArray(where)) return false;
  if (Object.getPrototypeOf(where) !== Object.prototype) return false;
  return Reflect.ownKeys(where).length === 0;
}

export function toOrder(sort: readonly SortSpec[] | undefined): SelectOrder | undefined {
  if (!sort?.length) return undefined;
  return sort.map((s) => [s.field, s.dir === 'desc' ? 'DESC' : 'ASC']);
}

/** Options for Model.findAll / findAndCountAll. */
export function toFindOptions(
  where: WhereOptions,
  opts: { limit?: number; offset?: number; sort?: readonly SortSpec[] } = {},
): SelectOptions {
  const order = toOrder(opts.sort);
  return {
    where,
    ...(opts.limit !== undefined ? { limit: opts.limit } : {}),
    ...(opts.offset ? { offset: opts.offset } : {}),
    ...(order ? { order } : {}),
  };
}

export abstract class RelationalFilterAdapter implements FilterAdapter<WhereOptions> {
  abstract readonly id: RelationalAdapterId;
  readonly family = 'relational';
  readonly explainer?: Explainer<WhereOptions>;

  protected readonly caps: AdapterCapabilities;
  private readonly escapeFn?: (value: SqlLiteral) => string;

  constructor(caps: AdapterCapabilities, opts: RelationalAdapterOptions = {}) {
    this.caps = caps;
    this.explainer = opts.explainer;
    this.escapeFn = opts.escape;
  }

  capabilities(): AdapterCapabilities {
    return this.caps;
  }

  empty(): WhereOptions {
    return {};
  }

  matchAll(): WhereOptions {
    return literal('1=1');
  }

  matchNone(): WhereOptions {
    return literal('1=0');
  }

  applyOperator(query: WhereOptions, field: FieldDescriptor, operator: Operator, value: FilterValue): WhereOptions {
    // selects are rendered without models, so there is no include to join the association through
    if (field.association) {
      throw new FilterCapabilityError(`${this.id} cannot filter through association ${field.association} (${field.name})`, {
        field: field.name,
        operator,
        adapter: this.id,
      });
    }
    return this.combineAnd([query, this.condition(field, operator, value)]);
  }

  combineAnd(queries: readonly WhereOptions[]): WhereOptions {
    const parts = queries.filter((q) => !isEmptyWhere(q));
    const only = parts[0];
    if (!only) return {};
    if (parts.length === 1) return only;
    return { [Op.and]: parts };
  }

  combineOr(queries: readonly WhereOptions[]): WhereOptions {
    const only = queries[0];
    if (!only) return this.matchNone();
    if (queries.some(isEmptyWhere)) return {};
    if (queries.length === 1) return only;
    return { [Op.or]: [...queries] };
  }

  negate(query: WhereOptions): WhereOptions {
    if (isEmptyWhere(query)) return this.matchNone();
    return { [Op.not]: query };
  }

  protected escape(value: SqlLiteral): string {
    if (!this.escapeFn) throw new Error(`${this.id} adapter needs an escape function for raw SQL fragments`);
    return this.escapeFn(value);
  }

  protected unsupported(field: FieldDescriptor, operator: Operator): never {
    throw new FilterCapabilityError(`${this.id} cannot apply ${operator} to ${field.name}`, {
      field: field.name,
      operator,
      adapter: this.id,
    });
  }

  /** `NULL OR cond`, so negated membership keeps rows whose column is missing. */
  protected orNull(field: FieldDescriptor, condition: WhereOptions): WhereOptions {
    return { [Op.or]: [{ [columnRef(field)]: null }, condition] };
  }

  protected condition(field: FieldDescriptor, operator: Operator, value: FilterValue): WhereOptions {
    switch (categoryOf(field.kind)) {
      case 'array':
        return this.arrayCondition(field, operator, value);
      case 'json':
        if (operator === 'isNull') return this.nullCondition(field, value);
        return this.jsonCondition(field, operator, value);
      case 'geo':
        if (operator === 'isNull') return this.nullCondition(field, value);
        return this.geoCondition(field, operator, value);
      default:
        return this.scalarCondition(field, operator, value);
    }
  }

  protected nullCondition(field: FieldDescriptor, value: FilterValue): WhereOptions {
    const key = columnRef(field);
    return asBoolean(value, field.name) ? { [key]: { [Op.is]: null } } : { [key]: { [Op.not]: null } };
  }

  protected scalarCondition(field: FieldDescriptor, operator: Operator, value: FilterValue): WhereOptions {
    const key = columnRef(field);
    const name = field.name;
    switch (operator) {
      case 'eq':
        return { [key]: { [Op.eq]: asScalar(value, name) } };
      case 'neq':
        return { [key]: { [Op.ne]: asScalar(value, name) } };
      case 'gt':
        return { [key]: { [Op.gt]: asScalar(value, name) } };
      case 'gte':
        return { [key]: { [Op.gte]: asScalar(value, name) } };
      case 'lt':
        return { [key]: { [Op.lt]: asScalar(value, name) } };
      case 'lte':
        return { [key]: { [Op.lte]: asScalar(value, name) } };
      case 'in':
        return { [key]: { [Op.in]: asScalarList(value, name) } };
      case 'nin':
        return { [key]: { [Op.notIn]: asScalarList(value, name) } };
      case 'isNull':
        return this.nullCondition(field, value);
      case 'like':
        return { [key]: { [Op.like]: asString(value, name) } };
      case 'ilike':
        return this.caseInsensitiveLike(field, asString(value, name));
      case 'contains':
        return { [key]: { [Op.substring]: asString(value, name) } };
      case 'icontains':
        return this.caseInsensitiveLike(field, `%${asString(value, name)}%`);
      case 'startsWith':
        return { [key]: { [Op.startsWith]: asString(value, name) } };
      case 'endsWith':
        return { [key]: { [Op.endsWith]: asString(value, name) } };
      case 'match':
      case 'fuzzy':
      case 'similar':
        return this.textCondition(field, operator, asString(value, name));
      default:
        return this.unsupported(field, operator);
    }
  }

  protected column(field: FieldDescriptor) {
    return col(columnRef(field));
  }

  protected quoteIdentifier(ref: string): string {
    return ref
      .split('.')
      .map((part) => `"${part.replace(/"/g, '""')}"`)
      .join('.');
  }

  protected list(value: FilterValue, field: FieldDescriptor): Scalar[] {
    return asScalarList(value, field.name);
  }

  /** Dialects whose LIKE is already case-insensitive keep this default. */
  protected caseInsensitiveLike(field: FieldDescriptor, pattern: string): WhereOptions {
    return { [columnRef(field)]: { [Op.like]: pattern } };
  }

  protected abstract textCondition(field: FieldDescriptor, operator: 'match' | 'fuzzy' | 'similar', value: string): WhereOptions;
  protected abstract arrayCondition(field: FieldDescriptor, operator: Operator, value: FilterValue): WhereOptions;
  protected abstract jsonCondition(field: FieldDescriptor, operator: Operator, value: FilterValue): WhereOptions;
  protected abstract geoCondition(field: FieldDescriptor, operator: Operator, value: FilterValue): WhereOptions;
}
