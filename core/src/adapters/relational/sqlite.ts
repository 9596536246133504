import { Op, fn, literal, where, type WhereOptions } from 'sequelize';

import type { Operator } from '../../filter/operators.js';
import type { FieldDescriptor, FilterValue, Scalar } from '../../filter/types.js';
import { asBoolean, asScalar, asString } from '../../filter/values.js';
import { RelationalFilterAdapter, columnRef } from './base.js';
import { jsonKeyPath } from './mysql.js';

/** JSON arrays through the json1 extension; no full-text or geo operators. */
export class SqliteFilterAdapter extends RelationalFilterAdapter {
  readonly id = 'sqlite';

  private elementMatch(value: Scalar): string {
    if (value === null) return 'IS NULL';
    if (typeof value === 'boolean') return `= ${value ? 1 : 0}`;
    return `= ${this.escape(value)}`;
  }

  private containsElement(field: FieldDescriptor, value: Scalar): string {
    const column = this.quoteIdentifier(columnRef(field));
    return `EXISTS (SELECT 1 FROM json_each(${column}) WHERE json_each.value ${this.elementMatch(value)})`;
  }

  protected textCondition(field: FieldDescriptor, operator: 'match' | 'fuzzy' | 'similar'): WhereOptions {
    return this.unsupported(field, operator);
  }

  protected arrayCondition(field: FieldDescriptor, operator: Operator, value: FilterValue): WhereOptions {
    const name = field.name;
    switch (operator) {
      case 'includes':
        return literal(this.containsElement(field, asScalar(value, name)));
      case 'excludes':
        return this.orNull(field, literal(`NOT ${this.containsElement(field, asScalar(value, name))}`));
      case 'isEmpty': {
        const size = fn('json_array_length', this.column(field));
        return asBoolean(value, name)
          ? { [Op.or]: [{ [columnRef(field)]: null }, where(size, 0)] }
          : where(size, Op.gt, 0);
      }
      case 'isNull':
        return this.nullCondition(field, value);
      default:
        return this.unsupported(field, operator);
    }
  }

  protected jsonCondition(field: FieldDescriptor, operator: Operator, value: FilterValue): WhereOptions {
    const column = this.column(field);
    switch (operator) {
      case 'hasKey':
        return where(fn('json_type', column, jsonKeyPath(asString(value, field.name))), { [Op.ne]: null });
      case 'jsonPath':
        return where(fn('json_type', column, asString(value, field.name)), { [Op.ne]: null });
      default:
        return this.unsupported(field, operator);
    }
  }

  protected geoCondition(field: FieldDescriptor, operator: Operator): WhereOptions {
    return this.unsupported(field, operator);
  }
}
