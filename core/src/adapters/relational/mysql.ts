import { Op, fn, literal, where, type WhereOptions } from 'sequelize';

import type { Operator } from '../../filter/operators.js';
import type { FieldDescriptor, FilterValue } from '../../filter/types.js';
import { asBoolean, asGeoDistance, asScalar, asString } from '../../filter/values.js';
import { RelationalFilterAdapter, columnRef } from './base.js';

export function jsonKeyPath(key: string): string {
  return `$."${key.replace(/["\\]/g, (c) => `\\${c}`)}"`;
}

/** Arrays live in JSON columns; overlap checks need MySQL 8.0.17+. */
export class MysqlFilterAdapter extends RelationalFilterAdapter {
  readonly id = 'mysql';

  protected override quoteIdentifier(ref: string): string {
    return ref
      .split('.')
      .map((part) => `\`${part.replace(/`/g, '``')}\``)
      .join('.');
  }

  protected textCondition(field: FieldDescriptor, operator: 'match' | 'fuzzy' | 'similar', value: string): WhereOptions {
    if (operator !== 'match') return this.unsupported(field, operator);
    return literal(
      `MATCH (${this.quoteIdentifier(columnRef(field))}) AGAINST (${this.escape(value)} IN NATURAL LANGUAGE MODE)`,
    );
  }

  protected arrayCondition(field: FieldDescriptor, operator: Operator, value: FilterValue): WhereOptions {
    const column = this.column(field);
    const name = field.name;
    switch (operator) {
      case 'includes':
        return where(fn('JSON_CONTAINS', column, fn('JSON_ARRAY', asScalar(value, name))), 1);
      case 'excludes':
        return this.orNull(field, where(fn('JSON_CONTAINS', column, fn('JSON_ARRAY', asScalar(value, name))), 0));
      case 'includesAny':
        return where(fn('JSON_OVERLAPS', column, fn('JSON_ARRAY', ...this.list(value, field))), 1);
      case 'excludesAll':
        return this.orNull(field, where(fn('JSON_OVERLAPS', column, fn('JSON_ARRAY', ...this.list(value, field))), 0));
      case 'isEmpty': {
        const size = fn('JSON_LENGTH', column);
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
        return where(fn('JSON_CONTAINS_PATH', column, 'one', jsonKeyPath(asString(value, field.name))), 1);
      case 'containsJson':
        return where(fn('JSON_CONTAINS', column, JSON.stringify(value)), 1);
      case 'jsonPath':
        return where(fn('JSON_CONTAINS_PATH', column, 'one', asString(value, field.name)), 1);
      default:
        return this.unsupported(field, operator);
    }
  }

  protected geoCondition(field: FieldDescriptor, operator: Operator, value: FilterValue): WhereOptions {
    if (operator !== 'withinDistance') return this.unsupported(field, operator);
    const { lat, lng, distance } = asGeoDistance(value, field.name);
    return where(fn('ST_Distance_Sphere', this.column(field), fn('POINT', lng, lat)), Op.lte, distance);
  }
}
