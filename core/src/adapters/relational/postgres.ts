import { Op, cast, fn, where, type WhereOptions } from 'sequelize';

import type { Operator } from '../../filter/operators.js';
import type { FieldDescriptor, FilterValue } from '../../filter/types.js';
import { asBoolean, asGeoDistance, asScalar, asString } from '../../filter/values.js';
import { RelationalFilterAdapter, columnRef } from './base.js';

const TRIGRAM_THRESHOLD = 0.3;
const MAX_EDIT_DISTANCE = 2;

/** Native array columns, JSONB, tsvector search and PostGIS. */
export class PostgresFilterAdapter extends RelationalFilterAdapter {
  readonly id = 'postgres';

  protected override caseInsensitiveLike(field: FieldDescriptor, pattern: string): WhereOptions {
    return { [columnRef(field)]: { [Op.iLike]: pattern } };
  }

  protected textCondition(field: FieldDescriptor, operator: 'match' | 'fuzzy' | 'similar', value: string): WhereOptions {
    const column = this.column(field);
    switch (operator) {
      case 'match':
        return where(fn('to_tsvector', column), Op.match, fn('plainto_tsquery', value));
      case 'fuzzy':
        return where(fn('levenshtein', fn('lower', column), value.toLowerCase()), Op.lte, MAX_EDIT_DISTANCE);
      case 'similar':
        return where(fn('similarity', column, value), Op.gt, TRIGRAM_THRESHOLD);
    }
  }

  protected arrayCondition(field: FieldDescriptor, operator: Operator, value: FilterValue): WhereOptions {
    const key = columnRef(field);
    const name = field.name;
    switch (operator) {
      case 'includes':
        return { [key]: { [Op.contains]: [asScalar(value, name)] } };
      case 'excludes':
        return this.orNull(field, { [Op.not]: { [key]: { [Op.contains]: [asScalar(value, name)] } } });
      case 'includesAll':
        return { [key]: { [Op.contains]: this.list(value, field) } };
      case 'includesAny':
        return { [key]: { [Op.overlap]: this.list(value, field) } };
      case 'excludesAll':
        return this.orNull(field, { [Op.not]: { [key]: { [Op.overlap]: this.list(value, field) } } });
      case 'excludesAny':
        return this.orNull(field, { [Op.not]: { [key]: { [Op.contains]: this.list(value, field) } } });
      case 'isEmpty': {
        const size = fn('cardinality', this.column(field));
        return asBoolean(value, name) ? { [Op.or]: [{ [key]: null }, where(size, 0)] } : where(size, Op.gt, 0);
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
        return where(fn('jsonb_exists', column, asString(value, field.name)), true);
      case 'containsJson':
        return where(fn('jsonb_contains', column, cast(JSON.stringify(value), 'jsonb')), true);
      case 'jsonPath':
        return where(fn('jsonb_path_exists', column, cast(asString(value, field.name), 'jsonpath')), true);
      default:
        return this.unsupported(field, operator);
    }
  }

  protected geoCondition(field: FieldDescriptor, operator: Operator, value: FilterValue): WhereOptions {
    if (operator !== 'withinDistance') return this.unsupported(field, operator);
    const { lat, lng, distance } = asGeoDistance(value, field.name);
    return where(
      fn(
        'ST_DWithin',
        cast(this.column(field), 'geography'),
        cast(fn('ST_SetSRID', fn('ST_MakePoint', lng, lat), 4326), 'geography'),
        distance,
      ),
      true,
    );
  }
}
