import type { WhereOptions } from 'sequelize';

import type { RelationalAdapterId } from '../capabilities/types.js';

export type SelectOrder = Array<[string, 'ASC' | 'DESC']>;

export type SelectOptions = {
  where?: WhereOptions;
  limit?: number;
  offset?: number;
  order?: SelectOrder;
};

export type SqlLiteral = string | number;

/**
 * Narrow SQL access used by capability detection, EXPLAIN and load sampling.
 * `sequelizeRunner` adapts a Sequelize instance to it.
 */
export interface SqlRunner {
  readonly dialect: RelationalAdapterId;
  select<T extends object>(sql: string): Promise<T[]>;
  escape(value: SqlLiteral): string;
  renderSelect(target: string, options: SelectOptions): string;
}
