import { QueryTypes, type Sequelize } from 'sequelize';

import { AdapterSelectionError } from '../capabilities/errors.js';
import type { RelationalAdapterId, SqlConnection } from '../capabilities/types.js';
import type { SelectOptions, SqlLiteral, SqlRunner } from './types.js';

const DIALECTS: Readonly<Record<string, RelationalAdapterId>> = {
  postgres: 'postgres',
  postgresql: 'postgres',
  mysql: 'mysql',
  mariadb: 'mysql',
  sqlite: 'sqlite',
};

type SelectQueryGenerator = {
  selectQuery(table: unknown, options: Record<string, unknown>, model?: unknown): string;
};

function isSelectQueryGenerator(v: unknown): v is SelectQueryGenerator {
  return typeof v === 'object' && v !== null && typeof Reflect.get(v, 'selectQuery') === 'function';
}

export function dialectOf(sequelize: Sequelize): RelationalAdapterId {
  const name = sequelize.getDialect();
  const dialect = DIALECTS[name];
  if (!dialect) throw new AdapterSelectionError(`Unsupported SQL dialect: ${name}`, { dialect: name });
  return dialect;
}

export function sequelizeRunner(sequelize: Sequelize): SqlRunner {
  const dialect = dialectOf(sequelize);

  return {
    dialect,
    select: <T extends object>(sql: string) => sequelize.query<T>(sql, { type: QueryTypes.SELECT }),
    escape: (value: SqlLiteral) => sequelize.escape(value),
    renderSelect: (target: string, options: SelectOptions) => {
      const generator: unknown = Reflect.get(sequelize.getQueryInterface(), 'queryGenerator');
      if (!isSelectQueryGenerator(generator)) {
        throw new Error(`Query generator unavailable for dialect ${dialect}`);
      }
      const model = sequelize.isDefined(target) ? sequelize.model(target) : undefined;
      const table = model ? model.getTableName() : target;
      const sql = generator.selectQuery(table, { ...options }, model);
      return sql.trim().replace(/;$/, '');
    },
  };
}

export function connectionFromSequelize(id: string, sequelize: Sequelize): SqlConnection {
  const sql = sequelizeRunner(sequelize);
  return { id, type: sql.dialect, sql };
}
