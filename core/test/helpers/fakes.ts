import type { PreparedQuery } from '../../src/complexity/types.js';
import type { FieldTable, FilterExpression } from '../../src/filter/types.js';
import type { Logger } from '../../src/logging/logger.js';
import type { RelationalAdapterId } from '../../src/capabilities/types.js';
import type { SelectOptions, SqlLiteral, SqlRunner } from '../../src/orm/types.js';
import type { SortSpec } from '../../src/query/types.js';

export type LogLine = { level: keyof Logger; message: string; details?: Record<string, unknown> };

export function recordingLogger(): { logger: Logger; lines: LogLine[] } {
  const lines: LogLine[] = [];
  const at =
    (level: keyof Logger) =>
    (message: string, details?: Record<string, unknown>) => {
      lines.push(details === undefined ? { level, message } : { level, message, details });
    };
  return { logger: { info: at('info'), warn: at('warn'), error: at('error'), debug: at('debug') }, lines };
}

export type FakeResponse = Array<Record<string, unknown>> | Error;

export type FakeSql = SqlRunner & { queries: string[]; rendered: Array<{ target: string; options: SelectOptions }> };

/** Answers exact SQL strings from a table; anything else rejects. */
export function fakeSql(dialect: RelationalAdapterId, responses: Record<string, FakeResponse> = {}): FakeSql {
  const queries: string[] = [];
  const rendered: FakeSql['rendered'] = [];
  return {
    dialect,
    queries,
    rendered,
    async select<T extends object>(sql: string): Promise<T[]> {
      queries.push(sql);
      const response = responses[sql];
      if (response === undefined) throw new Error(`unexpected query: ${sql}`);
      if (response instanceof Error) throw response;
      return response.filter((row): row is T & Record<string, unknown> => typeof row === 'object');
    },
    escape(value: SqlLiteral): string {
      return typeof value === 'number' ? String(value) : `'${value.replace(/'/g, "''")}'`;
    },
    renderSelect(target: string, options: SelectOptions): string {
      rendered.push({ target, options });
      return `SELECT * FROM ${target}`;
    },
  };
}

export function preparedQuery<Q>(
  compiled: Q,
  expression: FilterExpression,
  fields: FieldTable,
  paging: { limit?: number; offset?: number; sort?: readonly SortSpec[] } = {},
): PreparedQuery<Q> {
  return { target: 'people', expression, fields, compiled, ...paging };
}
