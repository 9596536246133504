import type { Logger } from '../logging/logger.js';
import type { SqlRunner } from '../orm/types.js';
import type { ElasticsearchInfoClient, FeatureName } from './types.js';
import { parseVersion, versionAtLeast } from './version.js';

export type DetectionResult = {
  version?: string;
  features: Partial<Record<FeatureName, boolean>>;
};

async function attempt<T>(logger: Logger, check: string, fn: () => Promise<T>, fallback: T): Promise<T> {
  try {
    return await fn();
  } catch (e) {
    logger.warn(`[capabilities] check failed: ${check}`, { error: e instanceof Error ? e.message : String(e) });
    return fallback;
  }
}

async function firstString(sql: SqlRunner, query: string, column: string): Promise<string | undefined> {
  const rows = await sql.select<Record<string, unknown>>(query);
  const value = rows[0]?.[column];
  return typeof value === 'string' ? value : undefined;
}

export async function detectPostgres(sql: SqlRunner, logger: Logger): Promise<DetectionResult> {
  const version = await attempt(logger, 'postgres version', () => firstString(sql, 'SELECT version() AS version', 'version'), undefined);
  const extensions = await attempt(
    logger,
    'postgres extensions',
    async () => {
      const rows = await sql.select<Record<string, unknown>>('SELECT extname FROM pg_extension');
      return new Set(rows.map((r) => r.extname).filter((x): x is string => typeof x === 'string'));
    },
    new Set<string>(),
  );
  const parsed = version ? parseVersion(version.replace(/^PostgreSQL\s*/i, '')) : null;

  return {
    ...(version ? { version } : {}),
    features: {
      arrays: true,
      json: true,
      fullText: true,
      jsonPath: versionAtLeast(parsed, [12, 0, 0]),
      jsonOverlaps: true,
      trigram: extensions.has('pg_trgm'),
      fuzzy: extensions.has('fuzzystrmatch'),
      geo: extensions.has('postgis'),
    },
  };
}

export async function detectMysql(sql: SqlRunner, logger: Logger): Promise<DetectionResult> {
  const version = await attempt(logger, 'mysql version', () => firstString(sql, 'SELECT VERSION() AS version', 'version'), undefined);
  const parsed = version ? parseVersion(version) : null;
  const mariadb = /mariadb/i.test(version ?? '');
  const json = versionAtLeast(parsed, [5, 7, 8]) || (mariadb && versionAtLeast(parsed, [10, 2, 7]));

  return {
    ...(version ? { version } : {}),
    features: {
      arrays: json,
      json,
      jsonPath: json,
      jsonOverlaps: !mariadb && versionAtLeast(parsed, [8, 0, 17]),
      fullText: versionAtLeast(parsed, [5, 6, 0]),
      geo: versionAtLeast(parsed, [5, 7, 6]),
    },
  };
}

export async function detectSqlite(sql: SqlRunner, logger: Logger): Promise<DetectionResult> {
  const version = await attempt(logger, 'sqlite version', () => firstString(sql, 'SELECT sqlite_version() AS version', 'version'), undefined);
  const json1 = await attempt(
    logger,
    'sqlite json1',
    async () => {
      await sql.select(`SELECT json('{}') AS json1`);
      return true;
    },
    false,
  );
  const fts5 = await attempt(
    logger,
    'sqlite fts5',
    async () => {
      const rows = await sql.select<Record<string, unknown>>(
        `SELECT sqlite_compileoption_used('ENABLE_FTS5') AS enabled`,
      );
      return rows[0]?.enabled === 1;
    },
    false,
  );

  return {
    ...(version ? { version } : {}),
    features: { arrays: json1, json: json1, jsonPath: json1, fullText: fts5 },
  };
}

export async function detectElasticsearch(client: ElasticsearchInfoClient, logger: Logger): Promise<DetectionResult> {
  const version = await attempt(
    logger,
    'elasticsearch info',
    async () => (await client.info()).version.number,
    undefined,
  );
  return {
    ...(version ? { version } : {}),
    features: { arrays: true, json: true, fullText: true, fuzzy: true, geo: true, jsonOverlaps: true },
  };
}
