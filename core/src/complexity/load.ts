import type { Logger } from '../logging/logger.js';
import { silentLogger } from '../logging/logger.js';
import type { SqlRunner } from '../orm/types.js';
import type { LoadSnapshot } from './types.js';

export type LoadSample = {
  activeConnections: number;
  cacheHitRatio: number;
};

export interface LoadSource {
  readonly name: string;
  sample(): Promise<LoadSample>;
}

export const IDLE_SNAPSHOT: LoadSnapshot = Object.freeze({
  activeConnections: 0,
  cacheHitRatio: 1,
  loadFactor: 0,
  sampledAt: 0,
});

function clamp01(n: number): number {
  if (!Number.isFinite(n)) return 0;
  return Math.min(1, Math.max(0, n));
}

/** Mean of connection saturation and cache-miss ratio. */
export function computeLoadFactor(sample: LoadSample, maxConnections: number): number {
  const saturation = Math.min(sample.activeConnections / Math.max(maxConnections, 1), 1);
  return clamp01((saturation + (1 - clamp01(sample.cacheHitRatio))) / 2);
}

function toNumber(v: unknown): number {
  const n = typeof v === 'string' ? Number(v) : v;
  return typeof n === 'number' && Number.isFinite(n) ? n : 0;
}

export class PostgresLoadSource implements LoadSource {
  readonly name = 'postgres';
  private readonly sql: SqlRunner;

  constructor(sql: SqlRunner) {
    this.sql = sql;
  }

  async sample(): Promise<LoadSample> {
    const [active] = await this.sql.select<Record<string, unknown>>(
      `SELECT count(*) AS active FROM pg_stat_activity WHERE state = 'active'`,
    );
    const [blocks] = await this.sql.select<Record<string, unknown>>(
      'SELECT sum(blks_hit) AS hit, sum(blks_read) AS read FROM pg_stat_database',
    );
    const hit = toNumber(blocks?.hit);
    const read = toNumber(blocks?.read);
    return { activeConnections: toNumber(active?.active), cacheHitRatio: hit + read > 0 ? hit / (hit + read) : 1 };
  }
}

export class MysqlLoadSource implements LoadSource {
  readonly name = 'mysql';
  private readonly sql: SqlRunner;

  constructor(sql: SqlRunner) {
    this.sql = sql;
  }

  async sample(): Promise<LoadSample> {
    const rows = await this.sql.select<Record<string, unknown>>(
      `SHOW GLOBAL STATUS WHERE Variable_name IN ('Threads_running', 'Innodb_buffer_pool_read_requests', 'Innodb_buffer_pool_reads')`,
    );
    const status = new Map(rows.map((r) => [String(r.Variable_name), toNumber(r.Value)]));
    const requests = status.get('Innodb_buffer_pool_read_requests') ?? 0;
    const misses = status.get('Innodb_buffer_pool_reads') ?? 0;
    return {
      activeConnections: status.get('Threads_running') ?? 0,
      cacheHitRatio: requests > 0 ? 1 - misses / requests : 1,
    };
  }
}

/** Fixed readings, for deployments without database statistics and for tests. */
export class StaticLoadSource implements LoadSource {
  readonly name = 'static';
  private value: LoadSample;

  constructor(value: LoadSample = { activeConnections: 0, cacheHitRatio: 1 }) {
    this.value = value;
  }

  set(value: LoadSample): void {
    this.value = value;
  }

  async sample(): Promise<LoadSample> {
    return this.value;
  }
}

export type LoadMonitorOptions = {
  source: LoadSource;
  intervalMs: number;
  maxConnections?: number;
  logger?: Logger;
  now?: () => number;
};

/**
 * Samples a LoadSource on a timer and publishes the latest snapshot.
 * Readers never wait on a sample; a failed sample keeps the previous snapshot.
 */
export class LoadMonitor {
  private readonly source: LoadSource;
  private readonly intervalMs: number;
  private readonly maxConnections: number;
  private readonly logger: Logger;
  private readonly now: () => number;
  private snapshot: LoadSnapshot = IDLE_SNAPSHOT;
  private timer: NodeJS.Timeout | null = null;

  constructor(opts: LoadMonitorOptions) {
    this.source = opts.source;
    this.intervalMs = opts.intervalMs;
    this.maxConnections = opts.maxConnections ?? 100;
    this.logger = opts.logger ?? silentLogger;
    this.now = opts.now ?? Date.now;
  }

  current(): LoadSnapshot {
    return this.snapshot;
  }

  async refresh(): Promise<LoadSnapshot> {
    try {
      const sample = await this.source.sample();
      this.snapshot = Object.freeze({
        activeConnections: sample.activeConnections,
        cacheHitRatio: clamp01(sample.cacheHitRatio),
        loadFactor: computeLoadFactor(sample, this.maxConnections),
        sampledAt: this.now(),
      });
    } catch (e) {
      this.logger.warn(`[load] sampling ${this.source.name} failed; keeping previous snapshot`, {
        error: e instanceof Error ? e.message : String(e),
      });
    }
    return this.snapshot;
  }

  start(): void {
    if (this.timer) return;
    void this.refresh();
    this.timer = setInterval(() => void this.refresh(), this.intervalMs);
    this.timer.unref();
  }

  stop(): void {
    if (!this.timer) return;
    clearInterval(this.timer);
    this.timer = null;
  }

  get running(): boolean {
    return this.timer !== null;
  }
}
