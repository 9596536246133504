import type { AnyFilterAdapter } from '../adapters/index.js';
import { ElasticsearchFilterAdapter } from '../adapters/elasticsearch.js';
import { MemoryFilterAdapter } from '../adapters/memory.js';
import { MysqlFilterAdapter } from '../adapters/relational/mysql.js';
import { PostgresFilterAdapter } from '../adapters/relational/postgres.js';
import { SqliteFilterAdapter } from '../adapters/relational/sqlite.js';
import { SqlExplainer } from '../complexity/explain.js';
import type { Logger } from '../logging/logger.js';
import { silentLogger } from '../logging/logger.js';
import { AdapterSelectionError } from './errors.js';
import { detectElasticsearch, detectMysql, detectPostgres, detectSqlite, type DetectionResult } from './detection.js';
import { formatCapabilityReport } from './report.js';
import { buildCapabilities, memoryCapabilities } from './tables.js';
import type { AdapterCapabilities, AdapterId, Connection } from './types.js';

export type CapabilityRegistryOptions = {
  /** Detected capabilities keyed by connection id. Owned by the registry once passed in. */
  cache?: Map<string, AdapterCapabilities>;
  logger?: Logger;
  /** Fall back to the in-memory adapter when no connection is configured. Defaults to true. */
  memoryFallback?: boolean;
  now?: () => number;
};

export type ResolveOptions = {
  /** Per-request adapter override; wins over the connection's own dialect. */
  override?: AdapterId;
};

const MEMORY_CONNECTION_ID = 'memory';

export class CapabilityRegistry {
  private readonly cache: Map<string, AdapterCapabilities>;
  private readonly inflight = new Map<string, { generation: number; result: Promise<AdapterCapabilities> }>();
  private readonly generations = new Map<string, number>();
  private readonly logger: Logger;
  private readonly memoryFallback: boolean;
  private readonly now: () => number;

  constructor(opts: CapabilityRegistryOptions = {}) {
    this.cache = opts.cache ?? new Map();
    this.logger = opts.logger ?? silentLogger;
    this.memoryFallback = opts.memoryFallback ?? true;
    this.now = opts.now ?? Date.now;
  }

  cached(connectionId: string): AdapterCapabilities | undefined {
    return this.cache.get(connectionId);
  }

  /**
   * Detects once per connection id; concurrent callers share the in-flight detection.
   * A detection started before `invalidate` never writes its result to the cache.
   */
  detect(connection: Connection): Promise<AdapterCapabilities> {
    const hit = this.cache.get(connection.id);
    if (hit) return Promise.resolve(hit);

    const generation = this.generationOf(connection.id);
    const pending = this.inflight.get(connection.id);
    if (pending && pending.generation === generation) return pending.result;

    const result = this.inspect(connection)
      .then((caps) => {
        if (this.generationOf(connection.id) !== generation) return caps;
        this.cache.set(connection.id, caps);
        this.logger.info(`[capabilities] detected ${connection.id}\n${formatCapabilityReport(caps)}`);
        return caps;
      })
      .finally(() => {
        if (this.inflight.get(connection.id)?.generation === generation) this.inflight.delete(connection.id);
      });
    this.inflight.set(connection.id, { generation, result });
    return result;
  }

  /** Drops cached capabilities and orphans any detection still running for the id. */
  invalidate(connectionId: string): boolean {
    this.generations.set(connectionId, this.generationOf(connectionId) + 1);
    const running = this.inflight.delete(connectionId);
    return this.cache.delete(connectionId) || running;
  }

  redetect(connection: Connection): Promise<AdapterCapabilities> {
    this.invalidate(connection.id);
    return this.detect(connection);
  }

  async resolve(connection: Connection | null | undefined, opts: ResolveOptions = {}): Promise<AnyFilterAdapter> {
    const override = opts.override;
    if (override) {
      if (override === 'memory') return this.memoryAdapter();
      if (connection?.type !== override) {
        throw new AdapterSelectionError(`Adapter override ${override} has no matching connection`, {
          override,
          connection: connection?.type ?? null,
        });
      }
    }

    if (connection) return this.build(connection, await this.detect(connection));

    if (!this.memoryFallback) {
      throw new AdapterSelectionError('No connection configured and the in-memory fallback is disabled');
    }
    return this.memoryAdapter();
  }

  private memoryAdapter(): MemoryFilterAdapter {
    let caps = this.cache.get(MEMORY_CONNECTION_ID);
    if (!caps) {
      caps = memoryCapabilities(this.now());
      this.cache.set(MEMORY_CONNECTION_ID, caps);
    }
    return new MemoryFilterAdapter(caps);
  }

  private generationOf(connectionId: string): number {
    return this.generations.get(connectionId) ?? 0;
  }

  private async inspect(connection: Connection): Promise<AdapterCapabilities> {
    let result: DetectionResult;
    switch (connection.type) {
      case 'postgres':
        result = await detectPostgres(connection.sql, this.logger);
        break;
      case 'mysql':
        result = await detectMysql(connection.sql, this.logger);
        break;
      case 'sqlite':
        result = await detectSqlite(connection.sql, this.logger);
        break;
      case 'elasticsearch':
        result = await detectElasticsearch(connection.client, this.logger);
        break;
      case 'memory':
        return memoryCapabilities(this.now());
    }
    return buildCapabilities(connection.type, result.features, {
      ...(result.version ? { version: result.version } : {}),
      detectedAt: this.now(),
    });
  }

  private build(connection: Connection, caps: AdapterCapabilities): AnyFilterAdapter {
    switch (connection.type) {
      case 'postgres':
        return new PostgresFilterAdapter(caps, {
          explainer: new SqlExplainer(connection.sql),
          escape: (v) => connection.sql.escape(v),
        });
      case 'mysql':
        return new MysqlFilterAdapter(caps, {
          explainer: new SqlExplainer(connection.sql),
          escape: (v) => connection.sql.escape(v),
        });
      case 'sqlite':
        return new SqliteFilterAdapter(caps, { escape: (v) => connection.sql.escape(v) });
      case 'elasticsearch':
        return new ElasticsearchFilterAdapter(caps);
      case 'memory':
        return new MemoryFilterAdapter(caps);
    }
  }
}
