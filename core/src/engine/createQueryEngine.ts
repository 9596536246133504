import { Sequelize } from 'sequelize';

import { toSearchBody } from '../adapters/elasticsearch.js';
import type { AnyFilterAdapter } from '../adapters/index.js';
import { runMemoryQuery, type Row } from '../adapters/memory.js';
import { toFindOptions } from '../adapters/relational/base.js';
import type { FilterAdapter } from '../adapters/types.js';
import { AdapterSelectionError } from '../capabilities/errors.js';
import { CapabilityRegistry } from '../capabilities/registry.js';
import type { AdapterCapabilities, AdapterId, Connection } from '../capabilities/types.js';
import { compileFilter } from '../compiler/compile.js';
import type { CustomFilterRegistry } from '../compiler/customFilters.js';
import { AdmissionController } from '../complexity/admission.js';
import { ComplexityAnalyzer } from '../complexity/analyzer.js';
import { ComplexityCache } from '../complexity/cache.js';
import { LoadMonitor, MysqlLoadSource, PostgresLoadSource, StaticLoadSource, type LoadSource } from '../complexity/load.js';
import { AdmissionTelemetry } from '../complexity/telemetry.js';
import type { PreparedQuery } from '../complexity/types.js';
import { normalizeConfig } from '../config/validate.js';
import { fieldsFromDslModel } from '../dsl/fields.js';
import { modelsOf } from '../dsl/registry.js';
import type { DslRoot } from '../dsl/types.js';
import { FilterAuthorizationError, FilterCapabilityError, FilterParseError, type CompileError } from '../filter/errors.js';
import { parseFilter } from '../filter/parser.js';
import { isAuthorized, isCustomField, storagePath, type AuthorizedFieldSet, type FilterExpression } from '../filter/types.js';
import { createConsoleLogger, type Logger } from '../logging/logger.js';
import { connectionFromSequelize } from '../orm/sequelizeRunner.js';
import type { SortSpec } from '../query/types.js';
import { err, mapResult, ok, type Result } from '../result.js';
import { DefaultServiceRegistry } from '../services/DefaultServiceRegistry.js';
import { UnknownEntityError } from './errors.js';
import type {
  CompiledFilter,
  EngineServices,
  EntityDefinition,
  PlanError,
  PlannedQuery,
  QueryEngine,
  QueryRequest,
  RegisterDslOptions,
  SearchResult,
} from './types.js';

export type CreateQueryEngineOptions = {
  logger?: Logger;
  /** Used instead of connecting to `db.url`. Not closed by the engine. */
  sequelize?: Sequelize;
  loadSource?: LoadSource;
  now?: () => number;
};

type PlanBase = Omit<PlannedQuery, 'filter' | 'decision'>;

function paging(request: { limit?: number; offset?: number }): { limit?: number; offset?: number } {
  return {
    ...(request.limit !== undefined ? { limit: request.limit } : {}),
    ...(request.offset ? { offset: request.offset } : {}),
  };
}

function storageSort(
  def: EntityDefinition,
  authorized: AuthorizedFieldSet,
  sort: readonly SortSpec[] = [],
): Result<SortSpec[], FilterParseError | FilterAuthorizationError> {
  const denied = [...new Set(sort.map((s) => s.field).filter((f) => !isAuthorized(authorized, f)))];
  if (denied.length) return err(new FilterAuthorizationError(denied.sort((a, b) => a.localeCompare(b)), 'sort'));

  const out: SortSpec[] = [];
  for (const s of sort) {
    const field = def.fields.get(s.field);
    if (!field) return err(new FilterParseError(`Unknown sort field: ${s.field}`, { field: s.field }));
    if (isCustomField(field)) {
      return err(new FilterParseError(`Cannot sort on custom field: ${s.field}`, { field: s.field }));
    }
    out.push({ field: storagePath(field), dir: s.dir });
  }
  return ok(out);
}

export function createQueryEngine(input: unknown = {}, opts: CreateQueryEngineOptions = {}): QueryEngine {
  const config = normalizeConfig(input);
  const logger = opts.logger ?? createConsoleLogger({ debug: config.logging.debug });
  const services = new DefaultServiceRegistry<EngineServices>(config);
  const entities = new Map<string, EntityDefinition>();

  let ownedDb: Sequelize | null = null;
  let monitorStarted = false;

  services.register('config', 'singleton', () => config);
  services.register('logger', 'singleton', () => logger);
  services.register('db', 'singleton', () => {
    if (opts.sequelize) return opts.sequelize;
    if (!config.db) throw new AdapterSelectionError('No database configured (set db.url)');
    ownedDb = new Sequelize(config.db.url, {
      logging: config.db.logging ? (sql: string) => logger.debug(`[db] ${sql}`) : false,
    });
    return ownedDb;
  });
  services.register('defaultConnection', 'singleton', () =>
    opts.sequelize || config.db ? connectionFromSequelize('default', services.resolve('db')) : null,
  );
  services.register(
    'capabilities',
    'singleton',
    () => new CapabilityRegistry({ logger, memoryFallback: config.adapters.memoryFallback, now: opts.now }),
  );
  services.register(
    'analyzer',
    'singleton',
    () =>
      new ComplexityAnalyzer({
        logger,
        explainTimeoutMs: config.complexity.explainTimeoutMs,
        customFilterWeight: config.complexity.customFilterWeight,
      }),
  );
  services.register('complexityCache', 'singleton', () => new ComplexityCache({ ttlMs: config.complexity.cacheTtl, now: opts.now }));
  services.register('loadSource', 'singleton', () => {
    if (opts.loadSource) return opts.loadSource;
    const conn = services.resolve('defaultConnection');
    if (conn?.type === 'postgres') return new PostgresLoadSource(conn.sql);
    if (conn?.type === 'mysql') return new MysqlLoadSource(conn.sql);
    return new StaticLoadSource();
  });
  services.register(
    'loadMonitor',
    'singleton',
    () =>
      new LoadMonitor({
        source: services.resolve('loadSource'),
        intervalMs: config.complexity.loadSampleIntervalMs,
        maxConnections: config.complexity.maxConnections,
        logger,
        now: opts.now,
      }),
  );
  services.register('telemetry', 'singleton', () => new AdmissionTelemetry());
  services.register(
    'admission',
    'singleton',
    () =>
      new AdmissionController({
        config: config.complexity,
        analyzer: services.resolve('analyzer'),
        cache: services.resolve('complexityCache'),
        ...(config.complexity.adaptiveLimits ? { load: services.resolve('loadMonitor') } : {}),
        telemetry: services.resolve('telemetry'),
        logger,
      }),
  );

  function registerEntity(def: EntityDefinition): void {
    if (!def.name) throw new Error('Entity name is required');
    if (entities.has(def.name)) throw new Error(`Entity already registered: ${def.name}`);
    entities.set(def.name, def);
  }

  function registerDsl(dsl: DslRoot, dslOpts: RegisterDslOptions = {}): string[] {
    const names: string[] = [];
    for (const [modelKey, spec] of modelsOf(dsl)) {
      const rows = dslOpts.rows;
      registerEntity({
        name: modelKey,
        target: spec.table ?? modelKey,
        fields: fieldsFromDslModel(modelKey, spec, { dsl }),
        ...(dslOpts.connection !== undefined ? { connection: dslOpts.connection } : {}),
        ...(spec.filter?.complexityLimit !== undefined ? { complexityLimit: spec.filter.complexityLimit } : {}),
        ...(rows ? { rows: () => rows(modelKey) } : {}),
      });
      names.push(modelKey);
    }
    logger.debug(`[engine] registered ${names.length} entities from DSL`, { entities: names });
    return names;
  }

  function entity(name: string): EntityDefinition {
    const def = entities.get(name);
    if (!def) throw new UnknownEntityError(name);
    return def;
  }

  function connectionFor(def: EntityDefinition): Connection | null {
    if (def.connection === null) return null;
    return def.connection ?? services.resolve('defaultConnection');
  }

  function resolveAdapter(def: EntityDefinition, override?: AdapterId): Promise<AnyFilterAdapter> {
    const chosen = override ?? def.adapter ?? config.adapters.override;
    return services.resolve('capabilities').resolve(connectionFor(def), chosen ? { override: chosen } : {});
  }

  function compileFor(def: EntityDefinition, expression: FilterExpression, request: QueryRequest, adapter: AnyFilterAdapter) {
    const custom = def.customFilters;
    switch (adapter.family) {
      case 'relational':
        return mapResult(
          compileFilter(expression, def.fields, request.authorized, adapter, custom?.relational ? { customFilters: custom.relational } : {}),
          (where): CompiledFilter => ({ family: 'relational', adapter: adapter.id, where }),
        );
      case 'search':
        return mapResult(
          compileFilter(expression, def.fields, request.authorized, adapter, custom?.search ? { customFilters: custom.search } : {}),
          (query): CompiledFilter => ({ family: 'search', adapter: adapter.id, query }),
        );
      case 'memory':
        return mapResult(
          compileFilter(expression, def.fields, request.authorized, adapter, custom?.memory ? { customFilters: custom.memory } : {}),
          (predicate): CompiledFilter => ({ family: 'memory', adapter: adapter.id, predicate }),
        );
    }
  }

  async function compile(entityName: string, request: QueryRequest): Promise<Result<CompiledFilter, CompileError>> {
    const def = entity(entityName);
    const parsed = parseFilter(request.filter, def.fields);
    if (!parsed.ok) return parsed;
    return compileFor(def, parsed.value, request, await resolveAdapter(def, request.adapter));
  }

  async function planWith<Q>(
    def: EntityDefinition,
    base: PlanBase,
    request: QueryRequest,
    adapter: FilterAdapter<Q>,
    customFilters: CustomFilterRegistry<Q> | undefined,
    wrap: (compiled: Q) => CompiledFilter,
  ): Promise<Result<PlannedQuery, PlanError>> {
    const compiled = compileFilter(base.expression, def.fields, request.authorized, adapter, customFilters ? { customFilters } : {});
    if (!compiled.ok) return compiled;

    const prepared: PreparedQuery<Q> = {
      target: base.target,
      expression: base.expression,
      fields: def.fields,
      compiled: compiled.value,
      ...paging(base),
      ...(base.sort.length ? { sort: base.sort } : {}),
    };
    const decision = await services.resolve('admission').decide(prepared, adapter, {
      ...(request.signal ? { signal: request.signal } : {}),
      ...(def.complexityLimit !== undefined ? { baseLimit: def.complexityLimit } : {}),
      ...(request.complexityLimit !== undefined ? { perFieldOverrideLimit: request.complexityLimit } : {}),
    });
    if (decision.outcome === 'reject') return err(decision.error);
    return ok({ ...base, filter: wrap(compiled.value), decision });
  }

  async function plan(entityName: string, request: QueryRequest): Promise<Result<PlannedQuery, PlanError>> {
    const def = entity(entityName);
    const parsed = parseFilter(request.filter, def.fields);
    if (!parsed.ok) return parsed;
    const sort = storageSort(def, request.authorized, request.sort);
    if (!sort.ok) return sort;

    const adapter = await resolveAdapter(def, request.adapter);
    if (adapter.family === 'relational') {
      const joined = request.sort?.map((s) => def.fields.get(s.field)).find((f) => f?.association);
      if (joined) {
        return err(
          new FilterCapabilityError(`${adapter.id} cannot sort through association ${joined.association} (${joined.name})`, {
            field: joined.name,
            adapter: adapter.id,
          }),
        );
      }
    }
    const base: PlanBase = {
      entity: def.name,
      target: def.target ?? def.name,
      expression: parsed.value,
      sort: sort.value,
      ...paging(request),
    };
    const custom = def.customFilters;

    switch (adapter.family) {
      case 'relational':
        return planWith(def, base, request, adapter, custom?.relational, (where) => ({
          family: 'relational',
          adapter: adapter.id,
          where,
        }));
      case 'search':
        return planWith(def, base, request, adapter, custom?.search, (query) => ({
          family: 'search',
          adapter: adapter.id,
          query,
        }));
      case 'memory':
        return planWith(def, base, request, adapter, custom?.memory, (predicate) => ({
          family: 'memory',
          adapter: adapter.id,
          predicate,
        }));
    }
  }

  async function execute(def: EntityDefinition, planned: PlannedQuery): Promise<SearchResult> {
    const page = { ...paging(planned), sort: planned.sort };
    const filter = planned.filter;

    switch (filter.family) {
      case 'memory': {
        const rows = def.rows ? await def.rows() : [];
        const out = runMemoryQuery(rows, { predicate: filter.predicate, ...page });
        return { rows: out.rows, total: out.total, plan: planned };
      }
      case 'relational': {
        const conn = connectionFor(def);
        if (!conn || conn.type === 'elasticsearch' || conn.type === 'memory') {
          throw new AdapterSelectionError(`Entity ${def.name} has no SQL connection`, { entity: def.name });
        }
        const sql = conn.sql.renderSelect(planned.target, toFindOptions(filter.where, page));
        return { rows: await conn.sql.select<Row>(sql), total: null, plan: planned };
      }
      case 'search': {
        const conn = connectionFor(def);
        if (conn?.type !== 'elasticsearch' || !conn.client.search) {
          throw new AdapterSelectionError(`Entity ${def.name} has no searchable Elasticsearch client`, { entity: def.name });
        }
        const res = await conn.client.search({ index: planned.target, body: toSearchBody(filter.query, page) });
        const total = res.hits.total;
        return {
          rows: res.hits.hits.map((h) => h._source ?? {}),
          total: total === undefined ? null : typeof total === 'number' ? total : total.value,
          plan: planned,
        };
      }
    }
  }

  async function search(entityName: string, request: QueryRequest): Promise<Result<SearchResult, PlanError>> {
    const planned = await plan(entityName, request);
    if (!planned.ok) return planned;
    return ok(await execute(entity(entityName), planned.value));
  }

  async function capabilities(entityName: string, capOpts: { adapter?: AdapterId } = {}): Promise<AdapterCapabilities> {
    const adapter = await resolveAdapter(entity(entityName), capOpts.adapter);
    return adapter.capabilities();
  }

  function start(): void {
    if (!config.complexity.adaptiveLimits || monitorStarted) return;
    services.resolve('loadMonitor').start();
    monitorStarted = true;
    logger.info(`[engine] ${config.app.name} sampling database load`, {
      intervalMs: config.complexity.loadSampleIntervalMs,
    });
  }

  function stop(): void {
    if (!monitorStarted) return;
    services.resolve('loadMonitor').stop();
    monitorStarted = false;
  }

  async function close(): Promise<void> {
    stop();
    if (ownedDb) {
      await ownedDb.close();
      ownedDb = null;
    }
  }

  return {
    config,
    services,
    logger,
    telemetry: services.resolve('telemetry'),
    registerEntity,
    registerDsl,
    entity,
    entities: () => [...entities.keys()].sort((a, b) => a.localeCompare(b)),
    compile,
    plan,
    search,
    capabilities,
    start,
    stop,
    close,
  };
}
