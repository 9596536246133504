import type { Sequelize, WhereOptions } from 'sequelize';

import type { EsQuery } from '../adapters/elasticsearch.js';
import type { MemoryPredicate, Row } from '../adapters/memory.js';
import type { CapabilityRegistry } from '../capabilities/registry.js';
import type { AdapterCapabilities, AdapterId, Connection, RelationalAdapterId, SqlConnection } from '../capabilities/types.js';
import type { CustomFilterRegistry } from '../compiler/customFilters.js';
import type { AdmissionController, AdmissionDecision } from '../complexity/admission.js';
import type { ComplexityAnalyzer } from '../complexity/analyzer.js';
import type { ComplexityCache } from '../complexity/cache.js';
import type { QueryTooComplexError } from '../complexity/errors.js';
import type { LoadMonitor, LoadSource } from '../complexity/load.js';
import type { AdmissionTelemetry } from '../complexity/telemetry.js';
import type { NormalizedConfig } from '../config/types.js';
import type { DslRoot } from '../dsl/types.js';
import type { CompileError } from '../filter/errors.js';
import type { AuthorizedFieldSet, FieldTable, FilterExpression } from '../filter/types.js';
import type { Logger } from '../logging/logger.js';
import type { SortSpec } from '../query/types.js';
import type { Result } from '../result.js';
import type { DefaultServiceRegistry } from '../services/DefaultServiceRegistry.js';

export type EntityCustomFilters = {
  relational?: CustomFilterRegistry<WhereOptions>;
  search?: CustomFilterRegistry<EsQuery>;
  memory?: CustomFilterRegistry<MemoryPredicate>;
};

export type EntityDefinition = {
  name: string;
  /** Table, model or index holding the entity. Defaults to `name`. */
  target?: string;
  fields: FieldTable;
  /** `null` pins the entity to the in-memory adapter; omitted uses the configured database. */
  connection?: Connection | null;
  /** Adapter override for every query on this entity. */
  adapter?: AdapterId;
  customFilters?: EntityCustomFilters;
  /** Base complexity limit replacing the configured one for this entity. */
  complexityLimit?: number;
  /** Rows searched when the entity is served by the in-memory adapter. */
  rows?: () => readonly Row[] | Promise<readonly Row[]>;
};

export type CompiledFilter =
  | { family: 'relational'; adapter: RelationalAdapterId; where: WhereOptions }
  | { family: 'search'; adapter: 'elasticsearch'; query: EsQuery }
  | { family: 'memory'; adapter: 'memory'; predicate: MemoryPredicate };

export type QueryRequest = {
  /** Raw filter JSON (`{ age: { _gte: 18 } }`). */
  filter?: unknown;
  authorized: AuthorizedFieldSet;
  sort?: readonly SortSpec[];
  limit?: number;
  offset?: number;
  /** Per-request adapter override. */
  adapter?: AdapterId;
  /** Complexity limit for this query alone; wins over the entity's. Set by the server, never by the client. */
  complexityLimit?: number;
  signal?: AbortSignal;
};

export type AdmittedDecision = Exclude<AdmissionDecision, { outcome: 'reject' }>;

export type PlannedQuery = {
  entity: string;
  target: string;
  expression: FilterExpression;
  filter: CompiledFilter;
  /** Sort with storage keys. */
  sort: readonly SortSpec[];
  limit?: number;
  offset?: number;
  decision: AdmittedDecision;
};

export type SearchResult = {
  rows: Row[];
  /** Matching rows before paging, where the backend reports it. */
  total: number | null;
  plan: PlannedQuery;
};

export type PlanError = CompileError | QueryTooComplexError;

export type EngineServices = {
  config: NormalizedConfig;
  logger: Logger;
  db: Sequelize;
  defaultConnection: SqlConnection | null;
  capabilities: CapabilityRegistry;
  analyzer: ComplexityAnalyzer;
  complexityCache: ComplexityCache;
  loadSource: LoadSource;
  loadMonitor: LoadMonitor;
  telemetry: AdmissionTelemetry;
  admission: AdmissionController;
};

export type RegisterDslOptions = {
  connection?: Connection | null;
  rows?: (modelKey: string) => readonly Row[] | Promise<readonly Row[]>;
};

export type QueryEngine = {
  config: NormalizedConfig;
  services: DefaultServiceRegistry<EngineServices>;
  logger: Logger;
  telemetry: AdmissionTelemetry;

  registerEntity(def: EntityDefinition): void;
  /** Registers every model of an entity DSL, with fields derived from it. */
  registerDsl(dsl: DslRoot, opts?: RegisterDslOptions): string[];
  entity(name: string): EntityDefinition;
  entities(): string[];

  compile(entity: string, request: QueryRequest): Promise<Result<CompiledFilter, CompileError>>;
  plan(entity: string, request: QueryRequest): Promise<Result<PlannedQuery, PlanError>>;
  search(entity: string, request: QueryRequest): Promise<Result<SearchResult, PlanError>>;
  capabilities(entity: string, opts?: { adapter?: AdapterId }): Promise<AdapterCapabilities>;

  /** Starts load sampling when adaptive limits are on. */
  start(): void;
  stop(): void;
  close(): Promise<void>;
};
