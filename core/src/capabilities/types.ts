import type { EsSearchBody } from '../adapters/elasticsearch.js';
import type { Operator, OperatorCategory } from '../filter/operators.js';
import type { SqlRunner } from '../orm/types.js';

export type RelationalAdapterId = 'postgres' | 'mysql' | 'sqlite';
export type AdapterId = RelationalAdapterId | 'elasticsearch' | 'memory';

export const ADAPTER_IDS: readonly AdapterId[] = ['postgres', 'mysql', 'sqlite', 'elasticsearch', 'memory'];

export type FeatureName =
  | 'arrays'
  | 'json'
  | 'jsonPath'
  | 'jsonOverlaps'
  | 'fullText'
  | 'fuzzy'
  | 'trigram'
  | 'geo';

export type FeatureSet = Readonly<Record<FeatureName, boolean>>;

export type OperatorTable = Readonly<Record<OperatorCategory, Readonly<Record<string, readonly Operator[]>>>>;

export type AdapterCapabilities = {
  readonly adapter: AdapterId;
  readonly version?: string;
  readonly features: FeatureSet;
  readonly operators: OperatorTable;
  readonly limits: { readonly maxInItems: number | null };
  readonly detectedAt: number;
};

export type ElasticsearchInfo = {
  version: { number: string; distribution?: string };
  cluster_name?: string;
};

/** The slice of an Elasticsearch/OpenSearch client used for detection. */
export type ElasticsearchInfoClient = {
  info(): Promise<ElasticsearchInfo>;
};

export type ElasticsearchHit = { _id?: string; _source?: Record<string, unknown> };

export type ElasticsearchSearchResponse = {
  hits: { total?: number | { value: number }; hits: ElasticsearchHit[] };
};

/** Detection plus, optionally, searching; without `search` the engine only compiles. */
export type ElasticsearchClient = ElasticsearchInfoClient & {
  search?(params: { index: string; body: EsSearchBody }): Promise<ElasticsearchSearchResponse>;
};

export type SqlConnection = { readonly id: string; readonly type: RelationalAdapterId; readonly sql: SqlRunner };
export type SearchConnection = {
  readonly id: string;
  readonly type: 'elasticsearch';
  readonly client: ElasticsearchClient;
};
export type MemoryConnection = { readonly id: string; readonly type: 'memory' };

export type Connection = SqlConnection | SearchConnection | MemoryConnection;
