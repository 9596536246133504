import type { FieldTable, FilterExpression } from '../filter/types.js';
import type { SortSpec } from '../query/types.js';

export type AnalysisMethod = 'explain' | 'heuristic' | 'unknown';

export type ComplexityAnalysis = {
  readonly cost: number;
  /** 0..100 */
  readonly normalizedScore: number;
  readonly method: AnalysisMethod;
  readonly suggestions: readonly string[];
  readonly rawDetails: Readonly<Record<string, unknown>>;
};

/** A compiled query plus the context needed to estimate its cost. */
export type PreparedQuery<Q> = {
  target: string;
  expression: FilterExpression;
  fields: FieldTable;
  compiled: Q;
  limit?: number;
  offset?: number;
  sort?: readonly SortSpec[];
};

export type ExplainRequest<Q> = {
  target: string;
  compiled: Q;
  limit?: number;
  offset?: number;
  sort?: readonly SortSpec[];
  signal: AbortSignal;
};

export type PlanNode = {
  nodeType: string;
  relation?: string;
  filter?: string;
};

export type ExplainResult = {
  cost: number;
  rows: number;
  seqScans: readonly PlanNode[];
  joins: number;
  notes: readonly string[];
  plan: unknown;
};

export interface Explainer<Q> {
  explain(request: ExplainRequest<Q>): Promise<ExplainResult>;
}

export type LoadSnapshot = {
  readonly activeConnections: number;
  /** 0..1 */
  readonly cacheHitRatio: number;
  /** 0..1 */
  readonly loadFactor: number;
  readonly sampledAt: number;
};

export type ComplexityCacheEntry = {
  key: string;
  analysis: ComplexityAnalysis;
  createdAt: number;
  ttl: number;
};
