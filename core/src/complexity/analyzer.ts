import type { Logger } from '../logging/logger.js';
import { silentLogger } from '../logging/logger.js';
import { AnalyzerError } from './errors.js';
import { raceAbort } from './explain.js';
import { analyzeHeuristically } from './heuristic.js';
import type { ComplexityAnalysis, ExplainResult, Explainer, PreparedQuery } from './types.js';

export const SEQ_SCAN_PENALTY = 5;
export const HIGH_PLAN_COST = 10_000;
export const MAX_JOINS_BEFORE_VIEW = 3;

export type AnalyzerOptions = {
  logger?: Logger;
  explainTimeoutMs?: number;
  customFilterWeight?: number;
};

export type AnalyzeOptions = {
  signal?: AbortSignal;
};

export type AnalyzableAdapter<Q> = {
  readonly id: string;
  readonly explainer?: Explainer<Q>;
};

export const UNKNOWN_ANALYSIS: ComplexityAnalysis = Object.freeze({
  cost: 0,
  normalizedScore: 0,
  method: 'unknown',
  suggestions: Object.freeze([]),
  rawDetails: Object.freeze({}),
});

function round2(n: number): number {
  return Math.round(n * 100) / 100;
}

export function scorePlan(cost: number, seqScans: number): number {
  return round2(Math.min(100, Math.max(0, 20 * Math.log10(1 + Math.max(cost, 0)) + SEQ_SCAN_PENALTY * seqScans)));
}

export function planSuggestions(plan: ExplainResult, query: PreparedQuery<unknown>): string[] {
  const out: string[] = [];
  for (const scan of plan.seqScans) {
    if (scan.filter) {
      out.push(`Consider an index on ${scan.relation ?? 'the scanned table'} for: ${scan.filter}`);
    }
  }
  if (query.limit === undefined) out.push('Add a limit to bound the number of rows returned');
  if (plan.cost > HIGH_PLAN_COST) out.push('Narrow the filter; the estimated plan cost is high');
  if (plan.joins > MAX_JOINS_BEFORE_VIEW) out.push('Consider a materialized view for this many joins');
  if (plan.notes.includes('filesort')) out.push('Add an index that matches the sort order');
  if (plan.notes.includes('temporary table')) out.push('Avoid sorts or groupings that need a temporary table');
  return out;
}

export function analysisFromPlan(plan: ExplainResult, query: PreparedQuery<unknown>): ComplexityAnalysis {
  return Object.freeze({
    cost: plan.cost,
    normalizedScore: scorePlan(plan.cost, plan.seqScans.length),
    method: 'explain',
    suggestions: Object.freeze(planSuggestions(plan, query)),
    rawDetails: Object.freeze({
      rows: plan.rows,
      seqScans: plan.seqScans,
      joins: plan.joins,
      notes: plan.notes,
      plan: plan.plan,
    }),
  });
}

/**
 * Estimates query cost through the backend's plan when it can report one, otherwise
 * structurally. Never fails the request: errors and timeouts yield an `unknown` analysis.
 */
export class ComplexityAnalyzer {
  private readonly logger: Logger;
  private readonly explainTimeoutMs: number;
  private readonly customFilterWeight: number;

  constructor(opts: AnalyzerOptions = {}) {
    this.logger = opts.logger ?? silentLogger;
    this.explainTimeoutMs = opts.explainTimeoutMs ?? 2000;
    this.customFilterWeight = opts.customFilterWeight ?? 10;
  }

  async analyze<Q>(query: PreparedQuery<Q>, adapter: AnalyzableAdapter<Q>, opts: AnalyzeOptions = {}): Promise<ComplexityAnalysis> {
    const signal = opts.signal;
    if (signal?.aborted) throw signal.reason;

    if (adapter.explainer) {
      try {
        return await this.explain(query, adapter.explainer, signal);
      } catch (e) {
        if (signal?.aborted) throw signal.reason;
        this.fail(new AnalyzerError('EXPLAIN failed', { adapter: adapter.id, target: query.target, cause: e }));
        return UNKNOWN_ANALYSIS;
      }
    }

    try {
      return analyzeHeuristically(query, { customFilterWeight: this.customFilterWeight });
    } catch (e) {
      this.fail(new AnalyzerError('Heuristic analysis failed', { adapter: adapter.id, target: query.target, cause: e }));
      return UNKNOWN_ANALYSIS;
    }
  }

  private async explain<Q>(query: PreparedQuery<Q>, explainer: Explainer<Q>, outer?: AbortSignal): Promise<ComplexityAnalysis> {
    const controller = new AbortController();
    const onAbort = () => controller.abort(outer?.reason);
    outer?.addEventListener('abort', onAbort, { once: true });
    const timer = setTimeout(
      () => controller.abort(new AnalyzerError(`EXPLAIN timed out after ${this.explainTimeoutMs}ms`)),
      this.explainTimeoutMs,
    );

    try {
      const plan = await raceAbort(
        explainer.explain({
          target: query.target,
          compiled: query.compiled,
          ...(query.limit !== undefined ? { limit: query.limit } : {}),
          ...(query.offset !== undefined ? { offset: query.offset } : {}),
          ...(query.sort ? { sort: query.sort } : {}),
          signal: controller.signal,
        }),
        controller.signal,
      );
      return analysisFromPlan(plan, query);
    } finally {
      clearTimeout(timer);
      outer?.removeEventListener('abort', onAbort);
    }
  }

  private fail(error: AnalyzerError): void {
    const cause = error.details?.cause;
    this.logger.warn(`[complexity] ${error.message}; admitting without an estimate`, {
      code: error.code,
      adapter: error.details?.adapter,
      target: error.details?.target,
      error: cause instanceof Error ? cause.message : String(cause),
    });
  }
}

/** Multi-line description of an analysis, for logs and CLI output. */
export function formatAnalysis(analysis: ComplexityAnalysis): string {
  const lines = [`score ${analysis.normalizedScore} (cost ${analysis.cost}, ${analysis.method})`];
  for (const s of analysis.suggestions) lines.push(`  - ${s}`);
  return lines.join('\n');
}
