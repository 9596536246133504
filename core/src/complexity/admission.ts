import type { ComplexityConfig } from '../config/types.js';
import type { Logger } from '../logging/logger.js';
import { silentLogger } from '../logging/logger.js';
import type { AnalyzableAdapter, AnalyzeOptions, ComplexityAnalyzer } from './analyzer.js';
import type { ComplexityCache } from './cache.js';
import { QueryTooComplexError } from './errors.js';
import { IDLE_SNAPSHOT, type LoadMonitor } from './load.js';
import { cacheKey } from './signature.js';
import type { AdmissionEventName, AdmissionTelemetry } from './telemetry.js';
import type { ComplexityAnalysis, LoadSnapshot, PreparedQuery } from './types.js';

export const FALLBACK_SUGGESTION = 'Simplify the filter or add a limit';

type DecisionBase = {
  analysis: ComplexityAnalysis;
  effectiveLimit: number;
  load: LoadSnapshot;
  cached: boolean;
};

export type AdmissionDecision =
  | ({ outcome: 'accept' } & DecisionBase)
  | ({ outcome: 'warn'; message: string } & DecisionBase)
  | ({ outcome: 'reject'; error: QueryTooComplexError } & DecisionBase);

export type DecideOptions = AnalyzeOptions & {
  /** Replaces the configured base limit for this call. */
  baseLimit?: number;
  /** Per-field override; wins over `baseLimit`. */
  perFieldOverrideLimit?: number;
};

export type AdmissionControllerDeps = {
  config: ComplexityConfig;
  analyzer: ComplexityAnalyzer;
  cache?: ComplexityCache;
  load?: LoadMonitor;
  telemetry?: AdmissionTelemetry;
  logger?: Logger;
};

/** base * (1 - load * maxReduction), kept within [min(minLimit, base), base]. */
export function effectiveLimit(
  base: number,
  loadFactor: number,
  cfg: Pick<ComplexityConfig, 'adaptiveLimits' | 'maxReductionFraction' | 'minLimit'>,
): number {
  if (!cfg.adaptiveLimits) return base;
  const load = Math.min(1, Math.max(0, loadFactor));
  const reduced = base * (1 - load * cfg.maxReductionFraction);
  const floor = Math.min(cfg.minLimit, base);
  return Math.min(base, Math.max(floor, reduced));
}

const EVENT: Record<AdmissionDecision['outcome'], AdmissionEventName> = {
  accept: 'query_accepted',
  warn: 'query_warning',
  reject: 'query_rejected',
};

export class AdmissionController {
  private readonly config: ComplexityConfig;
  private readonly analyzer: ComplexityAnalyzer;
  private readonly cache?: ComplexityCache;
  private readonly load?: LoadMonitor;
  private readonly telemetry?: AdmissionTelemetry;
  private readonly logger: Logger;

  constructor(deps: AdmissionControllerDeps) {
    this.config = deps.config;
    this.analyzer = deps.analyzer;
    this.cache = deps.cache;
    this.load = deps.load;
    this.telemetry = deps.telemetry;
    this.logger = deps.logger ?? silentLogger;
  }

  private async analysisFor<Q>(
    query: PreparedQuery<Q>,
    adapter: AnalyzableAdapter<Q>,
    opts: AnalyzeOptions,
  ): Promise<{ analysis: ComplexityAnalysis; cached: boolean }> {
    const cache = this.config.cacheEnabled ? this.cache : undefined;
    const key = cache ? cacheKey(query, adapter.id) : '';
    const hit = cache?.get(key);
    if (hit) return { analysis: hit, cached: true };

    // Rejects when the request is abandoned; nothing is stored in that case.
    const analysis = await this.analyzer.analyze(query, adapter, opts);
    if (cache && analysis.method !== 'unknown') cache.set(key, analysis);
    return { analysis, cached: false };
  }

  async decide<Q>(query: PreparedQuery<Q>, adapter: AnalyzableAdapter<Q>, opts: DecideOptions = {}): Promise<AdmissionDecision> {
    const { analysis, cached } = await this.analysisFor(query, adapter, opts.signal ? { signal: opts.signal } : {});
    const load = this.load?.current() ?? IDLE_SNAPSHOT;
    const base = opts.perFieldOverrideLimit ?? opts.baseLimit ?? this.config.baseLimit;
    const limit = effectiveLimit(base, load.loadFactor, this.config);
    const score = analysis.normalizedScore;
    const common: DecisionBase = { analysis, effectiveLimit: limit, load, cached };

    let decision: AdmissionDecision;
    if (score > limit) {
      const suggestions = analysis.suggestions.length ? analysis.suggestions : [FALLBACK_SUGGESTION];
      decision = { outcome: 'reject', error: new QueryTooComplexError(analysis, limit, suggestions), ...common };
      this.logger.warn(`[admission] rejected ${query.target}`, {
        adapter: adapter.id,
        score,
        limit,
        loadFactor: load.loadFactor,
        method: analysis.method,
      });
    } else if (score > this.config.warnThreshold * limit) {
      decision = {
        outcome: 'warn',
        message: `Query complexity ${score} is close to the limit ${limit}`,
        ...common,
      };
      this.logger.warn(`[admission] near limit ${query.target}`, { adapter: adapter.id, score, limit });
    } else {
      decision = { outcome: 'accept', ...common };
      this.logger.debug(`[admission] accepted ${query.target}`, { adapter: adapter.id, score, limit, cached });
    }

    try {
      this.telemetry?.emit(EVENT[decision.outcome], {
        measurements: { cost: analysis.cost, normalizedScore: score, loadFactor: load.loadFactor },
        metadata: { target: query.target, adapter: adapter.id, effectiveLimit: limit, cached, analysis, load },
      });
    } catch (e) {
      // listeners run synchronously; a failing one must not change the decision
      this.logger.error('[admission] telemetry listener failed', {
        event: EVENT[decision.outcome],
        error: e instanceof Error ? e.message : String(e),
      });
    }
    return decision;
  }
}
