import type { ComplexityAnalysis, ComplexityCacheEntry } from './types.js';

export type ComplexityCacheOptions = {
  ttlMs: number;
  /** Backing store; entries are evicted lazily on read. */
  store?: Map<string, ComplexityCacheEntry>;
  now?: () => number;
};

export type ComplexityCacheStats = {
  size: number;
  hits: number;
  misses: number;
  expired: number;
};

export class ComplexityCache {
  private readonly store: Map<string, ComplexityCacheEntry>;
  private readonly ttlMs: number;
  private readonly now: () => number;
  private hits = 0;
  private misses = 0;
  private expired = 0;

  constructor(opts: ComplexityCacheOptions) {
    this.store = opts.store ?? new Map();
    this.ttlMs = opts.ttlMs;
    this.now = opts.now ?? Date.now;
  }

  get(key: string): ComplexityAnalysis | undefined {
    const entry = this.store.get(key);
    if (!entry) {
      this.misses++;
      return undefined;
    }
    if (this.now() - entry.createdAt > entry.ttl) {
      this.store.delete(key);
      this.expired++;
      this.misses++;
      return undefined;
    }
    this.hits++;
    return entry.analysis;
  }

  set(key: string, analysis: ComplexityAnalysis): void {
    this.store.set(key, { key, analysis, createdAt: this.now(), ttl: this.ttlMs });
  }

  delete(key: string): boolean {
    return this.store.delete(key);
  }

  clear(): void {
    this.store.clear();
  }

  stats(): ComplexityCacheStats {
    return { size: this.store.size, hits: this.hits, misses: this.misses, expired: this.expired };
  }
}
