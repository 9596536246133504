import type { AdapterId } from '../capabilities/types.js';

export type ComplexityConfig = {
  /** Highest normalized score (0..100) admitted when the database is idle. */
  baseLimit: number;
  adaptiveLimits: boolean;
  /** Fraction of the effective limit above which a query is admitted with a warning. */
  warnThreshold: number;
  cacheEnabled: boolean;
  /** Milliseconds an analysis stays reusable. */
  cacheTtl: number;
  /** How far full load can pull the limit below baseLimit. */
  maxReductionFraction: number;
  minLimit: number;
  explainTimeoutMs: number;
  loadSampleIntervalMs: number;
  customFilterWeight: number;
  /** Connection count treated as full saturation by the load factor. */
  maxConnections: number;
};

export type QuerygateConfig = {
  app?: { name: string; env: 'development' | 'test' | 'staging' | 'production' };
  db?: { url: string; logging?: boolean };
  adapters?: { memoryFallback?: boolean; override?: AdapterId };
  complexity?: Partial<ComplexityConfig>;
  logging?: { debug?: boolean };
};

export type NormalizedConfig = {
  app: { name: string; env: 'development' | 'test' | 'staging' | 'production' };
  db?: { url: string; logging: boolean };
  adapters: { memoryFallback: boolean; override?: AdapterId };
  complexity: ComplexityConfig;
  logging: { debug: boolean };
};
