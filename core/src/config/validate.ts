import { Ajv2020 } from 'ajv/dist/2020.js';
// CommonJS package: the default import is module.exports, whose `default` is the plugin
import ajvFormats from 'ajv-formats';

import { ConfigValidationError } from './errors.js';
import { QUERYGATE_CONFIG_SCHEMA } from './schema.js';
import type { ComplexityConfig, NormalizedConfig, QuerygateConfig } from './types.js';

export const DEFAULT_COMPLEXITY: Readonly<ComplexityConfig> = Object.freeze({
  baseLimit: 80,
  adaptiveLimits: true,
  warnThreshold: 0.7,
  cacheEnabled: true,
  cacheTtl: 300_000,
  maxReductionFraction: 0.7,
  minLimit: 20,
  explainTimeoutMs: 2000,
  loadSampleIntervalMs: 5000,
  customFilterWeight: 10,
  maxConnections: 100,
});

const ajv = new Ajv2020({ allErrors: true, allowUnionTypes: true });
ajvFormats.default(ajv);
const validateConfig = ajv.compile<QuerygateConfig>(QUERYGATE_CONFIG_SCHEMA);
const validateComplexity = ajv.compile<Partial<ComplexityConfig>>(QUERYGATE_CONFIG_SCHEMA.properties.complexity);

export function normalizeComplexityConfig(input: unknown = {}): ComplexityConfig {
  if (!validateComplexity(input)) {
    throw new ConfigValidationError('Invalid complexity config', validateComplexity.errors ?? []);
  }
  const out: ComplexityConfig = { ...DEFAULT_COMPLEXITY, ...input };
  if (out.minLimit > out.baseLimit) {
    throw new ConfigValidationError(`complexity.minLimit (${out.minLimit}) exceeds baseLimit (${out.baseLimit})`);
  }
  return out;
}

export function normalizeConfig(input: unknown = {}): NormalizedConfig {
  if (!validateConfig(input)) {
    throw new ConfigValidationError('Invalid querygate config', validateConfig.errors ?? []);
  }
  return {
    app: input.app ?? { name: 'querygate', env: 'development' },
    ...(input.db ? { db: { url: input.db.url, logging: input.db.logging ?? false } } : {}),
    adapters: {
      memoryFallback: input.adapters?.memoryFallback ?? true,
      ...(input.adapters?.override ? { override: input.adapters.override } : {}),
    },
    complexity: normalizeComplexityConfig(input.complexity),
    logging: { debug: input.logging?.debug ?? false },
  };
}
