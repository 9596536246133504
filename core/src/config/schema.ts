import { ADAPTER_IDS } from '../capabilities/types.js';

// JSON schema (draft 2020-12) for QuerygateConfig.
export const QUERYGATE_CONFIG_SCHEMA = {
  $schema: 'https://json-schema.org/draft/2020-12/schema',
  type: 'object',
  properties: {
    app: {
      type: 'object',
      properties: {
        name: { type: 'string', minLength: 1 },
        env: { enum: ['development', 'test', 'staging', 'production'] },
      },
      required: ['name', 'env'],
      additionalProperties: false,
    },
    db: {
      type: 'object',
      properties: {
        url: { type: 'string', format: 'uri' },
        logging: { type: 'boolean' },
      },
      required: ['url'],
      additionalProperties: false,
    },
    adapters: {
      type: 'object',
      properties: {
        memoryFallback: { type: 'boolean' },
        override: { enum: [...ADAPTER_IDS] },
      },
      additionalProperties: false,
    },
    complexity: {
      type: 'object',
      properties: {
        baseLimit: { type: 'number', exclusiveMinimum: 0, maximum: 100 },
        adaptiveLimits: { type: 'boolean' },
        warnThreshold: { type: 'number', minimum: 0, maximum: 1 },
        cacheEnabled: { type: 'boolean' },
        cacheTtl: { type: 'integer', minimum: 0 },
        maxReductionFraction: { type: 'number', minimum: 0, maximum: 1 },
        minLimit: { type: 'number', minimum: 0, maximum: 100 },
        explainTimeoutMs: { type: 'integer', minimum: 1 },
        loadSampleIntervalMs: { type: 'integer', minimum: 1 },
        customFilterWeight: { type: 'number', minimum: 0 },
        maxConnections: { type: 'integer', minimum: 1 },
      },
      additionalProperties: false,
    },
    logging: {
      type: 'object',
      properties: { debug: { type: 'boolean' } },
      additionalProperties: false,
    },
  },
  additionalProperties: false,
} as const satisfies Record<string, unknown>;
