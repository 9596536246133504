export * from './admission.js';
export * from './analyzer.js';
export * from './cache.js';
export * from './errors.js';
export * from './explain.js';
export * from './heuristic.js';
export * from './load.js';
export * from './signature.js';
export * from './telemetry.js';
export * from './types.js';
