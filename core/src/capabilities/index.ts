export * from './errors.js';
export * from './detection.js';
export * from './registry.js';
export * from './report.js';
export * from './tables.js';
export * from './types.js';
export * from './version.js';
