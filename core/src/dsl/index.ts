export * from './errors.js';
export * from './fields.js';
export * from './registry.js';
export * from './schema.js';
export * from './types.js';
