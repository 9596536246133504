export * from './errors.js';
export * from './schema.js';
export * from './types.js';
export * from './validate.js';
