export * from './createQueryEngine.js';
export * from './errors.js';
export * from './types.js';
