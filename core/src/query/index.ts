export * from './errors.js';
export * from './parser.js';
export * from './types.js';
