export * from './builders.js';
export * from './errors.js';
export * from './operators.js';
export * from './parser.js';
export * from './types.js';
export * from './values.js';
