export * from './compile.js';
export * from './customFilters.js';
