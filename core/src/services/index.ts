export * from './DefaultServiceRegistry.js';
export * from './types.js';
