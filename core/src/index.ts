export * from './adapters/index.js';
export * from './capabilities/index.js';
export * from './compiler/index.js';
export * from './complexity/index.js';
export * from './config/index.js';
export * from './dsl/index.js';
export * from './engine/index.js';
export * from './filter/index.js';
export * from './logging/logger.js';
export * from './orm/sequelizeRunner.js';
export * from './orm/types.js';
export * from './query/index.js';
export * from './result.js';
export * from './services/index.js';
