export * from './base.js';
export * from './mysql.js';
export * from './postgres.js';
export * from './sqlite.js';
