import type { ElasticsearchFilterAdapter } from './elasticsearch.js';
import type { MemoryFilterAdapter } from './memory.js';
import type { RelationalFilterAdapter } from './relational/base.js';

export * from './elasticsearch.js';
export * from './memory.js';
export * from './relational/index.js';
export * from './types.js';

export type AnyFilterAdapter = RelationalFilterAdapter | ElasticsearchFilterAdapter | MemoryFilterAdapter;
