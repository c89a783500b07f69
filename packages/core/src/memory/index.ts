export { BaseCache } from './base-cache.js';
export { ValueCache, VALUE_CACHE } from './value-cache.js';
export type { ValueCacheConfig } from './value-cache.js';
export { ListCache, LIST_CACHE, LIST_CONTEXT_DATATYPE } from './list-cache.js';
export type { ListCacheConfig } from './list-cache.js';
