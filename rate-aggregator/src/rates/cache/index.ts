export { RateCacheService } from './rate-cache.service';
export { ReadThroughCache } from './read-through.cache';
export type { ReadThroughCacheHooks } from './read-through.cache';
