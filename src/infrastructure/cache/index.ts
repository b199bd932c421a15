/**
 * wiregraph - Cache Module
 */

export { CacheManager } from './CacheManager';
export type { CacheStats, CacheManagerOptions } from './CacheManager';
