/**
 * Response memoization - LRU/TTL store and request fingerprints.
 */

export {
  ResponseCache,
  type CacheEntry,
  type ResponseCacheConfig,
  type ResponseCacheStats,
} from './response-cache.js';

export {
  fingerprint,
  routeCachePrefix,
  KEY_SEPARATOR,
  type CacheKeyMaterial,
  type QueryInput,
} from './fingerprint.js';
