/**
 * Cache Package Exports
 *
 * Two-tier cache: Redis when available, an in-process expiring map always.
 */

export { TieredCache, createTieredCache, parseCount } from "./cache.js";
export type { TieredCacheOptions, CreateTieredCacheOptions } from "./cache.js";
export { ExpiringMap, type ExpiringMapOptions } from "./memory-store.js";
export {
  createRedisClient,
  asKeyValueStore,
  reconnectDelay,
  MAX_RECONNECT_ATTEMPTS,
  type RedisClientOptions,
} from "./client.js";
export type { CacheService, KeyValueStore } from "./types.js";
