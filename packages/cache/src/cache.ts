/**
 * Tiered Cache
 *
 * Read/write-through cache with two tiers:
 *   1. Primary  - remote Redis, shared across instances
 *   2. Fallback - in-process ExpiringMap, written on every set
 *
 * Failure policy:
 * - A primary error never reaches the caller. It is logged and the
 *   operation continues against the fallback tier.
 * - With no primary at all (no REDIS_URL) the fallback tier is the cache.
 *
 * Key Schema:
 *   {shortCode}          - Resolved long URL
 *   clicks:{shortCode}   - Click counter (integer string)
 */

import { createLogger, type Logger } from "@urlkit/logger";
import type { Clock } from "@urlkit/shared";
import { asKeyValueStore, createRedisClient, type RedisClientOptions } from "./client.js";
import { ExpiringMap } from "./memory-store.js";
import type { CacheService, KeyValueStore } from "./types.js";

/** TTL for counters created in the fallback tier (seconds) */
const DEFAULT_FALLBACK_TTL = 3600;

export interface TieredCacheOptions {
  /** Remote tier; null runs fallback-only */
  primary: KeyValueStore | null;
  /** Fallback tier (default: new ExpiringMap on `clock`) */
  fallback?: ExpiringMap;
  clock?: Clock;
  /** TTL applied when `increment` creates a fallback counter */
  fallbackTtlSeconds?: number;
  logger?: Logger;
}

export class TieredCache implements CacheService {
  private readonly primary: KeyValueStore | null;
  private readonly fallback: ExpiringMap;
  private readonly fallbackTtlSeconds: number;
  private readonly logger: Logger;

  constructor(options: TieredCacheOptions) {
    this.primary = options.primary;
    this.fallback = options.fallback ?? new ExpiringMap({ clock: options.clock });
    this.fallbackTtlSeconds = options.fallbackTtlSeconds ?? DEFAULT_FALLBACK_TTL;
    this.logger = options.logger ?? createLogger("cache");
  }

  /** True when a remote tier is configured */
  get hasPrimary(): boolean {
    return this.primary !== null;
  }

  async get(key: string): Promise<string | null> {
    if (this.primary) {
      try {
        const value = await this.primary.get(key);
        if (value !== null) return value;
      } catch (err) {
        this.logger.warn({ err, key }, "Redis GET failed, reading fallback");
      }
    }

    this.fallback.sweep();
    return this.fallback.get(key);
  }

  async set(key: string, value: string, ttlSeconds: number): Promise<void> {
    if (this.primary) {
      try {
        await this.primary.set(key, value, "EX", ttlSeconds);
      } catch (err) {
        this.logger.warn({ err, key }, "Redis SET failed, fallback holds the only copy");
      }
    }

    this.fallback.set(key, value, ttlSeconds);
  }

  async delete(key: string): Promise<void> {
    if (this.primary) {
      try {
        await this.primary.del(key);
      } catch (err) {
        this.logger.warn({ err, key }, "Redis DEL failed");
      }
    }

    this.fallback.delete(key);
  }

  async increment(key: string): Promise<number> {
    if (this.primary) {
      try {
        return await this.primary.incr(key);
      } catch (err) {
        this.logger.warn({ err, key }, "Redis INCR failed, counting in fallback");
      }
    }

    const next = this.fallback.upsert(
      key,
      () => ({ value: "0", ttlSeconds: this.fallbackTtlSeconds }),
      (current) => String(parseCount(current) + 1)
    );
    return Number(next);
  }

  async ping(): Promise<boolean> {
    if (!this.primary) return false;

    try {
      return (await this.primary.ping()) === "PONG";
    } catch {
      return false;
    }
  }

  async disconnect(): Promise<void> {
    this.fallback.clear();
    if (!this.primary) return;

    try {
      await this.primary.quit();
    } catch (err) {
      this.logger.warn({ err }, "Redis QUIT failed");
    }
  }
}

/**
 * Parse a stored counter. Anything that is not an integer counts as zero.
 */
export function parseCount(value: string): number {
  return /^[+-]?\d+$/.test(value.trim()) ? Number.parseInt(value, 10) : 0;
}

// =============================================================================
// Factory
// =============================================================================

export interface CreateTieredCacheOptions
  extends Omit<RedisClientOptions, "url" | "logger">,
    Omit<TieredCacheOptions, "primary"> {
  /** Redis URL; absent means fallback-only */
  redisUrl?: string;
}

/**
 * Create a TieredCache from configuration.
 *
 * Never throws: a missing URL or a client that cannot be constructed
 * leaves the cache running on its fallback tier.
 */
export function createTieredCache(options: CreateTieredCacheOptions = {}): TieredCache {
  const { redisUrl, connectTimeout, commandTimeout, maxRetries, ...cacheOptions } = options;
  const logger = cacheOptions.logger ?? createLogger("cache");

  let primary: KeyValueStore | null = null;

  if (!redisUrl) {
    logger.info("REDIS_URL not set, using in-memory cache only");
  } else {
    try {
      primary = asKeyValueStore(
        createRedisClient({ url: redisUrl, connectTimeout, commandTimeout, maxRetries, logger })
      );
    } catch (err) {
      logger.warn({ err }, "Failed to create Redis client, using in-memory cache only");
    }
  }

  return new TieredCache({ ...cacheOptions, primary, logger });
}
