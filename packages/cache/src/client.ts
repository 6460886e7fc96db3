/**
 * Redis Client
 *
 * ioredis connection for the primary cache tier, plus the narrowing to the
 * `KeyValueStore` commands `TieredCache` calls.
 */

import Redis from "ioredis";
import type { Logger } from "@urlkit/logger";
import type { KeyValueStore } from "./types.js";

export interface RedisClientOptions {
  /** Redis connection URL */
  url: string;
  /** Connection timeout in ms (default: 1000) */
  connectTimeout?: number;
  /** Command timeout in ms (default: 50) */
  commandTimeout?: number;
  /** Max retries per request (default: 1) */
  maxRetries?: number;
  /** Receives connection lifecycle events */
  logger?: Logger;
}

/** Reconnect attempts before ioredis gives up and the cache stays on its fallback tier */
export const MAX_RECONNECT_ATTEMPTS = 5;

/**
 * ioredis `retryStrategy`: 100ms per attempt, capped at 2s, `null` once
 * attempts run out.
 */
export function reconnectDelay(attempt: number): number | null {
  if (attempt > MAX_RECONNECT_ATTEMPTS) return null;
  return Math.min(attempt * 100, 2000);
}

/**
 * A slow or missing Redis must surface as a rejected command within
 * `commandTimeout`, so the offline queue is off and each command retries at
 * most `maxRetries` times.
 */
export function createRedisClient(options: RedisClientOptions): Redis {
  const { url, connectTimeout = 1000, commandTimeout = 50, maxRetries = 1, logger } = options;

  const client = new Redis(url, {
    connectTimeout,
    commandTimeout,
    maxRetriesPerRequest: maxRetries,
    enableReadyCheck: true,
    enableOfflineQueue: false,
    retryStrategy: reconnectDelay,
  });

  client.on("connect", () => logger?.info("Redis connected"));
  client.on("error", (err: Error) => logger?.warn({ err: err.message }, "Redis connection error"));
  client.on("close", () => logger?.debug("Redis connection closed"));

  return client;
}

/**
 * Narrow an ioredis client to the commands the tiered cache uses.
 */
export function asKeyValueStore(client: Redis): KeyValueStore {
  return {
    get: (key) => client.get(key),
    set: (key, value, mode, seconds) => client.set(key, value, mode, seconds),
    del: (key) => client.del(key),
    incr: (key) => client.incr(key),
    ping: () => client.ping(),
    quit: () => client.quit(),
  };
}
