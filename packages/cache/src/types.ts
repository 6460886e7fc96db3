/**
 * Cache Type Definitions
 */

/**
 * Remote key-value commands the cache needs (an ioredis subset).
 * Kept minimal so tests can supply an in-process stand-in.
 */
export interface KeyValueStore {
  get(key: string): Promise<string | null>;
  set(key: string, value: string, mode: "EX", seconds: number): Promise<unknown>;
  del(key: string): Promise<number>;
  incr(key: string): Promise<number>;
  ping(): Promise<string>;
  quit(): Promise<unknown>;
}

/**
 * Cache contract consumed by the link service.
 *
 * Implementations absorb their own failures: none of these methods reject
 * because the backing store is unavailable.
 */
export interface CacheService {
  get(key: string): Promise<string | null>;
  set(key: string, value: string, ttlSeconds: number): Promise<void>;
  delete(key: string): Promise<void>;
  /**
   * Atomically add one to the integer stored at `key`.
   * @returns The new count
   */
  increment(key: string): Promise<number>;
  /** True when the primary tier answers */
  ping(): Promise<boolean>;
  disconnect(): Promise<void>;
}
