/**
 * In-Process Expiring Map
 *
 * Fallback tier for the tiered cache, built on lru-cache. Each shard is an
 * LRUCache with per-entry TTLs measured on the injected clock. A dead entry
 * is dropped when its key is read, or by `sweep()`.
 *
 * Keys are spread over shards by hash, so a sweep or a hot key touches one
 * shard instead of the whole table. All operations are synchronous; within
 * a single event loop turn nothing else can run between the read and the
 * write of `upsert`, which makes it atomic per key.
 */

import { LRUCache } from "lru-cache";
import type { Clock } from "@urlkit/shared";

const DEFAULT_SHARD_COUNT = 16;
const DEFAULT_MAX_ENTRIES = 100_000;

export interface ExpiringMapOptions {
  /** Time source for expiry (default: Date.now) */
  clock?: Clock;
  /** Number of shards (default: 16) */
  shards?: number;
  /** Capacity across all shards; least recently used entries go first (default: 100000) */
  maxEntries?: number;
}

export class ExpiringMap {
  private readonly shards: LRUCache<string, string>[];

  constructor(options: ExpiringMapOptions = {}) {
    const count = Math.max(1, Math.floor(options.shards ?? DEFAULT_SHARD_COUNT));
    const perShard = Math.max(1, Math.ceil((options.maxEntries ?? DEFAULT_MAX_ENTRIES) / count));
    const clock = options.clock ?? { now: () => Date.now() };

    this.shards = Array.from(
      { length: count },
      () =>
        new LRUCache<string, string>({
          max: perShard,
          perf: { now: () => clock.now() },
          // Read the clock on every check; a cached "now" would lag a manual clock
          ttlResolution: 0,
        })
    );
  }

  /**
   * Read a live value. An expired entry is removed and reported as absent.
   */
  get(key: string): string | null {
    return this.shardFor(key).get(key) ?? null;
  }

  set(key: string, value: string, ttlSeconds: number): void {
    this.shardFor(key).set(key, value, { ttl: toTtlMs(ttlSeconds) });
  }

  delete(key: string): boolean {
    return this.shardFor(key).delete(key);
  }

  /**
   * Get-or-insert-then-mutate for a single key.
   *
   * A missing or expired entry is replaced by `create()` first. `mutate`
   * receives the current value and returns the new one; an existing entry
   * keeps its expiry.
   *
   * @returns The stored value after mutation
   */
  upsert(
    key: string,
    create: () => { value: string; ttlSeconds: number },
    mutate: (current: string) => string
  ): string {
    const shard = this.shardFor(key);
    const current = shard.get(key);

    if (current === undefined) {
      const initial = create();
      const next = mutate(initial.value);
      shard.set(key, next, { ttl: toTtlMs(initial.ttlSeconds) });
      return next;
    }

    const next = mutate(current);
    shard.set(key, next, { noUpdateTTL: true });
    return next;
  }

  /**
   * Remove every expired entry.
   *
   * @returns Number of entries removed
   */
  sweep(): number {
    let removed = 0;

    for (const shard of this.shards) {
      const before = shard.size;
      shard.purgeStale();
      removed += before - shard.size;
    }

    return removed;
  }

  /** Entries currently held, expired or not */
  get size(): number {
    return this.shards.reduce((total, shard) => total + shard.size, 0);
  }

  clear(): void {
    for (const shard of this.shards) shard.clear();
  }

  private shardFor(key: string): LRUCache<string, string> {
    return this.shards[hashKey(key) % this.shards.length];
  }
}

/** lru-cache reads a TTL of 0 as "never expires", so clamp to 1 ms */
function toTtlMs(ttlSeconds: number): number {
  return Math.max(1, Math.round(ttlSeconds * 1000));
}

/**
 * FNV-1a over UTF-16 code units, as an unsigned 32-bit integer.
 */
function hashKey(key: string): number {
  let hash = 0x811c9dc5;
  for (let i = 0; i < key.length; i++) {
    hash ^= key.charCodeAt(i);
    hash = Math.imul(hash, 0x01000193);
  }
  return hash >>> 0;
}
