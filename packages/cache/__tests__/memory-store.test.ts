/**
 * Expiring Map Tests
 */

import { describe, it, expect, beforeEach } from "@jest/globals";
import { ExpiringMap } from "../src/memory-store.js";
import { ManualClock } from "./fake-redis.js";

describe("ExpiringMap", () => {
  let clock: ManualClock;
  let map: ExpiringMap;

  beforeEach(() => {
    clock = new ManualClock(1_000);
    map = new ExpiringMap({ clock, shards: 4 });
  });

  describe("get / set", () => {
    it("should return a value before it expires", () => {
      map.set("abc123", "https://example.com", 1);

      expect(map.get("abc123")).toBe("https://example.com");
    });

    it("should keep the entry alive at exactly its expiry instant", () => {
      map.set("abc123", "https://example.com", 1);
      clock.advance(1_000);

      expect(map.get("abc123")).toBe("https://example.com");
    });

    it("should drop the entry once the TTL has passed", () => {
      map.set("abc123", "https://example.com", 1);
      clock.advance(1_001);

      expect(map.get("abc123")).toBeNull();
      expect(map.size).toBe(0);
    });

    it("should refresh the expiry on overwrite", () => {
      map.set("abc123", "https://old.example", 1);
      clock.advance(900);
      map.set("abc123", "https://new.example", 1);
      clock.advance(900);

      expect(map.get("abc123")).toBe("https://new.example");
    });

    it("should return null for unknown keys", () => {
      expect(map.get("missing")).toBeNull();
    });
  });

  describe("delete", () => {
    it("should report whether a key was removed", () => {
      map.set("abc123", "https://example.com", 60);

      expect(map.delete("abc123")).toBe(true);
      expect(map.delete("abc123")).toBe(false);
      expect(map.get("abc123")).toBeNull();
    });
  });

  describe("sweep", () => {
    it("should remove only expired entries across all shards", () => {
      for (let i = 0; i < 10; i++) {
        map.set(`short-${i}`, `https://example.com/${i}`, 1);
      }
      map.set("long-lived", "https://example.com/keep", 60);
      clock.advance(2_000);

      expect(map.sweep()).toBe(10);
      expect(map.size).toBe(1);
      expect(map.get("long-lived")).toBe("https://example.com/keep");
    });
  });

  describe("upsert", () => {
    const create = () => ({ value: "0", ttlSeconds: 60 });
    const addOne = (current: string) => String(Number(current) + 1);

    it("should create the entry before mutating it", () => {
      expect(map.upsert("clicks:abc", create, addOne)).toBe("1");
      expect(map.get("clicks:abc")).toBe("1");
    });

    it("should mutate an existing entry", () => {
      map.set("clicks:abc", "41", 60);

      expect(map.upsert("clicks:abc", create, addOne)).toBe("42");
    });

    it("should keep the existing expiry", () => {
      map.set("clicks:abc", "5", 1);
      map.upsert("clicks:abc", create, addOne);
      clock.advance(1_001);

      expect(map.get("clicks:abc")).toBeNull();
    });

    it("should start over when the entry has expired", () => {
      map.set("clicks:abc", "99", 1);
      clock.advance(1_001);

      expect(map.upsert("clicks:abc", create, addOne)).toBe("1");
    });

    it("should not lose updates from concurrent callers", async () => {
      await Promise.all(
        Array.from({ length: 100 }, async () => {
          await Promise.resolve();
          map.upsert("clicks:hot", create, addOne);
        })
      );

      expect(map.get("clicks:hot")).toBe("100");
    });
  });

  it("should treat a shard count below one as a single shard", () => {
    const single = new ExpiringMap({ clock, shards: 0 });
    single.set("a", "1", 60);
    single.set("b", "2", 60);

    expect(single.size).toBe(2);
  });

  it("should evict the least recently read entry when a shard is full", () => {
    const bounded = new ExpiringMap({ clock, shards: 1, maxEntries: 2 });
    bounded.set("a", "1", 60);
    bounded.set("b", "2", 60);
    bounded.get("a");
    bounded.set("c", "3", 60);

    expect(bounded.get("b")).toBeNull();
    expect(bounded.get("a")).toBe("1");
    expect(bounded.get("c")).toBe("3");
  });
});
