/**
 * Tests for TtlCache
 */

import { describe, it, expect, beforeEach } from "vitest";
import { manualClock, type ManualClock } from "@tablestore/testkit";
import { TtlCache, DEFAULT_CACHE_TTL_MS } from "./cache.js";

describe("TtlCache", () => {
  let clock: ManualClock;
  let cache: TtlCache<string>;

  beforeEach(() => {
    clock = manualClock(1_000);
    cache = new TtlCache<string>({ ttlMs: 100, maxSize: 3, now: clock.now });
  });

  describe("defaults", () => {
    it("should use a 300 second TTL", () => {
      expect(new TtlCache<string>().ttlMs).toBe(DEFAULT_CACHE_TTL_MS);
      expect(DEFAULT_CACHE_TTL_MS).toBe(300_000);
    });
  });

  describe("get/set", () => {
    it("should return undefined for a missing key", () => {
      expect(cache.get("missing")).toBeUndefined();
      expect(cache.stats().misses).toBe(1);
    });

    it("should return a fresh value", () => {
      cache.set("a", "alpha");
      clock.advance(99);

      expect(cache.get("a")).toBe("alpha");
      expect(cache.stats()).toEqual({ size: 1, hits: 1, misses: 0, expired: 0, evicted: 0 });
    });

    it("should expire a value once its age reaches the TTL", () => {
      cache.set("a", "alpha");
      clock.advance(100);

      expect(cache.get("a")).toBeUndefined();
      expect(cache.has("a")).toBe(false);
      expect(cache.stats()).toEqual({ size: 0, hits: 0, misses: 1, expired: 1, evicted: 0 });
    });

    it("should restart the TTL when a key is set again", () => {
      cache.set("a", "one");
      clock.advance(80);
      cache.set("a", "two");
      clock.advance(80);

      expect(cache.get("a")).toBe("two");
    });
  });

  describe("LRU eviction", () => {
    it("should evict the least recently used entry beyond maxSize", () => {
      cache.set("a", "1");
      cache.set("b", "2");
      cache.set("c", "3");

      // Touch "a" so "b" becomes the oldest
      cache.get("a");
      cache.set("d", "4");

      expect(cache.has("a")).toBe(true);
      expect(cache.has("b")).toBe(false);
      expect(cache.has("c")).toBe(true);
      expect(cache.has("d")).toBe(true);
      expect(cache.stats().evicted).toBe(1);
    });

    it("should not store anything when maxSize is 0", () => {
      const disabled = new TtlCache<string>({ maxSize: 0, now: clock.now });
      disabled.set("a", "1");

      expect(disabled.get("a")).toBeUndefined();
      expect(disabled.stats().size).toBe(0);
    });
  });

  describe("delete/clear", () => {
    it("should delete a single entry", () => {
      cache.set("a", "1");
      expect(cache.delete("a")).toBe(true);
      expect(cache.delete("a")).toBe(false);
    });

    it("should clear all entries", () => {
      cache.set("a", "1");
      cache.set("b", "2");
      cache.clear();

      expect(cache.stats().size).toBe(0);
    });
  });
});
