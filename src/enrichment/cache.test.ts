import assert from "node:assert/strict";
import test from "node:test";

import { MemoryTtlCache } from "./cache.js";

test("entries expire at their deadline", () => {
  let now = 1_000;
  const cache = new MemoryTtlCache<string>({ now: () => now });
  cache.set("gehen", "resolved", 100);
  now = 1_099;
  assert.equal(cache.get("gehen"), "resolved");
  now = 1_100;
  assert.equal(cache.get("gehen"), null);
  assert.equal(cache.size(), 0);
});

test("the oldest entry is evicted first when the cache is full", () => {
  let now = 0;
  const cache = new MemoryTtlCache<number>({ maxEntries: 2, now: () => now });
  cache.set("a", 1, 1_000);
  now = 1;
  cache.set("b", 2, 1_000);
  now = 2;
  cache.set("a", 3, 1_000);
  now = 3;
  cache.set("c", 4, 1_000);
  assert.equal(cache.get("b"), null);
  assert.equal(cache.get("a"), 3);
  assert.equal(cache.get("c"), 4);
});

test("sweepExpired removes only expired entries", () => {
  let now = 0;
  const cache = new MemoryTtlCache<string>({ now: () => now });
  cache.set("short", "x", 10);
  cache.set("long", "y", 1_000);
  now = 50;
  assert.equal(cache.sweepExpired(), 1);
  assert.equal(cache.size(), 1);
  cache.invalidate("long");
  assert.equal(cache.get("long"), null);
});
