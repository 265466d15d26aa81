import test from "node:test";
import assert from "node:assert/strict";

import { DailyDedup, MemoryCache } from "./cache.js";

test("cache entries expire after their ttl", async () => {
  let now = new Date("2024-05-01T00:00:00Z");
  const cache = new MemoryCache(() => now);

  await cache.setWithTTL("sent:1:2024-05-01:strike", 60);
  assert.equal(await cache.exists("sent:1:2024-05-01:strike"), true);

  now = new Date("2024-05-01T00:01:00Z");
  assert.equal(await cache.exists("sent:1:2024-05-01:strike"), false);
});

test("daily dedup keys on course, date and kind", async () => {
  const dedup = new DailyDedup(new MemoryCache(), 86_400);

  assert.equal(DailyDedup.key(7, "2024-05-01", "reminder_60"), "sent:7:2024-05-01:reminder_60");

  await dedup.markSent(7, "2024-05-01", "removal");
  assert.equal(await dedup.wasSent(7, "2024-05-01", "removal"), true);
  assert.equal(await dedup.wasSent(7, "2024-05-01", "strike"), false);
  assert.equal(await dedup.wasSent(7, "2024-05-02", "removal"), false);
});
