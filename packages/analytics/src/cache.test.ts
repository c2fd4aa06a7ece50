import { describe, it, expect } from "vitest";
import { ResultCache } from "./cache.js";
import { createContentItem, type ContentItem } from "./items.js";

function item(externalId: string): ContentItem {
  return createContentItem({ externalId, title: externalId, views: 10 });
}

function createClock(start = 1_000_000) {
  let now = start;
  return {
    now: () => now,
    advance: (ms: number) => {
      now += ms;
    },
  };
}

describe("ResultCache", () => {
  it("returns the exact stored list within the TTL", () => {
    const clock = createClock();
    const cache = new ResultCache({ now: clock.now });
    const items = [item("a"), item("b")];

    cache.put("UCchannel", 5, items);
    clock.advance(60_000);

    expect(cache.get("UCchannel", 5)).toBe(items);
  });

  it("treats entries older than the TTL as absent", () => {
    const clock = createClock();
    const cache = new ResultCache({ now: clock.now });

    cache.put("UCchannel", 5, [item("a")]);
    clock.advance(60_001);

    expect(cache.get("UCchannel", 5)).toBeUndefined();
    expect(cache.size).toBe(0);
  });

  it("keys entries by channel and count", () => {
    const cache = new ResultCache();
    const five = [item("a")];
    const ten = [item("b")];

    cache.put("UCchannel", 5, five);
    cache.put("UCchannel", 10, ten);

    expect(cache.get("UCchannel", 5)).toBe(five);
    expect(cache.get("UCchannel", 10)).toBe(ten);
    expect(cache.get("UCother", 5)).toBeUndefined();
  });

  it("overwrites on refresh and restarts the TTL", () => {
    const clock = createClock();
    const cache = new ResultCache({ ttlMs: 1_000, now: clock.now });
    const fresh = [item("fresh")];

    cache.put("UCchannel", 5, [item("stale")]);
    clock.advance(900);
    cache.put("UCchannel", 5, fresh);
    clock.advance(900);

    expect(cache.get("UCchannel", 5)).toBe(fresh);
  });

  it("evicts the least recently used entry beyond capacity", () => {
    const cache = new ResultCache({ maxEntries: 2 });

    cache.put("UCa", 5, [item("a")]);
    cache.put("UCb", 5, [item("b")]);
    cache.get("UCa", 5);
    cache.put("UCc", 5, [item("c")]);

    expect(cache.size).toBe(2);
    expect(cache.get("UCb", 5)).toBeUndefined();
    expect(cache.get("UCa", 5)).toBeDefined();
    expect(cache.get("UCc", 5)).toBeDefined();
  });
});
