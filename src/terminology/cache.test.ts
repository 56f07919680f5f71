import { describe, it, expect } from "vitest";
import { MemoryTermCache, cacheKey } from "./cache.js";
import type { ResolvedTerm } from "./types.js";

const term = (code: string): ResolvedTerm => ({
  code,
  codeSystemOid: "2.16.840.1.113883.6.96",
  display: `Display ${code}`,
  provenance: "DefaultDisplay",
});

describe("MemoryTermCache", () => {
  it("returns stored values until they expire", async () => {
    let now = 1_000;
    const cache = new MemoryTermCache(10, () => now);

    await cache.set("a", term("1"), 500);
    expect(await cache.get("a")).toEqual(term("1"));

    now = 1_499;
    expect(await cache.get("a")).toEqual(term("1"));

    now = 1_500;
    expect(await cache.get("a")).toBeUndefined();
    expect(cache.stats()).toEqual({ size: 0, hits: 2, misses: 1 });
  });

  it("ignores non-positive TTLs", async () => {
    const cache = new MemoryTermCache();
    await cache.set("a", term("1"), 0);
    expect(await cache.get("a")).toBeUndefined();
  });

  it("evicts the oldest entry past maxEntries", async () => {
    const cache = new MemoryTermCache(2);
    await cache.set("a", term("1"), 10_000);
    await cache.set("b", term("2"), 10_000);
    await cache.set("c", term("3"), 10_000);

    expect(await cache.get("a")).toBeUndefined();
    expect(await cache.get("b")).toEqual(term("2"));
    expect(await cache.get("c")).toEqual(term("3"));
  });

  it("clears entries and counters", async () => {
    const cache = new MemoryTermCache();
    await cache.set("a", term("1"), 10_000);
    await cache.get("a");
    await cache.clear();

    expect(cache.stats()).toEqual({ size: 0, hits: 0, misses: 0 });
  });
});

describe("cacheKey", () => {
  it("keeps system, code, language and country apart", () => {
    expect(cacheKey("2.16.840.1.113883.6.96", "420134006", "en", null)).toBe("2.16.840.1.113883.6.96|420134006|en|*");
    expect(cacheKey("2.16.840.1.113883.6.96", "420134006", "pt", "PT")).toBe("2.16.840.1.113883.6.96|420134006|pt|PT");
  });
});
