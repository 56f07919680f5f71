import type { ResolvedTerm } from "./types.js";

export interface CacheStats {
  size: number;
  hits: number;
  misses: number;
}

/**
 * Storage behind the resolver's cache. A backend may be remote, so every
 * operation may reject; the resolver treats a rejection as "cache unavailable".
 */
export interface TermCache {
  get(key: string): Promise<ResolvedTerm | undefined>;
  set(key: string, value: ResolvedTerm, ttlMs: number): Promise<void>;
  delete(key: string): Promise<void>;
  clear(): Promise<void>;
  stats(): CacheStats;
}

interface CacheEntry {
  value: ResolvedTerm;
  expiresAt: number;
}

export type Clock = () => number;

/**
 * Process-local TTL cache. Map insertion order doubles as age order, so
 * eviction of the oldest entry is a single iterator step.
 */
export class MemoryTermCache implements TermCache {
  private readonly entries = new Map<string, CacheEntry>();
  private hits = 0;
  private misses = 0;

  constructor(
    private readonly maxEntries = 50_000,
    private readonly now: Clock = Date.now
  ) {}

  async get(key: string): Promise<ResolvedTerm | undefined> {
    const entry = this.entries.get(key);
    if (!entry) {
      this.misses += 1;
      return undefined;
    }
    if (entry.expiresAt <= this.now()) {
      this.entries.delete(key);
      this.misses += 1;
      return undefined;
    }
    this.hits += 1;
    return entry.value;
  }

  async set(key: string, value: ResolvedTerm, ttlMs: number): Promise<void> {
    if (ttlMs <= 0) return;
    this.entries.delete(key);
    this.entries.set(key, { value, expiresAt: this.now() + ttlMs });

    while (this.entries.size > this.maxEntries) {
      const oldest = this.entries.keys().next();
      if (oldest.done) break;
      this.entries.delete(oldest.value);
    }
  }

  async delete(key: string): Promise<void> {
    this.entries.delete(key);
  }

  async clear(): Promise<void> {
    this.entries.clear();
    this.hits = 0;
    this.misses = 0;
  }

  stats(): CacheStats {
    return { size: this.entries.size, hits: this.hits, misses: this.misses };
  }
}

/**
 * Cache key for one resolution request. Country is part of the key because a
 * country-specific translation may differ from the language default.
 */
export function cacheKey(codeSystemOid: string, code: string, language: string, country: string | null): string {
  return [codeSystemOid, code, language, country ?? "*"].join("|");
}
