import type { EngineConfig } from "../config/index.js";
import { AuditLogger } from "../audit/audit-logger.js";
import {
  CacheBackendUnavailableError,
  ConceptNotFoundError,
  EngineError,
  LookupTimeoutError,
  UnsupportedCodeSystemError,
  errorMessage,
} from "../errors.js";
import { componentLogger } from "../observability/logger.js";
import { terminologyCacheRequestsTotal, terminologyResolutionsTotal } from "../observability/metrics.js";
import { sanitizeDisplay } from "../validation/section-validator.js";
import { MemoryTermCache, cacheKey, type TermCache } from "./cache.js";
import { isRegistered } from "./code-systems.js";
import type { ClinicalCode, ConceptRecord, ConceptStore, Provenance, ResolvedTerm } from "./types.js";

const logger = componentLogger("resolver");

export type ResolverConfig = Pick<
  EngineConfig,
  "targetLanguage" | "targetCountry" | "cacheTtlPositiveMs" | "cacheTtlNegativeMs" | "lookupTimeoutMs"
>;

export interface ResolverDeps {
  store: ConceptStore;
  config: ResolverConfig;
  cache?: TermCache;
  auditLogger?: AuditLogger;
}

interface Computed {
  term: ResolvedTerm;
  ttlMs: number;
}

/**
 * The display used when nothing better is known. Always contains the code,
 * minus any angle brackets.
 */
export function fallbackDisplay(code: string, codeSystemOid: string): string {
  const safeCode = sanitizeDisplay(code) || "(empty)";
  const safeSystem = sanitizeDisplay(codeSystemOid) || "(none)";
  return `Code: ${safeCode} (System: ${safeSystem})`;
}

function term(code: string, codeSystemOid: string, display: string, provenance: Provenance): ResolvedTerm {
  return Object.freeze({ code, codeSystemOid, display, provenance });
}

/**
 * Dual-key (code + code system) terminology resolver.
 *
 * `resolve` never rejects and never returns an empty display: every failure
 * path ends in a Fallback term, cached with the negative TTL so catalogue
 * updates surface later. Concurrent requests for the same key share one
 * catalogue lookup.
 */
export class TerminologyResolver {
  private readonly store: ConceptStore;
  private readonly config: ResolverConfig;
  private readonly cache: TermCache;
  private readonly auditLogger: AuditLogger;
  private readonly inFlight = new Map<string, Promise<ResolvedTerm>>();
  private generation = 0;

  constructor(deps: ResolverDeps) {
    this.store = deps.store;
    this.config = deps.config;
    this.cache = deps.cache ?? new MemoryTermCache();
    this.auditLogger = deps.auditLogger ?? new AuditLogger();
  }

  async resolve(
    code: string,
    codeSystemOid: string,
    language?: string,
    country?: string | null
  ): Promise<ResolvedTerm> {
    const normalizedCode = code.trim();
    const oid = codeSystemOid.trim();
    const lang = (language ?? this.config.targetLanguage).trim().toLowerCase();
    const ctry = country === undefined ? this.config.targetCountry : country;
    const normalizedCountry = ctry && ctry.trim().length > 0 ? ctry.trim().toUpperCase() : null;

    try {
      const resolved = await this.resolveCached(normalizedCode, oid, lang, normalizedCountry);
      terminologyResolutionsTotal.inc({ provenance: resolved.provenance });
      return resolved;
    } catch (err) {
      // last line of defence; resolveCached already degrades every known failure
      logger.error({ err, code: normalizedCode, codeSystemOid: oid }, "Unexpected terminology resolution error");
      terminologyResolutionsTotal.inc({ provenance: "Fallback" });
      return term(normalizedCode, oid, fallbackDisplay(normalizedCode, oid), "Fallback");
    }
  }

  /**
   * Resolution as extractors use it: a non-blank display found in the source
   * document wins verbatim and the catalogue is not consulted.
   */
  async resolveClinicalCode(clinicalCode: ClinicalCode, language?: string, country?: string | null): Promise<ResolvedTerm> {
    const sourceDisplay = clinicalCode.sourceDisplay ? sanitizeDisplay(clinicalCode.sourceDisplay) : "";
    if (sourceDisplay.length > 0) {
      terminologyResolutionsTotal.inc({ provenance: "SourceDisplay" });
      return term(clinicalCode.code, clinicalCode.codeSystemOid, sourceDisplay, "SourceDisplay");
    }
    return this.resolve(clinicalCode.code, clinicalCode.codeSystemOid, language, country);
  }

  /** Drops cached terms and forgets in-flight lookups. */
  async reset(): Promise<void> {
    // lookups started before this point finish without writing to the cache
    this.generation += 1;
    this.inFlight.clear();
    try {
      await this.cache.clear();
    } catch (err) {
      logger.warn({ err }, "Terminology cache clear failed");
    }
  }

  private async resolveCached(code: string, oid: string, language: string, country: string | null): Promise<ResolvedTerm> {
    const key = cacheKey(oid, code, language, country);

    let cacheAvailable = true;
    try {
      const cached = await this.cache.get(key);
      if (cached) {
        terminologyCacheRequestsTotal.inc({ result: "hit" });
        logger.debug({ code, codeSystemOid: oid, provenance: cached.provenance }, "Terminology cache hit");
        return cached;
      }
      terminologyCacheRequestsTotal.inc({ result: "miss" });
    } catch (err) {
      cacheAvailable = false;
      terminologyCacheRequestsTotal.inc({ result: "bypass" });
      const unavailable = new CacheBackendUnavailableError("get", err);
      logger.warn({ code, codeSystemOid: oid, error: unavailable.message }, "Terminology cache unavailable, resolving against catalogue");
    }

    const pending = this.inFlight.get(key);
    if (pending) return pending;

    const generation = this.generation;
    const promise: Promise<ResolvedTerm> = this.compute(code, oid, language, country)
      .then(async ({ term: resolved, ttlMs }) => {
        if (cacheAvailable && generation === this.generation) await this.cacheSet(key, resolved, ttlMs);
        return resolved;
      })
      .finally(() => {
        if (this.inFlight.get(key) === promise) this.inFlight.delete(key);
      });

    this.inFlight.set(key, promise);
    return promise;
  }

  private async cacheSet(key: string, value: ResolvedTerm, ttlMs: number): Promise<void> {
    try {
      await this.cache.set(key, value, ttlMs);
    } catch (err) {
      const unavailable = new CacheBackendUnavailableError("set", err);
      logger.warn({ key, error: unavailable.message }, "Terminology cache write failed");
    }
  }

  private async compute(code: string, oid: string, language: string, country: string | null): Promise<Computed> {
    if (!isRegistered(oid)) {
      return this.fallback(code, oid, new UnsupportedCodeSystemError(code, oid));
    }
    if (code.length === 0) {
      return this.fallback(code, oid, new ConceptNotFoundError(code, oid));
    }

    try {
      // one cross-reference through the value set defining OID after an exact miss
      const concept =
        (await this.lookup("findConcept", () => this.store.findConcept(code, oid))) ??
        (await this.lookup("findConceptByValueSet", () => this.store.findConceptByValueSet(code, oid)));

      if (!concept) {
        return this.fallback(code, oid, new ConceptNotFoundError(code, oid));
      }

      return await this.displayFor(concept, code, oid, language, country);
    } catch (err) {
      if (err instanceof EngineError) {
        return this.fallback(code, oid, err);
      }
      logger.warn({ code, codeSystemOid: oid, error: errorMessage(err) }, "Catalogue lookup failed");
      return this.fallback(code, oid, new ConceptNotFoundError(code, oid));
    }
  }

  private async displayFor(
    concept: ConceptRecord,
    code: string,
    oid: string,
    language: string,
    country: string | null
  ): Promise<Computed> {
    const translated = await this.lookup("findTranslation", () => this.store.findTranslation(concept, language, country));
    const translatedDisplay = translated ? sanitizeDisplay(translated) : "";
    if (translatedDisplay.length > 0) {
      logger.debug({ code, codeSystemOid: oid, language, country }, "Resolved from translation");
      return { term: term(code, oid, translatedDisplay, "Translation"), ttlMs: this.config.cacheTtlPositiveMs };
    }

    const defaultDisplay = sanitizeDisplay(concept.defaultDisplay);
    if (defaultDisplay.length > 0) {
      logger.debug({ code, codeSystemOid: oid, language, country }, "Resolved from default display");
      return { term: term(code, oid, defaultDisplay, "DefaultDisplay"), ttlMs: this.config.cacheTtlPositiveMs };
    }

    return this.fallback(code, oid, new ConceptNotFoundError(code, oid));
  }

  private fallback(code: string, oid: string, reason: EngineError): Computed {
    this.auditLogger.logFallbackResolution(code, oid, reason);
    return {
      term: term(code, oid, fallbackDisplay(code, oid), "Fallback"),
      ttlMs: this.config.cacheTtlNegativeMs,
    };
  }

  private async lookup<T>(operation: string, run: () => Promise<T>): Promise<T> {
    const timeoutMs = this.config.lookupTimeoutMs;
    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<never>((_resolve, reject) => {
      timer = setTimeout(() => reject(new LookupTimeoutError(operation, timeoutMs)), timeoutMs);
    });
    try {
      return await Promise.race([run(), timeout]);
    } finally {
      if (timer) clearTimeout(timer);
    }
  }
}
