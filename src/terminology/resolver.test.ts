import { describe, it, expect, vi, beforeEach } from "vitest";
import { AuditLogger } from "../audit/audit-logger.js";
import { loadTestCatalogue, testEngineConfig } from "../testing/fixtures.js";
import { MemoryTermCache, type TermCache } from "./cache.js";
import type { InMemoryConceptStore } from "./concept-store.js";
import { TerminologyResolver, fallbackDisplay } from "./resolver.js";
import type { ConceptRecord, ConceptStore, ResolvedTerm } from "./types.js";

const SNOMED = "2.16.840.1.113883.6.96";

function failingCache(): TermCache {
  return {
    get: () => Promise.reject(new Error("connection refused")),
    set: () => Promise.reject(new Error("connection refused")),
    delete: () => Promise.reject(new Error("connection refused")),
    clear: () => Promise.reject(new Error("connection refused")),
    stats: () => ({ size: 0, hits: 0, misses: 0 }),
  };
}

function silentAudit() {
  const sink = { info: vi.fn(), warn: vi.fn(), error: vi.fn() };
  return { sink, auditLogger: new AuditLogger("test", sink) };
}

describe("TerminologyResolver", () => {
  let store: InMemoryConceptStore;

  beforeEach(async () => {
    store = await loadTestCatalogue();
  });

  it("returns the translation for the requested language", async () => {
    const resolver = new TerminologyResolver({ store, config: testEngineConfig() });

    const term = await resolver.resolve("420134006", SNOMED, "en");

    expect(term).toEqual({
      code: "420134006",
      codeSystemOid: SNOMED,
      display: "Propensity to adverse reactions",
      provenance: "Translation",
    });
  });

  it("falls back to the concept default when the language has no translation", async () => {
    const resolver = new TerminologyResolver({ store, config: testEngineConfig() });

    const term = await resolver.resolve("420134006", SNOMED, "pt");

    expect(term.display).toBe("Propensity to adverse reactions");
    expect(term.provenance).toBe("DefaultDisplay");
  });

  it("builds the fallback text for unregistered code systems", async () => {
    const resolver = new TerminologyResolver({ store, config: testEngineConfig() });

    const term = await resolver.resolve("999999", "9.9.9.9");

    expect(term.display).toBe("Code: 999999 (System: 9.9.9.9)");
    expect(term.provenance).toBe("Fallback");
  });

  it("does not resolve inactive concepts", async () => {
    const resolver = new TerminologyResolver({ store, config: testEngineConfig() });

    const term = await resolver.resolve("91936005", SNOMED);

    expect(term.display).toBe(`Code: 91936005 (System: ${SNOMED})`);
    expect(term.provenance).toBe("Fallback");
  });

  it("prefers the country-specific translation from the configured target", async () => {
    const resolver = new TerminologyResolver({
      store,
      config: testEngineConfig({ targetLanguage: "pt", targetCountry: "PT" }),
    });

    expect((await resolver.resolve("38341003", SNOMED)).display).toBe("Hipertensão arterial");
    expect((await resolver.resolve("38341003", SNOMED, "pt", null)).display).toBe("Hipertensão");
  });

  it("does not look up codes sent under an unregistered OID", async () => {
    const findConceptByValueSet = vi.spyOn(store, "findConceptByValueSet");
    const resolver = new TerminologyResolver({ store, config: testEngineConfig() });

    const term = await resolver.resolve("260176001", "1.3.6.1.4.1.12559.11.10.1.3.1.42.19");

    expect(term).toEqual({
      code: "260176001",
      codeSystemOid: "1.3.6.1.4.1.12559.11.10.1.3.1.42.19",
      display: "Code: 260176001 (System: 1.3.6.1.4.1.12559.11.10.1.3.1.42.19)",
      provenance: "Fallback",
    });
    expect(findConceptByValueSet).not.toHaveBeenCalled();
  });

  it("cross-references the value set once after an exact miss", async () => {
    const valueSetStore: ConceptStore = {
      findConcept: vi.fn(async () => null),
      findConceptByValueSet: vi.fn(async () => ({
        code: "38341003",
        codeSystemOid: "1.2.3.4",
        status: "active" as const,
        defaultDisplay: "Hypertensive disorder",
        valueSetOid: SNOMED,
      })),
      findTranslation: vi.fn(async () => null),
    };
    const resolver = new TerminologyResolver({ store: valueSetStore, config: testEngineConfig() });

    const term = await resolver.resolve("38341003", SNOMED);

    expect(term).toEqual({ code: "38341003", codeSystemOid: SNOMED, display: "Hypertensive disorder", provenance: "DefaultDisplay" });
    expect(valueSetStore.findConcept).toHaveBeenCalledWith("38341003", SNOMED);
    expect(valueSetStore.findConceptByValueSet).toHaveBeenCalledTimes(1);
  });

  it("returns the same display twice and queries the catalogue once", async () => {
    const findConcept = vi.spyOn(store, "findConcept");
    const resolver = new TerminologyResolver({ store, config: testEngineConfig() });

    const first = await resolver.resolve("260176001", SNOMED);
    const second = await resolver.resolve("260176001", SNOMED);

    expect(second.display).toBe(first.display);
    expect(first.display).toBe("Kiwi fruit");
    expect(findConcept).toHaveBeenCalledTimes(1);
  });

  it("never returns an empty or markup-bearing display", async () => {
    const resolver = new TerminologyResolver({ store, config: testEngineConfig() });
    const inputs: [string, string][] = [
      ["", SNOMED],
      ["   ", ""],
      ["<b>x</b>", SNOMED],
      ["\u0000\u0001", "9.9.9.9"],
    ];

    for (const [code, system] of inputs) {
      const term = await resolver.resolve(code, system);
      expect(term.display.trim().length).toBeGreaterThan(0);
      expect(term.display).not.toMatch(/[<>]/);
      expect(term.provenance).toBe("Fallback");
    }
  });

  it("describes an empty code in the fallback text", async () => {
    const resolver = new TerminologyResolver({ store, config: testEngineConfig() });

    expect((await resolver.resolve("", SNOMED)).display).toBe(`Code: (empty) (System: ${SNOMED})`);
    expect((await resolver.resolve("<b>x</b>", SNOMED)).display).toBe(`Code: x (System: ${SNOMED})`);
  });

  it("caches fallbacks with the negative TTL and hits with the positive TTL", async () => {
    const cache = new MemoryTermCache();
    const set = vi.spyOn(cache, "set");
    const resolver = new TerminologyResolver({
      store,
      cache,
      config: testEngineConfig({ cacheTtlPositiveMs: 60_000, cacheTtlNegativeMs: 5_000 }),
    });

    await resolver.resolve("420134006", SNOMED, "en");
    await resolver.resolve("999999", "9.9.9.9", "en");

    expect(set).toHaveBeenNthCalledWith(1, `${SNOMED}|420134006|en|*`, expect.objectContaining({ provenance: "Translation" }), 60_000);
    expect(set).toHaveBeenNthCalledWith(2, "9.9.9.9|999999|en|*", expect.objectContaining({ provenance: "Fallback" }), 5_000);
  });

  it("resolves against the catalogue when the cache backend is down", async () => {
    const findConcept = vi.spyOn(store, "findConcept");
    const resolver = new TerminologyResolver({ store, cache: failingCache(), config: testEngineConfig() });

    const first = await resolver.resolve("420134006", SNOMED, "en");
    const second = await resolver.resolve("420134006", SNOMED, "en");

    expect(first.provenance).toBe("Translation");
    expect(second.display).toBe("Propensity to adverse reactions");
    expect(findConcept).toHaveBeenCalledTimes(2);
  });

  it("shares one catalogue lookup between concurrent requests for the same key", async () => {
    let release: (record: ConceptRecord | null) => void = () => undefined;
    const pending = new Promise<ConceptRecord | null>((resolve) => {
      release = resolve;
    });
    const slowStore: ConceptStore = {
      findConcept: vi.fn(() => pending),
      findConceptByValueSet: vi.fn(async () => null),
      findTranslation: vi.fn(async () => null),
    };
    const resolver = new TerminologyResolver({ store: slowStore, config: testEngineConfig() });

    const first = resolver.resolve("38341003", SNOMED);
    const second = resolver.resolve("38341003", SNOMED);
    await new Promise((resolve) => setTimeout(resolve, 0));
    release({
      code: "38341003",
      codeSystemOid: SNOMED,
      status: "active",
      defaultDisplay: "Hypertensive disorder",
      valueSetOid: null,
    });

    const results: ResolvedTerm[] = await Promise.all([first, second]);
    expect(results.map((term) => term.display)).toEqual(["Hypertensive disorder", "Hypertensive disorder"]);
    expect(slowStore.findConcept).toHaveBeenCalledTimes(1);
  });

  it("falls back when a catalogue lookup exceeds the timeout", async () => {
    const hangingStore: ConceptStore = {
      findConcept: () => new Promise<ConceptRecord | null>(() => undefined),
      findConceptByValueSet: async () => null,
      findTranslation: async () => null,
    };
    const resolver = new TerminologyResolver({ store: hangingStore, config: testEngineConfig({ lookupTimeoutMs: 20 }) });

    const term = await resolver.resolve("38341003", SNOMED);

    expect(term).toEqual({
      code: "38341003",
      codeSystemOid: SNOMED,
      display: `Code: 38341003 (System: ${SNOMED})`,
      provenance: "Fallback",
    });
  });

  it("falls back when the catalogue throws", async () => {
    const brokenStore: ConceptStore = {
      findConcept: async () => {
        throw new Error("table missing");
      },
      findConceptByValueSet: async () => null,
      findTranslation: async () => null,
    };
    const resolver = new TerminologyResolver({ store: brokenStore, config: testEngineConfig() });

    expect((await resolver.resolve("38341003", SNOMED)).provenance).toBe("Fallback");
  });

  it("audits fallback resolutions", async () => {
    const { sink, auditLogger } = silentAudit();
    const resolver = new TerminologyResolver({ store, auditLogger, config: testEngineConfig() });

    await resolver.resolve("999999", "9.9.9.9");

    expect(sink.info).toHaveBeenCalledTimes(1);
    expect(sink.info).toHaveBeenCalledWith(
      expect.objectContaining({ event: "fallback_resolution", errorKind: "UnsupportedCodeSystem" }),
      "Fallback display for 999999 (9.9.9.9)"
    );
  });

  it("consults the catalogue again after reset", async () => {
    const findConcept = vi.spyOn(store, "findConcept");
    const resolver = new TerminologyResolver({ store, config: testEngineConfig() });

    await resolver.resolve("260176001", SNOMED);
    await resolver.reset();
    await resolver.resolve("260176001", SNOMED);

    expect(findConcept).toHaveBeenCalledTimes(2);
  });

  it("does not cache a lookup that was still running when reset was called", async () => {
    const record = (defaultDisplay: string): ConceptRecord => ({
      code: "38341003",
      codeSystemOid: SNOMED,
      status: "active",
      defaultDisplay,
      valueSetOid: null,
    });
    let release: (value: ConceptRecord | null) => void = () => undefined;
    const pending = new Promise<ConceptRecord | null>((resolve) => {
      release = resolve;
    });
    const findConcept = vi.fn<(code: string, oid: string) => Promise<ConceptRecord | null>>();
    findConcept.mockReturnValueOnce(pending).mockResolvedValue(record("Updated display"));
    const changingStore: ConceptStore = {
      findConcept,
      findConceptByValueSet: vi.fn(async () => null),
      findTranslation: vi.fn(async () => null),
    };
    const resolver = new TerminologyResolver({ store: changingStore, config: testEngineConfig() });

    const stale = resolver.resolve("38341003", SNOMED);
    await new Promise((resolve) => setTimeout(resolve, 0));
    await resolver.reset();
    release(record("Stale display"));

    expect((await stale).display).toBe("Stale display");
    expect((await resolver.resolve("38341003", SNOMED)).display).toBe("Updated display");
    expect(findConcept).toHaveBeenCalledTimes(2);
  });

  describe("resolveClinicalCode", () => {
    it("uses a source display verbatim without touching the catalogue", async () => {
      const findConcept = vi.spyOn(store, "findConcept");
      const resolver = new TerminologyResolver({ store, config: testEngineConfig() });

      const term = await resolver.resolveClinicalCode({ code: "260176001", codeSystemOid: SNOMED, sourceDisplay: "Kiwi fruit" });

      expect(term).toEqual({ code: "260176001", codeSystemOid: SNOMED, display: "Kiwi fruit", provenance: "SourceDisplay" });
      expect(findConcept).not.toHaveBeenCalled();
    });

    it("resolves when the source display is blank", async () => {
      const resolver = new TerminologyResolver({ store, config: testEngineConfig() });

      const term = await resolver.resolveClinicalCode({ code: "260176001", codeSystemOid: SNOMED, sourceDisplay: "  " });

      expect(term.display).toBe("Kiwi fruit");
      expect(term.provenance).toBe("DefaultDisplay");
    });
  });
});

describe("fallbackDisplay", () => {
  it("keeps the code verbatim", () => {
    expect(fallbackDisplay("A10BA02", "2.16.840.1.113883.6.73")).toBe("Code: A10BA02 (System: 2.16.840.1.113883.6.73)");
    expect(fallbackDisplay("x", "")).toBe("Code: x (System: (none))");
  });
});
