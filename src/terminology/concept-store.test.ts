import { describe, it, expect } from "vitest";
import { CATALOGUE_PATH } from "../testing/fixtures.js";
import { InMemoryConceptStore, loadCatalogueFile, pickTranslation } from "./concept-store.js";

const SNOMED = "2.16.840.1.113883.6.96";

describe("InMemoryConceptStore", () => {
  const store = new InMemoryConceptStore({
    concepts: [
      { code: "38341003", codeSystemOid: SNOMED, defaultDisplay: "Hypertensive disorder", valueSetOid: "1.2.3.4" },
      { code: "91936005", codeSystemOid: SNOMED, status: "inactive", defaultDisplay: "Allergy to penicillin" },
    ],
    translations: [
      { code: "38341003", codeSystemOid: SNOMED, language: "PT", country: "pt", translatedDisplay: "Hipertensão arterial" },
      { code: "38341003", codeSystemOid: SNOMED, language: "pt", translatedDisplay: "Hipertensão" },
    ],
  });

  it("finds active concepts by code and system", async () => {
    const concept = await store.findConcept("38341003", SNOMED);
    expect(concept).toEqual({
      code: "38341003",
      codeSystemOid: SNOMED,
      status: "active",
      defaultDisplay: "Hypertensive disorder",
      valueSetOid: "1.2.3.4",
    });
  });

  it("does not return inactive concepts", async () => {
    expect(await store.findConcept("91936005", SNOMED)).toBeNull();
  });

  it("does not match the same code under another system", async () => {
    expect(await store.findConcept("38341003", "2.16.840.1.113883.6.1")).toBeNull();
  });

  it("finds concepts by value set", async () => {
    expect((await store.findConceptByValueSet("38341003", "1.2.3.4"))?.defaultDisplay).toBe("Hypertensive disorder");
  });

  it("prefers the country-specific translation", async () => {
    const concept = await store.findConcept("38341003", SNOMED);
    if (!concept) throw new Error("concept missing");

    expect(await store.findTranslation(concept, "pt", "PT")).toBe("Hipertensão arterial");
    expect(await store.findTranslation(concept, "pt", "BR")).toBe("Hipertensão");
    expect(await store.findTranslation(concept, "pt")).toBe("Hipertensão");
    expect(await store.findTranslation(concept, "de")).toBeNull();
  });

  it("rejects malformed snapshots", () => {
    expect(() => new InMemoryConceptStore({ concepts: [{ code: "", codeSystemOid: SNOMED, defaultDisplay: "x" }] })).toThrow();
  });
});

describe("pickTranslation", () => {
  it("returns null when no row matches the language", () => {
    expect(pickTranslation([{ language: "en", country: null, translatedDisplay: "x" }], "fr", null)).toBeNull();
  });
});

describe("loadCatalogueFile", () => {
  it("loads the bundled catalogue snapshot", async () => {
    const store = await loadCatalogueFile(CATALOGUE_PATH);
    expect(store.size).toBe(15);
    expect((await store.findConcept("260176001", SNOMED))?.defaultDisplay).toBe("Kiwi fruit");
  });
});
