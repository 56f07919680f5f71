import { describe, it, expect } from "vitest";
import type { ClinicalSectionEntry, NormalizedSection } from "../mapping/types.js";
import { SectionValidator, sanitizeDisplay } from "./section-validator.js";

function entry(overrides: Partial<ClinicalSectionEntry> = {}): ClinicalSectionEntry {
  return {
    entryId: "entry-1",
    displayText: "Kiwi fruit",
    codedConcepts: [{ code: "260176001", codeSystemOid: "2.16.840.1.113883.6.96", display: "Kiwi fruit", provenance: "SourceDisplay" }],
    clinicalStatus: "active",
    verificationStatus: null,
    onsetDate: null,
    recordedDate: null,
    severity: null,
    category: null,
    value: null,
    notes: [],
    sourceReference: "AllergyIntolerance/entry-1",
    ...overrides,
  };
}

function section(entries: ClinicalSectionEntry[], overrides: Partial<NormalizedSection> = {}): NormalizedSection {
  return {
    sectionId: "allergies",
    title: "Allergies and Intolerances",
    sectionCode: "48765-2",
    hasEntries: entries.length > 0,
    entryCount: entries.length,
    entries,
    columns: ["displayText"],
    displayConfig: {
      showTimeline: true,
      showSeverity: true,
      showStatus: true,
      enableFiltering: true,
      severityColors: {},
      statusColors: {},
    },
    codedConcepts: entries.flatMap((e) => e.codedConcepts),
    isCodedSection: true,
    dataSource: "FHIR",
    ...overrides,
  };
}

describe("sanitizeDisplay", () => {
  it("removes tags and collapses whitespace", () => {
    expect(sanitizeDisplay("  Kiwi <b>fruit</b>\n")).toBe("Kiwi fruit");
  });

  it("drops stray angle brackets and control characters", () => {
    expect(sanitizeDisplay("a < b\u0007c")).toBe("a b c");
  });

  it("can return an empty string", () => {
    expect(sanitizeDisplay("<br/>")).toBe("");
  });
});

describe("SectionValidator", () => {
  const validator = new SectionValidator();

  it("accepts a consistent section", () => {
    expect(validator.validate(section([entry()]))).toEqual({ valid: true, errors: [], warnings: [] });
  });

  it("flags counters that disagree with the entries", () => {
    const result = validator.validate(section([entry()], { entryCount: 2 }));

    expect(result.valid).toBe(false);
    expect(result.errors).toEqual(["entryCount 2 does not match 1 entries"]);
  });

  it("flags empty display text", () => {
    const result = validator.validate(section([entry({ displayText: " " })]));

    expect(result.errors).toEqual(["Entry 1: displayText is empty"]);
  });

  it("flags markup in resolved terms", () => {
    const bad = entry({
      codedConcepts: [{ code: "x", codeSystemOid: "9.9.9.9", display: "<i>x</i>", provenance: "Fallback" }],
    });

    expect(validator.validate(section([bad])).errors).toEqual(["Entry 1: term x display contains markup"]);
  });

  it("flags extra keys", () => {
    const withExtra = { ...section([]), extra: true };

    expect(validator.validate(withExtra).errors).toEqual(["Section unexpected extra"]);
  });

  it("warns about entries without coded concepts", () => {
    const result = validator.validate(section([entry({ codedConcepts: [] })]));

    expect(result.valid).toBe(true);
    expect(result.warnings).toEqual(["Section has entries but no coded concepts"]);
  });
});
