import { describe, it, expect } from "vitest";
import type { Bundle, Medication, MedicationStatement } from "fhir/r4";
import { readFixture } from "../../testing/fixtures.js";
import {
  firstCode,
  parseFhirBundle,
  readCodeableConcept,
  referenceTo,
  resolveReference,
  resourcesOfType,
} from "./fhir-bundle.js";

const SNOMED = "2.16.840.1.113883.6.96";

describe("parseFhirBundle", () => {
  it("accepts JSON text and objects", () => {
    const fromText = parseFhirBundle(readFixture("patient-bundle.json"));
    const fromObject = parseFhirBundle({ resourceType: "Bundle", type: "collection" });

    expect(fromText.entry).toHaveLength(7);
    expect(fromObject.entry).toBeUndefined();
  });

  it("rejects invalid JSON", () => {
    expect(() => parseFhirBundle("{not json")).toThrow("Unable to read FHIR document: invalid JSON");
  });

  it("rejects resources that are not bundles", () => {
    expect(() => parseFhirBundle({ resourceType: "Patient", id: "p1" })).toThrow("input is not a FHIR Bundle");
    expect(() => parseFhirBundle({ resourceType: "Bundle", entry: {} })).toThrow("input is not a FHIR Bundle");
    expect(() => parseFhirBundle(null)).toThrow("input is not a FHIR Bundle");
  });
});

describe("resourcesOfType", () => {
  it("filters entries by resource type in bundle order", () => {
    const bundle = parseFhirBundle(readFixture("patient-bundle.json"));

    expect(resourcesOfType(bundle, "AllergyIntolerance").map((allergy) => allergy.id)).toEqual(["allergy-1", "allergy-bad"]);
    expect(resourcesOfType(bundle, "Encounter")).toEqual([]);
  });
});

describe("readCodeableConcept", () => {
  it("gives the primary coding the concept text and maps system URIs to OIDs", () => {
    const concept = readCodeableConcept({
      text: "Kiwi",
      coding: [
        { system: "http://snomed.info/sct", code: "260176001", display: "Kiwi fruit" },
        { system: "urn:oid:1.2.3", code: "K1" },
        { display: "display only" },
      ],
    });

    expect(concept.primary).toEqual({ code: "260176001", codeSystemOid: SNOMED, sourceDisplay: "Kiwi" });
    expect(concept.codes).toEqual([
      { code: "260176001", codeSystemOid: SNOMED, sourceDisplay: "Kiwi" },
      { code: "K1", codeSystemOid: "1.2.3", sourceDisplay: null },
    ]);
    expect(concept.text).toBe("Kiwi");
  });

  it("treats a blank display as absent", () => {
    const concept = readCodeableConcept({ coding: [{ system: "http://loinc.org", code: "4548-4", display: "  " }] });

    expect(concept.primary?.sourceDisplay).toBeNull();
    expect(concept.text).toBeNull();
  });

  it("returns nothing for a missing concept", () => {
    expect(readCodeableConcept(undefined)).toEqual({ primary: null, codes: [], text: null });
  });
});

describe("firstCode", () => {
  it("skips codings without a code", () => {
    expect(firstCode({ coding: [{ display: "Active" }, { code: "active" }] })).toBe("active");
    expect(firstCode(undefined)).toBeNull();
  });
});

describe("resolveReference", () => {
  const medication: Medication = {
    resourceType: "Medication",
    id: "metformin",
    code: { coding: [{ system: "http://www.whocc.no/atc", code: "A10BA02" }] },
  };
  const statement: MedicationStatement = {
    resourceType: "MedicationStatement",
    id: "med-2",
    status: "active",
    subject: { reference: "Patient/p1" },
    medicationReference: { reference: "Medication/metformin" },
  };
  const bundle: Bundle = {
    resourceType: "Bundle",
    type: "collection",
    entry: [{ fullUrl: "urn:uuid:med-a", resource: medication }, { resource: statement }],
  };

  it("finds bundle entries by type and id", () => {
    expect(resolveReference(bundle, { reference: "Medication/metformin" }, "Medication")?.id).toBe("metformin");
    expect(resolveReference(bundle, { reference: "http://example.org/fhir/Medication/metformin" }, "Medication")?.id).toBe("metformin");
  });

  it("finds bundle entries by fullUrl", () => {
    expect(resolveReference(bundle, { reference: "urn:uuid:med-a" }, "Medication")?.id).toBe("metformin");
  });

  it("finds contained resources by local id", () => {
    expect(resolveReference(bundle, { reference: "#metformin" }, "Medication", [medication])?.id).toBe("metformin");
    expect(resolveReference(bundle, { reference: "#other" }, "Medication", [medication])).toBeNull();
  });

  it("does not return a resource of another type", () => {
    expect(resolveReference(bundle, { reference: "MedicationStatement/med-2" }, "Medication")).toBeNull();
    expect(resolveReference(bundle, undefined, "Medication")).toBeNull();
  });

  it("formats references as type and id", () => {
    expect(referenceTo(statement)).toBe("MedicationStatement/med-2");
  });
});
