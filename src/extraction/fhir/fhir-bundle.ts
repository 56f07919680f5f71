import type { Bundle, CodeableConcept, Coding, FhirResource, Reference } from "fhir/r4";
import { DocumentParseError } from "../../errors.js";
import { oidForSystemUri } from "../../terminology/code-systems.js";
import type { ClinicalCode } from "../../terminology/types.js";

export type ResourceType = FhirResource["resourceType"];
export type ResourceOfType<K extends ResourceType> = Extract<FhirResource, { resourceType: K }>;

export interface ConceptCodes {
  /** First coding that carries a code. */
  primary: ClinicalCode | null;
  /** Every coding with a code, primary first. */
  codes: ClinicalCode[];
  /** concept.text, else the first coding display. */
  text: string | null;
}

function isBundle(value: unknown): value is Bundle {
  if (typeof value !== "object" || value === null || Array.isArray(value)) return false;
  if (!("resourceType" in value) || value.resourceType !== "Bundle") return false;
  return !("entry" in value) || value.entry === undefined || Array.isArray(value.entry);
}

export function assertBundle(value: unknown): asserts value is Bundle {
  if (!isBundle(value)) {
    throw new DocumentParseError("FHIR", "input is not a FHIR Bundle");
  }
}

/** Accepts a Bundle object or its JSON text. */
export function parseFhirBundle(input: unknown): Bundle {
  let value = input;
  if (typeof input === "string") {
    try {
      value = JSON.parse(input);
    } catch (err) {
      throw new DocumentParseError("FHIR", "invalid JSON", err);
    }
  }
  assertBundle(value);
  return value;
}

function isResourceOfType<K extends ResourceType>(resource: FhirResource, type: K): resource is ResourceOfType<K> {
  return resource.resourceType === type;
}

export function resourcesOfType<K extends ResourceType>(bundle: Bundle, type: K): ResourceOfType<K>[] {
  const found: ResourceOfType<K>[] = [];
  for (const entry of bundle.entry ?? []) {
    const resource = entry?.resource;
    if (resource && typeof resource === "object" && isResourceOfType(resource, type)) {
      found.push(resource);
    }
  }
  return found;
}

function nonBlank(value: string | undefined | null): string | null {
  if (typeof value !== "string") return null;
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : null;
}

/** Null for display-only codings, which cannot be resolved. */
export function codingToClinicalCode(coding: Coding, sourceDisplay = nonBlank(coding.display)): ClinicalCode | null {
  const code = nonBlank(coding.code);
  if (!code) return null;
  return {
    code,
    codeSystemOid: oidForSystemUri(nonBlank(coding.system) ?? ""),
    sourceDisplay,
  };
}

/**
 * Codes of a CodeableConcept. The primary code takes concept.text as its
 * source display, then its own coding display.
 */
export function readCodeableConcept(concept: CodeableConcept | undefined): ConceptCodes {
  const codings = concept?.coding ?? [];
  const text = nonBlank(concept?.text) ?? codings.map((coding) => nonBlank(coding.display)).find((d) => d !== null) ?? null;

  const codes: ClinicalCode[] = [];
  for (const coding of codings) {
    const isFirst = codes.length === 0;
    const code = codingToClinicalCode(coding, isFirst ? nonBlank(concept?.text) ?? nonBlank(coding.display) : undefined);
    if (code) codes.push(code);
  }

  return { primary: codes[0] ?? null, codes, text };
}

/** Codes of several concepts flattened, e.g. reaction manifestations. */
export function codesOf(concepts: readonly (CodeableConcept | undefined)[]): ClinicalCode[] {
  return concepts.flatMap((concept) => readCodeableConcept(concept).codes);
}

/** The first plain code of a status-like concept, e.g. clinicalStatus. */
export function firstCode(concept: CodeableConcept | undefined): string | null {
  for (const coding of concept?.coding ?? []) {
    const code = nonBlank(coding.code);
    if (code) return code;
  }
  return null;
}

export function referenceTo(resource: FhirResource): string {
  return `${resource.resourceType}/${resource.id ?? ""}`;
}

/**
 * Finds the target of a reference: `#id` in the contained list, otherwise a
 * bundle entry by `Type/id` or fullUrl.
 */
export function resolveReference<K extends ResourceType>(
  bundle: Bundle,
  reference: Reference | undefined,
  type: K,
  contained: readonly FhirResource[] = []
): ResourceOfType<K> | null {
  const target = nonBlank(reference?.reference);
  if (!target) return null;

  if (target.startsWith("#")) {
    const id = target.slice(1);
    const match = contained.find((resource) => resource.id === id);
    return match && isResourceOfType(match, type) ? match : null;
  }

  for (const entry of bundle.entry ?? []) {
    const resource = entry?.resource;
    if (!resource || !isResourceOfType(resource, type)) continue;
    if (entry.fullUrl === target || referenceTo(resource) === target || target.endsWith(`/${referenceTo(resource)}`)) {
      return resource;
    }
  }
  return null;
}

export function firstString(...values: (string | undefined | null)[]): string | null {
  for (const value of values) {
    const candidate = nonBlank(value);
    if (candidate) return candidate;
  }
  return null;
}
