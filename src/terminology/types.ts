/** Where the display text of a resolved term came from. */
export type Provenance = "SourceDisplay" | "Translation" | "DefaultDisplay" | "Fallback";

/** A code exactly as it appears in the source document. */
export interface ClinicalCode {
  readonly code: string;
  readonly codeSystemOid: string;
  readonly sourceDisplay: string | null;
}

export type ConceptStatus = "active" | "inactive";

export interface ConceptRecord {
  readonly code: string;
  readonly codeSystemOid: string;
  readonly status: ConceptStatus;
  readonly defaultDisplay: string;
  /** OID of the value set the concept was catalogued under, when known. */
  readonly valueSetOid: string | null;
}

export interface ConceptTranslation {
  readonly conceptRef: { code: string; codeSystemOid: string };
  readonly language: string;
  readonly country: string | null;
  readonly translatedDisplay: string;
}

export interface ResolvedTerm {
  readonly code: string;
  readonly codeSystemOid: string;
  readonly display: string;
  readonly provenance: Provenance;
}

/**
 * Read-only view of the externally maintained terminology catalogue.
 * Implementations return null for "not found" and reject only on backend errors.
 */
export interface ConceptStore {
  findConcept(code: string, codeSystemOid: string): Promise<ConceptRecord | null>;
  findConceptByValueSet(code: string, valueSetOid: string): Promise<ConceptRecord | null>;
  findTranslation(concept: ConceptRecord, language: string, country?: string | null): Promise<string | null>;
}
