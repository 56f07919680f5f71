import type { Bundle, CodeableConcept, Dosage, MedicationRequest, MedicationStatement, Reference } from "fhir/r4";
import type { ClinicalCode } from "../../terminology/types.js";
import type { EntryDraft, ExtractorContext } from "../section-builder.js";
import { SECTION_DEFINITIONS } from "../section-definitions.js";
import { firstCode, firstString, readCodeableConcept, resolveReference, resourcesOfType, type ConceptCodes } from "./fhir-bundle.js";
import { FhirSectionExtractor } from "./fhir-extractor.js";

type MedicationUse = MedicationStatement | MedicationRequest;

/**
 * MedicationStatement and MedicationRequest. The drug comes from
 * medicationCodeableConcept or from the Medication that medicationReference
 * points at (contained or elsewhere in the bundle).
 */
export class FhirMedicationsExtractor extends FhirSectionExtractor<MedicationUse> {
  constructor(ctx: ExtractorContext) {
    super(SECTION_DEFINITIONS.medications, ctx);
  }

  protected resources(bundle: Bundle): MedicationUse[] {
    return [...resourcesOfType(bundle, "MedicationStatement"), ...resourcesOfType(bundle, "MedicationRequest")];
  }

  protected toDraft(use: MedicationUse, bundle: Bundle): EntryDraft {
    const drug = this.drug(use, bundle);
    const dosage: Dosage | undefined =
      use.resourceType === "MedicationStatement" ? use.dosage?.[0] : use.dosageInstruction?.[0];
    const extraCodes: ClinicalCode[] = [
      ...readCodeableConcept(dosage?.route).codes,
      ...readCodeableConcept(dosage?.doseAndRate?.[0]?.type).codes,
    ];

    const started =
      use.resourceType === "MedicationStatement"
        ? firstString(use.effectiveDateTime, use.effectivePeriod?.start)
        : firstString(use.dispenseRequest?.validityPeriod?.start, use.authoredOn);
    const recorded = use.resourceType === "MedicationStatement" ? firstString(use.dateAsserted) : firstString(use.authoredOn);

    return {
      ...this.identity(use),
      primaryCode: drug.primary,
      primaryText: drug.text,
      additionalCodes: [...drug.codes, ...extraCodes],
      clinicalStatus: firstString(use.status),
      onsetDate: started,
      recordedDate: recorded,
      category: use.resourceType === "MedicationStatement" ? firstCode(use.category) : firstCode(use.category?.[0]),
      notes: dosage?.text ? [`Dosage: ${dosage.text}`] : [],
    };
  }

  private drug(use: MedicationUse, bundle: Bundle): ConceptCodes {
    const concept: CodeableConcept | undefined = use.medicationCodeableConcept;
    if (concept) return readCodeableConcept(concept);

    const reference: Reference | undefined = use.medicationReference;
    const medication = resolveReference(bundle, reference, "Medication", use.contained ?? []);
    if (medication) return readCodeableConcept(medication.code);

    return { primary: null, codes: [], text: firstString(reference?.display) };
  }
}
