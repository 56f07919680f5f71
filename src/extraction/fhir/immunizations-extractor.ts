import type { Bundle, Immunization } from "fhir/r4";
import type { EntryDraft, ExtractorContext } from "../section-builder.js";
import { SECTION_DEFINITIONS } from "../section-definitions.js";
import { codesOf, firstString, readCodeableConcept, resourcesOfType } from "./fhir-bundle.js";
import { FhirSectionExtractor } from "./fhir-extractor.js";

export class FhirImmunizationsExtractor extends FhirSectionExtractor<Immunization> {
  constructor(ctx: ExtractorContext) {
    super(SECTION_DEFINITIONS.immunizations, ctx);
  }

  protected resources(bundle: Bundle): Immunization[] {
    return resourcesOfType(bundle, "Immunization");
  }

  protected toDraft(immunization: Immunization, _bundle: Bundle): EntryDraft {
    const vaccine = readCodeableConcept(immunization.vaccineCode);
    const targetDiseases = (immunization.protocolApplied ?? []).flatMap((protocol) => codesOf(protocol.targetDisease ?? []));
    const lot = firstString(immunization.lotNumber);

    return {
      ...this.identity(immunization),
      primaryCode: vaccine.primary,
      primaryText: vaccine.text,
      additionalCodes: [...vaccine.codes, ...targetDiseases, ...readCodeableConcept(immunization.route).codes],
      clinicalStatus: firstString(immunization.status),
      onsetDate: firstString(immunization.occurrenceDateTime, immunization.occurrenceString),
      recordedDate: firstString(immunization.recorded),
      notes: lot ? [`Lot: ${lot}`] : [],
    };
  }
}
