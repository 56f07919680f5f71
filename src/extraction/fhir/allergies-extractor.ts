import type { AllergyIntolerance, Bundle } from "fhir/r4";
import type { EntryDraft, ExtractorContext } from "../section-builder.js";
import { SECTION_DEFINITIONS } from "../section-definitions.js";
import { allergySeverity } from "../severity.js";
import { codesOf, firstCode, firstString, readCodeableConcept, resourcesOfType } from "./fhir-bundle.js";
import { FhirSectionExtractor } from "./fhir-extractor.js";

export class FhirAllergiesExtractor extends FhirSectionExtractor<AllergyIntolerance> {
  constructor(ctx: ExtractorContext) {
    super(SECTION_DEFINITIONS.allergies, ctx);
  }

  protected resources(bundle: Bundle): AllergyIntolerance[] {
    return resourcesOfType(bundle, "AllergyIntolerance");
  }

  protected toDraft(allergy: AllergyIntolerance, _bundle: Bundle): EntryDraft {
    const substance = readCodeableConcept(allergy.code);
    const reactions = allergy.reaction ?? [];

    return {
      ...this.identity(allergy),
      primaryCode: substance.primary,
      primaryText: substance.text,
      additionalCodes: [
        ...substance.codes,
        ...reactions.flatMap((reaction) => codesOf([reaction.substance, ...(reaction.manifestation ?? [])])),
      ],
      clinicalStatus: firstCode(allergy.clinicalStatus),
      verificationStatus: firstCode(allergy.verificationStatus),
      onsetDate: firstString(allergy.onsetDateTime, allergy.onsetPeriod?.start, allergy.onsetString),
      recordedDate: firstString(allergy.recordedDate),
      severity: allergySeverity(
        reactions.map((reaction) => reaction.severity),
        allergy.criticality
      ),
      category: firstString(allergy.category?.[0]),
      notes: (allergy.note ?? []).map((note) => note.text),
    };
  }
}
