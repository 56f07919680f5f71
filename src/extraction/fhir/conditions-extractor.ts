import type { Bundle, Condition } from "fhir/r4";
import type { EntryDraft, ExtractorContext } from "../section-builder.js";
import { SECTION_DEFINITIONS } from "../section-definitions.js";
import { severityOf } from "../severity.js";
import { firstCode, firstString, readCodeableConcept, resourcesOfType } from "./fhir-bundle.js";
import { FhirSectionExtractor } from "./fhir-extractor.js";

export class FhirConditionsExtractor extends FhirSectionExtractor<Condition> {
  constructor(ctx: ExtractorContext) {
    super(SECTION_DEFINITIONS.conditions, ctx);
  }

  protected resources(bundle: Bundle): Condition[] {
    return resourcesOfType(bundle, "Condition");
  }

  protected toDraft(condition: Condition, _bundle: Bundle): EntryDraft {
    const problem = readCodeableConcept(condition.code);

    return {
      ...this.identity(condition),
      primaryCode: problem.primary,
      primaryText: problem.text,
      additionalCodes: [...problem.codes, ...(condition.bodySite ?? []).flatMap((site) => readCodeableConcept(site).codes)],
      clinicalStatus: firstCode(condition.clinicalStatus),
      verificationStatus: firstCode(condition.verificationStatus),
      onsetDate: firstString(condition.onsetDateTime, condition.onsetPeriod?.start, condition.onsetString),
      recordedDate: firstString(condition.recordedDate),
      severity: severityOf(firstCode(condition.severity)),
      category: firstCode(condition.category?.[0]),
      notes: (condition.note ?? []).map((note) => note.text),
    };
  }
}
