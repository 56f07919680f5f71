import type { Bundle, Procedure } from "fhir/r4";
import type { EntryDraft, ExtractorContext } from "../section-builder.js";
import { SECTION_DEFINITIONS } from "../section-definitions.js";
import { firstCode, firstString, readCodeableConcept, resourcesOfType } from "./fhir-bundle.js";
import { FhirSectionExtractor } from "./fhir-extractor.js";

export class FhirProceduresExtractor extends FhirSectionExtractor<Procedure> {
  constructor(ctx: ExtractorContext) {
    super(SECTION_DEFINITIONS.procedures, ctx);
  }

  protected resources(bundle: Bundle): Procedure[] {
    return resourcesOfType(bundle, "Procedure");
  }

  protected toDraft(procedure: Procedure, _bundle: Bundle): EntryDraft {
    const performed = readCodeableConcept(procedure.code);
    const sites = (procedure.bodySite ?? []).flatMap((site) => readCodeableConcept(site).codes);

    return {
      ...this.identity(procedure),
      primaryCode: performed.primary,
      primaryText: performed.text,
      additionalCodes: [...performed.codes, ...sites],
      clinicalStatus: firstString(procedure.status),
      onsetDate: firstString(procedure.performedDateTime, procedure.performedPeriod?.start, procedure.performedString),
      category: firstCode(procedure.category),
      notes: (procedure.note ?? []).map((note) => note.text),
    };
  }
}
