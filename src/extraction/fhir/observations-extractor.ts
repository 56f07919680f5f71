import type { Bundle, Observation, Quantity } from "fhir/r4";
import type { ClinicalCode } from "../../terminology/types.js";
import type { EntryDraft, ExtractorContext } from "../section-builder.js";
import { SECTION_DEFINITIONS } from "../section-definitions.js";
import { firstCode, firstString, readCodeableConcept, resourcesOfType } from "./fhir-bundle.js";
import { FhirSectionExtractor } from "./fhir-extractor.js";

/** "7.2 mmol/L"; unit falls back to the UCUM code. */
export function formatQuantity(quantity: Quantity | undefined): string | null {
  if (quantity?.value === undefined) return null;
  const unit = firstString(quantity.unit, quantity.code);
  const comparator = quantity.comparator ?? "";
  return unit ? `${comparator}${quantity.value} ${unit}` : `${comparator}${quantity.value}`;
}

function valueText(observation: Observation): string | null {
  if (observation.valueQuantity) return formatQuantity(observation.valueQuantity);
  if (observation.valueCodeableConcept) return readCodeableConcept(observation.valueCodeableConcept).text;
  if (observation.valueString !== undefined) return firstString(observation.valueString);
  if (observation.valueBoolean !== undefined) return observation.valueBoolean ? "true" : "false";
  if (observation.valueInteger !== undefined) return String(observation.valueInteger);
  return null;
}

export class FhirObservationsExtractor extends FhirSectionExtractor<Observation> {
  constructor(ctx: ExtractorContext) {
    super(SECTION_DEFINITIONS.observations, ctx);
  }

  protected resources(bundle: Bundle): Observation[] {
    return resourcesOfType(bundle, "Observation");
  }

  protected toDraft(observation: Observation, _bundle: Bundle): EntryDraft {
    const measured = readCodeableConcept(observation.code);
    const value = readCodeableConcept(observation.valueCodeableConcept);
    const interpretations = (observation.interpretation ?? []).map((interpretation) => readCodeableConcept(interpretation));

    return {
      ...this.identity(observation),
      primaryCode: measured.primary,
      primaryText: measured.text,
      additionalCodes: [
        ...measured.codes,
        ...value.codes,
        ...interpretations.flatMap((interpretation) => interpretation.codes),
      ],
      clinicalStatus: firstString(observation.status),
      recordedDate: firstString(observation.effectiveDateTime, observation.effectivePeriod?.start, observation.issued),
      category: firstCode(observation.category?.[0]),
      value: valueText(observation),
      valueCode: value.primary,
      interpretationCodes: interpretations
        .map((interpretation) => interpretation.primary)
        .filter((code): code is ClinicalCode => code !== null),
      // uncoded interpretations keep their text
      notes: interpretations.flatMap((interpretation) =>
        interpretation.primary === null && interpretation.text !== null ? [`Interpretation: ${interpretation.text}`] : []
      ),
    };
  }
}
