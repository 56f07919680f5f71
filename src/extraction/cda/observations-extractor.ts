import type { ClinicalCode } from "../../terminology/types.js";
import type { EntryDraft, ExtractorContext } from "../section-builder.js";
import { SECTION_DEFINITIONS } from "../section-definitions.js";
import {
  attr,
  child,
  children,
  readCode,
  readEffectiveTime,
  readTranslations,
  sectionEntries,
  textContent,
  type CdaSection,
  type XmlElement,
} from "./cda-document.js";
import { CdaSectionExtractor } from "./cda-extractor.js";
import { formatQuantity } from "./medications-extractor.js";

/**
 * Result observations, standalone or grouped under a result organizer.
 */
export class CdaObservationsExtractor extends CdaSectionExtractor {
  constructor(ctx: ExtractorContext) {
    super(SECTION_DEFINITIONS.observations, ctx);
  }

  protected statements(section: CdaSection): XmlElement[] {
    const organized = sectionEntries(section, "organizer").flatMap((organizer) =>
      children(organizer, "component").flatMap((component) => children(component, "observation"))
    );
    return [...organized, ...sectionEntries(section, "observation")];
  }

  protected toDraft(observation: XmlElement, section: CdaSection): EntryDraft {
    const code = child(observation, "code");
    const value = child(observation, "value");
    const valueCode = readCode(value, section);

    const interpretations = children(observation, "interpretationCode")
      .map((interpretation) => readCode(interpretation, section))
      .filter((interpretation): interpretation is ClinicalCode => interpretation !== null);

    return {
      ...this.identity(observation),
      primaryCode: readCode(code, section),
      primaryText: textContent(child(observation, "text")) || null,
      additionalCodes: readTranslations(code),
      clinicalStatus: this.statusCode(observation),
      recordedDate: readEffectiveTime(observation),
      value: valueText(value),
      valueCode,
      interpretationCodes: interpretations,
    };
  }
}

/** PQ as "7.2 mmol/L", anything else as its text. Coded values render from their resolved term. */
function valueText(value: XmlElement | null): string | null {
  if (!value) return null;
  const quantity = formatQuantity(value);
  if (quantity) return quantity;
  const text = textContent(value);
  return text.length > 0 ? text : null;
}
