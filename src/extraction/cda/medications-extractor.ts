import type { ClinicalCode } from "../../terminology/types.js";
import type { EntryDraft, ExtractorContext } from "../section-builder.js";
import { SECTION_DEFINITIONS } from "../section-definitions.js";
import {
  attr,
  child,
  children,
  path,
  readCode,
  readTimestamp,
  readTranslations,
  sectionEntries,
  textContent,
  type CdaSection,
  type XmlElement,
} from "./cda-document.js";
import { CdaSectionExtractor } from "./cda-extractor.js";

/** Quantity as "1 tablet", or just the number when there is no unit. */
export function formatQuantity(element: XmlElement | null): string | null {
  const value = attr(element, "value");
  if (!value) return null;
  const unit = attr(element, "unit");
  return unit && unit !== "1" ? `${value} ${unit}` : value;
}

export class CdaMedicationsExtractor extends CdaSectionExtractor {
  constructor(ctx: ExtractorContext) {
    super(SECTION_DEFINITIONS.medications, ctx);
  }

  protected statements(section: CdaSection): XmlElement[] {
    return sectionEntries(section, "substanceAdministration");
  }

  protected toDraft(administration: XmlElement, section: CdaSection): EntryDraft {
    const material = path(administration, "consumable", "manufacturedProduct", "manufacturedMaterial");
    const materialCode = child(material, "code");

    const extraCodes = [
      readCode(child(administration, "routeCode"), section),
      readCode(child(administration, "administrationUnitCode"), section),
      readCode(child(material, "formCode"), section),
    ].filter((code): code is ClinicalCode => code !== null);

    // first effectiveTime is the period, later ones are frequency
    const period = children(administration, "effectiveTime")[0] ?? null;
    const start = readTimestamp(attr(period, "value") ?? attr(child(period, "low"), "value"));
    const dose = formatQuantity(child(administration, "doseQuantity"));

    return {
      ...this.identity(administration),
      primaryCode: readCode(materialCode, section),
      primaryText: textContent(child(material, "name")) || null,
      additionalCodes: [...readTranslations(materialCode), ...extraCodes],
      clinicalStatus: this.statusCode(administration),
      onsetDate: start,
      recordedDate: readTimestamp(attr(path(administration, "author", "time"), "value")),
      notes: dose ? [`Dose: ${dose}`] : [],
    };
  }
}
