import type { ClinicalCode } from "../../terminology/types.js";
import type { EntryDraft, ExtractorContext } from "../section-builder.js";
import { SECTION_DEFINITIONS } from "../section-definitions.js";
import {
  attr,
  child,
  path,
  readCode,
  readEffectiveTime,
  readTranslations,
  related,
  sectionEntries,
  textContent,
  type CdaSection,
  type XmlElement,
} from "./cda-document.js";
import { CdaSectionExtractor } from "./cda-extractor.js";

export class CdaImmunizationsExtractor extends CdaSectionExtractor {
  constructor(ctx: ExtractorContext) {
    super(SECTION_DEFINITIONS.immunizations, ctx);
  }

  protected statements(section: CdaSection): XmlElement[] {
    return sectionEntries(section, "substanceAdministration");
  }

  protected toDraft(administration: XmlElement, section: CdaSection): EntryDraft {
    const material = path(administration, "consumable", "manufacturedProduct", "manufacturedMaterial");
    const vaccineCode = child(material, "code");

    // target diseases are coded values of nested observations
    const targetDiseases = related(administration, "observation")
      .map((observation) => readCode(child(observation, "value"), section))
      .filter((code): code is ClinicalCode => code !== null);

    const lot = textContent(child(material, "lotNumberText"));
    const notDone = attr(administration, "negationInd") === "true";

    return {
      ...this.identity(administration),
      primaryCode: readCode(vaccineCode, section),
      primaryText: textContent(child(material, "name")) || null,
      additionalCodes: [...readTranslations(vaccineCode), ...targetDiseases],
      clinicalStatus: notDone ? "not-done" : this.statusCode(administration),
      onsetDate: readEffectiveTime(administration),
      notes: lot ? [`Lot: ${lot}`] : [],
    };
  }
}
