import type { EntryDraft, ExtractorContext } from "../section-builder.js";
import { SECTION_DEFINITIONS } from "../section-definitions.js";
import {
  child,
  readCode,
  readEffectiveTime,
  readTranslations,
  sectionEntries,
  textContent,
  type CdaSection,
  type XmlElement,
} from "./cda-document.js";
import { CdaSectionExtractor } from "./cda-extractor.js";

export class CdaProceduresExtractor extends CdaSectionExtractor {
  constructor(ctx: ExtractorContext) {
    super(SECTION_DEFINITIONS.procedures, ctx);
  }

  protected statements(section: CdaSection): XmlElement[] {
    return sectionEntries(section, "procedure");
  }

  protected toDraft(procedure: XmlElement, section: CdaSection): EntryDraft {
    const code = child(procedure, "code");
    const targetSite = readCode(child(procedure, "targetSiteCode"), section);

    return {
      ...this.identity(procedure),
      primaryCode: readCode(code, section),
      primaryText: textContent(child(procedure, "text")) || null,
      additionalCodes: [...readTranslations(code), ...(targetSite ? [targetSite] : [])],
      clinicalStatus: this.statusCode(procedure),
      onsetDate: readEffectiveTime(procedure),
    };
  }
}
