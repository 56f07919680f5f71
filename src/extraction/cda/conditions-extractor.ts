import type { EntryDraft, ExtractorContext } from "../section-builder.js";
import { SECTION_DEFINITIONS } from "../section-definitions.js";
import { severityOf } from "../severity.js";
import {
  attr,
  child,
  path,
  readCode,
  readEffectiveTime,
  readTimestamp,
  readTranslations,
  related,
  relatedValueCode,
  sectionEntries,
  textContent,
  type CdaSection,
  type XmlElement,
} from "./cda-document.js";
import { CdaSectionExtractor, clinicalStatusOf } from "./cda-extractor.js";

interface ProblemStatement {
  act: XmlElement | null;
  observation: XmlElement;
}

// problem observation code/@code
const DIAGNOSIS_CODES = new Set(["282291009", "29308-4"]);

export class CdaConditionsExtractor extends CdaSectionExtractor<ProblemStatement> {
  constructor(ctx: ExtractorContext) {
    super(SECTION_DEFINITIONS.conditions, ctx);
  }

  protected statements(section: CdaSection): ProblemStatement[] {
    const fromActs = sectionEntries(section, "act").flatMap((act) =>
      related(act, "observation", "SUBJ").map((observation) => ({ act, observation }))
    );
    const direct = sectionEntries(section, "observation").map((observation) => ({ act: null, observation }));
    return [...fromActs, ...direct];
  }

  protected toDraft({ act, observation }: ProblemStatement, section: CdaSection): EntryDraft {
    const value = child(observation, "value");
    const problemType = attr(child(observation, "code"), "code");

    return {
      ...this.identity(observation, act),
      primaryCode: readCode(value, section),
      primaryText: textContent(child(observation, "text")) || null,
      additionalCodes: readTranslations(value),
      clinicalStatus: clinicalStatusOf(relatedValueCode(observation, "33999-4"), this.statusCode(act)),
      verificationStatus: attr(observation, "negationInd") === "true" ? "refuted" : null,
      onsetDate: readEffectiveTime(observation),
      recordedDate: readTimestamp(attr(path(observation, "author", "time"), "value")),
      severity: severityOf(relatedValueCode(observation, "SEV")),
      category: problemType && DIAGNOSIS_CODES.has(problemType) ? "encounter-diagnosis" : "problem-list-item",
      notes: [],
    };
  }
}
