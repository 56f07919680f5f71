import type { ClinicalCode } from "../../terminology/types.js";
import type { EntryDraft, ExtractorContext } from "../section-builder.js";
import { SECTION_DEFINITIONS } from "../section-definitions.js";
import { allergySeverity, criticalityOf, severityOf } from "../severity.js";
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

interface AllergyStatement {
  act: XmlElement | null;
  observation: XmlElement;
}

const CATEGORY_BY_TYPE: Record<string, string> = {
  "414285001": "food",
  "235719002": "food",
  "416098002": "medication",
  "59037007": "medication",
  "419511003": "medication",
  "426232007": "environment",
};

const SEVERITY_CODE = "SEV";
const STATUS_CODE = "33999-4";
const CRITICALITY_CODE = "82606-5";

/**
 * Allergy concern acts and the intolerance observations inside them. The
 * agent (playingEntity code) is the primary concept; the allergy type, the
 * reaction manifestations and any translations ride along as extra concepts.
 */
export class CdaAllergiesExtractor extends CdaSectionExtractor<AllergyStatement> {
  constructor(ctx: ExtractorContext) {
    super(SECTION_DEFINITIONS.allergies, ctx);
  }

  protected statements(section: CdaSection): AllergyStatement[] {
    const fromActs = sectionEntries(section, "act").flatMap((act) => {
      const observations = related(act, "observation", "SUBJ");
      return observations.map((observation) => ({ act, observation }));
    });
    const direct = sectionEntries(section, "observation").map((observation) => ({ act: null, observation }));
    return [...fromActs, ...direct];
  }

  protected toDraft({ act, observation }: AllergyStatement, section: CdaSection): EntryDraft {
    const agent = path(observation, "participant", "participantRole", "playingEntity");
    const agentCode = readCode(child(agent, "code"), section);
    const typeCode = readCode(child(observation, "value"), section);

    const reactions = related(observation, "observation", "MFST");
    const reactionCodes = reactions
      .map((reaction) => readCode(child(reaction, "value"), section))
      .filter((code): code is ClinicalCode => code !== null);

    const severity = allergySeverity(
      [observation, ...reactions].map((element) => severityOf(relatedValueCode(element, SEVERITY_CODE))),
      criticalityOf(relatedValueCode(observation, CRITICALITY_CODE))
    );

    const agentName = textContent(child(agent, "name"));

    return {
      ...this.identity(observation, act),
      // a named agent without a code still outranks the allergy type
      primaryCode: agentCode ?? (agentName ? null : typeCode),
      primaryText: agentName || null,
      additionalCodes: [...readTranslations(child(agent, "code")), ...(typeCode ? [typeCode] : []), ...reactionCodes],
      clinicalStatus: clinicalStatusOf(relatedValueCode(observation, STATUS_CODE), this.statusCode(act)),
      verificationStatus: attr(observation, "negationInd") === "true" ? "refuted" : null,
      onsetDate: readEffectiveTime(observation),
      recordedDate: readTimestamp(attr(path(observation, "author", "time"), "value")) ?? readEffectiveTime(act),
      severity,
      category: typeCode ? CATEGORY_BY_TYPE[typeCode.code] ?? null : null,
      notes: [],
    };
  }
}
