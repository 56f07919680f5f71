import type { NormalizedSection, SectionExtractor } from "../../mapping/types.js";
import { componentLogger } from "../../observability/logger.js";
import { buildSection, collectEntries, type EntryDraft, type ExtractorContext } from "../section-builder.js";
import type { SectionDefinition } from "../section-definitions.js";
import {
  attr,
  child,
  entryReference,
  findSections,
  readIdentifier,
  type CdaDocument,
  type CdaSection,
  type XmlElement,
} from "./cda-document.js";

const logger = componentLogger("extraction");

interface CdaItem<T> {
  statement: T;
  section: CdaSection;
}

const PROBLEM_STATUS: Record<string, string> = {
  "55561003": "active",
  "73425007": "inactive",
  "413322009": "resolved",
};

const ACT_STATUS: Record<string, string> = {
  active: "active",
  suspended: "inactive",
  aborted: "inactive",
  completed: "resolved",
};

/** Status observation value (SNOMED) first, concern act statusCode second. */
export function clinicalStatusOf(statusValueCode: string | null, actStatusCode: string | null): string | null {
  if (statusValueCode && PROBLEM_STATUS[statusValueCode]) return PROBLEM_STATUS[statusValueCode] ?? null;
  if (actStatusCode) return ACT_STATUS[actStatusCode.toLowerCase()] ?? null;
  return null;
}

/**
 * Shared walk for CDA sections: find every matching section, pull its
 * clinical statements and hand each one to `toDraft`.
 */
export abstract class CdaSectionExtractor<T = XmlElement> implements SectionExtractor<CdaDocument> {
  readonly dataSource = "CDA" as const;

  constructor(
    protected readonly definition: SectionDefinition,
    protected readonly ctx: ExtractorContext
  ) {}

  get sectionId(): string {
    return this.definition.sectionId;
  }

  async extract(document: CdaDocument): Promise<NormalizedSection> {
    const sections = findSections(document, {
      templateIds: this.definition.cdaTemplateIds,
      codes: [this.definition.sectionCode, ...this.definition.alternateCodes],
    });
    const items: CdaItem<T>[] = sections.flatMap((section) =>
      this.statements(section).map((statement) => ({ statement, section }))
    );

    logger.debug({ sectionId: this.sectionId, sections: sections.length, statements: items.length }, "CDA section scan");

    const entries = await collectEntries(items, this.definition, this.dataSource, this.ctx, ({ statement, section }) =>
      this.toDraft(statement, section)
    );
    return buildSection(this.definition, this.dataSource, entries);
  }

  protected abstract statements(section: CdaSection): T[];

  protected abstract toDraft(statement: T, section: CdaSection): EntryDraft;

  /** Entry id and source reference from the first candidate carrying an `id`. */
  protected identity(...candidates: (XmlElement | null)[]): Pick<EntryDraft, "entryId" | "sourceReference"> {
    let entryId: string | null = null;
    for (const candidate of candidates) {
      entryId = readIdentifier(child(candidate, "id"));
      if (entryId) break;
    }
    return { entryId, sourceReference: entryReference(entryId ?? "") };
  }

  protected statusCode(element: XmlElement | null): string | null {
    const code = attr(child(element, "statusCode"), "code");
    return code ? code.toLowerCase() : null;
  }
}
