import type { Bundle } from "fhir/r4";
import { AuditLogger } from "../audit/audit-logger.js";
import { DocumentParseError, EngineError, ExtractorFailureError, errorMessage } from "../errors.js";
import { parseCdaDocument, type CdaDocument } from "../extraction/cda/cda-document.js";
import { parseFhirBundle } from "../extraction/fhir/fhir-bundle.js";
import type { ExtractorRegistry } from "../extraction/registry.js";
import type { NormalizedSection, PipelineResult, SectionExtractor, SourceType } from "../mapping/types.js";
import { componentLogger } from "../observability/logger.js";
import { pipelineDurationSeconds, sectionExtractionsTotal } from "../observability/metrics.js";
import { SectionValidator } from "../validation/section-validator.js";

const logger = componentLogger("pipeline");

export interface ProcessOptions {
  /** Restrict the run to these section ids. */
  sections?: readonly string[];
}

export interface PipelineManagerDeps {
  registry: ExtractorRegistry;
  concurrency: number;
  auditLogger?: AuditLogger;
  validator?: SectionValidator;
}

type SectionOutcome =
  | { ok: true; section: NormalizedSection }
  | { ok: false; sectionId: string };

export function emptyResult(sourceType: SourceType, failedSectionIds: string[] = []): PipelineResult {
  return assemble(sourceType, [], failedSectionIds);
}

function assemble(sourceType: SourceType, produced: NormalizedSection[], failed: string[]): PipelineResult {
  const sections = [...produced].sort((a, b) => compareIds(a.sectionId, b.sectionId));
  const failedSectionIds = [...failed].sort(compareIds);
  const sectionsBySectionId: Record<string, NormalizedSection> = {};
  for (const section of sections) {
    sectionsBySectionId[section.sectionId] = section;
  }
  Object.freeze(sections);
  Object.freeze(failedSectionIds);
  Object.freeze(sectionsBySectionId);

  return Object.freeze({
    sourceType,
    sections,
    sectionsBySectionId,
    sectionsCount: sections.length,
    sectionsWithEntries: sections.filter((section) => section.hasEntries).length,
    totalEntries: sections.reduce((sum, section) => sum + section.entryCount, 0),
    failedSectionIds,
  });
}

function compareIds(a: string, b: string): number {
  if (a < b) return -1;
  return a > b ? 1 : 0;
}

/**
 * Runs every registered extractor of one source format over one document.
 *
 * A failing extractor costs only its own section; the document itself is
 * parsed once up front and a document that cannot be parsed yields an empty
 * result. `process` never rejects.
 */
export class PipelineManager {
  private readonly registry: ExtractorRegistry;
  private readonly concurrency: number;
  private readonly auditLogger: AuditLogger;
  private readonly validator: SectionValidator;

  constructor(deps: PipelineManagerDeps) {
    this.registry = deps.registry;
    this.concurrency = Math.max(1, Math.floor(deps.concurrency));
    this.auditLogger = deps.auditLogger ?? new AuditLogger();
    this.validator = deps.validator ?? new SectionValidator();
  }

  async process(document: unknown, sourceType: SourceType, options: ProcessOptions = {}): Promise<PipelineResult> {
    const endTimer = pipelineDurationSeconds.startTimer({ data_source: sourceType });
    try {
      if (sourceType === "CDA") {
        const parsed = this.parse(sourceType, () => parseCdaDocument(typeof document === "string" ? document : ""));
        if (!parsed) return emptyResult(sourceType);
        return await this.run<CdaDocument>(sourceType, this.registry.extractorsFor("CDA"), parsed, options);
      }
      const parsed = this.parse(sourceType, () => parseFhirBundle(document));
      if (!parsed) return emptyResult(sourceType);
      return await this.run<Bundle>(sourceType, this.registry.extractorsFor("FHIR"), parsed, options);
    } catch (err) {
      logger.error({ err, sourceType }, "Pipeline run failed");
      return emptyResult(sourceType);
    } finally {
      endTimer();
    }
  }

  private parse<T>(sourceType: SourceType, parse: () => T): T | null {
    try {
      return parse();
    } catch (err) {
      const rejected = err instanceof EngineError ? err : new DocumentParseError(sourceType, errorMessage(err), err);
      this.auditLogger.logDocumentRejected(sourceType, rejected);
      return null;
    }
  }

  private async run<TDocument>(
    sourceType: SourceType,
    extractors: SectionExtractor<TDocument>[],
    document: TDocument,
    options: ProcessOptions
  ): Promise<PipelineResult> {
    const wanted = options.sections ? new Set(options.sections) : null;
    const selected = wanted ? extractors.filter((extractor) => wanted.has(extractor.sectionId)) : extractors;

    const outcomes = await this.pool(selected, (extractor) => this.runOne(sourceType, extractor, document));

    const produced: NormalizedSection[] = [];
    const failed: string[] = [];
    for (const outcome of outcomes) {
      if (outcome.ok) produced.push(outcome.section);
      else failed.push(outcome.sectionId);
    }

    const result = assemble(sourceType, produced, failed);
    logger.info(
      {
        sourceType,
        sectionsCount: result.sectionsCount,
        totalEntries: result.totalEntries,
        failedSectionIds: result.failedSectionIds,
      },
      "Document normalized"
    );
    return result;
  }

  private async runOne<TDocument>(
    sourceType: SourceType,
    extractor: SectionExtractor<TDocument>,
    document: TDocument
  ): Promise<SectionOutcome> {
    const sectionId = extractor.sectionId;
    try {
      const section = await extractor.extract(document);
      const validation = this.validator.validate(section);
      if (!validation.valid) {
        throw new Error(`invalid section: ${validation.errors.join("; ")}`);
      }
      sectionExtractionsTotal.inc({ section_id: sectionId, data_source: sourceType, outcome: "success" });
      return { ok: true, section };
    } catch (err) {
      const failure = new ExtractorFailureError(sectionId, err);
      sectionExtractionsTotal.inc({ section_id: sectionId, data_source: sourceType, outcome: "failure" });
      logger.error({ err, sectionId, sourceType }, "Section extractor failed");
      this.auditLogger.logExtractorFailure(sectionId, sourceType, failure);
      return { ok: false, sectionId };
    }
  }

  /** Runs `task` over `items` with at most `concurrency` in flight; results keep input order. */
  private async pool<T, R>(items: readonly T[], task: (item: T) => Promise<R>): Promise<R[]> {
    const results: R[] = new Array<R>(items.length);
    let next = 0;
    const worker = async (): Promise<void> => {
      while (next < items.length) {
        const index = next++;
        const item = items[index];
        if (item === undefined) continue;
        results[index] = await task(item);
      }
    };
    const workers = Array.from({ length: Math.min(this.concurrency, items.length) }, () => worker());
    await Promise.all(workers);
    return results;
  }
}
