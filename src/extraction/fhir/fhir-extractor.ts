import type { Bundle, FhirResource } from "fhir/r4";
import type { NormalizedSection, SectionExtractor } from "../../mapping/types.js";
import { componentLogger } from "../../observability/logger.js";
import { buildSection, collectEntries, type EntryDraft, type ExtractorContext } from "../section-builder.js";
import type { SectionDefinition } from "../section-definitions.js";
import { referenceTo } from "./fhir-bundle.js";

const logger = componentLogger("extraction");

export abstract class FhirSectionExtractor<R extends FhirResource> implements SectionExtractor<Bundle> {
  readonly dataSource = "FHIR" as const;

  constructor(
    protected readonly definition: SectionDefinition,
    protected readonly ctx: ExtractorContext
  ) {}

  get sectionId(): string {
    return this.definition.sectionId;
  }

  async extract(bundle: Bundle): Promise<NormalizedSection> {
    const resources = this.resources(bundle);
    logger.debug({ sectionId: this.sectionId, resources: resources.length }, "FHIR section scan");

    const entries = await collectEntries(resources, this.definition, this.dataSource, this.ctx, (resource) =>
      this.toDraft(resource, bundle)
    );
    return buildSection(this.definition, this.dataSource, entries);
  }

  protected abstract resources(bundle: Bundle): R[];

  protected abstract toDraft(resource: R, bundle: Bundle): EntryDraft;

  protected identity(resource: R): Pick<EntryDraft, "entryId" | "sourceReference"> {
    return { entryId: resource.id ?? null, sourceReference: referenceTo(resource) };
  }
}
