import type { Bundle } from "fhir/r4";
import type { SectionExtractor, SourceType } from "../mapping/types.js";
import type { ExtractorContext } from "./section-builder.js";
import type { CdaDocument } from "./cda/cda-document.js";
import { CdaAllergiesExtractor } from "./cda/allergies-extractor.js";
import { CdaConditionsExtractor } from "./cda/conditions-extractor.js";
import { CdaImmunizationsExtractor } from "./cda/immunizations-extractor.js";
import { CdaMedicationsExtractor } from "./cda/medications-extractor.js";
import { CdaObservationsExtractor } from "./cda/observations-extractor.js";
import { CdaProceduresExtractor } from "./cda/procedures-extractor.js";
import { FhirAllergiesExtractor } from "./fhir/allergies-extractor.js";
import { FhirConditionsExtractor } from "./fhir/conditions-extractor.js";
import { FhirImmunizationsExtractor } from "./fhir/immunizations-extractor.js";
import { FhirMedicationsExtractor } from "./fhir/medications-extractor.js";
import { FhirObservationsExtractor } from "./fhir/observations-extractor.js";
import { FhirProceduresExtractor } from "./fhir/procedures-extractor.js";

/**
 * sectionId -> extractor, one table per source format. Registering an id
 * twice replaces the earlier extractor.
 */
export class ExtractorRegistry {
  private readonly cda = new Map<string, SectionExtractor<CdaDocument>>();
  private readonly fhir = new Map<string, SectionExtractor<Bundle>>();

  registerCda(extractor: SectionExtractor<CdaDocument>): this {
    this.cda.set(extractor.sectionId, extractor);
    return this;
  }

  registerFhir(extractor: SectionExtractor<Bundle>): this {
    this.fhir.set(extractor.sectionId, extractor);
    return this;
  }

  extractorsFor(sourceType: "CDA"): SectionExtractor<CdaDocument>[];
  extractorsFor(sourceType: "FHIR"): SectionExtractor<Bundle>[];
  extractorsFor(sourceType: SourceType): SectionExtractor<CdaDocument>[] | SectionExtractor<Bundle>[] {
    return sourceType === "CDA" ? [...this.cda.values()] : [...this.fhir.values()];
  }

  sectionIds(sourceType: SourceType): string[] {
    const table = sourceType === "CDA" ? this.cda : this.fhir;
    return [...table.keys()].sort();
  }
}

export function createExtractorRegistry(ctx: ExtractorContext): ExtractorRegistry {
  return new ExtractorRegistry()
    .registerCda(new CdaAllergiesExtractor(ctx))
    .registerCda(new CdaConditionsExtractor(ctx))
    .registerCda(new CdaImmunizationsExtractor(ctx))
    .registerCda(new CdaMedicationsExtractor(ctx))
    .registerCda(new CdaObservationsExtractor(ctx))
    .registerCda(new CdaProceduresExtractor(ctx))
    .registerFhir(new FhirAllergiesExtractor(ctx))
    .registerFhir(new FhirConditionsExtractor(ctx))
    .registerFhir(new FhirImmunizationsExtractor(ctx))
    .registerFhir(new FhirMedicationsExtractor(ctx))
    .registerFhir(new FhirObservationsExtractor(ctx))
    .registerFhir(new FhirProceduresExtractor(ctx));
}
