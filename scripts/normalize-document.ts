/**
 * Normalizes one CDA or FHIR document against the configured catalogue and
 * prints the resulting sections.
 *
 * Usage:
 *   npx tsx scripts/normalize-document.ts CDA path/to/document.xml
 *   npx tsx scripts/normalize-document.ts FHIR path/to/bundle.json
 */

import { promises as fs } from "fs";
import { loadConfig } from "../src/config/index.js";
import { createConceptStore, createEngine } from "../src/engine.js";
import type { SourceType } from "../src/mapping/types.js";

function parseSourceType(value: string | undefined): SourceType | null {
  const upper = value?.toUpperCase();
  return upper === "CDA" || upper === "FHIR" ? upper : null;
}

async function normalizeDocument(): Promise<void> {
  const sourceType = parseSourceType(process.argv[2]);
  const path = process.argv[3];
  if (!sourceType || !path) {
    console.error("Usage: normalize-document.ts <CDA|FHIR> <path>");
    process.exitCode = 2;
    return;
  }

  const config = loadConfig();
  const store = await createConceptStore(config);
  const engine = createEngine({ config: config.engine, store });

  const document = await fs.readFile(path, "utf8");
  const { result, quality } = await engine.process(document, sourceType);

  for (const section of result.sections) {
    console.log(`\n${section.title} [${section.sectionId}] ${section.entryCount} entries`);
    for (const entry of section.entries) {
      const status = entry.clinicalStatus ? ` (${entry.clinicalStatus})` : "";
      console.log(`  - ${entry.displayText}${status}`);
      for (const term of entry.codedConcepts) {
        console.log(`      ${term.code} ${term.codeSystemOid}: ${term.display} [${term.provenance}]`);
      }
    }
  }

  if (result.failedSectionIds.length > 0) {
    console.log(`\nFailed sections: ${result.failedSectionIds.join(", ")}`);
  }
  const percentage = quality.percentage === null ? "n/a" : `${quality.percentage}%`;
  console.log(`\nTranslation quality: ${quality.level} (${percentage}, ${quality.resolvedConcepts}/${quality.totalConcepts})`);
}

normalizeDocument().catch((err: unknown) => {
  console.error("Normalization failed:", err);
  process.exitCode = 1;
});
