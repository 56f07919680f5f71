import { promises as fs } from "fs";
import { z } from "zod";
import type { ConceptRecord, ConceptStore, ConceptTranslation } from "./types.js";

const conceptSchema = z.object({
  code: z.string().min(1),
  codeSystemOid: z.string().min(1),
  status: z.enum(["active", "inactive"]).default("active"),
  defaultDisplay: z.string().min(1),
  valueSetOid: z.string().nullable().default(null),
});

const translationSchema = z.object({
  code: z.string().min(1),
  codeSystemOid: z.string().min(1),
  language: z.string().min(2),
  country: z.string().nullable().default(null),
  translatedDisplay: z.string().min(1),
});

export const catalogueSnapshotSchema = z.object({
  concepts: z.array(conceptSchema),
  translations: z.array(translationSchema).default([]),
});

export type CatalogueSnapshot = z.input<typeof catalogueSnapshotSchema>;

function conceptKey(code: string, codeSystemOid: string): string {
  return `${codeSystemOid}|${code}`;
}

/**
 * Catalogue held in memory, loaded from a snapshot of the external registry.
 */
export class InMemoryConceptStore implements ConceptStore {
  private readonly concepts = new Map<string, ConceptRecord>();
  private readonly byValueSet = new Map<string, ConceptRecord>();
  private readonly translations = new Map<string, ConceptTranslation[]>();

  constructor(snapshot: CatalogueSnapshot = { concepts: [] }) {
    const parsed = catalogueSnapshotSchema.parse(snapshot);

    for (const concept of parsed.concepts) {
      const record: ConceptRecord = Object.freeze({ ...concept });
      this.concepts.set(conceptKey(record.code, record.codeSystemOid), record);
      if (record.valueSetOid) {
        this.byValueSet.set(conceptKey(record.code, record.valueSetOid), record);
      }
    }

    for (const row of parsed.translations) {
      const key = conceptKey(row.code, row.codeSystemOid);
      const list = this.translations.get(key) ?? [];
      list.push(Object.freeze({
        conceptRef: { code: row.code, codeSystemOid: row.codeSystemOid },
        language: row.language.toLowerCase(),
        country: row.country ? row.country.toUpperCase() : null,
        translatedDisplay: row.translatedDisplay,
      }));
      this.translations.set(key, list);
    }
  }

  get size(): number {
    return this.concepts.size;
  }

  async findConcept(code: string, codeSystemOid: string): Promise<ConceptRecord | null> {
    const record = this.concepts.get(conceptKey(code, codeSystemOid));
    return record && record.status === "active" ? record : null;
  }

  async findConceptByValueSet(code: string, valueSetOid: string): Promise<ConceptRecord | null> {
    const record = this.byValueSet.get(conceptKey(code, valueSetOid));
    return record && record.status === "active" ? record : null;
  }

  async findTranslation(concept: ConceptRecord, language: string, country?: string | null): Promise<string | null> {
    const rows = this.translations.get(conceptKey(concept.code, concept.codeSystemOid));
    if (!rows) return null;
    return pickTranslation(rows, language, country ?? null);
  }
}

/**
 * Exact (language, country) row first, then the language row without a country.
 */
export function pickTranslation(
  rows: readonly Pick<ConceptTranslation, "language" | "country" | "translatedDisplay">[],
  language: string,
  country: string | null
): string | null {
  const lang = language.toLowerCase();
  const ctry = country ? country.toUpperCase() : null;

  if (ctry) {
    const exact = rows.find((row) => row.language === lang && row.country === ctry);
    if (exact) return exact.translatedDisplay;
  }
  const generic = rows.find((row) => row.language === lang && row.country === null);
  return generic ? generic.translatedDisplay : null;
}

export async function loadCatalogueFile(path: string): Promise<InMemoryConceptStore> {
  const content = await fs.readFile(path, "utf8");
  const snapshot = catalogueSnapshotSchema.parse(JSON.parse(content));
  return new InMemoryConceptStore(snapshot);
}
