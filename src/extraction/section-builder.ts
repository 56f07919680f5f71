import { AuditLogger } from "../audit/audit-logger.js";
import { MalformedSourceElementError } from "../errors.js";
import type { ClinicalSectionEntry, DataSource, NormalizedSection } from "../mapping/types.js";
import { sectionEntriesSkippedTotal } from "../observability/metrics.js";
import { isRegistered } from "../terminology/code-systems.js";
import type { TerminologyResolver } from "../terminology/resolver.js";
import type { ClinicalCode, ResolvedTerm } from "../terminology/types.js";
import { sanitizeDisplay } from "../validation/section-validator.js";
import type { SectionDefinition } from "./section-definitions.js";

export interface ExtractorContext {
  resolver: Pick<TerminologyResolver, "resolveClinicalCode">;
  auditLogger: AuditLogger;
}

/**
 * What an extractor reads out of one source element before terminology
 * resolution. Optional fields default to null / empty.
 */
export interface EntryDraft {
  entryId: string | null;
  primaryCode: ClinicalCode | null;
  /** Display text for a primary concept that carries text but no code. */
  primaryText?: string | null;
  additionalCodes?: ClinicalCode[];
  clinicalStatus?: string | null;
  verificationStatus?: string | null;
  onsetDate?: string | null;
  recordedDate?: string | null;
  severity?: string | null;
  category?: string | null;
  /** Plain value text, used when the value is not coded. */
  value?: string | null;
  /** A coded value; the entry's value becomes its resolved display. */
  valueCode?: ClinicalCode | null;
  /** Each one becomes an "Interpretation: <display>" note. */
  interpretationCodes?: ClinicalCode[];
  notes?: string[];
  sourceReference: string;
}

function termKey(code: ClinicalCode): string {
  return `${code.codeSystemOid}|${code.code}`;
}

function nonBlank(value: string | null | undefined): string | null {
  if (value === null || value === undefined) return null;
  const cleaned = sanitizeDisplay(value);
  return cleaned.length > 0 ? cleaned : null;
}

/**
 * Builds one entry. Throws MalformedSourceElementError when the element has
 * no identifier or no primary concept at all.
 */
export async function createEntry(draft: EntryDraft, ctx: ExtractorContext): Promise<ClinicalSectionEntry> {
  const entryId = nonBlank(draft.entryId);
  if (!entryId) {
    throw new MalformedSourceElementError("id", null);
  }

  const primaryText = nonBlank(draft.primaryText);
  const primaryCode = draft.primaryCode && draft.primaryCode.code.trim().length > 0 ? draft.primaryCode : null;
  if (!primaryCode && !primaryText) {
    throw new MalformedSourceElementError("code", entryId);
  }

  const valueCode = draft.valueCode && draft.valueCode.code.trim().length > 0 ? draft.valueCode : null;
  const interpretationCodes = (draft.interpretationCodes ?? []).filter((code) => code.code.trim().length > 0);

  const codes: ClinicalCode[] = [];
  const seen = new Set<string>();
  for (const code of [primaryCode, ...(draft.additionalCodes ?? []), valueCode, ...interpretationCodes]) {
    if (!code || code.code.trim().length === 0) continue;
    const key = termKey(code);
    if (seen.has(key)) continue;
    seen.add(key);
    codes.push(code);
  }

  const codedConcepts: ResolvedTerm[] = [];
  const resolvedByKey = new Map<string, ResolvedTerm>();
  for (const code of codes) {
    const resolved = await ctx.resolver.resolveClinicalCode(code);
    codedConcepts.push(resolved);
    resolvedByKey.set(termKey(code), resolved);
  }
  const displayOf = (code: ClinicalCode): string | null => resolvedByKey.get(termKey(code))?.display ?? null;

  const primaryTerm = primaryCode ? codedConcepts[0] : undefined;
  const displayText = primaryTerm?.display ?? primaryText ?? entryId;
  const value = (valueCode ? displayOf(valueCode) : null) ?? draft.value;

  const notes = [
    ...interpretationCodes.map((code) => `Interpretation: ${displayOf(code) ?? code.code}`),
    ...(draft.notes ?? []),
  ]
    .map((note) => sanitizeDisplay(note))
    .filter((note) => note.length > 0);
  Object.freeze(codedConcepts);
  Object.freeze(notes);

  return Object.freeze({
    entryId,
    displayText,
    codedConcepts,
    clinicalStatus: nonBlank(draft.clinicalStatus),
    verificationStatus: nonBlank(draft.verificationStatus),
    onsetDate: nonBlank(draft.onsetDate),
    recordedDate: nonBlank(draft.recordedDate),
    severity: nonBlank(draft.severity),
    category: nonBlank(draft.category),
    value: nonBlank(value),
    notes,
    sourceReference: draft.sourceReference,
  });
}

/**
 * Turns source elements into entries one by one. A malformed element is
 * audited and skipped; anything else propagates and fails the section.
 */
export async function collectEntries<T>(
  items: readonly T[],
  definition: SectionDefinition,
  dataSource: DataSource,
  ctx: ExtractorContext,
  toDraft: (item: T) => EntryDraft
): Promise<ClinicalSectionEntry[]> {
  const entries: ClinicalSectionEntry[] = [];
  for (const item of items) {
    let draft: EntryDraft | null = null;
    try {
      draft = toDraft(item);
      entries.push(await createEntry(draft, ctx));
    } catch (err) {
      if (!(err instanceof MalformedSourceElementError)) throw err;
      sectionEntriesSkippedTotal.inc({ section_id: definition.sectionId, data_source: dataSource });
      ctx.auditLogger.logEntrySkipped(definition.sectionId, dataSource, err, err.elementId ?? draft?.entryId ?? null);
    }
  }
  return entries;
}

export function buildSection(
  definition: SectionDefinition,
  dataSource: DataSource,
  entries: ClinicalSectionEntry[]
): NormalizedSection {
  const codedConcepts = entries.flatMap((entry) => entry.codedConcepts);
  const columns = [...definition.columns];
  Object.freeze(entries);
  Object.freeze(codedConcepts);
  Object.freeze(columns);

  return Object.freeze({
    sectionId: definition.sectionId,
    title: definition.title,
    sectionCode: definition.sectionCode,
    hasEntries: entries.length > 0,
    entryCount: entries.length,
    entries,
    columns,
    displayConfig: definition.displayConfig,
    codedConcepts,
    isCodedSection: codedConcepts.some((term) => isRegistered(term.codeSystemOid)),
    dataSource,
  });
}
