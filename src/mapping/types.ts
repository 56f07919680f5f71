import type { ResolvedTerm } from "../terminology/types.js";

export type SourceType = "CDA" | "FHIR";
export type DataSource = SourceType;

export interface DisplayConfig {
  showTimeline: boolean;
  showSeverity: boolean;
  showStatus: boolean;
  enableFiltering: boolean;
  severityColors: Record<string, string>;
  statusColors: Record<string, string>;
}

/**
 * One clinical fact, identical in shape whichever format it came from.
 * Absent values are null, never missing keys.
 */
export interface ClinicalSectionEntry {
  entryId: string;
  displayText: string;
  codedConcepts: ResolvedTerm[];
  clinicalStatus: string | null;
  verificationStatus: string | null;
  onsetDate: string | null;
  recordedDate: string | null;
  severity: string | null;
  category: string | null;
  value: string | null;
  notes: string[];
  sourceReference: string;
}

export interface NormalizedSection {
  sectionId: string;
  title: string;
  sectionCode: string;
  hasEntries: boolean;
  entryCount: number;
  entries: ClinicalSectionEntry[];
  columns: string[];
  displayConfig: DisplayConfig;
  codedConcepts: ResolvedTerm[];
  isCodedSection: boolean;
  dataSource: DataSource;
}

export interface PipelineResult {
  sourceType: SourceType;
  sections: NormalizedSection[];
  sectionsBySectionId: Record<string, NormalizedSection>;
  sectionsCount: number;
  sectionsWithEntries: number;
  totalEntries: number;
  failedSectionIds: string[];
}

/**
 * Extracts one clinical domain from one already-parsed source document.
 */
export interface SectionExtractor<TDocument> {
  readonly sectionId: string;
  readonly dataSource: DataSource;
  extract(document: TDocument): Promise<NormalizedSection>;
}
