import type { DisplayConfig } from "../mapping/types.js";

export type SectionId =
  | "allergies"
  | "conditions"
  | "immunizations"
  | "medications"
  | "observations"
  | "procedures";

export interface SectionDefinition {
  sectionId: SectionId;
  title: string;
  /** LOINC section code. */
  sectionCode: string;
  alternateCodes: readonly string[];
  cdaTemplateIds: readonly string[];
  columns: readonly string[];
  displayConfig: DisplayConfig;
}

const STATUS_COLORS = {
  active: "danger",
  inactive: "secondary",
  resolved: "success",
};

function displayConfig(overrides: Partial<DisplayConfig>): DisplayConfig {
  return {
    showTimeline: true,
    showSeverity: false,
    showStatus: true,
    enableFiltering: true,
    severityColors: {},
    statusColors: {},
    ...overrides,
  };
}

export const SECTION_DEFINITIONS: Readonly<Record<SectionId, SectionDefinition>> = {
  allergies: {
    sectionId: "allergies",
    title: "Allergies and Intolerances",
    sectionCode: "48765-2",
    alternateCodes: ["10155-0"],
    cdaTemplateIds: [
      "2.16.840.1.113883.10.20.22.2.6.1",
      "2.16.840.1.113883.10.20.22.2.6",
      "1.3.6.1.4.1.12559.11.10.1.3.1.2.4",
    ],
    columns: ["displayText", "category", "severity", "clinicalStatus", "onsetDate"],
    displayConfig: displayConfig({
      showSeverity: true,
      severityColors: { high: "danger", severe: "danger", moderate: "warning", low: "warning", mild: "info" },
      statusColors: STATUS_COLORS,
    }),
  },
  conditions: {
    sectionId: "conditions",
    title: "Problem List",
    sectionCode: "11450-4",
    alternateCodes: [],
    cdaTemplateIds: [
      "2.16.840.1.113883.10.20.22.2.5.1",
      "2.16.840.1.113883.10.20.22.2.5",
      "1.3.6.1.4.1.12559.11.10.1.3.1.2.3",
    ],
    columns: ["displayText", "clinicalStatus", "verificationStatus", "severity", "onsetDate"],
    displayConfig: displayConfig({
      showSeverity: true,
      severityColors: { severe: "danger", moderate: "warning", mild: "info" },
      statusColors: { ...STATUS_COLORS, remission: "info", recurrence: "warning" },
    }),
  },
  immunizations: {
    sectionId: "immunizations",
    title: "Immunizations",
    sectionCode: "11369-6",
    alternateCodes: [],
    cdaTemplateIds: ["2.16.840.1.113883.10.20.22.2.2.1", "2.16.840.1.113883.10.20.22.2.2"],
    columns: ["displayText", "onsetDate", "clinicalStatus", "notes"],
    displayConfig: displayConfig({
      enableFiltering: false,
      statusColors: { completed: "success", "not-done": "secondary", "entered-in-error": "secondary" },
    }),
  },
  medications: {
    sectionId: "medications",
    title: "Medication Summary",
    sectionCode: "10160-0",
    alternateCodes: [],
    cdaTemplateIds: [
      "2.16.840.1.113883.10.20.22.2.1.1",
      "2.16.840.1.113883.10.20.22.2.1",
      "1.3.6.1.4.1.12559.11.10.1.3.1.2.1",
    ],
    columns: ["displayText", "clinicalStatus", "onsetDate", "notes"],
    displayConfig: displayConfig({
      statusColors: { active: "success", completed: "secondary", stopped: "danger", "on-hold": "warning" },
    }),
  },
  observations: {
    sectionId: "observations",
    title: "Results",
    sectionCode: "30954-2",
    alternateCodes: [],
    cdaTemplateIds: ["2.16.840.1.113883.10.20.22.2.3.1", "2.16.840.1.113883.10.20.22.2.3"],
    columns: ["displayText", "value", "severity", "recordedDate"],
    displayConfig: displayConfig({ showStatus: false }),
  },
  procedures: {
    sectionId: "procedures",
    title: "History of Procedures",
    sectionCode: "47519-4",
    alternateCodes: [],
    cdaTemplateIds: ["2.16.840.1.113883.10.20.22.2.7.1", "2.16.840.1.113883.10.20.22.2.7"],
    columns: ["displayText", "onsetDate", "clinicalStatus", "category"],
    displayConfig: displayConfig({
      statusColors: { completed: "success", "in-progress": "info", "not-done": "secondary" },
    }),
  },
};

export const SECTION_IDS: readonly SectionId[] = [
  "allergies",
  "conditions",
  "immunizations",
  "medications",
  "observations",
  "procedures",
];
