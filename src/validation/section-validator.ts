import type { ClinicalSectionEntry, NormalizedSection } from "../mapping/types.js";
import { componentLogger } from "../observability/logger.js";

const logger = componentLogger("validation");

export interface ValidationResult {
  valid: boolean;
  errors: string[];
  warnings: string[];
}

export const SECTION_KEYS: readonly (keyof NormalizedSection)[] = [
  "sectionId",
  "title",
  "sectionCode",
  "hasEntries",
  "entryCount",
  "entries",
  "columns",
  "displayConfig",
  "codedConcepts",
  "isCodedSection",
  "dataSource",
];

export const ENTRY_KEYS: readonly (keyof ClinicalSectionEntry)[] = [
  "entryId",
  "displayText",
  "codedConcepts",
  "clinicalStatus",
  "verificationStatus",
  "onsetDate",
  "recordedDate",
  "severity",
  "category",
  "value",
  "notes",
  "sourceReference",
];

const MARKUP = /<[^>]*>/g;
const STRAY_BRACKETS = /[<>]/g;
// eslint-disable-next-line no-control-regex
const CONTROL_CHARS = /[\x00-\x1F\x7F]/g;

/**
 * Display text as handed to presentation: no markup, no control characters,
 * single spaces. May return an empty string; callers decide the fallback.
 */
export function sanitizeDisplay(value: string): string {
  return value
    .replace(MARKUP, " ")
    .replace(STRAY_BRACKETS, "")
    .replace(CONTROL_CHARS, " ")
    .replace(/\s+/g, " ")
    .trim();
}

function sameKeys(actual: object, expected: readonly string[]): string[] {
  const keys = Object.keys(actual);
  const missing = expected.filter((key) => !keys.includes(key));
  const extra = keys.filter((key) => !expected.includes(key));
  return [
    ...missing.map((key) => `missing ${key}`),
    ...extra.map((key) => `unexpected ${key}`),
  ];
}

/**
 * Checks a section against the shared schema before it is handed to
 * presentation: same key set on every section and entry, non-empty display
 * text on every entry and resolved term, counters consistent with entries.
 */
export class SectionValidator {
  validate(section: NormalizedSection): ValidationResult {
    const errors: string[] = [];
    const warnings: string[] = [];

    for (const problem of sameKeys(section, SECTION_KEYS)) {
      errors.push(`Section ${problem}`);
    }

    if (section.entryCount !== section.entries.length) {
      errors.push(`entryCount ${section.entryCount} does not match ${section.entries.length} entries`);
    }
    if (section.hasEntries !== section.entries.length > 0) {
      errors.push("hasEntries does not match entries");
    }

    section.entries.forEach((entry, index) => {
      for (const problem of sameKeys(entry, ENTRY_KEYS)) {
        errors.push(`Entry ${index + 1}: ${problem}`);
      }
      if (!entry.displayText || entry.displayText.trim().length === 0) {
        errors.push(`Entry ${index + 1}: displayText is empty`);
      }
      entry.codedConcepts.forEach((term) => {
        if (!term.display || term.display.trim().length === 0) {
          errors.push(`Entry ${index + 1}: term ${term.code} has empty display`);
        } else if (/[<>]/.test(term.display)) {
          errors.push(`Entry ${index + 1}: term ${term.code} display contains markup`);
        }
      });
    });

    if (section.hasEntries && section.codedConcepts.length === 0) {
      warnings.push("Section has entries but no coded concepts");
    }

    const valid = errors.length === 0;

    if (!valid) {
      logger.warn(
        { errors, warnings, sectionId: section.sectionId, dataSource: section.dataSource },
        "Section validation failed"
      );
    } else if (warnings.length > 0) {
      logger.debug(
        { warnings, sectionId: section.sectionId, dataSource: section.dataSource },
        "Section validation passed with warnings"
      );
    }

    return { valid, errors, warnings };
  }
}
