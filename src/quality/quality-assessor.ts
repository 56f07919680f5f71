import type { NormalizedSection, PipelineResult } from "../mapping/types.js";
import type { ResolvedTerm } from "../terminology/types.js";

export type QualityLevel = "Excellent" | "Good" | "Fair" | "Poor" | "No codes";

export interface QualityScore {
  level: QualityLevel;
  /** Rounded to one decimal; null when there was nothing to score. */
  percentage: number | null;
  resolvedConcepts: number;
  totalConcepts: number;
}

const THRESHOLDS: readonly { min: number; level: QualityLevel }[] = [
  { min: 90, level: "Excellent" },
  { min: 70, level: "Good" },
  { min: 50, level: "Fair" },
];

/**
 * Share of coded concepts that got a real display (anything but Fallback).
 * Levels are taken from the exact ratio, before rounding.
 */
export class QualityAssessor {
  score(result: PipelineResult): QualityScore {
    return this.scoreTerms(result.sections.flatMap((section) => section.codedConcepts));
  }

  assessSection(section: NormalizedSection): QualityScore {
    return this.scoreTerms(section.codedConcepts);
  }

  private scoreTerms(terms: readonly ResolvedTerm[]): QualityScore {
    const totalConcepts = terms.length;
    const resolvedConcepts = terms.filter((term) => term.provenance !== "Fallback").length;
    if (totalConcepts === 0) {
      return { level: "No codes", percentage: null, resolvedConcepts: 0, totalConcepts: 0 };
    }

    const exact = (resolvedConcepts / totalConcepts) * 100;
    const level = THRESHOLDS.find((threshold) => exact >= threshold.min)?.level ?? "Poor";
    return {
      level,
      percentage: Math.round(exact * 10) / 10,
      resolvedConcepts,
      totalConcepts,
    };
  }
}
