// SNOMED severity codes, shared by CDA SEV observations and FHIR Condition.severity
const SEVERITY: Record<string, string> = {
  "255604002": "mild",
  "371923003": "moderate",
  "6736007": "moderate",
  "371924009": "severe",
  "24484000": "severe",
};

const CRITICALITY: Record<string, string> = {
  CRITH: "high",
  CRITL: "low",
  CRITU: "unable-to-assess",
};

export function severityOf(severityCode: string | null): string | null {
  return severityCode ? SEVERITY[severityCode] ?? null : null;
}

/** HL7 v3 criticality codes to the FHIR criticality words. */
export function criticalityOf(code: string | null): string | null {
  return code ? CRITICALITY[code.toUpperCase()] ?? null : null;
}

/**
 * Severity of an allergy in either format: the first stated severity
 * (intolerance, then reactions in document order), else its criticality.
 */
export function allergySeverity(
  severities: readonly (string | null | undefined)[],
  criticality: string | null | undefined
): string | null {
  for (const severity of severities) {
    if (severity) return severity;
  }
  return criticality ?? null;
}
