/**
 * Code System Registry
 *
 * Static OID <-> code system table shared by the resolver, the extractors
 * and presentation helpers. FHIR codings name their system by URI, CDA by
 * OID; everything inside the engine is keyed by OID.
 */

export const CODE_SYSTEM_OIDS = {
  SNOMED_CT: "2.16.840.1.113883.6.96",
  LOINC: "2.16.840.1.113883.6.1",
  RXNORM: "2.16.840.1.113883.6.88",
  ICD10: "2.16.840.1.113883.6.3",
  ICD10CM: "2.16.840.1.113883.6.90",
  ICD10PCS: "2.16.840.1.113883.6.4",
  ICD9CM: "2.16.840.1.113883.6.103",
  ATC: "2.16.840.1.113883.6.73",
  UCUM: "2.16.840.1.113883.6.8",
  EDQM: "0.4.0.127.0.16.1.1.2.1",
  ACT_CODE: "2.16.840.1.113883.5.4",
  OBSERVATION_INTERPRETATION: "2.16.840.1.113883.5.83",
  ROUTE_OF_ADMINISTRATION: "2.16.840.1.113883.5.112",
  ACT_STATUS: "2.16.840.1.113883.5.14",
  NULL_FLAVOR: "2.16.840.1.113883.5.1008",
} as const;

export const UNKNOWN_CODE_SYSTEM = "Unknown";

export interface CodeSystemEntry {
  oid: string;
  name: string;
  uri: string;
  badge: string;
}

const CODE_SYSTEMS: readonly CodeSystemEntry[] = [
  { oid: CODE_SYSTEM_OIDS.SNOMED_CT, name: "SNOMED CT", uri: "http://snomed.info/sct", badge: "badge bg-primary" },
  { oid: CODE_SYSTEM_OIDS.LOINC, name: "LOINC", uri: "http://loinc.org", badge: "badge bg-success" },
  { oid: CODE_SYSTEM_OIDS.RXNORM, name: "RxNorm", uri: "http://www.nlm.nih.gov/research/umls/rxnorm", badge: "badge bg-warning" },
  { oid: CODE_SYSTEM_OIDS.ICD10, name: "ICD-10", uri: "http://hl7.org/fhir/sid/icd-10", badge: "badge bg-danger" },
  { oid: CODE_SYSTEM_OIDS.ICD10CM, name: "ICD-10-CM", uri: "http://hl7.org/fhir/sid/icd-10-cm", badge: "badge bg-danger" },
  { oid: CODE_SYSTEM_OIDS.ICD10PCS, name: "ICD-10-PCS", uri: "http://www.cms.gov/Medicare/Coding/ICD10", badge: "badge bg-danger" },
  { oid: CODE_SYSTEM_OIDS.ICD9CM, name: "ICD-9-CM", uri: "http://hl7.org/fhir/sid/icd-9-cm", badge: "badge bg-secondary" },
  { oid: CODE_SYSTEM_OIDS.ATC, name: "ATC", uri: "http://www.whocc.no/atc", badge: "badge bg-dark" },
  { oid: CODE_SYSTEM_OIDS.UCUM, name: "UCUM", uri: "http://unitsofmeasure.org", badge: "badge bg-info" },
  { oid: CODE_SYSTEM_OIDS.EDQM, name: "EDQM Standard Terms", uri: "http://standardterms.edqm.eu", badge: "badge bg-info" },
  { oid: CODE_SYSTEM_OIDS.ACT_CODE, name: "HL7 ActCode", uri: "http://terminology.hl7.org/CodeSystem/v3-ActCode", badge: "badge bg-secondary" },
  { oid: CODE_SYSTEM_OIDS.OBSERVATION_INTERPRETATION, name: "HL7 ObservationInterpretation", uri: "http://terminology.hl7.org/CodeSystem/v3-ObservationInterpretation", badge: "badge bg-secondary" },
  { oid: CODE_SYSTEM_OIDS.ROUTE_OF_ADMINISTRATION, name: "HL7 RouteOfAdministration", uri: "http://terminology.hl7.org/CodeSystem/v3-RouteOfAdministration", badge: "badge bg-secondary" },
  { oid: CODE_SYSTEM_OIDS.ACT_STATUS, name: "HL7 ActStatus", uri: "http://terminology.hl7.org/CodeSystem/v3-ActStatus", badge: "badge bg-secondary" },
  { oid: CODE_SYSTEM_OIDS.NULL_FLAVOR, name: "HL7 NullFlavor", uri: "http://terminology.hl7.org/CodeSystem/v3-NullFlavor", badge: "badge bg-secondary" },
];

const BY_OID = new Map(CODE_SYSTEMS.map((entry) => [entry.oid, entry]));
const BY_URI = new Map(CODE_SYSTEMS.map((entry) => [entry.uri, entry]));

const DEFAULT_BADGE = "badge bg-light";

export function isRegistered(oid: string): boolean {
  return BY_OID.has(oid.trim());
}

/**
 * Canonical system name for an OID, or the literal "Unknown" marker.
 */
export function lookup(oid: string): string {
  return BY_OID.get(oid.trim())?.name ?? UNKNOWN_CODE_SYSTEM;
}

/** Badge text for presentation layers. */
export function codeSystemName(oid: string): string {
  return lookup(oid);
}

export function codeSystemBadge(oid: string): string {
  return BY_OID.get(oid.trim())?.badge ?? DEFAULT_BADGE;
}

/**
 * Maps a FHIR coding.system to the OID used as the resolver's key.
 * `urn:oid:` URIs and bare OIDs pass through; unknown URIs are returned as-is
 * so the resolver classifies them as unsupported.
 */
export function oidForSystemUri(system: string): string {
  const trimmed = system.trim();
  if (trimmed.startsWith("urn:oid:")) return trimmed.slice("urn:oid:".length);

  const known = BY_URI.get(trimmed) ?? BY_URI.get(trimmed.replace(/\/$/, ""));
  return known ? known.oid : trimmed;
}

export function systemUriForOid(oid: string): string | null {
  return BY_OID.get(oid.trim())?.uri ?? null;
}

export function registeredCodeSystems(): readonly CodeSystemEntry[] {
  return CODE_SYSTEMS;
}
