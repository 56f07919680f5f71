export { loadConfig, DEFAULT_ENGINE_CONFIG } from "./config/index.js";
export type { AppConfig, EngineConfig } from "./config/index.js";
export { createEngine, createConceptStore } from "./engine.js";
export type { Engine, EngineOptions, EngineRun } from "./engine.js";
export { AuditLogger } from "./audit/audit-logger.js";
export type { AuditEvent, AuditEventType } from "./audit/audit-logger.js";
export * from "./errors.js";

export {
  CODE_SYSTEM_OIDS,
  UNKNOWN_CODE_SYSTEM,
  codeSystemBadge,
  codeSystemName,
  isRegistered,
  lookup,
  oidForSystemUri,
  registeredCodeSystems,
  systemUriForOid,
} from "./terminology/code-systems.js";
export { MemoryTermCache, cacheKey } from "./terminology/cache.js";
export type { CacheStats, TermCache } from "./terminology/cache.js";
export type { CodeSystemEntry } from "./terminology/code-systems.js";
export { InMemoryConceptStore, loadCatalogueFile } from "./terminology/concept-store.js";
export type { CatalogueSnapshot } from "./terminology/concept-store.js";
export { MySqlConceptStore } from "./db/mysql.js";
export { TerminologyResolver, fallbackDisplay } from "./terminology/resolver.js";
export type {
  ClinicalCode,
  ConceptRecord,
  ConceptStore,
  Provenance,
  ResolvedTerm,
} from "./terminology/types.js";

export { ExtractorRegistry, createExtractorRegistry } from "./extraction/registry.js";
export { SECTION_DEFINITIONS, SECTION_IDS } from "./extraction/section-definitions.js";
export type { SectionDefinition, SectionId } from "./extraction/section-definitions.js";
export { PipelineManager } from "./pipeline/pipeline-manager.js";
export type { ProcessOptions } from "./pipeline/pipeline-manager.js";
export { QualityAssessor } from "./quality/quality-assessor.js";
export type { QualityLevel, QualityScore } from "./quality/quality-assessor.js";
export { SectionValidator, sanitizeDisplay } from "./validation/section-validator.js";
export type {
  ClinicalSectionEntry,
  DataSource,
  DisplayConfig,
  NormalizedSection,
  PipelineResult,
  SectionExtractor,
  SourceType,
} from "./mapping/types.js";
