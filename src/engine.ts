import type { AppConfig, EngineConfig } from "./config/index.js";
import { AuditLogger } from "./audit/audit-logger.js";
import { createPool, MySqlConceptStore } from "./db/mysql.js";
import { createExtractorRegistry, type ExtractorRegistry } from "./extraction/registry.js";
import type { PipelineResult, SourceType } from "./mapping/types.js";
import { componentLogger } from "./observability/logger.js";
import { PipelineManager, type ProcessOptions } from "./pipeline/pipeline-manager.js";
import { QualityAssessor, type QualityScore } from "./quality/quality-assessor.js";
import { MemoryTermCache, type TermCache } from "./terminology/cache.js";
import { loadCatalogueFile } from "./terminology/concept-store.js";
import { TerminologyResolver } from "./terminology/resolver.js";
import type { ConceptStore } from "./terminology/types.js";

const logger = componentLogger("engine");

export interface EngineOptions {
  config: EngineConfig;
  store: ConceptStore;
  cache?: TermCache;
  auditLogger?: AuditLogger;
}

export interface EngineRun {
  result: PipelineResult;
  quality: QualityScore;
}

export interface Engine {
  resolver: TerminologyResolver;
  registry: ExtractorRegistry;
  pipeline: PipelineManager;
  assessor: QualityAssessor;
  process(document: unknown, sourceType: SourceType, options?: ProcessOptions): Promise<EngineRun>;
}

/**
 * Wires resolver, extractors, pipeline and assessor once. Everything stateful
 * (the cache, the in-flight table) lives on the returned objects.
 */
export function createEngine(options: EngineOptions): Engine {
  const { config, store } = options;
  const auditLogger = options.auditLogger ?? new AuditLogger();
  const cache = options.cache ?? new MemoryTermCache(config.cacheMaxEntries);

  const resolver = new TerminologyResolver({ store, cache, config, auditLogger });
  const registry = createExtractorRegistry({ resolver, auditLogger });
  const pipeline = new PipelineManager({ registry, concurrency: config.extractorConcurrency, auditLogger });
  const assessor = new QualityAssessor();

  return {
    resolver,
    registry,
    pipeline,
    assessor,
    async process(document, sourceType, processOptions) {
      const result = await pipeline.process(document, sourceType, processOptions);
      return { result, quality: assessor.score(result) };
    },
  };
}

export async function createConceptStore(config: AppConfig): Promise<ConceptStore> {
  if (config.catalogue.backend === "mysql") {
    logger.info({ host: config.mysql.host, database: config.mysql.database }, "Using MySQL terminology catalogue");
    return new MySqlConceptStore(createPool(config));
  }
  const store = await loadCatalogueFile(config.catalogue.filePath);
  logger.info({ file: config.catalogue.filePath, concepts: store.size }, "Loaded terminology catalogue file");
  return store;
}
