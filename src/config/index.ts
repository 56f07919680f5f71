import dotenv from "dotenv";
import { z } from "zod";

dotenv.config();

const numeric = z.string().regex(/^\d+$/, "must be a non-negative integer");

const envSchema = z.object({
  PORT: numeric.optional(),
  SERVICE_NAME: z.string().default("clinical-terminology-engine"),

  TARGET_LANGUAGE: z.string().min(2).default("en"),
  TARGET_COUNTRY: z.string().optional(),
  CACHE_TTL_POSITIVE_MS: numeric.optional(),
  CACHE_TTL_NEGATIVE_MS: numeric.optional(),
  CACHE_MAX_ENTRIES: numeric.optional(),
  LOOKUP_TIMEOUT_MS: numeric.optional(),
  EXTRACTOR_CONCURRENCY: numeric.optional(),

  CATALOGUE_BACKEND: z.enum(["mysql", "file"]).default("file"),
  CATALOGUE_FILE: z.string().default("data/catalogue.json"),

  MYSQL_HOST: z.string().optional(),
  MYSQL_PORT: numeric.optional(),
  MYSQL_USER: z.string().optional(),
  MYSQL_PASSWORD: z.string().optional(),
  MYSQL_DATABASE: z.string().optional(),
});

export type EngineConfig = {
  targetLanguage: string;
  targetCountry: string | null;
  cacheTtlPositiveMs: number;
  cacheTtlNegativeMs: number;
  cacheMaxEntries: number;
  lookupTimeoutMs: number;
  extractorConcurrency: number;
};

export type AppConfig = {
  port: number;
  serviceName: string;
  engine: EngineConfig;
  catalogue: {
    backend: "mysql" | "file";
    filePath: string;
  };
  mysql: {
    host: string;
    port: number;
    user: string;
    password: string;
    database: string;
  };
};

export const DEFAULT_ENGINE_CONFIG: EngineConfig = {
  targetLanguage: "en",
  targetCountry: null,
  cacheTtlPositiveMs: 60 * 60 * 1000,
  cacheTtlNegativeMs: 5 * 60 * 1000,
  cacheMaxEntries: 50_000,
  lookupTimeoutMs: 2_000,
  extractorConcurrency: 4,
};

function normalizeCountry(value: string | undefined): string | null {
  if (!value || value.trim().length === 0) return null;
  return value.trim().toUpperCase();
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.parse(env);

  const positiveTtl = Number(parsed.CACHE_TTL_POSITIVE_MS ?? DEFAULT_ENGINE_CONFIG.cacheTtlPositiveMs);
  const negativeTtl = Number(parsed.CACHE_TTL_NEGATIVE_MS ?? DEFAULT_ENGINE_CONFIG.cacheTtlNegativeMs);

  return {
    port: Number(parsed.PORT ?? 3000),
    serviceName: parsed.SERVICE_NAME,
    engine: {
      targetLanguage: parsed.TARGET_LANGUAGE.trim().toLowerCase(),
      targetCountry: normalizeCountry(parsed.TARGET_COUNTRY),
      cacheTtlPositiveMs: positiveTtl,
      // negative results never outlive positive ones
      cacheTtlNegativeMs: Math.min(negativeTtl, positiveTtl),
      cacheMaxEntries: Number(parsed.CACHE_MAX_ENTRIES ?? DEFAULT_ENGINE_CONFIG.cacheMaxEntries),
      lookupTimeoutMs: Number(parsed.LOOKUP_TIMEOUT_MS ?? DEFAULT_ENGINE_CONFIG.lookupTimeoutMs),
      extractorConcurrency: Math.max(1, Number(parsed.EXTRACTOR_CONCURRENCY ?? DEFAULT_ENGINE_CONFIG.extractorConcurrency)),
    },
    catalogue: {
      backend: parsed.CATALOGUE_BACKEND,
      filePath: parsed.CATALOGUE_FILE,
    },
    mysql: {
      host: parsed.MYSQL_HOST ?? "localhost",
      port: Number(parsed.MYSQL_PORT ?? 3306),
      user: parsed.MYSQL_USER ?? "root",
      password: parsed.MYSQL_PASSWORD ?? "",
      database: parsed.MYSQL_DATABASE ?? "terminology",
    },
  };
}
