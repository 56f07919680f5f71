import { readFileSync } from "fs";
import { fileURLToPath } from "url";
import { DEFAULT_ENGINE_CONFIG, type EngineConfig } from "../config/index.js";
import { loadCatalogueFile } from "../terminology/concept-store.js";

export const CATALOGUE_PATH = fileURLToPath(new URL("../../data/catalogue.json", import.meta.url));

export function readFixture(name: string): string {
  return readFileSync(fileURLToPath(new URL(`../../test/fixtures/${name}`, import.meta.url)), "utf8");
}

export function loadTestCatalogue() {
  return loadCatalogueFile(CATALOGUE_PATH);
}

export function testEngineConfig(overrides: Partial<EngineConfig> = {}): EngineConfig {
  return { ...DEFAULT_ENGINE_CONFIG, ...overrides };
}
