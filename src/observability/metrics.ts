import client from "prom-client";
import type { Request, Response } from "express";

// Default registry and process metrics
client.collectDefaultMetrics();

export const terminologyResolutionsTotal = new client.Counter({
  name: "terminology_resolutions_total",
  help: "Resolved clinical codes by provenance of the display text",
  labelNames: ["provenance"] as const,
});

export const terminologyCacheRequestsTotal = new client.Counter({
  name: "terminology_cache_requests_total",
  help: "Terminology cache lookups by result",
  labelNames: ["result"] as const,
});

export const sectionExtractionsTotal = new client.Counter({
  name: "section_extractions_total",
  help: "Section extractor runs by outcome",
  labelNames: ["section_id", "data_source", "outcome"] as const,
});

export const sectionEntriesSkippedTotal = new client.Counter({
  name: "section_entries_skipped_total",
  help: "Source entries skipped because a required field was missing",
  labelNames: ["section_id", "data_source"] as const,
});

export const pipelineDurationSeconds = new client.Histogram({
  name: "pipeline_duration_seconds",
  help: "Duration of one document pipeline run in seconds",
  labelNames: ["data_source"] as const,
  buckets: [0.01, 0.05, 0.1, 0.2, 0.5, 1, 2, 5]
});

export async function metricsHandler(_req: Request, res: Response): Promise<void> {
  res.set("Content-Type", client.register.contentType);
  res.end(await client.register.metrics());
}
