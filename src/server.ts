import express, { type Request, type Response } from "express";
import type { AppConfig } from "./config/index.js";
import type { Engine } from "./engine.js";
import { metricsHandler } from "./observability/metrics.js";

export function createServer(config: AppConfig, engine: Pick<Engine, "registry">) {
  const app = express();

  app.get("/health", (_req: Request, res: Response) => {
    res.status(200).json({
      status: "ok",
      service: config.serviceName,
      catalogue: config.catalogue.backend,
      targetLanguage: config.engine.targetLanguage,
      sections: {
        CDA: engine.registry.sectionIds("CDA"),
        FHIR: engine.registry.sectionIds("FHIR"),
      },
    });
  });

  app.get("/metrics", metricsHandler);

  return app;
}
