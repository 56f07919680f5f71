import { loadConfig } from "./config/index.js";
import { createConceptStore, createEngine } from "./engine.js";
import { logger } from "./observability/logger.js";
import { createServer } from "./server.js";

async function main(): Promise<void> {
  const config = loadConfig();
  const store = await createConceptStore(config);
  const engine = createEngine({ config: config.engine, store });

  const app = createServer(config, engine);
  app.listen(config.port, () => {
    logger.info({ port: config.port, service: config.serviceName }, "Service listening");
  });
}

main().catch((err: unknown) => {
  logger.fatal({ err }, "Service failed to start");
  process.exit(1);
});
