import express, { type Express } from "express";
import type { AppDeps } from "./context.js";
import { errorHandler, notFoundHandler } from "./errorHandler.js";
import { consumerRoutes } from "./routes/consumer.js";
import { domainRoutes } from "./routes/domain.js";
import { healthRoutes } from "./routes/health.js";
import { providerRoutes } from "./routes/provider.js";
import { serviceRoutes } from "./routes/services.js";

export type { AppDeps } from "./context.js";
export { ConfigError, loadConfig, type AppConfig } from "./config.js";
export { createLedger } from "./eth.js";
export { createLogger } from "./logger.js";
export { ExperimentStore } from "./experiments.js";
export { HttpOrchestrator, StaticDeployment } from "./deployment.js";

export function createApp(deps: AppDeps): Express {
  const app = express();
  app.use(express.json({ limit: "1mb" }));
  // prices and gas figures are bigints
  app.set("json replacer", (_key: string, value: unknown) => (typeof value === "bigint" ? value.toString() : value));

  app.use(healthRoutes(deps));
  app.use(domainRoutes(deps));
  app.use(serviceRoutes(deps));
  app.use(consumerRoutes(deps));
  app.use(providerRoutes(deps));

  app.use(notFoundHandler);
  app.use(errorHandler(deps.logger));
  return app;
}
