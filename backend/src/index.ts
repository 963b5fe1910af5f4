import { createSmallerSubnet, DomainSession } from "federation-sdk";
import { createApp } from "./app.js";
import { ConfigError, loadConfig, type AppConfig } from "./config.js";
import { HttpOrchestrator, StaticDeployment } from "./deployment.js";
import { createLedger } from "./eth.js";
import { ExperimentStore } from "./experiments.js";
import { createLogger } from "./logger.js";

let CFG: AppConfig;
try {
  CFG = loadConfig();
} catch (e) {
  if (e instanceof ConfigError) {
    console.error(e.message);
    process.exit(1);
  }
  throw e;
}

const logger = createLogger(CFG);
const ledger = createLedger(CFG, logger);
const session = new DomainSession(ledger, { logger });

const orchestrator = CFG.orchestratorUrl ? new HttpOrchestrator(CFG.orchestratorUrl, logger) : undefined;

const app = createApp({
  role: CFG.role,
  domainName: CFG.domainName,
  session,
  deployment: orchestrator ?? new StaticDeployment(CFG.federatedHost, logger),
  network: orchestrator,
  experiments: new ExperimentStore(CFG.experimentsDir),
  wait: CFG.wait,
  lookbackBlocks: CFG.lookbackBlocks,
  subnet: createSmallerSubnet(CFG.federationNet, CFG.dltNodeId),
  logger,
});

const server = app.listen(CFG.port, () => {
  logger.info({ port: CFG.port, account: session.address, ledger: ledger.describe().nodeUrl }, "API listening");
});

const shutdown = (signal: string) => {
  logger.info({ signal }, "shutting down");
  server.close(() => process.exit(0));
};
process.on("SIGINT", () => shutdown("SIGINT"));
process.on("SIGTERM", () => shutdown("SIGTERM"));
