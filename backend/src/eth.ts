import { EthersFederationLedger, InMemoryChain, type FederationLedger } from "federation-sdk";
import type { Logger } from "pino";
import type { AppConfig } from "./config.js";

/** The ledger binding selected by LEDGER_MODE. */
export function createLedger(cfg: Pick<AppConfig, "ledger" | "domainName">, logger: Logger): FederationLedger {
  if (cfg.ledger.mode === "memory") {
    logger.warn("LEDGER_MODE=memory: using an in-process ledger visible to this process only");
    return new InMemoryChain().account(cfg.domainName);
  }
  return new EthersFederationLedger({
    rpcUrl: cfg.ledger.rpcUrl,
    contractAddress: cfg.ledger.contractAddress,
    privateKey: cfg.ledger.privateKey,
    logger,
  });
}
