import { pino, type Logger } from "pino";
import type { AppConfig } from "./config.js";

/** Process logger of one domain; every sdk component logs through children of it. */
export function createLogger(cfg: Pick<AppConfig, "logLevel" | "role" | "domainName">): Logger {
  return pino({
    level: cfg.logLevel,
    formatters: {
      level: (label) => ({ level: label }),
    },
    base: {
      service: "federation-backend",
      role: cfg.role,
      domain: cfg.domainName,
    },
  });
}
