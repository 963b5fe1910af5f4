import "dotenv/config";
import { z } from "zod";

const intFrom = (fallback: number) => z.coerce.number().int().positive().default(fallback);

const EnvSchema = z
  .object({
    DOMAIN_FUNCTION: z.enum(["consumer", "provider"]),
    DOMAIN_NAME: z.string().min(1).default("domain"),
    LEDGER_MODE: z.enum(["rpc", "memory"]).default("rpc"),
    RPC_URL: z.string().url().optional(),
    CONTRACT_ADDRESS: z.string().regex(/^0x[0-9a-fA-F]{40}$/, "must be a 20-byte hex address").optional(),
    PRIVATE_KEY: z.string().regex(/^(0x)?[0-9a-fA-F]{64}$/, "must be a 32-byte hex key").optional(),
    PORT: intFrom(8000),
    LOG_LEVEL: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).default("info"),
    POLL_INITIAL_MS: intFrom(250),
    POLL_MAX_MS: intFrom(5000),
    POLL_TIMEOUT_MS: intFrom(600_000),
    LOOKBACK_BLOCKS: intFrom(20),
    ORCHESTRATOR_URL: z.string().url().optional(),
    FEDERATED_HOST: z.string().min(1).default("0.0.0.0"),
    FEDERATION_NET: z.string().regex(/^\d{1,3}(\.\d{1,3}){3}\/\d{1,2}$/, "must be a CIDR").default("10.0.0.0/16"),
    DLT_NODE_ID: z.string().regex(/^\d{1,3}$/).default("1"),
    EXPERIMENTS_DIR: z.string().min(1).default("experiments"),
  })
  .superRefine((env, ctx) => {
    if (env.LEDGER_MODE !== "rpc") return;
    for (const key of ["RPC_URL", "CONTRACT_ADDRESS", "PRIVATE_KEY"] as const) {
      if (env[key] === undefined) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: [key], message: "required when LEDGER_MODE=rpc" });
      }
    }
  });

export type Env = z.output<typeof EnvSchema>;

export type AppConfig = {
  role: Env["DOMAIN_FUNCTION"];
  domainName: string;
  ledger:
    | { mode: "memory" }
    | { mode: "rpc"; rpcUrl: string; contractAddress: string; privateKey: string };
  port: number;
  logLevel: Env["LOG_LEVEL"];
  wait: { initialDelayMs: number; maxDelayMs: number; timeoutMs: number };
  lookbackBlocks: number;
  orchestratorUrl?: string;
  federatedHost: string;
  federationNet: string;
  dltNodeId: string;
  experimentsDir: string;
};

export class ConfigError extends Error {
  constructor(readonly problems: string[]) {
    super(`invalid configuration: ${problems.join("; ")}`);
    this.name = "ConfigError";
  }
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`));
  }
  const e = parsed.data;

  let ledger: AppConfig["ledger"] = { mode: "memory" };
  if (e.LEDGER_MODE === "rpc") {
    // presence checked by superRefine
    if (e.RPC_URL === undefined || e.CONTRACT_ADDRESS === undefined || e.PRIVATE_KEY === undefined) {
      throw new ConfigError(["RPC_URL, CONTRACT_ADDRESS and PRIVATE_KEY are required when LEDGER_MODE=rpc"]);
    }
    ledger = { mode: "rpc", rpcUrl: e.RPC_URL, contractAddress: e.CONTRACT_ADDRESS, privateKey: e.PRIVATE_KEY };
  }

  return {
    role: e.DOMAIN_FUNCTION,
    domainName: e.DOMAIN_NAME,
    ledger,
    port: e.PORT,
    logLevel: e.LOG_LEVEL,
    wait: { initialDelayMs: e.POLL_INITIAL_MS, maxDelayMs: e.POLL_MAX_MS, timeoutMs: e.POLL_TIMEOUT_MS },
    lookbackBlocks: e.LOOKBACK_BLOCKS,
    orchestratorUrl: e.ORCHESTRATOR_URL,
    federatedHost: e.FEDERATED_HOST,
    federationNet: e.FEDERATION_NET,
    dltNodeId: e.DLT_NODE_ID,
    experimentsDir: e.EXPERIMENTS_DIR,
  };
}
