import { mkdtemp } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { createApp, ExperimentStore } from "federation-backend";
import { DomainSession, type InMemoryChain, type Role } from "federation-sdk";
import { FAST_WAIT, RecordingDeployment, silent } from "./federation.js";

export async function tempDir(prefix: string): Promise<string> {
  return mkdtemp(path.join(os.tmpdir(), prefix));
}

/** One domain's HTTP API on a shared in-process chain. */
export async function domainApp(chain: InMemoryChain, label: string, role: Role) {
  const session = new DomainSession(chain.account(label), { logger: silent });
  const deployment = new RecordingDeployment(`${label}.federated.test`);
  const experiments = new ExperimentStore(await tempDir("federation-exp-"));
  const app = createApp({
    role,
    domainName: label,
    session,
    deployment,
    experiments,
    wait: FAST_WAIT,
    lookbackBlocks: 20,
    logger: silent,
  });
  return { app, session, deployment, experiments };
}
