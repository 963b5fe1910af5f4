import {
  DomainSession,
  FederationError,
  pollUntil,
  type DeployRequest,
  type DeploymentCollaborator,
  type EndpointInfo,
  type InMemoryChain,
  type NetworkCollaborator,
  type ServiceRequirements,
  type TunnelRequest,
} from "federation-sdk";
import { pino } from "pino";

export const silent = pino({ level: "silent" });

/** Short waits so suites never sit on production backoff. */
export const FAST_WAIT = { initialDelayMs: 2, maxDelayMs: 10, timeoutMs: 3000 };

export const NGINX: ServiceRequirements = {
  serviceType: "nginx",
  bandwidthGbps: 10,
  rttLatencyMs: 20,
  computeCpus: 2,
  computeRamGb: 4,
};

export const CONSUMER_ENDPOINT: EndpointInfo = {
  serviceCatalogDb: "http://consumer.test/catalog",
  topologyDb: "http://consumer.test/topology",
  nsdId: "nginx-nsd",
  nsId: "ns-consumer",
};

export function providerEndpoint(n: number): EndpointInfo {
  return {
    serviceCatalogDb: `http://provider${n}.test/catalog`,
    topologyDb: `http://provider${n}.test/topology`,
    nsdId: `nsd-provider${n}`,
    nsId: `ns-provider${n}`,
  };
}

export async function registeredDomain(chain: InMemoryChain, label: string): Promise<DomainSession> {
  const session = new DomainSession(chain.account(label), { logger: silent });
  await session.register(label);
  return session;
}

/** Resolves with the FederationError `promise` rejects with; fails if it resolves. */
export async function rejection(promise: Promise<unknown>): Promise<FederationError> {
  try {
    await promise;
  } catch (e) {
    if (e instanceof FederationError) return e;
    throw e;
  }
  throw new Error("expected the call to be rejected");
}

/** First service announced on the chain, as seen by `session`. */
export async function firstAnnouncement(session: DomainSession): Promise<string> {
  return pollUntil(
    async () => (await session.cursor.poll("ServiceAnnouncement", { fromBlock: 0 }))[0]?.serviceId,
    { what: "an announcement", ...FAST_WAIT }
  );
}

export async function waitForState(session: DomainSession, serviceId: string, state: number): Promise<void> {
  await pollUntil(
    async () => ((await session.model.getState(serviceId)) === state ? true : undefined),
    { what: `${serviceId} in state ${state}`, ...FAST_WAIT }
  );
}

export class RecordingDeployment implements DeploymentCollaborator {
  readonly deployed: DeployRequest[] = [];
  readonly removed: string[] = [];

  constructor(private readonly host = "10.0.1.5") {}

  async deploy(req: DeployRequest): Promise<string> {
    this.deployed.push(req);
    return this.host;
  }

  async teardown(serviceName: string): Promise<void> {
    this.removed.push(serviceName);
  }
}

export class RecordingNetwork implements NetworkCollaborator {
  readonly tunnels: TunnelRequest[] = [];

  async establishTunnel(req: TunnelRequest): Promise<void> {
    this.tunnels.push(req);
  }
}
