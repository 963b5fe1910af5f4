import type { DeploymentCollaborator, NetworkCollaborator } from "./collaborators.js";
import type { BlockRange } from "./cursor.js";
import { ErrorCode, FederationError } from "./errors.js";
import { componentLogger } from "./logger.js";
import { NegotiationRun, type RunOptions, type RunSummary } from "./run.js";
import type { DomainSession } from "./session.js";
import { ServiceState, type EndpointInfo, type EventOf, type ServiceRequirements } from "./types.js";
import { validatePrice } from "./utils.js";

/** What a provider advertises. Anything left out does not constrain a match. */
export type Capability = {
  serviceType?: string;
  bandwidthGbps?: number;
  rttLatencyMs?: number;
  computeCpus?: number;
  computeRamGb?: number;
};

function atLeast(offered: number | undefined, requested: number | null): boolean {
  return offered === undefined || requested === null || offered >= requested;
}

export function matchesCapability(req: ServiceRequirements, cap: Capability): boolean {
  if (cap.serviceType !== undefined && req.serviceType !== null) {
    if (cap.serviceType.trim().toLowerCase() !== req.serviceType.trim().toLowerCase()) return false;
  }
  const latencyOk =
    cap.rttLatencyMs === undefined || req.rttLatencyMs === null || cap.rttLatencyMs <= req.rttLatencyMs;
  return (
    latencyOk &&
    atLeast(cap.bandwidthGbps, req.bandwidthGbps) &&
    atLeast(cap.computeCpus, req.computeCpus) &&
    atLeast(cap.computeRamGb, req.computeRamGb)
  );
}

export type ProviderRequest = RunOptions & {
  price: bigint | number | string;
  endpoint: EndpointInfo;
  capability?: Capability;
  /** Only consider this service instead of the first matching announcement. */
  serviceId?: string;
  /** Where announcement discovery starts; defaults to the last 20 blocks. */
  discoverFrom?: BlockRange;
  replicas?: number;
  subnet?: string;
};

type ProviderCommon = RunSummary & {
  role: "provider";
  serviceId: string;
  price: bigint;
};

export type ProviderOutcome =
  | (ProviderCommon & {
      outcome: "deployed";
      federatedHost: string;
      consumerEndpoint: EndpointInfo;
    })
  | (ProviderCommon & { outcome: "not_chosen" });

export type ProviderDeps = {
  deployment: DeploymentCollaborator;
  network?: NetworkCollaborator;
};

export const DEFAULT_DISCOVERY: BlockRange = { lastBlocks: 20 };

/**
 * Provider side of one negotiation: pick the first open announcement this
 * domain can serve, bid on it, and deploy only if the ledger names this
 * domain the winner. Losing is an outcome, not an error.
 */
export class ProviderOrchestrator {
  constructor(
    private readonly session: DomainSession,
    private readonly deps: ProviderDeps
  ) {}

  async run(request: ProviderRequest): Promise<ProviderOutcome> {
    const price = validatePrice(request.price);
    const capability = request.capability ?? {};
    const run = new NegotiationRun("provider", componentLogger("provider", this.session.logger), request);
    const { session } = this;

    session.beginNegotiation(run.runId, "provider");
    try {
      // 1) discover
      run.enter("discover");
      const announcements = await session.cursor.subscribe(
        "ServiceAnnouncement",
        request.discoverFrom ?? DEFAULT_DISCOVERY
      );
      const found = await run.waitFor("a matching service announcement", async () => {
        for (const e of await announcements.next()) {
          if (await this.isCandidate(e, request.serviceId, capability)) return e;
        }
        return undefined;
      });
      const serviceId = found.serviceId;
      run.log = run.log.child({ serviceId });
      run.mark("announce_received");

      // 2) bid; the closure subscription starts first so the event is not missed
      run.enter("place_bid");
      const closures = await session.cursor.subscribe("ServiceAnnouncementClosed");
      run.record(await session.placeBid(serviceId, price, request.endpoint));
      run.mark("bid_offer_sent");

      // 3) wait for the consumer's decision
      run.enter("await_decision");
      await run.waitFor(`${serviceId} to close`, async () => {
        const closed = (await closures.next()).find((e) => e.serviceId === serviceId);
        return closed;
      });
      run.mark("winner_received");

      // 4) only the winner goes on
      run.enter("check_winner");
      if (!(await session.model.isWinner(serviceId))) {
        run.mark("other_provider_chosen");
        run.log.info("another provider was chosen");
        return { ...run.summary(), role: "provider", outcome: "not_chosen", serviceId, price };
      }
      run.log.info("chosen as winner");

      run.enter("service_info");
      const info = await session.model.getServiceInfo(serviceId, true);
      if (info.view !== "provider") {
        throw new FederationError(ErrorCode.INCONSISTENT, `expected the provider view of ${serviceId}`);
      }

      // 5) deploy
      run.enter("deploy");
      const descriptor = info.consumerEndpoint.nsdId ?? found.requirements.serviceType;
      if (descriptor === null) {
        throw FederationError.malformed(`${serviceId} names neither a descriptor nor a service type`);
      }
      run.mark("deployment_start");
      const federatedHost = await this.deps.deployment.deploy({
        serviceId,
        descriptor,
        replicas: request.replicas ?? 1,
      });
      run.mark("deployment_finished");

      // 6) confirm; DomainSession re-checks the winner before submitting
      run.enter("confirm_deployment");
      run.record(await session.confirmDeployment(serviceId, federatedHost));
      run.mark("confirm_deployment_sent");

      if (this.deps.network) {
        run.enter("establish_connection");
        run.mark("establish_connection_with_consumer_start");
        await this.deps.network.establishTunnel({
          serviceId,
          local: request.endpoint,
          remote: info.consumerEndpoint,
          subnet: request.subnet,
        });
        run.mark("establish_connection_with_consumer_finished");
      }

      run.log.info({ federatedHost }, "federation completed");
      return {
        ...run.summary(),
        role: "provider",
        outcome: "deployed",
        serviceId,
        price,
        federatedHost,
        consumerEndpoint: info.consumerEndpoint,
      };
    } catch (e) {
      throw run.fail(e);
    } finally {
      session.endNegotiation(run.runId);
    }
  }

  private async isCandidate(
    e: EventOf<"ServiceAnnouncement">,
    wanted: string | undefined,
    capability: Capability
  ): Promise<boolean> {
    if (wanted !== undefined && e.serviceId !== wanted) return false;
    if (!matchesCapability(e.requirements, capability)) return false;
    return (await this.session.model.getState(e.serviceId)) === ServiceState.Open;
  }
}
