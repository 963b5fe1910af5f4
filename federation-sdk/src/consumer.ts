import type { NetworkCollaborator } from "./collaborators.js";
import { ErrorCode, FederationError } from "./errors.js";
import { componentLogger } from "./logger.js";
import { NegotiationRun, type RunOptions, type RunSummary } from "./run.js";
import type { DomainSession } from "./session.js";
import { LifecycleTrail, selectWinner, stateName, type StateName } from "./state-machine.js";
import {
  ServiceState,
  type Bid,
  type EndpointInfo,
  type ServiceRequirements,
} from "./types.js";
import { validateQuorum } from "./utils.js";

export type ConsumerRequest = RunOptions & {
  requirements: ServiceRequirements;
  endpoint: EndpointInfo;
  /** Bids to wait for before choosing. */
  quorum: number;
  /** Subnet handed to the network collaborator, if one is configured. */
  subnet?: string;
};

export type ConsumerOutcome = RunSummary & {
  role: "consumer";
  serviceId: string;
  bids: Bid[];
  winner: Bid;
  federatedHost: string | null;
  providerEndpoint: EndpointInfo;
  states: StateName[];
};

export type ConsumerDeps = {
  network?: NetworkCollaborator;
};

/**
 * Consumer side of one negotiation:
 * announce, collect bids up to the quorum, choose the cheapest, then wait
 * for the winner to deploy and hand its endpoint to the network layer.
 */
export class ConsumerOrchestrator {
  constructor(
    private readonly session: DomainSession,
    private readonly deps: ConsumerDeps = {}
  ) {}

  async run(request: ConsumerRequest): Promise<ConsumerOutcome> {
    const quorum = validateQuorum(request.quorum);
    const run = new NegotiationRun("consumer", componentLogger("consumer", this.session.logger), request);
    const { session } = this;

    session.beginNegotiation(run.runId, "consumer");
    try {
      // 1) announce; the bid subscription starts before it so no NewBid is missed
      run.enter("announce");
      const newBids = await session.cursor.subscribe("NewBid");
      const { serviceId, tx } = await session.announce(request.requirements, request.endpoint);
      run.record(tx);
      run.log = run.log.child({ serviceId });
      run.mark("service_announced");
      const trail = new LifecycleTrail(serviceId);

      // 2) fold bid counts until the quorum is reached
      run.enter("collect_bids");
      let bidCount = 0;
      const count = await run.waitFor(`${quorum} bid(s) on ${serviceId}`, async () => {
        for (const e of await newBids.next()) {
          if (e.serviceId === serviceId && e.bidCount > bidCount) bidCount = e.bidCount;
        }
        return bidCount >= quorum ? bidCount : undefined;
      });
      run.mark("bid_offer_received");
      run.log.info({ bidCount: count }, "quorum reached");

      // 3) evaluate every recorded bid
      run.enter("select_winner");
      const bids = await session.model.getBids(serviceId, count);
      const winner = selectWinner(bids);
      run.log.info(
        { bidIndex: winner.bidIndex, provider: winner.providerAddr, price: winner.price.toString() },
        "winner selected"
      );

      // 4) close the service; never resubmitted
      run.enter("choose_provider");
      trail.observe(await session.model.getState(serviceId));
      run.record(await session.chooseProvider(serviceId, winner.bidIndex));
      run.mark("winner_chosen");

      run.enter("await_closed");
      await run.waitFor(`${serviceId} to close`, async () => {
        const state = trail.observe(await session.model.getState(serviceId));
        return state >= ServiceState.Closed ? state : undefined;
      });

      // 5) wait for the winner's confirmation
      run.enter("await_deployment");
      await run.waitFor(`${serviceId} to be deployed`, async () => {
        const state = trail.observe(await session.model.getState(serviceId));
        return state === ServiceState.Deployed ? state : undefined;
      });
      run.mark("confirm_deployment_received");

      // 6) hand-off
      run.enter("service_info");
      const info = await session.model.getServiceInfo(serviceId, false);
      if (info.view !== "consumer") {
        throw new FederationError(ErrorCode.INCONSISTENT, `expected the consumer view of ${serviceId}`);
      }

      if (this.deps.network) {
        run.enter("establish_connection");
        run.mark("establish_connection_with_provider_start");
        await this.deps.network.establishTunnel({
          serviceId,
          local: request.endpoint,
          remote: info.providerEndpoint,
          subnet: request.subnet,
        });
        run.mark("establish_connection_with_provider_finished");
      }

      run.log.info({ federatedHost: info.federatedHost }, "federation completed");
      return {
        ...run.summary(),
        role: "consumer",
        serviceId,
        bids,
        winner,
        federatedHost: info.federatedHost,
        providerEndpoint: info.providerEndpoint,
        states: trail.states.map(stateName),
      };
    } catch (e) {
      throw run.fail(e);
    } finally {
      session.endNegotiation(run.runId);
    }
  }
}
