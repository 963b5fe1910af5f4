import { expect } from "chai";
import {
  ConsumerOrchestrator,
  ErrorCode,
  InMemoryChain,
  matchesCapability,
  pollUntil,
  ProviderOrchestrator,
  ServiceState,
  type DomainSession,
  type ProviderOutcome,
} from "federation-sdk";
import {
  CONSUMER_ENDPOINT,
  FAST_WAIT,
  NGINX,
  providerEndpoint,
  RecordingDeployment,
  RecordingNetwork,
  registeredDomain,
  rejection,
} from "../helpers/federation.js";

describe("Provider orchestrator", () => {
  it("matches capabilities: type, floors, latency ceiling, unset fields", () => {
    expect(matchesCapability(NGINX, {})).to.equal(true);
    expect(matchesCapability(NGINX, { serviceType: " NGINX " })).to.equal(true);
    expect(matchesCapability(NGINX, { serviceType: "k8s" })).to.equal(false);
    expect(matchesCapability(NGINX, { bandwidthGbps: 10, computeCpus: 8, computeRamGb: 4 })).to.equal(true);
    expect(matchesCapability(NGINX, { bandwidthGbps: 9 })).to.equal(false);
    expect(matchesCapability(NGINX, { computeRamGb: 2 })).to.equal(false);
    expect(matchesCapability(NGINX, { rttLatencyMs: 20 })).to.equal(true);
    expect(matchesCapability(NGINX, { rttLatencyMs: 25 })).to.equal(false);
    expect(matchesCapability({ ...NGINX, rttLatencyMs: null }, { rttLatencyMs: 500 })).to.equal(true);
  });

  it("runs a full federation: the cheaper provider deploys, the other is not chosen", async () => {
    const chain = new InMemoryChain();
    const consumer = await registeredDomain(chain, "consumer");
    const cheap = await registeredDomain(chain, "provider1");
    const dear = await registeredDomain(chain, "provider2");
    const cheapDeploy = new RecordingDeployment("10.0.1.5");
    const dearDeploy = new RecordingDeployment("10.0.2.5");
    const network = new RecordingNetwork();

    const providerRuns = [
      new ProviderOrchestrator(cheap, { deployment: cheapDeploy, network }).run({
        price: 30,
        endpoint: providerEndpoint(1),
        capability: { serviceType: "nginx" },
        wait: FAST_WAIT,
        subnet: "10.0.1.0/24",
      }),
      new ProviderOrchestrator(dear, { deployment: dearDeploy }).run({
        price: 50,
        endpoint: providerEndpoint(2),
        wait: FAST_WAIT,
      }),
    ];
    const consumerRun = new ConsumerOrchestrator(consumer).run({
      requirements: NGINX,
      endpoint: CONSUMER_ENDPOINT,
      quorum: 2,
      wait: FAST_WAIT,
    });

    const [won, lost] = await Promise.all(providerRuns);
    const consumed = await consumerRun;

    expect(won.outcome).to.equal("deployed");
    expect(lost.outcome).to.equal("not_chosen");
    expect(consumed.winner.providerAddr).to.equal(cheap.address);
    expect(consumed.federatedHost).to.equal("10.0.1.5");

    if (won.outcome !== "deployed") throw new Error("unreachable");
    expect(won.federatedHost).to.equal("10.0.1.5");
    expect(won.consumerEndpoint).to.deep.equal(CONSUMER_ENDPOINT);
    expect(won.transactions.map((t) => t.call)).to.deep.equal(["PlaceBid", "ServiceDeployed"]);
    expect(won.timeline.map((m) => m.step)).to.deep.equal([
      "announce_received",
      "bid_offer_sent",
      "winner_received",
      "deployment_start",
      "deployment_finished",
      "confirm_deployment_sent",
      "establish_connection_with_consumer_start",
      "establish_connection_with_consumer_finished",
    ]);
    expect(cheapDeploy.deployed).to.deep.equal([{ serviceId: won.serviceId, descriptor: "nginx-nsd", replicas: 1 }]);
    expect(network.tunnels).to.deep.equal([
      { serviceId: won.serviceId, local: providerEndpoint(1), remote: CONSUMER_ENDPOINT, subnet: "10.0.1.0/24" },
    ]);

    expect(lost.timeline.map((m) => m.step)).to.deep.equal([
      "announce_received",
      "bid_offer_sent",
      "winner_received",
      "other_provider_chosen",
    ]);
    expect(lost.transactions.map((t) => t.call)).to.deep.equal(["PlaceBid"]);
    expect(dearDeploy.deployed).to.deep.equal([]);
    expect(await consumer.model.getState(consumed.serviceId)).to.equal(ServiceState.Deployed);
  });

  it("falls back to the service type when the consumer names no descriptor", async () => {
    const chain = new InMemoryChain();
    const consumer = await registeredDomain(chain, "consumer");
    const provider = await registeredDomain(chain, "provider1");
    const deployment = new RecordingDeployment();

    const run = new ProviderOrchestrator(provider, { deployment }).run({
      price: 7,
      endpoint: providerEndpoint(1),
      wait: FAST_WAIT,
      replicas: 3,
    });
    const { serviceId } = await consumer.announce(NGINX, { ...CONSUMER_ENDPOINT, nsdId: null });
    await waitForBid(consumer, serviceId);
    await consumer.chooseProvider(serviceId, 0);

    const outcome: ProviderOutcome = await run;
    expect(outcome.outcome).to.equal("deployed");
    expect(deployment.deployed).to.deep.equal([{ serviceId, descriptor: "nginx", replicas: 3 }]);
  });

  it("skips announcements it cannot serve and times out in discovery", async () => {
    const chain = new InMemoryChain();
    const consumer = await registeredDomain(chain, "consumer");
    const provider = await registeredDomain(chain, "provider1");
    const deployment = new RecordingDeployment();

    const run = new ProviderOrchestrator(provider, { deployment }).run({
      price: 7,
      endpoint: providerEndpoint(1),
      capability: { serviceType: "k8s" },
      wait: { ...FAST_WAIT, timeoutMs: 120 },
    });
    await consumer.announce(NGINX, CONSUMER_ENDPOINT);

    const err = await rejection(run);
    expect(err.code).to.equal(ErrorCode.TIMEOUT);
    expect(err.step).to.equal("discover");
    expect(provider.client.history.map((t) => t.call)).to.deep.equal(["RegisterDomain"]);
  });

  it("ignores services that are no longer open", async () => {
    const chain = new InMemoryChain();
    const consumer = await registeredDomain(chain, "consumer");
    const early = await registeredDomain(chain, "provider1");
    const late = await registeredDomain(chain, "provider2");

    const { serviceId } = await consumer.announce(NGINX, CONSUMER_ENDPOINT);
    await early.placeBid(serviceId, 10, providerEndpoint(1));
    await consumer.chooseProvider(serviceId, 0);

    const err = await rejection(
      new ProviderOrchestrator(late, { deployment: new RecordingDeployment() }).run({
        price: 1,
        endpoint: providerEndpoint(2),
        serviceId,
        wait: { ...FAST_WAIT, timeoutMs: 80 },
      })
    );
    expect(err.code).to.equal(ErrorCode.TIMEOUT);
    expect(err.step).to.equal("discover");
  });
});

async function waitForBid(consumer: DomainSession, serviceId: string): Promise<void> {
  const bids = await consumer.cursor.subscribe("NewBid", { fromBlock: 0 });
  await pollUntil(
    async () => ((await bids.next()).some((e) => e.serviceId === serviceId) ? true : undefined),
    { what: "a bid", ...FAST_WAIT }
  );
}
