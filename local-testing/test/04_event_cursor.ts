import { expect } from "chai";
import { EventCursor, eventKey, InMemoryChain, LedgerClient } from "federation-sdk";
import { CONSUMER_ENDPOINT, NGINX, providerEndpoint, silent } from "../helpers/federation.js";

async function setup() {
  const chain = new InMemoryChain();
  const consumer = new LedgerClient(chain.account("consumer"), silent);
  const provider = new LedgerClient(chain.account("provider"), silent);
  await consumer.submit({ kind: "RegisterDomain", domainName: "consumer" }); // block 1
  await provider.submit({ kind: "RegisterDomain", domainName: "provider" }); // block 2
  return { chain, consumer, provider, cursor: new EventCursor(chain.account("observer"), silent) };
}

describe("Event cursor", () => {
  it("returns events of one kind in ledger order with their payload", async () => {
    const { consumer, provider, cursor } = await setup();
    await consumer.submit({ kind: "AnnounceService", serviceId: "s1", requirements: NGINX, endpoint: CONSUMER_ENDPOINT });
    await provider.submit({ kind: "PlaceBid", serviceId: "s1", price: 10n, endpoint: providerEndpoint(1) });
    await provider.submit({ kind: "PlaceBid", serviceId: "s1", price: 9n, endpoint: providerEndpoint(1) });

    const registered = await cursor.poll("OperatorRegistered", { fromBlock: 0 });
    expect(registered.map((e) => [e.name, e.blockNumber])).to.deep.equal([
      ["consumer", 1],
      ["provider", 2],
    ]);

    const bids = await cursor.poll("NewBid", { fromBlock: 0 });
    expect(bids.map((e) => [e.serviceId, e.bidCount, e.blockNumber])).to.deep.equal([
      ["s1", 1, 4],
      ["s1", 2, 5],
    ]);

    const [announcement] = await cursor.poll("ServiceAnnouncement", { lastBlocks: 3 });
    expect(announcement.serviceId).to.equal("s1");
    expect(announcement.requirements).to.deep.equal(NGINX);
  });

  it("honours block windows", async () => {
    const { consumer, cursor } = await setup();
    await consumer.submit({ kind: "AnnounceService", serviceId: "s1", requirements: NGINX, endpoint: CONSUMER_ENDPOINT });
    expect(await cursor.poll("OperatorRegistered", { fromBlock: 2, toBlock: 2 })).to.have.length(1);
    expect(await cursor.poll("OperatorRegistered", { lastBlocks: 0 })).to.have.length(0);
    expect(await cursor.poll("ServiceAnnouncement", "latest")).to.have.length(1);
    expect(await cursor.poll("ServiceAnnouncement", { fromBlock: 5, toBlock: 4 })).to.deep.equal([]);
  });

  it("re-delivers on overlapping polls but a subscription hands each event out once", async () => {
    const { consumer, provider, cursor } = await setup();
    await consumer.submit({ kind: "AnnounceService", serviceId: "s1", requirements: NGINX, endpoint: CONSUMER_ENDPOINT });

    const sub = await cursor.subscribe("NewBid");
    expect(sub.fromBlock).to.equal(3);
    expect(await sub.next()).to.deep.equal([]);

    await provider.submit({ kind: "PlaceBid", serviceId: "s1", price: 10n, endpoint: providerEndpoint(1) });
    const overlapA = await cursor.poll("NewBid", { fromBlock: 0 });
    const overlapB = await cursor.poll("NewBid", { fromBlock: 0 });
    expect(overlapA.map(eventKey)).to.deep.equal(overlapB.map(eventKey));

    const first = await sub.next();
    expect(first.map((e) => e.bidCount)).to.deep.equal([1]);
    expect(await sub.next()).to.deep.equal([]);

    await provider.submit({ kind: "PlaceBid", serviceId: "s1", price: 8n, endpoint: providerEndpoint(1) });
    expect((await sub.next()).map((e) => e.bidCount)).to.deep.equal([2]);
  });
});
