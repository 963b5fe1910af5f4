import { expect } from "chai";
import { ErrorCode, InMemoryChain, LedgerClient, rejectionReason, type SubmitCall } from "federation-sdk";
import { rejection, silent } from "../helpers/federation.js";

const register = (name: string): SubmitCall => ({ kind: "RegisterDomain", domainName: name });

describe("Ledger client nonce discipline", () => {
  it("seeds the nonce from the ledger and advances once per accepted submission", async () => {
    const chain = new InMemoryChain();
    const client = new LedgerClient(chain.account("consumer"), silent);
    expect(client.currentNonce).to.equal(null);

    const first = await client.submit(register("consumer"));
    const second = await client.submit({ kind: "UnregisterDomain" });

    expect([first.nonce, second.nonce]).to.deep.equal([0, 1]);
    expect(client.currentNonce).to.equal(2);
    expect(chain.nonceOf(client.address)).to.equal(2);
    expect(client.history.map((t) => t.call)).to.deep.equal(["RegisterDomain", "UnregisterDomain"]);
  });

  it("serializes concurrent submissions so nonces never collide", async () => {
    const chain = new InMemoryChain();
    const client = new LedgerClient(chain.account("consumer"), silent);
    await client.submit(register("consumer"));

    const ids = ["service-a", "service-b", "service-c", "service-d"];
    const handles = await Promise.all(
      ids.map((serviceId) =>
        client.submit({
          kind: "AnnounceService",
          serviceId,
          requirements: { serviceType: "nginx", bandwidthGbps: null, rttLatencyMs: null, computeCpus: null, computeRamGb: null },
          endpoint: { serviceCatalogDb: null, topologyDb: null, nsdId: null, nsId: null },
        })
      )
    );
    expect(handles.map((h) => h.nonce)).to.deep.equal([1, 2, 3, 4]);
  });

  it("surfaces a rejection without consuming the nonce", async () => {
    const chain = new InMemoryChain();
    const client = new LedgerClient(chain.account("provider"), silent);

    // unregistering an unknown domain is refused by the contract
    const err = await rejection(client.submit({ kind: "UnregisterDomain" }));
    expect(err.code).to.equal(ErrorCode.LEDGER_REJECTED);
    expect(rejectionReason(err)).to.equal("unauthorized");
    expect(client.currentNonce).to.equal(0);

    const ok = await client.submit(register("provider"));
    expect(ok.nonce).to.equal(0);
  });

  it("reports a nonce conflict without retrying, then re-reads the nonce for the next call", async () => {
    const chain = new InMemoryChain();
    const ledger = chain.account("consumer");
    const client = new LedgerClient(ledger, silent);
    await client.submit(register("consumer"));

    // another process using the same account moves the ledger's nonce
    await ledger.send({ kind: "UnregisterDomain" }, 1);

    const err = await rejection(client.submit(register("consumer")));
    expect(err.code).to.equal(ErrorCode.LEDGER_REJECTED);
    expect(rejectionReason(err)).to.equal("nonce");
    expect(err.message).to.equal("nonce too low: expected 2, got 1");
    expect(client.history).to.have.length(1);
    expect(client.currentNonce).to.equal(null);
    expect(chain.nonceOf(client.address)).to.equal(2);

    const next = await client.submit(register("consumer"));
    expect(next.nonce).to.equal(2);
    expect(client.history.map((t) => t.call)).to.deep.equal(["RegisterDomain", "RegisterDomain"]);

    await ledger.send({ kind: "UnregisterDomain" }, 3);
    expect(await client.resyncNonce()).to.equal(4);
  });

  it("classifies foreign failures as the ledger being unavailable", async () => {
    const chain = new InMemoryChain();
    const client = new LedgerClient(chain.account("consumer"), silent);
    chain.failNextSubmit(new Error("socket hang up"));

    const err = await rejection(client.submit(register("consumer")));
    expect(err.code).to.equal(ErrorCode.LEDGER_UNAVAILABLE);
    expect(err.message).to.equal("submitting RegisterDomain: socket hang up");
    expect(err.status).to.equal(503);
    expect(client.currentNonce).to.equal(null);
    expect((await client.submit(register("consumer"))).nonce).to.equal(0);

    chain.offline = true;
    const down = await rejection(client.getServiceState("service1"));
    expect(down.code).to.equal(ErrorCode.LEDGER_UNAVAILABLE);
    expect(down.message).to.equal("memory://federation is not reachable");
  });

  it("answers queries without touching the nonce", async () => {
    const chain = new InMemoryChain();
    const client = new LedgerClient(chain.account("consumer"), silent);
    const err = await rejection(client.getServiceState("missing"));
    expect(err.code).to.equal(ErrorCode.NOT_FOUND);
    expect(client.currentNonce).to.equal(null);
    expect(await client.receipt("0x1234")).to.equal(null);
  });
});
