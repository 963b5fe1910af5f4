import { readFile, mkdir, writeFile } from "node:fs/promises";
import path from "node:path";
import { expect } from "chai";
import { ethers } from "ethers";
import { ConfigError, createLedger, ExperimentStore, HttpOrchestrator, loadConfig } from "federation-backend";
import {
  callArgs,
  classifyLedgerError,
  ErrorCode,
  FEDERATION_ABI,
  FederationError,
  rejectionReason,
} from "federation-sdk";
import { tempDir } from "../helpers/app.js";
import { rejection, silent } from "../helpers/federation.js";

type FetchCall = { url: string; method?: string; body?: unknown };

function fakeFetch(calls: FetchCall[], answer: () => Response): typeof fetch {
  return async (input, init) => {
    calls.push({
      url: String(input),
      method: init?.method,
      body: typeof init?.body === "string" ? JSON.parse(init.body) : undefined,
    });
    return answer();
  };
}

describe("Backend support", () => {
  it("numbers exported timelines one past the highest existing file", async () => {
    const dir = await tempDir("federation-exp-");
    const store = new ExperimentStore(dir);
    expect(await store.nextIndex("provider")).to.equal(1);

    await mkdir(path.join(dir, "provider"), { recursive: true });
    await writeFile(path.join(dir, "provider", "federation_events_provider_test_3.csv"), "step,timestamp\n");
    await writeFile(path.join(dir, "provider", "notes.txt"), "unrelated");

    const file = await store.export("provider", [
      { step: "announce_received", seconds: 0.5 },
      { step: "bid_offer_sent", seconds: 1.25 },
    ]);
    expect(file).to.equal(path.join(dir, "provider", "federation_events_provider_test_4.csv"));
    expect(await readFile(file, "utf8")).to.equal("step,timestamp\nannounce_received,0.5\nbid_offer_sent,1.25\n");
    expect(await store.nextIndex("consumer")).to.equal(1);
  });

  it("loads configuration with defaults for a memory ledger", () => {
    const cfg = loadConfig({ DOMAIN_FUNCTION: "provider", LEDGER_MODE: "memory", DOMAIN_NAME: "edge-2" });
    expect(cfg.role).to.equal("provider");
    expect(cfg.domainName).to.equal("edge-2");
    expect(cfg.ledger).to.deep.equal({ mode: "memory" });
    expect(cfg.port).to.equal(8000);
    expect(cfg.wait).to.deep.equal({ initialDelayMs: 250, maxDelayMs: 5000, timeoutMs: 600_000 });
    expect(cfg.lookbackBlocks).to.equal(20);
    expect(cfg.federationNet).to.equal("10.0.0.0/16");
    expect(cfg.orchestratorUrl).to.equal(undefined);

    const ledger = createLedger(cfg, silent);
    expect(ledger.describe().nodeUrl).to.equal("memory://federation");
  });

  it("lists every missing rpc setting in one ConfigError", () => {
    try {
      loadConfig({ DOMAIN_FUNCTION: "consumer", PORT: "9100" });
      expect.fail("should have thrown");
    } catch (e) {
      expect(e).to.be.instanceOf(ConfigError);
      if (!(e instanceof ConfigError)) return;
      expect(e.problems).to.deep.equal([
        "RPC_URL: required when LEDGER_MODE=rpc",
        "CONTRACT_ADDRESS: required when LEDGER_MODE=rpc",
        "PRIVATE_KEY: required when LEDGER_MODE=rpc",
      ]);
    }

    const rpc = loadConfig({
      DOMAIN_FUNCTION: "consumer",
      RPC_URL: "http://127.0.0.1:8545",
      CONTRACT_ADDRESS: `0x${"11".repeat(20)}`,
      PRIVATE_KEY: `0x${"22".repeat(32)}`,
      PORT: "9100",
    });
    expect(rpc.port).to.equal(9100);
    expect(rpc.ledger.mode).to.equal("rpc");
  });

  it("calls the orchestrator API for deploy, tunnel and teardown", async () => {
    const calls: FetchCall[] = [];
    const answers = [
      new Response(JSON.stringify({ federated_host: "10.0.3.4" }), { status: 200 }),
      new Response("", { status: 200 }),
      new Response("", { status: 200 }),
    ];
    const orchestrator = new HttpOrchestrator(
      "http://orchestrator.test/",
      silent,
      fakeFetch(calls, () => answers.shift() ?? new Response("", { status: 500 }))
    );

    expect(await orchestrator.deploy({ serviceId: "service7", descriptor: "nginx-nsd", replicas: 2 })).to.equal("10.0.3.4");
    await orchestrator.establishTunnel({
      serviceId: "service7",
      local: { serviceCatalogDb: "a", topologyDb: "b", nsdId: "c", nsId: "d" },
      remote: { serviceCatalogDb: "e", topologyDb: null, nsdId: null, nsId: null },
      subnet: "10.0.1.0/24",
    });
    await orchestrator.teardown("nginx service7");

    expect(calls).to.deep.equal([
      {
        url: "http://orchestrator.test/deploy",
        method: "POST",
        body: { service_id: "service7", descriptor: "nginx-nsd", replicas: 2 },
      },
      {
        url: "http://orchestrator.test/configure_router",
        method: "POST",
        body: {
          service_id: "service7",
          local_endpoint: { serviceCatalogDb: "a", topologyDb: "b", nsdId: "c", nsId: "d" },
          remote_endpoint: { serviceCatalogDb: "e", topologyDb: null, nsdId: null, nsId: null },
          subnet: "10.0.1.0/24",
          ip_range: "10.0.1.1-10.0.1.254",
        },
      },
      { url: "http://orchestrator.test/deploy/nginx%20service7", method: "DELETE", body: undefined },
    ]);
  });

  it("maps orchestrator failures to INTERNAL", async () => {
    const failing = new HttpOrchestrator(
      "http://orchestrator.test",
      silent,
      fakeFetch([], () => new Response("busy", { status: 502 }))
    );
    const status = await rejection(failing.deploy({ serviceId: "service7", descriptor: "x", replicas: 1 }));
    expect(status.code).to.equal(ErrorCode.INTERNAL);
    expect(status.message).to.equal("orchestrator POST /deploy failed with 502");
    expect(status.details).to.deep.equal({ status: 502 });

    const hostless = new HttpOrchestrator(
      "http://orchestrator.test",
      silent,
      fakeFetch([], () => new Response(JSON.stringify({ ok: true }), { status: 200 }))
    );
    const missing = await rejection(hostless.deploy({ serviceId: "service7", descriptor: "x", replicas: 1 }));
    expect(missing.message).to.equal("orchestrator answered /deploy without a federated_host");

    const down = new HttpOrchestrator("http://orchestrator.test", silent, async () => {
      throw new TypeError("fetch failed");
    });
    const unreachable = await rejection(down.teardown("svc"));
    expect(unreachable.code).to.equal(ErrorCode.INTERNAL);
    expect(unreachable.message).to.equal("orchestrator unreachable at http://orchestrator.test/deploy/svc");
  });

  it("classifies ethers failures by code and call mode", () => {
    const network = classifyLedgerError(ethers.makeError("socket hang up", "NETWORK_ERROR"), "PlaceBid", "submit");
    expect(network.code).to.equal(ErrorCode.LEDGER_UNAVAILABLE);
    expect(network.message.startsWith("PlaceBid: socket hang up")).to.equal(true);

    const nonce = classifyLedgerError(ethers.makeError("nonce used", "NONCE_EXPIRED"), "PlaceBid", "submit");
    expect(nonce.code).to.equal(ErrorCode.LEDGER_REJECTED);
    expect(rejectionReason(nonce)).to.equal("nonce");

    const revert = ethers.makeError("execution reverted", "CALL_EXCEPTION");
    expect(classifyLedgerError(revert, "GetBid", "query").code).to.equal(ErrorCode.NOT_FOUND);
    expect(rejectionReason(classifyLedgerError(revert, "ChooseProvider", "submit"))).to.equal("revert");

    const funds = classifyLedgerError(ethers.makeError("no gas money", "INSUFFICIENT_FUNDS"), "PlaceBid", "submit");
    expect(rejectionReason(funds)).to.equal("unauthorized");

    const decode = classifyLedgerError(ethers.makeError("could not decode", "BAD_DATA"), "GetServiceState", "query");
    expect(decode.code).to.equal(ErrorCode.ABI_MISMATCH);

    const overrun = classifyLedgerError(ethers.makeError("padding exceeds data length", "BUFFER_OVERRUN"), "GetBid", "query");
    expect(overrun.code).to.equal(ErrorCode.ABI_MISMATCH);
    const numeric = classifyLedgerError(ethers.makeError("value out-of-bounds", "NUMERIC_FAULT"), "PlaceBid", "submit");
    expect(numeric.code).to.equal(ErrorCode.ABI_MISMATCH);

    const already = FederationError.notFound("service1");
    expect(classifyLedgerError(already, "GetServiceState", "query")).to.equal(already);
    expect(classifyLedgerError(new Error("odd"), "x", "query").code).to.equal(ErrorCode.LEDGER_UNAVAILABLE);
  });

  it("encodes submit calls against the contract ABI", () => {
    const iface = new ethers.Interface(FEDERATION_ABI);
    expect(iface.getFunction("ChooseProvider")?.format()).to.equal("ChooseProvider(bytes32,uint256)");
    expect(iface.getEvent("NewBid")?.format()).to.equal("NewBid(bytes32,uint256)");

    const [name, args] = callArgs({ kind: "ChooseProvider", serviceId: "service1", bidIndex: 2 });
    expect(name).to.equal("ChooseProvider");
    const decoded = iface.decodeFunctionData(name, iface.encodeFunctionData(name, args));
    expect(ethers.decodeBytes32String(decoded[0])).to.equal("service1");
    expect(decoded[1]).to.equal(2n);

    const [deployed, deployArgs] = callArgs({ kind: "ServiceDeployed", serviceId: "service1", federatedHost: "10.0.1.5" });
    const host = iface.decodeFunctionData(deployed, iface.encodeFunctionData(deployed, deployArgs));
    expect(ethers.toUtf8String(host[0])).to.equal("10.0.1.5");
    expect(callArgs({ kind: "UnregisterDomain" })).to.deep.equal(["removeOperator", []]);

    try {
      callArgs({ kind: "ChooseProvider", serviceId: "s".repeat(33), bidIndex: 0 });
      expect.fail("should have thrown");
    } catch (e) {
      expect(e).to.be.instanceOf(FederationError);
      if (!(e instanceof FederationError)) return;
      expect(e.code).to.equal(ErrorCode.MALFORMED_INPUT);
      expect(e.message).to.equal(`"${"s".repeat(33)}" does not fit in bytes32`);
    }
  });
});
