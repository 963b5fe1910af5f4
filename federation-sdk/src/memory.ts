import { dataSlice, getAddress, id } from "ethers";
import { ErrorCode, FederationError } from "./errors.js";
import {
  ServiceState,
  type EndpointInfo,
  type EventKind,
  type EventMeta,
  type FederationEvent,
  type FederationLedger,
  type Hex,
  type LedgerDescription,
  type RawBid,
  type RawServiceInfo,
  type SubmitCall,
  type TxReceipt,
} from "./types.js";
import { EMPTY_ENDPOINT, formatRequirements, parseRequirements, toHex } from "./utils.js";

type DistributiveOmit<T, K extends PropertyKey> = T extends unknown ? Omit<T, K> : never;
type EventBody = DistributiveOmit<FederationEvent, keyof EventMeta>;

type StoredBid = {
  provider: Hex;
  price: bigint;
  endpoint: EndpointInfo;
};

export type ServiceRecord = {
  consumer: Hex;
  requirements: string;
  consumerEndpoint: EndpointInfo;
  providerEndpoint: EndpointInfo;
  state: ServiceState;
  bids: StoredBid[];
  winner: Hex | null;
  federatedHost: string;
};

/** Deterministic account address for a label, e.g. "consumer" or "provider-1". */
export function addressFor(label: string): Hex {
  return toHex(getAddress(dataSlice(id(label), 12)));
}

function same(a: Hex, b: Hex): boolean {
  return a.toLowerCase() === b.toLowerCase();
}

function fitsBytes32(value: string, what: string): void {
  if (Buffer.byteLength(value, "utf8") > 32) {
    throw new FederationError(ErrorCode.ABI_MISMATCH, `${what} does not fit in bytes32`);
  }
}

/**
 * Shared state of an in-process Federation contract: operators, services,
 * bids, account nonces and an event log. One transaction is one block.
 * Domains talk to it through `account(label)`.
 */
export class InMemoryChain {
  readonly contractAddress: Hex;
  readonly nodeUrl = "memory://federation";
  /** While set, every call fails as if the node were unreachable. */
  offline = false;

  private height = 0;
  private readonly operators = new Map<string, string>();
  private readonly nonces = new Map<string, number>();
  private readonly services = new Map<string, ServiceRecord>();
  private readonly logs: FederationEvent[] = [];
  private readonly receipts = new Map<string, TxReceipt>();
  private readonly faults: Error[] = [];

  constructor(label = "federation-contract") {
    this.contractAddress = addressFor(label);
  }

  account(label: string): InMemoryFederationLedger {
    return new InMemoryFederationLedger(this, addressFor(label));
  }

  /** Makes the next submission (from any account) fail with `error`. */
  failNextSubmit(error: Error): void {
    this.faults.push(error);
  }

  get blockHeight(): number {
    return this.height;
  }

  get eventLog(): readonly FederationEvent[] {
    return this.logs;
  }

  ensureOnline(): void {
    if (this.offline) throw FederationError.unavailable(`${this.nodeUrl} is not reachable`);
  }

  nonceOf(address: Hex): number {
    return this.nonces.get(address.toLowerCase()) ?? 0;
  }

  execute(from: Hex, call: SubmitCall, nonce: number): Hex {
    this.ensureOnline();
    const fault = this.faults.shift();
    if (fault) throw fault;

    const expected = this.nonceOf(from);
    if (nonce !== expected) {
      const hint = nonce < expected ? "nonce too low" : "nonce too high";
      throw FederationError.rejected(`${hint}: expected ${expected}, got ${nonce}`, "nonce");
    }

    // rules run before anything is written, so a rejected call leaves no trace
    const bodies = this.apply(from, call);

    this.nonces.set(from.toLowerCase(), expected + 1);
    this.height += 1;
    const txHash = toHex(id(`${from}:${nonce}:${this.height}`));
    bodies.forEach((body, logIndex) => {
      this.logs.push({ ...body, txHash, blockNumber: this.height, logIndex });
    });
    this.receipts.set(txHash, {
      transactionHash: txHash,
      blockHash: toHex(id(`block:${this.height}`)),
      blockNumber: this.height,
      from,
      to: this.contractAddress,
      status: 1,
      gasUsed: 21000n,
      cumulativeGasUsed: 21000n,
      logs: bodies.length,
    });
    return txHash;
  }

  private apply(from: Hex, call: SubmitCall): EventBody[] {
    switch (call.kind) {
      case "RegisterDomain": {
        fitsBytes32(call.domainName, "domain name");
        if (this.operators.has(from.toLowerCase())) {
          throw FederationError.rejected("Domain already registered", "state");
        }
        return this.commit(() => this.operators.set(from.toLowerCase(), call.domainName), {
          kind: "OperatorRegistered",
          operator: from,
          name: call.domainName,
        });
      }
      case "UnregisterDomain": {
        this.requireOperator(from);
        return this.commit(() => this.operators.delete(from.toLowerCase()), {
          kind: "OperatorRemoved",
          operator: from,
        });
      }
      case "AnnounceService": {
        this.requireOperator(from);
        fitsBytes32(call.serviceId, "service id");
        if (this.services.has(call.serviceId)) {
          throw FederationError.rejected(`Service ${call.serviceId} already exists`, "state");
        }
        const requirements = formatRequirements(call.requirements);
        return this.commit(
          () =>
            this.services.set(call.serviceId, {
              consumer: from,
              requirements,
              consumerEndpoint: call.endpoint,
              providerEndpoint: EMPTY_ENDPOINT,
              state: ServiceState.Open,
              bids: [],
              winner: null,
              federatedHost: "",
            }),
          { kind: "ServiceAnnouncement", serviceId: call.serviceId, requirements: parseRequirements(requirements) }
        );
      }
      case "UpdateEndpoint": {
        this.requireOperator(from);
        const service = this.requireServiceForSubmit(call.serviceId);
        if (call.asProvider) {
          if (service.winner === null || !same(service.winner, from)) {
            throw FederationError.rejected("Only the winning provider can update its endpoint", "unauthorized");
          }
          service.providerEndpoint = call.endpoint;
        } else {
          if (!same(service.consumer, from)) {
            throw FederationError.rejected("Only the consumer can update its endpoint", "unauthorized");
          }
          service.consumerEndpoint = call.endpoint;
        }
        return [];
      }
      case "PlaceBid": {
        this.requireOperator(from);
        const service = this.requireServiceForSubmit(call.serviceId);
        if (service.state !== ServiceState.Open) {
          throw FederationError.rejected(`Service ${call.serviceId} is not open for bids`, "state");
        }
        return this.commit(
          () => service.bids.push({ provider: from, price: call.price, endpoint: call.endpoint }),
          { kind: "NewBid", serviceId: call.serviceId, bidCount: service.bids.length + 1 }
        );
      }
      case "ChooseProvider": {
        this.requireOperator(from);
        const service = this.requireServiceForSubmit(call.serviceId);
        if (!same(service.consumer, from)) {
          throw FederationError.rejected("Only the consumer can choose a provider", "unauthorized");
        }
        if (service.state !== ServiceState.Open) {
          throw FederationError.rejected(`Service ${call.serviceId} is already closed`, "state");
        }
        const bid = service.bids[call.bidIndex];
        if (bid === undefined) {
          throw FederationError.rejected(`Bid ${call.bidIndex} does not exist`, "revert");
        }
        return this.commit(
          () => {
            service.state = ServiceState.Closed;
            service.winner = bid.provider;
            service.providerEndpoint = bid.endpoint;
          },
          { kind: "ServiceAnnouncementClosed", serviceId: call.serviceId }
        );
      }
      case "ServiceDeployed": {
        this.requireOperator(from);
        const service = this.requireServiceForSubmit(call.serviceId);
        if (service.state !== ServiceState.Closed) {
          throw FederationError.rejected(`Service ${call.serviceId} is not awaiting deployment`, "state");
        }
        if (service.winner === null || !same(service.winner, from)) {
          throw FederationError.rejected("Only the winning provider can confirm deployment", "unauthorized");
        }
        return this.commit(
          () => {
            service.state = ServiceState.Deployed;
            service.federatedHost = call.federatedHost;
          },
          { kind: "ServiceDeployedEvent", serviceId: call.serviceId }
        );
      }
    }
  }

  private commit(write: () => unknown, event: EventBody): EventBody[] {
    write();
    return [event];
  }

  private requireOperator(address: Hex): void {
    if (!this.operators.has(address.toLowerCase())) {
      throw FederationError.rejected("Domain is not registered as an operator", "unauthorized");
    }
  }

  private requireServiceForSubmit(serviceId: string): ServiceRecord {
    const service = this.services.get(serviceId);
    if (!service) throw FederationError.rejected(`Service ${serviceId} does not exist`, "revert");
    return service;
  }

  // ---- views ----

  service(serviceId: string): ServiceRecord {
    this.ensureOnline();
    const service = this.services.get(serviceId);
    if (!service) throw FederationError.notFound(`service ${serviceId}`);
    return service;
  }

  bid(serviceId: string, bidIndex: number, caller: Hex): RawBid {
    const service = this.service(serviceId);
    if (!same(service.consumer, caller)) {
      throw FederationError.rejected("Only the consumer can read bids", "unauthorized");
    }
    const bid = service.bids[bidIndex];
    if (bid === undefined) throw FederationError.notFound(`bid ${bidIndex} of ${serviceId}`);
    return { providerAddr: bid.provider, price: bid.price, bidIndex };
  }

  serviceInfo(serviceId: string, asProvider: boolean, caller: Hex): RawServiceInfo {
    const service = this.service(serviceId);
    if (asProvider) {
      if (service.winner === null || !same(service.winner, caller)) {
        throw FederationError.rejected("Only the winning provider can read the consumer endpoint", "unauthorized");
      }
      return { serviceId, federatedHost: service.federatedHost, endpoint: service.consumerEndpoint };
    }
    if (!same(service.consumer, caller)) {
      throw FederationError.rejected("Only the consumer can read the provider endpoint", "unauthorized");
    }
    return { serviceId, federatedHost: service.federatedHost, endpoint: service.providerEndpoint };
  }

  events(kind: EventKind, fromBlock: number, toBlock: number): FederationEvent[] {
    this.ensureOnline();
    return this.logs.filter((e) => e.kind === kind && e.blockNumber >= fromBlock && e.blockNumber <= toBlock);
  }

  receipt(txHash: Hex): TxReceipt | null {
    this.ensureOnline();
    return this.receipts.get(txHash) ?? null;
  }
}

/** One account's connection to an InMemoryChain. */
export class InMemoryFederationLedger implements FederationLedger {
  constructor(readonly chain: InMemoryChain, readonly address: Hex) {}

  describe(): LedgerDescription {
    return { nodeUrl: this.chain.nodeUrl, address: this.address, contractAddress: this.chain.contractAddress };
  }

  async transactionCount(address: Hex): Promise<number> {
    this.chain.ensureOnline();
    return this.chain.nonceOf(address);
  }

  async send(call: SubmitCall, nonce: number): Promise<Hex> {
    return this.chain.execute(this.address, call, nonce);
  }

  async serviceState(serviceId: string): Promise<number> {
    return this.chain.service(serviceId).state;
  }

  async bid(serviceId: string, bidIndex: number, caller: Hex): Promise<RawBid> {
    return this.chain.bid(serviceId, bidIndex, caller);
  }

  async serviceInfo(serviceId: string, asProvider: boolean, caller: Hex): Promise<RawServiceInfo> {
    return this.chain.serviceInfo(serviceId, asProvider, caller);
  }

  async isWinner(serviceId: string, candidate: Hex): Promise<boolean> {
    const { winner } = this.chain.service(serviceId);
    return winner !== null && same(winner, candidate);
  }

  async blockNumber(): Promise<number> {
    this.chain.ensureOnline();
    return this.chain.blockHeight;
  }

  async events(kind: EventKind, fromBlock: number, toBlock: number): Promise<FederationEvent[]> {
    return this.chain.events(kind, fromBlock, toBlock);
  }

  async receipt(txHash: Hex): Promise<TxReceipt | null> {
    return this.chain.receipt(txHash);
  }
}
