export type Hex = `0x${string}`;

export type Role = "consumer" | "provider";

/** On-ledger lifecycle of a federated service. Values match the contract's uint8. */
export enum ServiceState {
  Open = 0,
  Closed = 1,
  Deployed = 2,
}

// Every field may be unset (travels as "None" on the ledger)
export type ServiceRequirements = {
  serviceType: string | null;
  bandwidthGbps: number | null;
  rttLatencyMs: number | null;
  computeCpus: number | null;
  computeRamGb: number | null;
};

export type EndpointInfo = {
  serviceCatalogDb: string | null;
  topologyDb: string | null;
  nsdId: string | null;
  nsId: string | null;
};

export type Bid = {
  serviceId: string;
  bidIndex: number;
  providerAddr: Hex;
  price: bigint;
};

/**
 * What GetServiceInfo hands back depends on who asks: the consumer sees the
 * winner's endpoint and the federated host, the provider sees only the
 * consumer's endpoint.
 */
export type ServiceInfo =
  | {
      view: "consumer";
      serviceId: string;
      federatedHost: string | null;
      providerEndpoint: EndpointInfo;
    }
  | {
      view: "provider";
      serviceId: string;
      consumerEndpoint: EndpointInfo;
    };

// ---- ledger calls ----

export type SubmitCall =
  | { kind: "RegisterDomain"; domainName: string }
  | { kind: "UnregisterDomain" }
  | {
      kind: "AnnounceService";
      serviceId: string;
      requirements: ServiceRequirements;
      endpoint: EndpointInfo;
    }
  | {
      kind: "UpdateEndpoint";
      serviceId: string;
      asProvider: boolean;
      endpoint: EndpointInfo;
    }
  | { kind: "PlaceBid"; serviceId: string; price: bigint; endpoint: EndpointInfo }
  | { kind: "ChooseProvider"; serviceId: string; bidIndex: number }
  | { kind: "ServiceDeployed"; serviceId: string; federatedHost: string };

export type SubmitKind = SubmitCall["kind"];

export type TxHandle = {
  hash: Hex;
  nonce: number;
  call: SubmitKind;
};

export type TxReceipt = {
  transactionHash: Hex;
  blockHash: Hex;
  blockNumber: number;
  from: Hex;
  to: Hex | null;
  status: number | null;
  gasUsed: bigint;
  cumulativeGasUsed: bigint;
  logs: number;
};

export type RawBid = {
  providerAddr: Hex;
  price: bigint;
  bidIndex: number;
};

export type RawServiceInfo = {
  serviceId: string;
  federatedHost: string;
  endpoint: EndpointInfo;
};

// ---- events ----

export type EventMeta = {
  txHash: Hex;
  blockNumber: number;
  logIndex: number;
};

export type FederationEvent =
  | (EventMeta & { kind: "OperatorRegistered"; operator: Hex; name: string })
  | (EventMeta & { kind: "OperatorRemoved"; operator: Hex })
  | (EventMeta & {
      kind: "ServiceAnnouncement";
      serviceId: string;
      requirements: ServiceRequirements;
    })
  // bidCount is the number of bids recorded so far (the contract calls it max_bid_index)
  | (EventMeta & { kind: "NewBid"; serviceId: string; bidCount: number })
  | (EventMeta & { kind: "ServiceAnnouncementClosed"; serviceId: string })
  | (EventMeta & { kind: "ServiceDeployedEvent"; serviceId: string });

export type EventKind = FederationEvent["kind"];

export type EventOf<K extends EventKind> = Extract<FederationEvent, { kind: K }>;

export const EVENT_KINDS = [
  "OperatorRegistered",
  "OperatorRemoved",
  "ServiceAnnouncement",
  "NewBid",
  "ServiceAnnouncementClosed",
  "ServiceDeployedEvent",
] as const satisfies readonly EventKind[];

export type LedgerDescription = {
  nodeUrl: string;
  address: Hex;
  contractAddress: Hex;
};

/**
 * Port to the Federation contract. Implementations classify their failures
 * into FederationError codes; anything else reaching the client is treated
 * as the ledger being unavailable.
 */
export interface FederationLedger {
  readonly address: Hex;
  describe(): LedgerDescription;

  transactionCount(address: Hex): Promise<number>;
  send(call: SubmitCall, nonce: number): Promise<Hex>;

  serviceState(serviceId: string): Promise<number>;
  bid(serviceId: string, bidIndex: number, caller: Hex): Promise<RawBid>;
  serviceInfo(serviceId: string, asProvider: boolean, caller: Hex): Promise<RawServiceInfo>;
  isWinner(serviceId: string, candidate: Hex): Promise<boolean>;

  blockNumber(): Promise<number>;
  events(kind: EventKind, fromBlock: number, toBlock: number): Promise<FederationEvent[]>;
  receipt(txHash: Hex): Promise<TxReceipt | null>;
}
