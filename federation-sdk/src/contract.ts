import { ethers } from "ethers";
import WebSocket from "ws";
import { ErrorCode, FederationError, isFederationError } from "./errors.js";
import { componentLogger, type Logger } from "./logger.js";
import type {
  EventKind,
  FederationEvent,
  FederationLedger,
  Hex,
  LedgerDescription,
  RawBid,
  RawServiceInfo,
  SubmitCall,
  TxReceipt,
} from "./types.js";
import { endpointFields, endpointFromFields, formatRequirements, parseRequirements, stripPadding, toHex } from "./utils.js";

export const FEDERATION_ABI = [
  "function addOperator(bytes32 name)",
  "function removeOperator()",
  "function AnnounceService(bytes requirements, bytes32 id, bytes catalog, bytes topology, bytes nsdId, bytes nsId)",
  "function UpdateEndpoint(bool provider, bytes32 id, bytes catalog, bytes topology, bytes nsdId, bytes nsId)",
  "function PlaceBid(bytes32 id, uint256 price, bytes catalog, bytes topology, bytes nsdId, bytes nsId)",
  "function ChooseProvider(bytes32 id, uint256 bidIndex)",
  "function ServiceDeployed(bytes info, bytes32 id)",
  "function GetServiceState(bytes32 id) view returns (uint8)",
  "function GetBid(bytes32 id, uint256 index, address creator) view returns (address, uint256, uint256)",
  "function GetServiceInfo(bytes32 id, bool provider, address caller) view returns (bytes32, bytes, bytes, bytes, bytes, bytes)",
  "function isWinner(bytes32 id, address candidate) view returns (bool)",
  "event OperatorRegistered(address operator, bytes32 name)",
  "event OperatorRemoved(address operator)",
  "event ServiceAnnouncement(bytes requirements, bytes32 id)",
  "event NewBid(bytes32 _id, uint256 max_bid_index)",
  "event ServiceAnnouncementClosed(bytes32 _id)",
  "event ServiceDeployedEvent(bytes32 _id)",
];

export type EthersLedgerConfig = {
  /** http(s) or ws(s) node URL */
  rpcUrl: string;
  contractAddress: string;
  privateKey: string;
  logger?: Logger;
};

// ---- encoding ----

function bytes32(text: string): string {
  const raw = ethers.toUtf8Bytes(text);
  if (raw.length > 32) {
    throw FederationError.malformed(`"${text}" does not fit in bytes32`);
  }
  return ethers.zeroPadBytes(raw, 32);
}
const bytes = (text: string): Uint8Array => ethers.toUtf8Bytes(text);

function text(value: unknown, what: string): string {
  if (typeof value !== "string" || !ethers.isHexString(value)) {
    throw new FederationError(ErrorCode.ABI_MISMATCH, `${what}: expected bytes, got ${typeof value}`);
  }
  return stripPadding(ethers.toUtf8String(value));
}

function uint(value: unknown, what: string): bigint {
  if (typeof value !== "bigint") {
    throw new FederationError(ErrorCode.ABI_MISMATCH, `${what}: expected uint, got ${typeof value}`);
  }
  return value;
}

function address(value: unknown, what: string): Hex {
  if (typeof value !== "string" || !ethers.isAddress(value)) {
    throw new FederationError(ErrorCode.ABI_MISMATCH, `${what}: expected address`);
  }
  return toHex(ethers.getAddress(value));
}

function tuple(value: unknown, size: number, what: string): unknown[] {
  if (!(value instanceof ethers.Result) || value.length !== size) {
    throw new FederationError(ErrorCode.ABI_MISMATCH, `${what}: expected ${size} return values`);
  }
  return value.toArray();
}

/** Contract function name and arguments for a submit call. */
export function callArgs(call: SubmitCall): [string, unknown[]] {
  switch (call.kind) {
    case "RegisterDomain":
      return ["addOperator", [bytes32(call.domainName)]];
    case "UnregisterDomain":
      return ["removeOperator", []];
    case "AnnounceService":
      return [
        "AnnounceService",
        [bytes(formatRequirements(call.requirements)), bytes32(call.serviceId), ...endpointFields(call.endpoint).map(bytes)],
      ];
    case "UpdateEndpoint":
      return [
        "UpdateEndpoint",
        [call.asProvider, bytes32(call.serviceId), ...endpointFields(call.endpoint).map(bytes)],
      ];
    case "PlaceBid":
      return ["PlaceBid", [bytes32(call.serviceId), call.price, ...endpointFields(call.endpoint).map(bytes)]];
    case "ChooseProvider":
      return ["ChooseProvider", [bytes32(call.serviceId), call.bidIndex]];
    case "ServiceDeployed":
      return ["ServiceDeployed", [bytes(call.federatedHost), bytes32(call.serviceId)]];
  }
}

// ---- errors ----

function messageOf(e: unknown): string {
  if (ethers.isError(e, "CALL_EXCEPTION") && e.reason) return e.reason;
  return e instanceof Error ? e.message : String(e);
}

/** Maps ethers failures onto federation error codes. */
export function classifyLedgerError(e: unknown, what: string, mode: "submit" | "query"): FederationError {
  if (isFederationError(e)) return e;
  const message = `${what}: ${messageOf(e)}`;
  if (ethers.isError(e, "NETWORK_ERROR") || ethers.isError(e, "TIMEOUT") || ethers.isError(e, "SERVER_ERROR")) {
    return FederationError.unavailable(message, e);
  }
  if (ethers.isError(e, "NONCE_EXPIRED") || ethers.isError(e, "REPLACEMENT_UNDERPRICED")) {
    return FederationError.rejected(message, "nonce", e);
  }
  if (ethers.isError(e, "CALL_EXCEPTION")) {
    return mode === "query"
      ? new FederationError(ErrorCode.NOT_FOUND, message, { cause: e })
      : FederationError.rejected(message, "revert", e);
  }
  if (ethers.isError(e, "INSUFFICIENT_FUNDS")) {
    return FederationError.rejected(message, "unauthorized", e);
  }
  if (
    ethers.isError(e, "INVALID_ARGUMENT") ||
    ethers.isError(e, "UNSUPPORTED_OPERATION") ||
    ethers.isError(e, "BAD_DATA") ||
    ethers.isError(e, "BUFFER_OVERRUN") ||
    ethers.isError(e, "NUMERIC_FAULT")
  ) {
    return new FederationError(ErrorCode.ABI_MISMATCH, message, { cause: e });
  }
  return FederationError.unavailable(message, e);
}

/**
 * The Federation contract reached through ethers: a JsonRpcProvider for
 * http(s) nodes, a WebSocketProvider over `ws` for ws(s) nodes.
 */
export class EthersFederationLedger implements FederationLedger {
  readonly address: Hex;
  private readonly provider: ethers.JsonRpcProvider | ethers.WebSocketProvider;
  private readonly contract: ethers.Contract;
  private readonly log: Logger;

  constructor(private readonly cfg: EthersLedgerConfig) {
    this.log = componentLogger("ethers-ledger", cfg.logger);
    this.provider = /^wss?:\/\//i.test(cfg.rpcUrl)
      ? new ethers.WebSocketProvider(() => new WebSocket(cfg.rpcUrl))
      : new ethers.JsonRpcProvider(cfg.rpcUrl);
    const wallet = new ethers.Wallet(cfg.privateKey, this.provider);
    this.address = toHex(wallet.address);
    this.contract = new ethers.Contract(cfg.contractAddress, FEDERATION_ABI, wallet);
  }

  describe(): LedgerDescription {
    return {
      nodeUrl: this.cfg.rpcUrl,
      address: this.address,
      contractAddress: toHex(ethers.getAddress(this.cfg.contractAddress)),
    };
  }

  async transactionCount(account: Hex): Promise<number> {
    try {
      return await this.provider.getTransactionCount(account, "pending");
    } catch (e) {
      throw classifyLedgerError(e, "getTransactionCount", "query");
    }
  }

  async send(call: SubmitCall, nonce: number): Promise<Hex> {
    const [name, args] = callArgs(call);
    try {
      const tx = await this.contract.getFunction(name).send(...args, { nonce });
      this.log.debug({ fn: name, nonce, txHash: tx.hash }, "sent");
      return toHex(tx.hash);
    } catch (e) {
      throw classifyLedgerError(e, name, "submit");
    }
  }

  async serviceState(serviceId: string): Promise<number> {
    const raw = await this.view("GetServiceState", [bytes32(serviceId)]);
    return Number(uint(raw, "GetServiceState"));
  }

  async bid(serviceId: string, bidIndex: number, caller: Hex): Promise<RawBid> {
    const [provider, price, index] = tuple(
      await this.view("GetBid", [bytes32(serviceId), bidIndex, caller]),
      3,
      "GetBid"
    );
    return {
      providerAddr: address(provider, "GetBid provider"),
      price: uint(price, "GetBid price"),
      bidIndex: Number(uint(index, "GetBid index")),
    };
  }

  async serviceInfo(serviceId: string, asProvider: boolean, caller: Hex): Promise<RawServiceInfo> {
    const [id, host, catalog, topology, nsdId, nsId] = tuple(
      await this.view("GetServiceInfo", [bytes32(serviceId), asProvider, caller]),
      6,
      "GetServiceInfo"
    );
    return {
      serviceId: text(id, "GetServiceInfo id"),
      federatedHost: text(host, "GetServiceInfo host"),
      endpoint: endpointFromFields(
        text(catalog, "catalog"),
        text(topology, "topology"),
        text(nsdId, "nsd id"),
        text(nsId, "ns id")
      ),
    };
  }

  async isWinner(serviceId: string, candidate: Hex): Promise<boolean> {
    const raw = await this.view("isWinner", [bytes32(serviceId), candidate]);
    if (typeof raw !== "boolean") {
      throw new FederationError(ErrorCode.ABI_MISMATCH, "isWinner: expected bool");
    }
    return raw;
  }

  async blockNumber(): Promise<number> {
    try {
      return await this.provider.getBlockNumber();
    } catch (e) {
      throw classifyLedgerError(e, "getBlockNumber", "query");
    }
  }

  async events(kind: EventKind, fromBlock: number, toBlock: number): Promise<FederationEvent[]> {
    let logs: Array<ethers.EventLog | ethers.Log>;
    try {
      logs = await this.contract.queryFilter(kind, fromBlock, toBlock);
    } catch (e) {
      throw classifyLedgerError(e, `queryFilter ${kind}`, "query");
    }
    const out: FederationEvent[] = [];
    for (const log of logs) {
      if (!(log instanceof ethers.EventLog)) {
        this.log.warn({ kind, txHash: log.transactionHash }, "skipping undecodable log");
        continue;
      }
      out.push(decodeEvent(kind, log));
    }
    return out;
  }

  async receipt(txHash: Hex): Promise<TxReceipt | null> {
    let rc: ethers.TransactionReceipt | null;
    try {
      rc = await this.provider.getTransactionReceipt(txHash);
    } catch (e) {
      throw classifyLedgerError(e, "getTransactionReceipt", "query");
    }
    if (rc === null) return null;
    return {
      transactionHash: toHex(rc.hash),
      blockHash: toHex(rc.blockHash),
      blockNumber: rc.blockNumber,
      from: toHex(rc.from),
      to: rc.to === null ? null : toHex(rc.to),
      status: rc.status,
      gasUsed: rc.gasUsed,
      cumulativeGasUsed: rc.cumulativeGasUsed,
      logs: rc.logs.length,
    };
  }

  async close(): Promise<void> {
    await this.provider.destroy();
  }

  private async view(name: string, args: unknown[]): Promise<unknown> {
    try {
      const result: unknown = await this.contract.getFunction(name).staticCall(...args);
      return result;
    } catch (e) {
      throw classifyLedgerError(e, name, "query");
    }
  }
}

function decodeEvent(kind: EventKind, log: ethers.EventLog): FederationEvent {
  const meta = { txHash: toHex(log.transactionHash), blockNumber: log.blockNumber, logIndex: log.index };
  const args = log.args.toArray();
  switch (kind) {
    case "OperatorRegistered":
      return { ...meta, kind, operator: address(args[0], kind), name: text(args[1], kind) };
    case "OperatorRemoved":
      return { ...meta, kind, operator: address(args[0], kind) };
    case "ServiceAnnouncement":
      return { ...meta, kind, requirements: parseRequirements(text(args[0], kind)), serviceId: text(args[1], kind) };
    case "NewBid":
      return { ...meta, kind, serviceId: text(args[0], kind), bidCount: Number(uint(args[1], kind)) };
    case "ServiceAnnouncementClosed":
      return { ...meta, kind, serviceId: text(args[0], kind) };
    case "ServiceDeployedEvent":
      return { ...meta, kind, serviceId: text(args[0], kind) };
  }
}
