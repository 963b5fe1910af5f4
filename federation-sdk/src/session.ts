import { EventCursor } from "./cursor.js";
import { ErrorCode, FederationError } from "./errors.js";
import { LedgerClient } from "./ledger.js";
import { componentLogger, type Logger } from "./logger.js";
import { ServiceLedgerModel } from "./model.js";
import { stateName, validateTransition } from "./state-machine.js";
import {
  ServiceState,
  type EndpointInfo,
  type FederationLedger,
  type Hex,
  type Role,
  type ServiceRequirements,
  type TxHandle,
} from "./types.js";
import {
  serviceIdFactory,
  validateEndpoint,
  validatePrice,
  validateRequirements,
  validateServiceId,
  type IdFactory,
} from "./utils.js";

export type SessionOptions = {
  logger?: Logger;
  idFactory?: IdFactory;
  /** Set when the account is known to be registered already (e.g. after a restart). */
  registered?: boolean;
};

export type Announcement = {
  serviceId: string;
  tx: TxHandle;
};

/**
 * One domain identity talking to the ledger. Everything that submits goes
 * through the single LedgerClient here, which makes this object the owner
 * of the account's nonce and of the domain's in-flight negotiations.
 */
export class DomainSession {
  readonly client: LedgerClient;
  readonly model: ServiceLedgerModel;
  readonly cursor: EventCursor;
  readonly logger: Logger;

  private registered: boolean;
  private readonly inFlight = new Map<string, Role>();
  private readonly nextServiceId: IdFactory;
  private readonly log: Logger;

  constructor(readonly ledger: FederationLedger, opts: SessionOptions = {}) {
    this.logger = opts.logger ?? componentLogger("federation");
    this.client = new LedgerClient(ledger, this.logger);
    this.model = new ServiceLedgerModel(this.client);
    this.cursor = new EventCursor(ledger, this.logger);
    this.registered = opts.registered ?? false;
    this.nextServiceId = opts.idFactory ?? serviceIdFactory();
    this.log = componentLogger("session", this.logger);
  }

  get address(): Hex {
    return this.client.address;
  }

  get isRegistered(): boolean {
    return this.registered;
  }

  get negotiations(): ReadonlyMap<string, Role> {
    return this.inFlight;
  }

  async register(name: string): Promise<TxHandle> {
    if (this.registered) {
      throw new FederationError(ErrorCode.ALREADY_REGISTERED, `Domain ${name} is already registered`);
    }
    if (name.trim() === "" || Buffer.byteLength(name, "utf8") > 32) {
      throw FederationError.malformed("domain name must be 1 to 32 bytes");
    }
    const tx = await this.client.submit({ kind: "RegisterDomain", domainName: name });
    this.registered = true;
    this.log.info({ name, txHash: tx.hash }, "domain registered");
    return tx;
  }

  /** Refused while any negotiation of this session is still running. */
  async unregister(): Promise<TxHandle> {
    if (!this.registered) {
      throw new FederationError(ErrorCode.NOT_REGISTERED, "Domain is not registered");
    }
    if (this.inFlight.size > 0) {
      throw new FederationError(
        ErrorCode.NEGOTIATION_IN_FLIGHT,
        `cannot unregister with ${this.inFlight.size} negotiation(s) in flight`,
        { details: { inFlight: [...this.inFlight.keys()].join(",") } }
      );
    }
    const tx = await this.client.submit({ kind: "UnregisterDomain" });
    this.registered = false;
    this.log.info({ txHash: tx.hash }, "domain unregistered");
    return tx;
  }

  async announce(requirements: ServiceRequirements, endpoint: EndpointInfo): Promise<Announcement> {
    const req = validateRequirements(requirements);
    const ep = validateEndpoint(endpoint);
    const serviceId = this.nextServiceId();
    const tx = await this.client.submit({
      kind: "AnnounceService",
      serviceId,
      requirements: req,
      endpoint: ep,
    });
    this.log.info({ serviceId, txHash: tx.hash }, "service announced");
    return { serviceId, tx };
  }

  async placeBid(serviceId: string, price: bigint | number | string, endpoint: EndpointInfo): Promise<TxHandle> {
    const id = validateServiceId(serviceId);
    const amount = validatePrice(price);
    const ep = validateEndpoint(endpoint);
    const state = await this.model.getState(id);
    if (state !== ServiceState.Open) {
      throw new FederationError(
        ErrorCode.ILLEGAL_TRANSITION,
        `service ${id} is ${stateName(state)}; bids are only accepted while open`,
        { details: { serviceId: id, state: stateName(state) } }
      );
    }
    const tx = await this.client.submit({ kind: "PlaceBid", serviceId: id, price: amount, endpoint: ep });
    this.log.info({ serviceId: id, price: amount.toString(), txHash: tx.hash }, "bid placed");
    return tx;
  }

  /** Open → Closed. Checked against the ledger's current state first. */
  async chooseProvider(serviceId: string, bidIndex: number): Promise<TxHandle> {
    const id = validateServiceId(serviceId);
    if (!Number.isInteger(bidIndex) || bidIndex < 0) {
      throw FederationError.malformed(`invalid bid index ${bidIndex}`);
    }
    validateTransition(await this.model.getState(id), ServiceState.Closed, id);
    const tx = await this.client.submit({ kind: "ChooseProvider", serviceId: id, bidIndex });
    this.log.info({ serviceId: id, bidIndex, txHash: tx.hash }, "provider chosen");
    return tx;
  }

  /**
   * Closed → Deployed. Only the winner may confirm; a loser is stopped
   * here with NOT_WINNER before anything is submitted.
   */
  async confirmDeployment(serviceId: string, federatedHost: string): Promise<TxHandle> {
    const id = validateServiceId(serviceId);
    if (federatedHost.trim() === "") {
      throw FederationError.malformed("federated host must not be empty");
    }
    validateTransition(await this.model.getState(id), ServiceState.Deployed, id);
    if (!(await this.model.isWinner(id))) {
      throw FederationError.notWinner(id);
    }
    const tx = await this.client.submit({ kind: "ServiceDeployed", serviceId: id, federatedHost });
    this.log.info({ serviceId: id, federatedHost, txHash: tx.hash }, "deployment confirmed");
    return tx;
  }

  async updateEndpoint(serviceId: string, endpoint: EndpointInfo, asProvider: boolean): Promise<TxHandle> {
    const id = validateServiceId(serviceId);
    const ep = validateEndpoint(endpoint);
    const tx = await this.client.submit({ kind: "UpdateEndpoint", serviceId: id, asProvider, endpoint: ep });
    this.log.info({ serviceId: id, asProvider, txHash: tx.hash }, "endpoint updated");
    return tx;
  }

  /** Marks an orchestrator run as in flight until `endNegotiation(runId)`. */
  beginNegotiation(runId: string, role: Role): void {
    this.inFlight.set(runId, role);
  }

  endNegotiation(runId: string): void {
    this.inFlight.delete(runId);
  }
}
