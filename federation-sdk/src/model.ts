import { ErrorCode, isFederationError } from "./errors.js";
import type { LedgerClient } from "./ledger.js";
import { parseServiceState } from "./state-machine.js";
import { ServiceState, type Bid, type Hex, type ServiceInfo } from "./types.js";
import { validateServiceId } from "./utils.js";

/**
 * Typed reads of service, bid and winner data. Every call goes to the
 * ledger; nothing mutable is cached, so two domains reading the same
 * service always see what the ledger holds.
 */
export class ServiceLedgerModel {
  constructor(private readonly client: LedgerClient) {}

  get address(): Hex {
    return this.client.address;
  }

  async getState(serviceId: string): Promise<ServiceState> {
    const id = validateServiceId(serviceId);
    return parseServiceState(await this.client.getServiceState(id), id);
  }

  async getBid(serviceId: string, bidIndex: number): Promise<Bid> {
    const id = validateServiceId(serviceId);
    const raw = await this.client.getBid(id, bidIndex);
    return { serviceId: id, bidIndex: raw.bidIndex, providerAddr: raw.providerAddr, price: raw.price };
  }

  /** Bids 0..count-1, fetched in index order. */
  async getBids(serviceId: string, count: number): Promise<Bid[]> {
    const bids: Bid[] = [];
    for (let i = 0; i < count; i++) {
      bids.push(await this.getBid(serviceId, i));
    }
    return bids;
  }

  /**
   * Every bid of a service, read until the ledger reports the next index
   * missing. The service itself must exist.
   */
  async listBids(serviceId: string): Promise<Bid[]> {
    await this.getState(serviceId);
    const bids: Bid[] = [];
    for (let i = 0; ; i++) {
      try {
        bids.push(await this.getBid(serviceId, i));
      } catch (e) {
        if (isFederationError(e, ErrorCode.NOT_FOUND)) return bids;
        throw e;
      }
    }
  }

  async getServiceInfo(serviceId: string, asProvider: boolean): Promise<ServiceInfo> {
    const id = validateServiceId(serviceId);
    const raw = await this.client.getServiceInfo(id, asProvider);
    if (asProvider) {
      return { view: "provider", serviceId: id, consumerEndpoint: raw.endpoint };
    }
    return {
      view: "consumer",
      serviceId: id,
      federatedHost: raw.federatedHost === "" ? null : raw.federatedHost,
      providerEndpoint: raw.endpoint,
    };
  }

  /**
   * Whether `address` won the service. There is no winner while the service
   * is open, so that case answers false without asking the contract.
   */
  async isWinner(serviceId: string, address: Hex = this.client.address): Promise<boolean> {
    const id = validateServiceId(serviceId);
    const state = await this.getState(id);
    if (state === ServiceState.Open) return false;
    return this.client.isWinner(id, address);
  }
}
