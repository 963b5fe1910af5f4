import { ErrorCode, FederationError } from "./errors.js";
import { ServiceState, type Bid } from "./types.js";

/**
 * Service lifecycle as enforced by the contract:
 *
 *   OPEN ──(ChooseProvider, consumer)──► CLOSED ──(ServiceDeployed, winner)──► DEPLOYED
 *
 * Nothing moves backwards and no state is ever removed.
 */
const validTransitions: Record<ServiceState, ServiceState[]> = {
  [ServiceState.Open]: [ServiceState.Closed],
  [ServiceState.Closed]: [ServiceState.Deployed],
  [ServiceState.Deployed]: [],
};

const stateNames: Record<ServiceState, "open" | "closed" | "deployed"> = {
  [ServiceState.Open]: "open",
  [ServiceState.Closed]: "closed",
  [ServiceState.Deployed]: "deployed",
};

export type StateName = (typeof stateNames)[ServiceState];

export function stateName(state: ServiceState): StateName {
  return stateNames[state];
}

export function parseServiceState(raw: number, serviceId: string): ServiceState {
  switch (raw) {
    case ServiceState.Open:
      return ServiceState.Open;
    case ServiceState.Closed:
      return ServiceState.Closed;
    case ServiceState.Deployed:
      return ServiceState.Deployed;
    default:
      throw new FederationError(
        ErrorCode.INCONSISTENT,
        `ledger reported unknown state ${raw} for ${serviceId}`,
        { details: { serviceId, state: raw } }
      );
  }
}

export function isValidTransition(from: ServiceState, to: ServiceState): boolean {
  return validTransitions[from].includes(to);
}

export function validateTransition(from: ServiceState, to: ServiceState, serviceId: string): void {
  if (!isValidTransition(from, to)) {
    throw new FederationError(
      ErrorCode.ILLEGAL_TRANSITION,
      `Invalid state transition from ${stateName(from)} to ${stateName(to)} for service ${serviceId}`,
      { details: { serviceId, from: stateName(from), to: stateName(to) } }
    );
  }
}

export function isTerminalState(state: ServiceState): boolean {
  return validTransitions[state].length === 0;
}

export function getAllowedTransitions(state: ServiceState): ServiceState[] {
  return validTransitions[state];
}

/**
 * Lowest price wins; on equal price the earliest bid index wins.
 * Pure in the bid set: input order does not matter.
 */
export function selectWinner(bids: readonly Bid[]): Bid {
  let best: Bid | undefined;
  for (const bid of bids) {
    if (
      best === undefined ||
      bid.price < best.price ||
      (bid.price === best.price && bid.bidIndex < best.bidIndex)
    ) {
      best = bid;
    }
  }
  if (best === undefined) {
    throw new FederationError(ErrorCode.NOT_FOUND, "no bids to choose from");
  }
  return best;
}

/**
 * Records the states one observer reads for a service and refuses any
 * backwards step. Polling may miss an intermediate state, so forward jumps
 * are accepted.
 */
export class LifecycleTrail {
  private readonly observed: ServiceState[] = [];

  constructor(readonly serviceId: string) {}

  get states(): readonly ServiceState[] {
    return this.observed;
  }

  get current(): ServiceState | undefined {
    return this.observed[this.observed.length - 1];
  }

  observe(state: ServiceState): ServiceState {
    const last = this.current;
    if (last !== undefined && state < last) {
      throw new FederationError(
        ErrorCode.INCONSISTENT,
        `service ${this.serviceId} went back from ${stateName(last)} to ${stateName(state)}`,
        { details: { serviceId: this.serviceId, from: stateName(last), to: stateName(state) } }
      );
    }
    if (last !== state) this.observed.push(state);
    return state;
  }
}
