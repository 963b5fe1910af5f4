import { expect } from "chai";
import {
  ErrorCode,
  getAllowedTransitions,
  isTerminalState,
  isValidTransition,
  LifecycleTrail,
  parseServiceState,
  selectWinner,
  ServiceState,
  stateName,
  validateTransition,
  type Bid,
} from "federation-sdk";
import { rejection } from "../helpers/federation.js";

const bid = (bidIndex: number, price: bigint): Bid => ({
  serviceId: "service1",
  bidIndex,
  providerAddr: "0x0000000000000000000000000000000000000001",
  price,
});

describe("Negotiation state machine", () => {
  it("only moves forward: open -> closed -> deployed", () => {
    expect(isValidTransition(ServiceState.Open, ServiceState.Closed)).to.equal(true);
    expect(isValidTransition(ServiceState.Closed, ServiceState.Deployed)).to.equal(true);
    expect(isValidTransition(ServiceState.Open, ServiceState.Deployed)).to.equal(false);
    expect(isValidTransition(ServiceState.Closed, ServiceState.Open)).to.equal(false);
    expect(isValidTransition(ServiceState.Deployed, ServiceState.Closed)).to.equal(false);
    expect(getAllowedTransitions(ServiceState.Open)).to.deep.equal([ServiceState.Closed]);
    expect(isTerminalState(ServiceState.Deployed)).to.equal(true);
    expect(isTerminalState(ServiceState.Closed)).to.equal(false);
  });

  it("names an illegal transition in the error", async () => {
    const err = await rejection(
      (async () => validateTransition(ServiceState.Closed, ServiceState.Closed, "service9"))()
    );
    expect(err.code).to.equal(ErrorCode.ILLEGAL_TRANSITION);
    expect(err.message).to.equal("Invalid state transition from closed to closed for service service9");
    expect(err.details).to.deep.equal({ serviceId: "service9", from: "closed", to: "closed" });
  });

  it("treats an unknown ledger state as inconsistent", () => {
    expect(parseServiceState(2, "s")).to.equal(ServiceState.Deployed);
    expect(stateName(parseServiceState(0, "s"))).to.equal("open");
    expect(() => parseServiceState(7, "s")).to.throw("ledger reported unknown state 7 for s");
  });

  it("picks the lowest price, earliest index on ties, whatever the input order", () => {
    expect(selectWinner([bid(0, 50n), bid(1, 30n), bid(2, 40n)]).bidIndex).to.equal(1);
    expect(selectWinner([bid(2, 30n), bid(0, 30n), bid(1, 30n)]).bidIndex).to.equal(0);
    const bids = [bid(3, 10n), bid(1, 10n), bid(2, 5n), bid(0, 5n)];
    expect(selectWinner(bids)).to.deep.equal(bid(0, 5n));
    expect(selectWinner([...bids].reverse())).to.deep.equal(bid(0, 5n));
    expect(() => selectWinner([])).to.throw("no bids to choose from");
  });

  it("keeps an observed lifecycle monotonic", () => {
    const trail = new LifecycleTrail("service1");
    trail.observe(ServiceState.Open);
    trail.observe(ServiceState.Open);
    trail.observe(ServiceState.Deployed);
    expect(trail.states).to.deep.equal([ServiceState.Open, ServiceState.Deployed]);
    expect(() => trail.observe(ServiceState.Closed)).to.throw("service service1 went back from deployed to closed");
    expect(trail.current).to.equal(ServiceState.Deployed);
  });
});
