import { FederationError, isFederationError } from "./errors.js";
import { componentLogger, type Logger } from "./logger.js";
import type { EventKind, EventOf, FederationEvent, FederationLedger } from "./types.js";

export type BlockRange =
  | { fromBlock: number; toBlock?: number }
  | { lastBlocks: number }
  | "latest";

export function eventKey(e: FederationEvent): string {
  return `${e.txHash}:${e.logIndex}`;
}

function byLedgerOrder(a: FederationEvent, b: FederationEvent): number {
  return a.blockNumber - b.blockNumber || a.logIndex - b.logIndex;
}

function ofKind<K extends EventKind>(kind: K) {
  return (e: FederationEvent): e is EventOf<K> => e.kind === kind;
}

/**
 * Reads contract events over block ranges. A poll returns events in ledger
 * order (block, then position in block). Repeated polls over overlapping
 * ranges return the same events again; use a Subscription to skip them.
 */
export class EventCursor {
  private readonly log: Logger;

  constructor(private readonly ledger: FederationLedger, logger?: Logger) {
    this.log = componentLogger("event-cursor", logger);
  }

  async latestBlock(): Promise<number> {
    try {
      return await this.ledger.blockNumber();
    } catch (e) {
      if (isFederationError(e)) throw e;
      throw FederationError.unavailable(`reading block number: ${e instanceof Error ? e.message : String(e)}`, e);
    }
  }

  /** Resolves a range to a concrete starting block. */
  async startBlock(range: BlockRange): Promise<number> {
    if (range === "latest") return this.latestBlock();
    if ("lastBlocks" in range) return Math.max(0, (await this.latestBlock()) - range.lastBlocks);
    return range.fromBlock;
  }

  async poll<K extends EventKind>(kind: K, range: BlockRange): Promise<EventOf<K>[]> {
    const from = await this.startBlock(range);
    const to = typeof range === "object" && "toBlock" in range && range.toBlock !== undefined
      ? range.toBlock
      : await this.latestBlock();
    if (to < from) return [];

    let events: FederationEvent[];
    try {
      events = await this.ledger.events(kind, from, to);
    } catch (e) {
      if (isFederationError(e)) throw e;
      throw FederationError.unavailable(`reading ${kind} events: ${e instanceof Error ? e.message : String(e)}`, e);
    }
    const matching = events.filter(ofKind(kind)).sort(byLedgerOrder);
    this.log.debug({ kind, from, to, count: matching.length }, "polled events");
    return matching;
  }

  /**
   * Starts a subscription whose first block is fixed now, so events emitted
   * between this call and the first `next()` are not missed.
   */
  async subscribe<K extends EventKind>(kind: K, range: BlockRange = "latest"): Promise<Subscription<K>> {
    return new Subscription(this, kind, await this.startBlock(range));
  }
}

/**
 * Re-polls from a fixed starting block and hands out each event once,
 * keyed by transaction hash and log position.
 */
export class Subscription<K extends EventKind> {
  private readonly seen = new Set<string>();

  constructor(
    private readonly cursor: EventCursor,
    readonly kind: K,
    readonly fromBlock: number
  ) {}

  async next(): Promise<EventOf<K>[]> {
    const events = await this.cursor.poll(this.kind, { fromBlock: this.fromBlock });
    const fresh: EventOf<K>[] = [];
    for (const e of events) {
      const key = eventKey(e);
      if (this.seen.has(key)) continue;
      this.seen.add(key);
      fresh.push(e);
    }
    return fresh;
  }
}
