import { ErrorCode, FederationError, isFederationError, rejectionReason } from "./errors.js";
import { componentLogger, type Logger } from "./logger.js";
import type {
  FederationLedger,
  Hex,
  RawBid,
  RawServiceInfo,
  SubmitCall,
  TxHandle,
  TxReceipt,
} from "./types.js";

function asLedgerError(e: unknown, what: string): FederationError {
  if (isFederationError(e)) return e;
  const message = e instanceof Error ? e.message : String(e);
  return FederationError.unavailable(`${what}: ${message}`, e);
}

/**
 * Owns one domain account's outgoing transaction sequence.
 *
 * Submissions are serialized: each waits for the previous one to settle, is
 * stamped with the current nonce, and only advances it once the node has
 * accepted the transaction. Rejections are surfaced, never retried here.
 * After a nonce conflict or an unreachable node the nonce is dropped and
 * re-read from the ledger by the next submission.
 */
export class LedgerClient {
  readonly address: Hex;
  private nonce: number | null = null;
  private tail: Promise<unknown> = Promise.resolve();
  private readonly submitted: TxHandle[] = [];
  private readonly log: Logger;

  constructor(private readonly ledger: FederationLedger, logger?: Logger) {
    this.address = ledger.address;
    this.log = componentLogger("ledger-client", logger);
  }

  get ledgerPort(): FederationLedger {
    return this.ledger;
  }

  /** Next nonce this client will use, or null before the first submission. */
  get currentNonce(): number | null {
    return this.nonce;
  }

  /** Transactions accepted so far, in submission order. */
  get history(): readonly TxHandle[] {
    return this.submitted;
  }

  submit(call: SubmitCall): Promise<TxHandle> {
    const run = this.tail.then(() => this.submitNow(call));
    // keep the chain alive whatever this submission does
    this.tail = run.catch(() => undefined);
    return run;
  }

  private async submitNow(call: SubmitCall): Promise<TxHandle> {
    if (this.nonce === null) {
      try {
        this.nonce = await this.ledger.transactionCount(this.address);
      } catch (e) {
        throw asLedgerError(e, "reading account nonce");
      }
    }
    const nonce = this.nonce;

    let hash: Hex;
    try {
      hash = await this.ledger.send(call, nonce);
    } catch (e) {
      const err = asLedgerError(e, `submitting ${call.kind}`);
      this.log.error({ call: call.kind, nonce, code: ErrorCode[err.code], err: err.message }, "submission failed");
      // the ledger's count may have moved; the next submission re-reads it
      if (rejectionReason(err) === "nonce" || err.code === ErrorCode.LEDGER_UNAVAILABLE) {
        this.nonce = null;
      }
      throw err;
    }

    this.nonce = nonce + 1;
    const handle: TxHandle = { hash, nonce, call: call.kind };
    this.submitted.push(handle);
    this.log.info({ call: call.kind, nonce, txHash: hash }, "transaction submitted");
    return handle;
  }

  /** Re-reads the account's nonce from the ledger now. */
  async resyncNonce(): Promise<number> {
    await this.tail;
    try {
      this.nonce = await this.ledger.transactionCount(this.address);
    } catch (e) {
      throw asLedgerError(e, "reading account nonce");
    }
    this.log.warn({ nonce: this.nonce }, "nonce resynchronized from ledger");
    return this.nonce;
  }

  // ---- queries: never touch the nonce ----

  async getServiceState(serviceId: string): Promise<number> {
    return this.query("GetServiceState", () => this.ledger.serviceState(serviceId));
  }

  async getBid(serviceId: string, bidIndex: number, caller: Hex = this.address): Promise<RawBid> {
    return this.query("GetBid", () => this.ledger.bid(serviceId, bidIndex, caller));
  }

  async getServiceInfo(
    serviceId: string,
    asProvider: boolean,
    caller: Hex = this.address
  ): Promise<RawServiceInfo> {
    return this.query("GetServiceInfo", () => this.ledger.serviceInfo(serviceId, asProvider, caller));
  }

  async isWinner(serviceId: string, candidate: Hex = this.address): Promise<boolean> {
    return this.query("isWinner", () => this.ledger.isWinner(serviceId, candidate));
  }

  async receipt(txHash: Hex): Promise<TxReceipt | null> {
    return this.query("receipt", () => this.ledger.receipt(txHash));
  }

  private async query<T>(name: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (e) {
      throw asLedgerError(e, name);
    }
  }
}
