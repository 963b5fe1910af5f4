import { v4 as uuidv4 } from "uuid";
import { atStep, ErrorCode, type FederationError } from "./errors.js";
import type { Logger } from "./logger.js";
import { pollUntil, resolveWait, type WaitPolicy } from "./poll.js";
import { StepTimeline, type StepMark } from "./timeline.js";
import type { Role, TxHandle } from "./types.js";

export type RunOptions = {
  /** Deadline of the whole run; every wait shares it. */
  timeoutMs?: number;
  wait?: Partial<WaitPolicy>;
  signal?: AbortSignal;
  now?: () => number;
};

export type RunSummary = {
  runId: string;
  role: Role;
  timeline: readonly StepMark[];
  transactions: readonly TxHandle[];
  durationSeconds: number;
};

/**
 * Bookkeeping of one orchestrator run: id, current step, step timeline,
 * submitted transactions and the shared deadline of its waits.
 */
export class NegotiationRun {
  readonly runId = uuidv4();
  readonly timeline: StepTimeline;
  readonly transactions: TxHandle[] = [];
  log: Logger;
  step = "start";

  private readonly policy: ReturnType<typeof resolveWait>;
  private readonly deadline: number;
  private readonly signal?: AbortSignal;

  constructor(readonly role: Role, logger: Logger, opts: RunOptions = {}) {
    this.policy = resolveWait({ ...opts.wait, timeoutMs: opts.timeoutMs ?? opts.wait?.timeoutMs });
    this.deadline = Date.now() + this.policy.timeoutMs;
    this.signal = opts.signal;
    this.timeline = new StepTimeline(opts.now);
    this.log = logger.child({ runId: this.runId, role });
  }

  enter(step: string): void {
    this.step = step;
    this.log.info({ step }, "step");
  }

  mark(step: string): void {
    const m = this.timeline.mark(step);
    this.log.debug({ mark: m.step, seconds: m.seconds }, "timeline");
  }

  record(tx: TxHandle): TxHandle {
    this.transactions.push(tx);
    return tx;
  }

  waitFor<T>(what: string, probe: () => Promise<T | undefined>): Promise<T> {
    return pollUntil(probe, {
      what,
      timeoutMs: this.policy.timeoutMs,
      deadline: this.deadline,
      initialDelayMs: this.policy.initialDelayMs,
      maxDelayMs: this.policy.maxDelayMs,
      factor: this.policy.factor,
      signal: this.signal,
      logger: this.log,
    });
  }

  fail(e: unknown): FederationError {
    const err = atStep(this.step, e);
    this.log.error({ step: err.step, code: ErrorCode[err.code], err: err.message }, "negotiation failed");
    return err;
  }

  summary(): RunSummary {
    return {
      runId: this.runId,
      role: this.role,
      timeline: this.timeline.entries,
      transactions: this.transactions,
      durationSeconds: this.timeline.elapsedSeconds(),
    };
  }
}
