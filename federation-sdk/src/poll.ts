import { setTimeout as sleep } from "node:timers/promises";
import { FederationError } from "./errors.js";
import type { Logger } from "./logger.js";

export type PollOptions = {
  /** What is being waited for; used in logs and errors. */
  what: string;
  timeoutMs: number;
  /** Absolute deadline (epoch ms) shared by several waits; overrides `timeoutMs` as the cut-off. */
  deadline?: number;
  initialDelayMs?: number;
  maxDelayMs?: number;
  factor?: number;
  signal?: AbortSignal;
  logger?: Logger;
};

export type WaitPolicy = Pick<PollOptions, "timeoutMs" | "initialDelayMs" | "maxDelayMs" | "factor">;

export const DEFAULT_WAIT: Required<WaitPolicy> = {
  timeoutMs: 10 * 60 * 1000,
  initialDelayMs: 250,
  maxDelayMs: 5000,
  factor: 2,
};

export function resolveWait(policy: Partial<WaitPolicy> = {}): Required<WaitPolicy> {
  return {
    timeoutMs: policy.timeoutMs ?? DEFAULT_WAIT.timeoutMs,
    initialDelayMs: policy.initialDelayMs ?? DEFAULT_WAIT.initialDelayMs,
    maxDelayMs: policy.maxDelayMs ?? DEFAULT_WAIT.maxDelayMs,
    factor: policy.factor ?? DEFAULT_WAIT.factor,
  };
}

/**
 * Calls `probe` until it yields a value other than `undefined`, sleeping with
 * exponential backoff between attempts. Fails with TIMEOUT once the deadline
 * passes and with CANCELLED when the signal aborts. Probe errors propagate.
 */
export async function pollUntil<T>(
  probe: () => Promise<T | undefined>,
  opts: PollOptions
): Promise<T> {
  const initial = opts.initialDelayMs ?? DEFAULT_WAIT.initialDelayMs;
  const cap = opts.maxDelayMs ?? DEFAULT_WAIT.maxDelayMs;
  const factor = opts.factor ?? DEFAULT_WAIT.factor;
  const deadline = opts.deadline ?? Date.now() + opts.timeoutMs;

  let delay = initial;
  for (let attempt = 1; ; attempt++) {
    if (opts.signal?.aborted) throw FederationError.cancelled(opts.what);

    const value = await probe();
    if (value !== undefined) return value;

    const remaining = deadline - Date.now();
    if (remaining <= 0) throw FederationError.timeout(opts.what, opts.timeoutMs);

    opts.logger?.debug({ what: opts.what, attempt, delayMs: Math.min(delay, remaining) }, "waiting");
    try {
      await sleep(Math.min(delay, remaining), undefined, { signal: opts.signal });
    } catch (e) {
      if (opts.signal?.aborted) throw FederationError.cancelled(opts.what);
      throw e;
    }
    delay = Math.min(delay * factor, cap);
  }
}
