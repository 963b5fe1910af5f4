/**
 * Error codes for the federation protocol
 *
 * - 1xxx: input rejected before any ledger call
 * - 2xxx: negotiation outcomes and local guards
 * - 3xxx: ledger failures
 * - 4xxx: waits that did not complete
 * - 5xxx: system errors
 */
export enum ErrorCode {
  MALFORMED_INPUT = 1001,

  NOT_FOUND = 2001,
  NOT_WINNER = 2002,
  ILLEGAL_TRANSITION = 2003,
  ALREADY_REGISTERED = 2004,
  NOT_REGISTERED = 2005,
  NEGOTIATION_IN_FLIGHT = 2006,
  WRONG_ROLE = 2007,

  LEDGER_UNAVAILABLE = 3001,
  LEDGER_REJECTED = 3002,
  ABI_MISMATCH = 3003,
  INCONSISTENT = 3004,

  TIMEOUT = 4001,
  CANCELLED = 4002,

  INTERNAL = 5001,
}

export const errorCodeToStatus: Record<ErrorCode, number> = {
  [ErrorCode.MALFORMED_INPUT]: 400,

  [ErrorCode.NOT_FOUND]: 404,
  [ErrorCode.NOT_WINNER]: 403,
  [ErrorCode.ILLEGAL_TRANSITION]: 409,
  [ErrorCode.ALREADY_REGISTERED]: 409,
  [ErrorCode.NOT_REGISTERED]: 409,
  [ErrorCode.NEGOTIATION_IN_FLIGHT]: 409,
  [ErrorCode.WRONG_ROLE]: 409,

  [ErrorCode.LEDGER_UNAVAILABLE]: 503,
  [ErrorCode.LEDGER_REJECTED]: 409,
  [ErrorCode.ABI_MISMATCH]: 500,
  [ErrorCode.INCONSISTENT]: 502,

  [ErrorCode.TIMEOUT]: 504,
  [ErrorCode.CANCELLED]: 499,

  [ErrorCode.INTERNAL]: 500,
};

export type RejectionReason = "nonce" | "state" | "unauthorized" | "revert";

export type ErrorDetails = Record<string, string | number | boolean | null>;

export class FederationError extends Error {
  readonly code: ErrorCode;
  step?: string;
  readonly details?: ErrorDetails;

  constructor(
    code: ErrorCode,
    message: string,
    options?: { step?: string; details?: ErrorDetails; cause?: unknown }
  ) {
    super(message, options?.cause === undefined ? undefined : { cause: options.cause });
    this.name = ErrorCode[code];
    this.code = code;
    this.step = options?.step;
    this.details = options?.details;
    Error.captureStackTrace(this, this.constructor);
  }

  get status(): number {
    return errorCodeToStatus[this.code];
  }

  static malformed(message: string, details?: ErrorDetails): FederationError {
    return new FederationError(ErrorCode.MALFORMED_INPUT, message, { details });
  }

  static notFound(what: string): FederationError {
    return new FederationError(ErrorCode.NOT_FOUND, `${what} not found`);
  }

  static notWinner(serviceId: string): FederationError {
    return new FederationError(
      ErrorCode.NOT_WINNER,
      `this domain is not the winner of ${serviceId}`,
      { details: { serviceId } }
    );
  }

  static unavailable(message: string, cause?: unknown): FederationError {
    return new FederationError(ErrorCode.LEDGER_UNAVAILABLE, message, { cause });
  }

  static rejected(message: string, reason: RejectionReason, cause?: unknown): FederationError {
    return new FederationError(ErrorCode.LEDGER_REJECTED, message, {
      details: { reason },
      cause,
    });
  }

  static timeout(what: string, timeoutMs: number): FederationError {
    return new FederationError(
      ErrorCode.TIMEOUT,
      `timed out after ${timeoutMs}ms waiting for ${what}`,
      { details: { timeoutMs } }
    );
  }

  static cancelled(what: string): FederationError {
    return new FederationError(ErrorCode.CANCELLED, `cancelled while waiting for ${what}`);
  }
}

export function isFederationError(e: unknown, code?: ErrorCode): e is FederationError {
  return e instanceof FederationError && (code === undefined || e.code === code);
}

export function rejectionReason(e: FederationError): RejectionReason | undefined {
  const reason = e.details?.reason;
  switch (reason) {
    case "nonce":
    case "state":
    case "unauthorized":
    case "revert":
      return reason;
    default:
      return undefined;
  }
}

/**
 * Tags an error with the orchestrator step it escaped from. Errors that are
 * not FederationErrors become INTERNAL so callers always get a code.
 */
export function atStep(step: string, e: unknown): FederationError {
  if (e instanceof FederationError) {
    if (e.step === undefined) e.step = step;
    return e;
  }
  const message = e instanceof Error ? e.message : String(e);
  return new FederationError(ErrorCode.INTERNAL, message, { step, cause: e });
}
