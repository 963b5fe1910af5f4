import type { NextFunction, Request, RequestHandler, Response } from "express";
import { ErrorCode, FederationError, isFederationError, type ErrorDetails } from "federation-sdk";
import type { Logger } from "pino";

export type ErrorBody = {
  success: false;
  error: {
    code: ErrorCode;
    name: string;
    message: string;
    step?: string;
    details?: ErrorDetails;
    timestamp: string;
  };
};

export type SuccessBody<T> = {
  success: true;
  data: T;
};

export function ok<T>(res: Response, data: T, status = 200): void {
  const body: SuccessBody<T> = { success: true, data };
  res.status(status).json(body);
}

/** Forwards rejections of async route handlers to the error middleware. */
export const asyncHandler =
  (fn: (req: Request, res: Response, next: NextFunction) => Promise<void>): RequestHandler =>
  (req, res, next) => {
    fn(req, res, next).catch(next);
  };

function toFederationError(err: unknown): FederationError {
  if (isFederationError(err)) return err;
  // body-parser marks malformed JSON with a 4xx status
  if (err instanceof SyntaxError && "status" in err && err.status === 400) {
    return FederationError.malformed(`invalid JSON body: ${err.message}`);
  }
  const message = err instanceof Error ? err.message : String(err);
  return new FederationError(ErrorCode.INTERNAL, message, { cause: err });
}

export function errorHandler(logger: Logger) {
  return (err: unknown, req: Request, res: Response, _next: NextFunction): void => {
    const e = toFederationError(err);
    const status = e.status;
    const level = status >= 500 ? "error" : "warn";
    logger[level](
      { code: ErrorCode[e.code], status, step: e.step, path: req.path, method: req.method, err: e.message },
      "request failed"
    );

    const body: ErrorBody = {
      success: false,
      error: {
        code: e.code,
        name: ErrorCode[e.code],
        message: e.message,
        timestamp: new Date().toISOString(),
      },
    };
    if (e.step !== undefined) body.error.step = e.step;
    if (e.details !== undefined) body.error.details = e.details;
    res.status(status).json(body);
  };
}

export function notFoundHandler(req: Request, res: Response): void {
  const body: ErrorBody = {
    success: false,
    error: {
      code: ErrorCode.NOT_FOUND,
      name: ErrorCode[ErrorCode.NOT_FOUND],
      message: `Route ${req.method} ${req.path} not found`,
      timestamp: new Date().toISOString(),
    },
  };
  res.status(404).json(body);
}
