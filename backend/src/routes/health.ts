import { Router } from "express";
import { FederationError, parseWith, toHex } from "federation-sdk";
import type { AppDeps } from "../context.js";
import { asyncHandler, ok } from "../errorHandler.js";
import { TxHashQuery } from "../schemas.js";

export function healthRoutes(deps: AppDeps): Router {
  const health = Router();

  health.get("/health", (_req, res) => {
    ok(res, {
      status: "ok",
      role: deps.role,
      domain: deps.domainName,
      account: deps.session.address,
      registered: deps.session.isRegistered,
      negotiations: deps.session.negotiations.size,
    });
  });

  health.get("/web3_info", (_req, res) => {
    ok(res, deps.session.ledger.describe());
  });

  health.get(
    "/tx_receipt",
    asyncHandler(async (req, res) => {
      const { tx_hash } = parseWith(TxHashQuery, req.query, "query");
      const receipt = await deps.session.client.receipt(toHex(tx_hash));
      if (receipt === null) throw FederationError.notFound(`transaction ${tx_hash}`);
      ok(res, receipt);
    })
  );

  return health;
}
