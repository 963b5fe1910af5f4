import { Router } from "express";
import { parseWith } from "federation-sdk";
import type { AppDeps } from "../context.js";
import { asyncHandler, ok } from "../errorHandler.js";
import { RegisterBody } from "../schemas.js";

export function domainRoutes(deps: AppDeps): Router {
  const domain = Router();

  domain.post(
    "/register_domain",
    asyncHandler(async (req, res) => {
      const { name } = parseWith(RegisterBody, req.body ?? {}, "body");
      const tx = await deps.session.register(name ?? deps.domainName);
      ok(res, { tx });
    })
  );

  domain.delete(
    "/unregister_domain",
    asyncHandler(async (_req, res) => {
      const tx = await deps.session.unregister();
      ok(res, { tx });
    })
  );

  return domain;
}
