import { Router } from "express";
import { parseWith, stateName } from "federation-sdk";
import type { AppDeps } from "../context.js";
import { asyncHandler, ok } from "../errorHandler.js";
import { EndpointBody, endpointOf, ServiceIdQuery } from "../schemas.js";

// Reads and updates shared by both roles
export function serviceRoutes(deps: AppDeps): Router {
  const services = Router();
  const asProvider = deps.role === "provider";

  services.get(
    "/service_state",
    asyncHandler(async (req, res) => {
      const { service_id } = parseWith(ServiceIdQuery, req.query, "query");
      const state = await deps.session.model.getState(service_id);
      ok(res, { serviceId: service_id, state: stateName(state) });
    })
  );

  services.get(
    "/service_info",
    asyncHandler(async (req, res) => {
      const { service_id } = parseWith(ServiceIdQuery, req.query, "query");
      ok(res, await deps.session.model.getServiceInfo(service_id, asProvider));
    })
  );

  services.post(
    "/send_endpoint_info",
    asyncHandler(async (req, res) => {
      const body = parseWith(EndpointBody, req.body, "body");
      const tx = await deps.session.updateEndpoint(body.service_id, endpointOf(body), asProvider);
      ok(res, { tx });
    })
  );

  return services;
}
