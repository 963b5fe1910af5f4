import { Router } from "express";
import { FederationError, ProviderOrchestrator, ServiceState, parseWith, type ServiceRequirements } from "federation-sdk";
import { requireRole, type AppDeps } from "../context.js";
import { asyncHandler, ok } from "../errorHandler.js";
import { capabilityOf, DeployedBody, endpointOf, PlaceBidBody, ProviderRunBody, ServiceIdQuery } from "../schemas.js";

export function providerRoutes(deps: AppDeps): Router {
  const provider = Router();
  const lookback = { lastBlocks: deps.lookbackBlocks };

  provider.get(
    "/service_announcements",
    asyncHandler(async (_req, res) => {
      const events = await deps.session.cursor.poll("ServiceAnnouncement", lookback);
      const open: Array<{ serviceId: string; requirements: ServiceRequirements; blockNumber: number; txHash: string }> = [];
      for (const e of events) {
        if ((await deps.session.model.getState(e.serviceId)) === ServiceState.Open) {
          open.push({ serviceId: e.serviceId, requirements: e.requirements, blockNumber: e.blockNumber, txHash: e.txHash });
        }
      }
      if (open.length === 0) throw FederationError.notFound("open service announcements");
      ok(res, open);
    })
  );

  provider.post(
    "/place_bid",
    asyncHandler(async (req, res) => {
      const body = parseWith(PlaceBidBody, req.body, "body");
      const tx = await deps.session.placeBid(body.service_id, body.service_price, endpointOf(body));
      ok(res, { serviceId: body.service_id, tx }, 201);
    })
  );

  provider.get(
    "/winner_status",
    asyncHandler(async (req, res) => {
      const { service_id } = parseWith(ServiceIdQuery, req.query, "query");
      const closures = await deps.session.cursor.poll("ServiceAnnouncementClosed", lookback);
      ok(res, { serviceId: service_id, closed: closures.some((e) => e.serviceId === service_id) });
    })
  );

  provider.get(
    "/is_winner",
    asyncHandler(async (req, res) => {
      const { service_id } = parseWith(ServiceIdQuery, req.query, "query");
      ok(res, { serviceId: service_id, winner: await deps.session.model.isWinner(service_id) });
    })
  );

  provider.post(
    "/service_deployed",
    asyncHandler(async (req, res) => {
      const { service_id, federated_host } = parseWith(DeployedBody, req.body, "body");
      const tx = await deps.session.confirmDeployment(service_id, federated_host);
      ok(res, { serviceId: service_id, tx });
    })
  );

  provider.post(
    "/simulate_provider_federation_process",
    asyncHandler(async (req, res) => {
      requireRole(deps, "provider");
      const body = parseWith(ProviderRunBody, req.body ?? {}, "body");
      const orchestrator = new ProviderOrchestrator(deps.session, {
        deployment: deps.deployment,
        network: deps.network,
      });
      const outcome = await orchestrator.run({
        price: body.service_price,
        endpoint: endpointOf(body),
        capability: capabilityOf(body.capability),
        serviceId: body.service_id,
        discoverFrom: lookback,
        replicas: body.replicas,
        subnet: deps.subnet,
        wait: deps.wait,
        timeoutMs: body.timeout_ms,
      });
      const csvPath = body.export_to_csv ? await deps.experiments.export("provider", outcome.timeline) : null;
      ok(res, { ...outcome, csvPath });
    })
  );

  return provider;
}
