import { Router } from "express";
import { ConsumerOrchestrator, FederationError, parseWith } from "federation-sdk";
import { requireRole, type AppDeps } from "../context.js";
import { asyncHandler, ok } from "../errorHandler.js";
import {
  AnnounceBody,
  ChooseProviderBody,
  ConsumerRunBody,
  endpointOf,
  requirementsOf,
  ServiceIdQuery,
} from "../schemas.js";

export function consumerRoutes(deps: AppDeps): Router {
  const consumer = Router();

  consumer.post(
    "/create_service_announcement",
    asyncHandler(async (req, res) => {
      const body = parseWith(AnnounceBody, req.body, "body");
      const { serviceId, tx } = await deps.session.announce(requirementsOf(body), endpointOf(body));
      ok(res, { serviceId, tx }, 201);
    })
  );

  consumer.get(
    "/bids",
    asyncHandler(async (req, res) => {
      const { service_id } = parseWith(ServiceIdQuery, req.query, "query");
      const bids = await deps.session.model.listBids(service_id);
      if (bids.length === 0) throw FederationError.notFound(`bids for ${service_id}`);
      ok(res, bids);
    })
  );

  consumer.post(
    "/choose_provider",
    asyncHandler(async (req, res) => {
      const { service_id, bid_index } = parseWith(ChooseProviderBody, req.body, "body");
      const tx = await deps.session.chooseProvider(service_id, bid_index);
      ok(res, { serviceId: service_id, bidIndex: bid_index, tx });
    })
  );

  consumer.post(
    "/simulate_consumer_federation_process",
    asyncHandler(async (req, res) => {
      requireRole(deps, "consumer");
      const body = parseWith(ConsumerRunBody, req.body ?? {}, "body");
      const orchestrator = new ConsumerOrchestrator(deps.session, { network: deps.network });
      const outcome = await orchestrator.run({
        requirements: requirementsOf(body),
        endpoint: endpointOf(body),
        quorum: body.service_providers,
        subnet: deps.subnet,
        wait: deps.wait,
        timeoutMs: body.timeout_ms,
      });
      const csvPath = body.export_to_csv ? await deps.experiments.export("consumer", outcome.timeline) : null;
      ok(res, { ...outcome, csvPath });
    })
  );

  return consumer;
}
