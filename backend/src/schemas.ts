import { ServiceIdSchema, type Capability, type EndpointInfo, type ServiceRequirements } from "federation-sdk";
import { z } from "zod";

// Request fields keep the snake_case names operators already script against.

const optionalText = z.string().trim().min(1).nullish();
const optionalNumber = z.coerce.number().nullish();

const requirementFields = {
  service_type: optionalText,
  bandwidth_gbps: optionalNumber,
  rtt_latency_ms: optionalNumber,
  compute_cpus: optionalNumber,
  compute_ram_gb: optionalNumber,
};

const endpointFields = {
  service_catalog_db: optionalText,
  topology_db: optionalText,
  nsd_id: optionalText,
  ns_id: optionalText,
};

// JSON numbers lose precision past 2^53; larger prices travel as decimal strings
const priceField = z.union([
  z.number().refine(Number.isSafeInteger, "must be a safe integer; send larger prices as a decimal string"),
  z.string(),
]);

const runFields = {
  export_to_csv: z.boolean().default(false),
  timeout_ms: z.number().int().positive().optional(),
};

export const ServiceIdQuery = z.object({ service_id: ServiceIdSchema });
export const TxHashQuery = z.object({ tx_hash: z.string().regex(/^0x[0-9a-fA-F]{64}$/, "must be a 32-byte hex hash") });

export const RegisterBody = z.object({ name: z.string().min(1).optional() });

export const AnnounceBody = z.object({ ...requirementFields, ...endpointFields });

export const PlaceBidBody = z.object({
  service_id: ServiceIdSchema,
  service_price: priceField,
  ...endpointFields,
});

export const ChooseProviderBody = z.object({
  service_id: ServiceIdSchema,
  bid_index: z.coerce.number().int().min(0),
});

export const EndpointBody = z.object({ service_id: ServiceIdSchema, ...endpointFields });

export const DeployedBody = z.object({
  service_id: ServiceIdSchema,
  federated_host: z.string().min(1),
});

export const ConsumerRunBody = z.object({
  ...requirementFields,
  ...endpointFields,
  service_providers: z.number().int().min(1).default(1),
  ...runFields,
});

export const ProviderRunBody = z.object({
  service_price: priceField,
  service_id: ServiceIdSchema.optional(),
  capability: z.object(requirementFields).optional(),
  replicas: z.number().int().min(1).default(1),
  ...endpointFields,
  ...runFields,
});

type RequirementInput = { [K in keyof typeof requirementFields]?: string | number | null };
type EndpointInput = { [K in keyof typeof endpointFields]?: string | null };

export function requirementsOf(body: RequirementInput): ServiceRequirements {
  const num = (v: string | number | null | undefined) => (typeof v === "number" ? v : null);
  return {
    serviceType: typeof body.service_type === "string" ? body.service_type : null,
    bandwidthGbps: num(body.bandwidth_gbps),
    rttLatencyMs: num(body.rtt_latency_ms),
    computeCpus: num(body.compute_cpus),
    computeRamGb: num(body.compute_ram_gb),
  };
}

export function capabilityOf(body: RequirementInput | undefined): Capability {
  if (body === undefined) return {};
  const r = requirementsOf(body);
  const cap: Capability = {};
  if (r.serviceType !== null) cap.serviceType = r.serviceType;
  if (r.bandwidthGbps !== null) cap.bandwidthGbps = r.bandwidthGbps;
  if (r.rttLatencyMs !== null) cap.rttLatencyMs = r.rttLatencyMs;
  if (r.computeCpus !== null) cap.computeCpus = r.computeCpus;
  if (r.computeRamGb !== null) cap.computeRamGb = r.computeRamGb;
  return cap;
}

export function endpointOf(body: EndpointInput): EndpointInfo {
  return {
    serviceCatalogDb: body.service_catalog_db ?? null,
    topologyDb: body.topology_db ?? null,
    nsdId: body.nsd_id ?? null,
    nsId: body.ns_id ?? null,
  };
}

