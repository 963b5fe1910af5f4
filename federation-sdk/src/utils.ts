import { z } from "zod";
import { FederationError } from "./errors.js";
import type { EndpointInfo, Hex, ServiceRequirements } from "./types.js";

const NONE = "None";

export const EMPTY_REQUIREMENTS: ServiceRequirements = {
  serviceType: null,
  bandwidthGbps: null,
  rttLatencyMs: null,
  computeCpus: null,
  computeRamGb: null,
};

export const EMPTY_ENDPOINT: EndpointInfo = {
  serviceCatalogDb: null,
  topologyDb: null,
  nsdId: null,
  nsId: null,
};

// ---- validation ----

const url = z
  .string()
  .url()
  .refine((v) => /^https?:\/\//i.test(v), "must be an http(s) URL");
const descriptorId = z.string().regex(/^[A-Za-z0-9_.:-]+$/, "invalid descriptor id");

export const RequirementsSchema = z.object({
  serviceType: z.string().regex(/^[A-Za-z0-9_.-]+$/, "invalid service type").nullable(),
  bandwidthGbps: z.number().finite().positive().nullable(),
  rttLatencyMs: z.number().int().positive().nullable(),
  computeCpus: z.number().int().positive().nullable(),
  computeRamGb: z.number().int().positive().nullable(),
});

export const EndpointSchema = z.object({
  serviceCatalogDb: url.nullable(),
  topologyDb: url.nullable(),
  nsdId: descriptorId.nullable(),
  nsId: descriptorId.nullable(),
});

export const ServiceIdSchema = z
  .string()
  .min(1)
  .refine((v) => Buffer.byteLength(v, "utf8") <= 32, "must fit in 32 bytes");

export const PriceSchema = z
  .union([z.bigint(), z.number().int(), z.string().regex(/^\d+$/)])
  .transform((v) => BigInt(v))
  .refine((v) => v >= 0n, "must not be negative");

function issues(error: z.ZodError): string {
  return error.issues.map((i) => `${i.path.join(".") || "value"}: ${i.message}`).join("; ");
}

export function parseWith<S extends z.ZodTypeAny>(schema: S, value: unknown, what: string): z.output<S> {
  const parsed = schema.safeParse(value);
  if (!parsed.success) {
    throw FederationError.malformed(`invalid ${what}: ${issues(parsed.error)}`);
  }
  return parsed.data;
}

export function validateRequirements(value: ServiceRequirements): ServiceRequirements {
  return parseWith(RequirementsSchema, value, "requirements");
}

export function validateEndpoint(value: EndpointInfo): EndpointInfo {
  return parseWith(EndpointSchema, value, "endpoint");
}

export function validateServiceId(value: string): string {
  return parseWith(ServiceIdSchema, value, "service id");
}

export function validatePrice(value: bigint | number | string): bigint {
  return parseWith(PriceSchema, value, "price");
}

export function validateQuorum(value: number): number {
  return parseWith(z.number().int().min(1), value, "quorum");
}

// ---- wire formats ----

function field(value: string | number | null): string {
  return value === null ? NONE : String(value);
}

/** `service_type=...; bandwidth_gbps=...; ...` with every field present */
export function formatRequirements(r: ServiceRequirements): string {
  return [
    `service_type=${field(r.serviceType)}`,
    `bandwidth_gbps=${field(r.bandwidthGbps)}`,
    `rtt_latency_ms=${field(r.rttLatencyMs)}`,
    `compute_cpus=${field(r.computeCpus)}`,
    `compute_ram_gb=${field(r.computeRamGb)}`,
  ].join("; ");
}

function scalar(raw: string): string | number | null {
  if (raw.toLowerCase() === NONE.toLowerCase() || raw === "") return null;
  if (/^\d+$/.test(raw)) return parseInt(raw, 10);
  if (/^\d+\.\d*$|^\d*\.\d+$/.test(raw)) return parseFloat(raw);
  return raw;
}

function numeric(v: string | number | null | undefined): number | null {
  return typeof v === "number" ? v : null;
}

/**
 * Decodes an announcement's requirements. Requirements come from another
 * domain, so unknown keys and entries without `=` are skipped.
 */
export function parseRequirements(text: string): ServiceRequirements {
  const kv = new Map<string, string | number | null>();
  for (const entry of text.split(";")) {
    const trimmed = entry.trim();
    const eq = trimmed.indexOf("=");
    if (eq < 0) continue;
    kv.set(trimmed.slice(0, eq).trim(), scalar(trimmed.slice(eq + 1).trim()));
  }
  const type = kv.get("service_type");
  return {
    serviceType: type === undefined || type === null ? null : String(type),
    bandwidthGbps: numeric(kv.get("bandwidth_gbps")),
    rttLatencyMs: numeric(kv.get("rtt_latency_ms")),
    computeCpus: numeric(kv.get("compute_cpus")),
    computeRamGb: numeric(kv.get("compute_ram_gb")),
  };
}

/** Endpoint fields in contract order: catalog, topology, nsd id, ns id */
export function endpointFields(e: EndpointInfo): [string, string, string, string] {
  return [field(e.serviceCatalogDb), field(e.topologyDb), field(e.nsdId), field(e.nsId)];
}

function textOrNull(v: string): string | null {
  return v === "" || v === NONE ? null : v;
}

export function endpointFromFields(
  catalog: string,
  topology: string,
  nsdId: string,
  nsId: string
): EndpointInfo {
  return {
    serviceCatalogDb: textOrNull(catalog),
    topologyDb: textOrNull(topology),
    nsdId: textOrNull(nsdId),
    nsId: textOrNull(nsId),
  };
}

export function isHex(value: string): value is Hex {
  return /^0x[0-9a-fA-F]*$/.test(value);
}

export function toHex(value: string): Hex {
  if (!isHex(value)) throw FederationError.malformed(`not a hex string: ${value}`);
  return value;
}

/** Strips the NUL padding fixed-size ledger fields carry. */
export function stripPadding(text: string): string {
  return text.replace(/\u0000+$/, "");
}

// ---- ids ----

export type IdFactory = () => string;

/** `service<unix-ms>`, never repeating within one factory even if the clock stalls */
export function serviceIdFactory(now: () => number = Date.now): IdFactory {
  let last = 0;
  return () => {
    last = Math.max(now(), last + 1);
    return `service${last}`;
  };
}

// ---- subnets ----

/** Replaces the third octet of `cidr` with `identifier`: ("10.0.0.0/16", "3") -> "10.0.3.0/24" */
export function createSmallerSubnet(cidr: string, identifier: string, prefixLength = 24): string {
  const [ip] = cidr.split("/");
  const octets = ip.split(".");
  if (octets.length !== 4) throw FederationError.malformed(`invalid subnet ${cidr}`);
  octets[2] = identifier;
  return `${octets.join(".")}/${prefixLength}`;
}

function ipToInt(ip: string): number {
  const octets = ip.split(".").map((o) => Number(o));
  if (octets.length !== 4 || octets.some((o) => !Number.isInteger(o) || o < 0 || o > 255)) {
    throw FederationError.malformed(`invalid IPv4 address ${ip}`);
  }
  return ((octets[0] << 24) >>> 0) + (octets[1] << 16) + (octets[2] << 8) + octets[3];
}

function intToIp(n: number): string {
  return [n >>> 24, (n >>> 16) & 255, (n >>> 8) & 255, n & 255].join(".");
}

/** Usable host range of a subnet: "10.0.1.0/24" -> "10.0.1.1-10.0.1.254" */
export function ipRangeFromSubnet(cidr: string): string {
  const [ip, prefixRaw] = cidr.split("/");
  const prefix = Number(prefixRaw);
  if (!Number.isInteger(prefix) || prefix < 0 || prefix > 30) {
    throw FederationError.malformed(`invalid subnet ${cidr}`);
  }
  const size = 2 ** (32 - prefix);
  const network = Math.floor(ipToInt(ip) / size) * size;
  return `${intToIp(network + 1)}-${intToIp(network + size - 2)}`;
}
