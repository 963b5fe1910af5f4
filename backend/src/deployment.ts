import {
  ErrorCode,
  FederationError,
  ipRangeFromSubnet,
  type DeployRequest,
  type DeploymentCollaborator,
  type NetworkCollaborator,
  type TunnelRequest,
} from "federation-sdk";
import type { Logger } from "pino";
import { z } from "zod";

/** Reports a fixed federated host; for domains whose service is already running. */
export class StaticDeployment implements DeploymentCollaborator {
  constructor(private readonly host: string, private readonly logger: Logger) {}

  async deploy(req: DeployRequest): Promise<string> {
    this.logger.info({ serviceId: req.serviceId, descriptor: req.descriptor, host: this.host }, "static deployment");
    return this.host;
  }

  async teardown(serviceName: string): Promise<void> {
    this.logger.info({ serviceName }, "static teardown: nothing to remove");
  }
}

const DeployResponse = z.object({ federated_host: z.string().min(1) });

/**
 * Drives an external orchestrator API:
 * `POST /deploy`, `DELETE /deploy/:name` and `POST /configure_router`.
 */
export class HttpOrchestrator implements DeploymentCollaborator, NetworkCollaborator {
  private readonly baseUrl: string;

  constructor(
    baseUrl: string,
    private readonly logger: Logger,
    private readonly fetchImpl: typeof fetch = fetch
  ) {
    this.baseUrl = baseUrl.replace(/\/+$/, "");
  }

  async deploy(req: DeployRequest): Promise<string> {
    const body = await this.request("POST", "/deploy", {
      service_id: req.serviceId,
      descriptor: req.descriptor,
      replicas: req.replicas,
    });
    const parsed = DeployResponse.safeParse(body);
    if (!parsed.success) {
      throw new FederationError(ErrorCode.INTERNAL, "orchestrator answered /deploy without a federated_host");
    }
    return parsed.data.federated_host;
  }

  async teardown(serviceName: string): Promise<void> {
    await this.request("DELETE", `/deploy/${encodeURIComponent(serviceName)}`);
  }

  async establishTunnel(req: TunnelRequest): Promise<void> {
    await this.request("POST", "/configure_router", {
      service_id: req.serviceId,
      local_endpoint: req.local,
      remote_endpoint: req.remote,
      subnet: req.subnet ?? null,
      ip_range: req.subnet === undefined ? null : ipRangeFromSubnet(req.subnet),
    });
  }

  private async request(method: string, route: string, payload?: unknown): Promise<unknown> {
    const url = `${this.baseUrl}${route}`;
    let res: Response;
    try {
      res = await this.fetchImpl(url, {
        method,
        headers: { "Content-Type": "application/json" },
        body: payload === undefined ? undefined : JSON.stringify(payload),
      });
    } catch (e) {
      throw new FederationError(ErrorCode.INTERNAL, `orchestrator unreachable at ${url}`, { cause: e });
    }
    this.logger.debug({ method, url, status: res.status }, "orchestrator call");
    if (!res.ok) {
      throw new FederationError(ErrorCode.INTERNAL, `orchestrator ${method} ${route} failed with ${res.status}`, {
        details: { status: res.status },
      });
    }
    const text = await res.text();
    if (text === "") return null;
    try {
      const json: unknown = JSON.parse(text);
      return json;
    } catch (e) {
      throw new FederationError(ErrorCode.INTERNAL, `orchestrator ${method} ${route} returned invalid JSON`, { cause: e });
    }
  }
}
