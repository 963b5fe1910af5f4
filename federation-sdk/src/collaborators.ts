import type { EndpointInfo } from "./types.js";

export type DeployRequest = {
  serviceId: string;
  /** Application descriptor to instantiate (image, manifest or catalog id). */
  descriptor: string;
  replicas: number;
};

/** Instantiates the federated service in the provider's infrastructure. */
export interface DeploymentCollaborator {
  /** Returns the federated host the consumer will reach the service on. */
  deploy(req: DeployRequest): Promise<string>;
  teardown(serviceName: string): Promise<void>;
}

export type TunnelRequest = {
  serviceId: string;
  local: EndpointInfo;
  remote: EndpointInfo;
  subnet?: string;
};

/** Data-plane connectivity between the two domains. */
export interface NetworkCollaborator {
  establishTunnel(req: TunnelRequest): Promise<void>;
}
