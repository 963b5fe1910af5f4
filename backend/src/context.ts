import {
  FederationError,
  ErrorCode,
  type DeploymentCollaborator,
  type DomainSession,
  type NetworkCollaborator,
  type Role,
  type WaitPolicy,
} from "federation-sdk";
import type { Logger } from "pino";
import type { ExperimentStore } from "./experiments.js";

/** Everything the routes need; built once in index.ts, or by tests. */
export type AppDeps = {
  role: Role;
  domainName: string;
  session: DomainSession;
  deployment: DeploymentCollaborator;
  network?: NetworkCollaborator;
  experiments: ExperimentStore;
  wait: Partial<WaitPolicy>;
  lookbackBlocks: number;
  /** Subnet handed to the network collaborator. */
  subnet?: string;
  logger: Logger;
};

export function requireRole(deps: AppDeps, role: Role): void {
  if (deps.role !== role) {
    throw new FederationError(ErrorCode.WRONG_ROLE, `this domain is configured as ${deps.role}, not ${role}`, {
      details: { role: deps.role },
    });
  }
}
