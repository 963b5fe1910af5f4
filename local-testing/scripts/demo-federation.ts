/**
 * One consumer and two providers negotiating on an in-process ledger.
 *
 *   npm run demo
 */
import {
  ConsumerOrchestrator,
  DomainSession,
  InMemoryChain,
  ProviderOrchestrator,
  type DeploymentCollaborator,
} from "federation-sdk";
import { pino } from "pino";

const logger = pino({ level: process.env.LOG_LEVEL ?? "info", formatters: { level: (label) => ({ level: label }) } });
const wait = { initialDelayMs: 20, maxDelayMs: 200, timeoutMs: 30_000 };

function fixedHost(host: string): DeploymentCollaborator {
  return {
    async deploy(req) {
      logger.info({ serviceId: req.serviceId, descriptor: req.descriptor, host }, "pretend deployment");
      return host;
    },
    async teardown(serviceName) {
      logger.info({ serviceName }, "pretend teardown");
    },
  };
}

async function domain(chain: InMemoryChain, label: string): Promise<DomainSession> {
  const session = new DomainSession(chain.account(label), { logger: logger.child({ domain: label }) });
  await session.register(label);
  return session;
}

async function main() {
  const chain = new InMemoryChain();
  const consumer = await domain(chain, "consumer");
  const provider1 = await domain(chain, "provider1");
  const provider2 = await domain(chain, "provider2");

  const endpoint = (name: string) => ({
    serviceCatalogDb: `http://${name}.local/catalog`,
    topologyDb: `http://${name}.local/topology`,
    nsdId: "nginx-nsd",
    nsId: `ns-${name}`,
  });

  // providers start first and wait for the announcement
  const providerRuns = [
    new ProviderOrchestrator(provider1, { deployment: fixedHost("10.0.1.5") }).run({
      price: 40,
      endpoint: endpoint("provider1"),
      wait,
    }),
    new ProviderOrchestrator(provider2, { deployment: fixedHost("10.0.2.5") }).run({
      price: 25,
      endpoint: endpoint("provider2"),
      wait,
    }),
  ];

  const outcome = await new ConsumerOrchestrator(consumer).run({
    requirements: { serviceType: "nginx", bandwidthGbps: 5, rttLatencyMs: 30, computeCpus: 1, computeRamGb: 2 },
    endpoint: endpoint("consumer"),
    quorum: 2,
    wait,
  });
  const providers = await Promise.all(providerRuns);

  logger.info(
    {
      serviceId: outcome.serviceId,
      winner: outcome.winner.providerAddr,
      price: outcome.winner.price.toString(),
      federatedHost: outcome.federatedHost,
      seconds: outcome.durationSeconds,
      providers: providers.map((p) => p.outcome),
    },
    "federation complete"
  );
}

main().catch((e) => {
  logger.error({ err: e }, "demo failed");
  process.exitCode = 1;
});
