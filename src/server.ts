import { config } from "./config";
import { rootLogger } from "./logger";
import { createRuntime, loadOrchestratorConfig } from "./runtime";
import { buildApp } from "./serverApp";

const start = async (): Promise<void> => {
  const runtime = createRuntime(await loadOrchestratorConfig(config.orchestratorConfigPath));
  await runtime.orchestrator.init();

  const app = buildApp({
    store: runtime.store,
    orchestrator: runtime.orchestrator,
    agents: runtime.agents,
    adapters: runtime.adapters,
    logger: { level: config.logLevel, name: "quality-remediation" }
  });

  await app.listen({ port: config.port, host: "0.0.0.0" });
};

start().catch((error: unknown) => {
  rootLogger.error({ err: error }, "Server failed to start");
  process.exit(1);
});
