import fs from "node:fs/promises";
import path from "node:path";
import { AgentRegistry } from "./agents/fixerAgent";
import type { FaultSink } from "./agents/errorBoundary";
import { CommandFixerAgent } from "./agents/commandFixerAgent";
import { LlmFixerAgent } from "./agents/llmFixerAgent";
import { AdapterRegistry } from "./checks/checkAdapter";
import { CommandCheckAdapter } from "./checks/commandCheckAdapter";
import { assertLlmConfig, config } from "./config";
import { OpenAiClient } from "./llm/openaiClient";
import { createLogger } from "./logger";
import { FixStrategyMemory } from "./memory/fixStrategyMemory";
import { HashingIssueEmbedder, OpenAiIssueEmbedder } from "./memory/issueEmbedder";
import type { IssueEmbedder } from "./memory/issueEmbedder";
import { QualityOrchestrator } from "./orchestrator/qualityOrchestrator";
import { parseOrchestratorConfig } from "./schemas/orchestratorConfig";
import { CommandRunner } from "./services/commandRunner";
import { RunStore } from "./services/runStore";
import { WorkspaceService } from "./services/workspace";
import type { OrchestratorConfig } from "./types";

export interface Runtime {
  config: OrchestratorConfig;
  store: RunStore;
  adapters: AdapterRegistry;
  agents: AgentRegistry;
  orchestrator: QualityOrchestrator;
}

/** Reads a JSON orchestrator config; a relative projectRoot is taken from the file's directory. */
export const loadOrchestratorConfig = async (configPath: string): Promise<OrchestratorConfig> => {
  const absolute = path.resolve(config.workspaceRoot, configPath);
  const raw: unknown = JSON.parse(await fs.readFile(absolute, "utf8"));
  const parsed = parseOrchestratorConfig(raw);
  return { ...parsed, projectRoot: path.resolve(path.dirname(absolute), parsed.projectRoot) };
};

export const createRuntime = (orchestratorConfig: OrchestratorConfig, options: { faultSink?: FaultSink } = {}): Runtime => {
  const logger = createLogger("runtime");
  const root = orchestratorConfig.projectRoot;
  const runner = new CommandRunner(root);
  const adapters = new AdapterRegistry([new CommandCheckAdapter(runner, root)]);
  const agents = new AgentRegistry(orchestratorConfig.fixers.map((fixer) => new CommandFixerAgent(fixer, runner, root)));

  let llm: OpenAiClient | undefined;
  if (config.useLlmFixer || config.useOpenAiEmbeddings) {
    assertLlmConfig();
    llm = new OpenAiClient();
  }
  if (llm && config.useLlmFixer) {
    agents.register(new LlmFixerAgent(llm, new WorkspaceService(root)));
  }

  const embedder: IssueEmbedder =
    llm && config.useOpenAiEmbeddings ? new OpenAiIssueEmbedder(llm) : new HashingIssueEmbedder();
  const store = new RunStore();
  const orchestrator = new QualityOrchestrator({
    config: orchestratorConfig,
    adapters,
    agents,
    store,
    memory: new FixStrategyMemory(config.fixStrategyLogPath),
    embedder,
    faultSink: options.faultSink
  });

  logger.info(
    { projectRoot: root, checks: orchestratorConfig.checks.length, agents: agents.all().map((agent) => agent.name) },
    "Runtime ready"
  );
  return { config: orchestratorConfig, store, adapters, agents, orchestrator };
};
