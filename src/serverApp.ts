import fastify, { type FastifyInstance } from "fastify";
import { z } from "zod";
import { config } from "./config";
import type { StrategyStatistics } from "./memory/fixStrategyMemory";
import type { RunStore } from "./services/runStore";
import type { DelegationMetrics, IssueKind, RunInput } from "./types";

export interface OrchestratorLike {
  start(input: Partial<RunInput>): string;
  getDelegationMetrics(): DelegationMetrics;
  getStrategyStatistics(): StrategyStatistics | undefined;
}

export interface AgentCatalogLike {
  capabilities(): Array<{ name: string; strategy: string; supportedKinds: IssueKind[] }>;
}

export interface AdapterCatalogLike {
  names(): string[];
}

export interface ServerDeps {
  store: RunStore;
  orchestrator: OrchestratorLike;
  agents: AgentCatalogLike;
  adapters: AdapterCatalogLike;
  logger?: boolean | { level: string; name?: string };
}

const runInputSchema = z.object({
  files: z.array(z.string().min(1).max(500)).max(5000).optional(),
  stages: z.array(z.enum(["fast", "comprehensive"])).min(1).optional(),
  fix: z.boolean().optional()
});

export const buildApp = (deps: ServerDeps): FastifyInstance => {
  const app = fastify({ logger: deps.logger ?? false });

  app.get("/api/health", async () => ({ ok: true }));

  app.get("/api/overview", async () => ({
    ok: true,
    service: "quality-remediation",
    workspaceRoot: config.workspaceRoot,
    adapters: deps.adapters.names(),
    agents: deps.agents.capabilities().map((agent) => agent.name),
    now: new Date().toISOString()
  }));

  app.post("/api/runs", async (request, reply) => {
    const parsed = runInputSchema.safeParse(request.body ?? {});
    if (!parsed.success) {
      return reply.code(400).send({ error: parsed.error.flatten() });
    }

    const runId = deps.orchestrator.start(parsed.data);
    return reply.code(202).send({ runId });
  });

  app.get("/api/runs", async () => ({ runs: deps.store.all() }));

  app.get<{ Params: { id: string } }>("/api/runs/:id", async (request, reply) => {
    const run = deps.store.get(request.params.id);
    if (!run) {
      return reply.code(404).send({ error: "Run not found" });
    }
    return { run, events: deps.store.getEvents(run.id) };
  });

  app.get<{ Params: { id: string } }>("/api/runs/:id/events", async (request, reply) => {
    const { id } = request.params;
    if (!deps.store.get(id)) {
      return reply.code(404).send({ error: "Run not found" });
    }

    reply.hijack();
    reply.raw.setHeader("Content-Type", "text/event-stream");
    reply.raw.setHeader("Cache-Control", "no-cache");
    reply.raw.setHeader("Connection", "keep-alive");
    reply.raw.flushHeaders?.();

    const send = (data: unknown): void => {
      reply.raw.write(`data: ${JSON.stringify(data)}\n\n`);
    };

    for (const event of deps.store.getEvents(id)) {
      send(event);
    }

    const unsubscribe = deps.store.subscribe(id, (event) => send(event));

    request.raw.on("close", () => {
      unsubscribe();
      reply.raw.end();
    });
  });

  app.get("/api/agents", async () => ({ agents: deps.agents.capabilities() }));

  app.get("/api/delegation/stats", async () => ({ stats: deps.orchestrator.getDelegationMetrics() }));

  app.get("/api/strategies/stats", async () => {
    const stats = deps.orchestrator.getStrategyStatistics();
    return stats ? { enabled: true, stats } : { enabled: false };
  });

  return app;
};
