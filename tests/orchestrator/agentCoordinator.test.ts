import fs from "node:fs/promises";
import path from "node:path";
import { describe, expect, it, vi } from "vitest";
import { AgentRegistry } from "../../src/agents/fixerAgent";
import { AgentCoordinator, strategyForIteration } from "../../src/orchestrator/agentCoordinator";
import { createFixResult, failedFixResult } from "../../src/services/fixResults";
import type { StrategyRecommendation } from "../../src/types";
import { createIssue, createTempDir } from "../helpers";
import { FakeAgent } from "./fakeAgent";

const failing = (name: string) => async () => failedFixResult(`${name} could not fix it`, 0.4);

const createMemory = (recommendation: StrategyRecommendation | null) => ({
  recordAttempt: vi.fn(async () => ({
    issueKind: "type_error" as const,
    errorCode: null,
    issueMessage: "",
    filePath: null,
    embedding: [],
    agentUsed: "",
    strategy: "",
    success: true,
    confidence: 1,
    timestamp: "",
    sessionId: null
  })),
  findSimilarIssues: vi.fn(() => []),
  recommendStrategy: vi.fn(() => recommendation)
});

describe("strategyForIteration", () => {
  it("escalates at 2, 5 and 10 iterations", () => {
    expect([0, 1, 2, 4, 5, 9, 10, 25].map(strategyForIteration)).toEqual([
      "conservative",
      "conservative",
      "moderate",
      "moderate",
      "aggressive",
      "aggressive",
      "desperate",
      "desperate"
    ]);
  });
});

describe("AgentCoordinator", () => {
  it("never calls fix when every agent scores below the threshold", async () => {
    const agent = new FakeAgent("weak", 0.29);
    const coordinator = new AgentCoordinator(new AgentRegistry([agent]));

    const outcome = await coordinator.handleIssue(createIssue());

    expect(agent.fixCalls).toHaveLength(0);
    expect(outcome.attemptedAgents).toEqual([]);
    expect(outcome.result.success).toBe(false);
    expect(outcome.result.confidence).toBe(0.29);
    expect(outcome.result.remainingIssues).toEqual([
      "No agent is confident enough to fix type_error issue issue-1 (best score 0.29 < 0.3)"
    ]);
  });

  it("accepts an agent scoring exactly the threshold", async () => {
    const agent = new FakeAgent("edge", 0.3);
    const outcome = await new AgentCoordinator(new AgentRegistry([agent])).handleIssue(createIssue());
    expect(outcome.agentName).toBe("edge");
    expect(outcome.result.success).toBe(true);
  });

  it("picks the highest score and keeps registration order on ties", async () => {
    const first = new FakeAgent("first", 0.6);
    const second = new FakeAgent("second", 0.6);
    const coordinator = new AgentCoordinator(new AgentRegistry([first, second]));
    expect((await coordinator.selectAgent(createIssue()))?.agent.name).toBe("first");

    const best = new FakeAgent("best", 0.8);
    const withBest = new AgentCoordinator(new AgentRegistry([first, second, best]));
    expect((await withBest.selectAgent(createIssue()))?.agent.name).toBe("best");
  });

  it("scores an agent whose canHandle throws as zero", async () => {
    const broken = new FakeAgent("broken", () => {
      throw new Error("cannot score");
    });
    const coordinator = new AgentCoordinator(new AgentRegistry([broken, new FakeAgent("ok", 0.5)]));

    const scores = await coordinator.scoreAgents(createIssue());
    expect(scores.map((entry) => [entry.agent.name, entry.score])).toEqual([
      ["ok", 0.5],
      ["broken", 0]
    ]);
  });

  it("converts a throwing fixer into a failed result and reports the fault", async () => {
    const agent = new FakeAgent("crashy", 0.9, async () => Promise.reject(new Error("boom")));
    const faultSink = { report: vi.fn() };
    const coordinator = new AgentCoordinator(new AgentRegistry([agent]), { faultSink });

    const outcome = await coordinator.handleIssue(createIssue({ id: "i-2" }));

    expect(outcome.result.success).toBe(false);
    expect(outcome.result.remainingIssues).toEqual(["crashy failed on issue i-2: boom"]);
    expect(faultSink.report).toHaveBeenCalledTimes(1);
  });

  it("downgrades a success whose claimed edits never reached disk", async () => {
    const root = await createTempDir();
    await fs.writeFile(path.join(root, "app.ts"), "let x: number = '1';\n");
    const liar = new FakeAgent("liar", 0.9, async () =>
      createFixResult({ confidence: 0.95, fixesApplied: ["fixed"], filesModified: ["app.ts", "ghost.ts"] })
    );
    const coordinator = new AgentCoordinator(new AgentRegistry([liar]), { workspaceRoot: root });

    const outcome = await coordinator.handleIssue(createIssue({ filePath: "app.ts" }));

    expect(outcome.result.success).toBe(false);
    expect(outcome.result.confidence).toBe(0.95);
    expect(outcome.result.remainingIssues).toEqual(["liar reported modifying app.ts, ghost.ts but the content did not change"]);
  });

  it("rejects a claim on an untouched file the issue does not name", async () => {
    const root = await createTempDir();
    await fs.writeFile(path.join(root, "app.ts"), "a\n");
    await fs.writeFile(path.join(root, "other.ts"), "b\n");
    const anHourAgo = new Date(Date.now() - 3_600_000);
    await fs.utimes(path.join(root, "other.ts"), anHourAgo, anHourAgo);
    const liar = new FakeAgent("liar", 0.9, async () => createFixResult({ confidence: 0.9, filesModified: ["other.ts"] }));
    const coordinator = new AgentCoordinator(new AgentRegistry([liar]), { workspaceRoot: root });

    const outcome = await coordinator.handleIssue(createIssue({ filePath: "app.ts" }));

    expect(outcome.result.success).toBe(false);
    expect(outcome.result.remainingIssues).toEqual(["liar reported modifying other.ts but the content did not change"]);
    expect(await fs.readFile(path.join(root, "other.ts"), "utf8")).toBe("b\n");
  });

  it("keeps a success whose edits are on disk", async () => {
    const root = await createTempDir();
    await fs.writeFile(path.join(root, "app.ts"), "let x: number = '1';\n");
    const honest = new FakeAgent("honest", 0.9, async () => {
      await fs.writeFile(path.join(root, "app.ts"), "let x: number = 1;\n");
      await fs.writeFile(path.join(root, "extra.ts"), "export {};\n");
      return createFixResult({ confidence: 0.9, filesModified: ["app.ts", "extra.ts"] });
    });
    const coordinator = new AgentCoordinator(new AgentRegistry([honest]), { workspaceRoot: root });

    const outcome = await coordinator.handleIssue(createIssue({ filePath: "app.ts" }));

    expect(outcome.result.success).toBe(true);
    expect(outcome.result.filesModified).toEqual(["app.ts", "extra.ts"]);
  });

  it("boosts the agent that memory recommends and records the attempt", async () => {
    const strong = new FakeAgent("strong", 0.6);
    const remembered = new FakeAgent("remembered", 0.4);
    const memory = createMemory({
      agentName: "remembered",
      strategy: "remembered-strategy",
      key: "remembered:remembered-strategy",
      confidence: 0.5,
      successCount: 3,
      attempts: 3
    });
    const embedder = { embed: vi.fn(async () => [1, 0]) };
    const coordinator = new AgentCoordinator(new AgentRegistry([strong, remembered]), {
      memory,
      embedder,
      sessionId: "session-1"
    });
    const issue = createIssue();

    const outcome = await coordinator.handleIssue(issue);

    expect(outcome.agentName).toBe("remembered");
    expect(strong.fixCalls).toHaveLength(0);
    expect(memory.recordAttempt).toHaveBeenCalledWith(
      issue,
      [1, 0],
      "remembered",
      "remembered-strategy",
      { success: true, confidence: 0.9 },
      "session-1"
    );
  });

  it("does not boost a recommended agent that is below the threshold", async () => {
    const low = new FakeAgent("low", 0.2);
    const memory = createMemory({
      agentName: "low",
      strategy: "low-strategy",
      key: "low:low-strategy",
      confidence: 1,
      successCount: 9,
      attempts: 9
    });
    const coordinator = new AgentCoordinator(new AgentRegistry([low]), {
      memory,
      embedder: { embed: async () => [1] }
    });

    const outcome = await coordinator.handleIssue(createIssue());
    expect(low.fixCalls).toHaveLength(0);
    expect(outcome.result.success).toBe(false);
  });

  it("tries up to three agents from the aggressive iteration on", async () => {
    const agents = [
      new FakeAgent("a", 0.9, failing("a")),
      new FakeAgent("b", 0.8, failing("b")),
      new FakeAgent("c", 0.7, async () => createFixResult({ confidence: 0.7 })),
      new FakeAgent("d", 0.6)
    ];
    const coordinator = new AgentCoordinator(new AgentRegistry(agents));

    const early = await coordinator.handleIssue(createIssue(), 1);
    expect(early.attemptedAgents).toEqual(["a"]);
    expect(early.result.remainingIssues).toEqual(["a could not fix it"]);

    const late = await coordinator.handleIssue(createIssue(), 5);
    expect(late.attemptedAgents).toEqual(["a", "b", "c"]);
    expect(late.agentName).toBe("c");
    expect(late.result.success).toBe(true);
    expect(agents[3]?.fixCalls).toHaveLength(0);
  });

  it("merges the per-issue results of a batch", async () => {
    const agent = new FakeAgent("picky", 0.9, async (issue) =>
      issue.id === "bad" ? failedFixResult("still failing", 0.2) : createFixResult({ confidence: 0.8, fixesApplied: [issue.id] })
    );
    const coordinator = new AgentCoordinator(new AgentRegistry([agent]));

    const merged = await coordinator.handleIssues([createIssue({ id: "good" }), createIssue({ id: "bad" })]);

    expect(merged.success).toBe(false);
    expect(merged.confidence).toBe(0.8);
    expect(merged.fixesApplied).toEqual(["good"]);
    expect(merged.remainingIssues).toEqual(["still failing"]);
  });
});
