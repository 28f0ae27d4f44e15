import type { AgentRegistry, FixerAgent } from "../agents/fixerAgent";
import { runWithErrorBoundary } from "../agents/errorBoundary";
import type { FaultSink } from "../agents/errorBoundary";
import { createLogger, toErrorMessage } from "../logger";
import type { Logger } from "../logger";
import type { FixStrategyMemoryLike } from "../memory/fixStrategyMemory";
import type { IssueEmbedder } from "../memory/issueEmbedder";
import { snapshotFiles, isGenuineModification } from "../services/fileSnapshot";
import type { FileSnapshot } from "../services/fileSnapshot";
import { clampConfidence, createFixResult, failedFixResult, mergeAllFixResults } from "../services/fixResults";
import type { FixResult, Issue, StrategyRecommendation } from "../types";

export const DELEGATION_THRESHOLD = 0.3;
export const CACHE_CONFIDENCE_THRESHOLD = 0.7;
export const MEMORY_BOOST = 0.2;
export const MAX_FALLBACK_AGENTS = 3;
/** File timestamps come from a coarse clock that can trail Date.now() by a tick. */
export const MTIME_SLACK_MS = 50;

export type IterationStrategy = "conservative" | "moderate" | "aggressive" | "desperate";

export const strategyForIteration = (iteration: number): IterationStrategy => {
  if (iteration < 2) return "conservative";
  if (iteration < 5) return "moderate";
  if (iteration < 10) return "aggressive";
  return "desperate";
};

export interface IssueFixer {
  handleIssues(issues: readonly Issue[], iteration?: number): Promise<FixResult>;
}

export interface AgentScore {
  agent: FixerAgent;
  score: number;
  boosted: boolean;
}

export interface IssueOutcome {
  issue: Issue;
  agentName?: string;
  attemptedAgents: string[];
  result: FixResult;
}

export interface CoordinatorEvents {
  onAgentSelected?: (issue: Issue, agentName: string, score: number) => void;
  onIssueResolved?: (outcome: IssueOutcome) => void;
}

export interface CoordinatorOptions {
  workspaceRoot?: string;
  memory?: FixStrategyMemoryLike;
  embedder?: IssueEmbedder;
  faultSink?: FaultSink;
  logger?: Logger;
  sessionId?: string;
  events?: CoordinatorEvents;
}

export const declinedFixResult = (issue: Issue, bestScore: number): FixResult =>
  failedFixResult(
    `No agent is confident enough to fix ${issue.kind} issue ${issue.id} (best score ${bestScore.toFixed(2)} < ${DELEGATION_THRESHOLD})`,
    clampConfidence(bestScore)
  );

/**
 * Routes each issue to the fixer that scores it highest, calls it behind the
 * error boundary and refuses to believe claimed edits that never reached disk.
 */
export class AgentCoordinator implements IssueFixer {
  private readonly logger: Logger;
  private readonly workspaceRoot: string;

  constructor(
    private readonly registry: AgentRegistry,
    private readonly options: CoordinatorOptions = {}
  ) {
    this.logger = options.logger ?? createLogger("agent-coordinator");
    this.workspaceRoot = options.workspaceRoot ?? process.cwd();
  }

  get agents(): AgentRegistry {
    return this.registry;
  }

  async scoreAgents(issue: Issue, recommendation?: StrategyRecommendation | null): Promise<AgentScore[]> {
    const scores: AgentScore[] = [];
    for (const agent of this.registry.all()) {
      let score = 0;
      try {
        score = clampConfidence(await agent.canHandle(issue));
      } catch (error: unknown) {
        this.logger.warn({ agent: agent.name, issueId: issue.id, err: error }, "canHandle threw, scoring agent as 0");
      }

      // a boost reorders eligible agents; it never lifts one over the threshold
      const boosted = recommendation?.agentName === agent.name && score >= DELEGATION_THRESHOLD;
      if (boosted && recommendation) {
        score = Math.min(1, score + recommendation.confidence + MEMORY_BOOST);
      }
      scores.push({ agent, score, boosted });
    }

    // stable: equal scores keep registration order, so only a strictly higher score displaces
    return scores.sort((a, b) => b.score - a.score);
  }

  async selectAgent(issue: Issue, recommendation?: StrategyRecommendation | null): Promise<AgentScore | undefined> {
    const [best] = await this.scoreAgents(issue, recommendation);
    if (!best || best.score < DELEGATION_THRESHOLD) return undefined;
    return best;
  }

  /** Invokes one agent and verifies every path it claims to have modified. */
  async invokeAgent(agent: FixerAgent, issue: Issue): Promise<FixResult> {
    const watched = [issue.filePath, ...(agent.targetFiles?.(issue) ?? [])].filter(
      (filePath): filePath is string => Boolean(filePath)
    );
    const before = await snapshotFiles(watched, this.workspaceRoot);
    const startedAt = Date.now();

    const result = await runWithErrorBoundary(agent.name, issue, () => agent.fix(issue), {
      logger: this.logger,
      sink: this.options.faultSink
    });

    if (!result.success || result.filesModified.length === 0) {
      return result;
    }
    return this.verifyClaim(agent, issue, result, before, startedAt);
  }

  /** A single verified attempt by a caller-chosen agent, recorded in memory like routed ones. */
  async attempt(agent: FixerAgent, issue: Issue): Promise<FixResult> {
    const embedding = await this.embed(issue);
    const result = await this.invokeAgent(agent, issue);
    await this.remember(issue, embedding, agent, result);
    return result;
  }

  private async verifyClaim(
    agent: FixerAgent,
    issue: Issue,
    result: FixResult,
    before: Map<string, FileSnapshot>,
    startedAt: number
  ): Promise<FixResult> {
    const after = await snapshotFiles(result.filesModified, this.workspaceRoot);
    const unverified = result.filesModified.filter((filePath) => {
      const next = after.get(filePath);
      const previous = before.get(filePath);
      if (!next) return true;
      // no snapshot to compare: the file must have been written during the call
      if (!previous) return !next.exists || next.mtimeMs < startedAt - MTIME_SLACK_MS;
      return !isGenuineModification(previous, next);
    });

    if (unverified.length === 0) {
      return result;
    }

    this.logger.warn(
      { agent: agent.name, issueId: issue.id, unverified },
      `${agent.name} claimed changes that are not on disk`
    );
    return createFixResult({
      ...result,
      success: false,
      remainingIssues: [
        ...result.remainingIssues,
        `${agent.name} reported modifying ${unverified.join(", ")} but the content did not change`
      ]
    });
  }

  async handleIssue(issue: Issue, iteration = 0): Promise<IssueOutcome> {
    const strategy = strategyForIteration(iteration);
    const embedding = await this.embed(issue);
    const recommendation = embedding && this.options.memory ? this.options.memory.recommendStrategy(issue, embedding) : null;
    const scores = await this.scoreAgents(issue, recommendation);
    const eligible = scores.filter((entry) => entry.score >= DELEGATION_THRESHOLD);

    if (eligible.length === 0) {
      const outcome: IssueOutcome = {
        issue,
        attemptedAgents: [],
        result: declinedFixResult(issue, scores[0]?.score ?? 0)
      };
      this.logger.info({ issueId: issue.id, kind: issue.kind }, "No eligible agent, issue left unresolved");
      this.options.events?.onIssueResolved?.(outcome);
      return outcome;
    }

    const candidates =
      strategy === "aggressive" || strategy === "desperate" ? eligible.slice(0, MAX_FALLBACK_AGENTS) : eligible.slice(0, 1);
    const attemptedAgents: string[] = [];
    const results: FixResult[] = [];
    let lastAgent: string | undefined;

    for (const candidate of candidates) {
      const { agent, score } = candidate;
      this.options.events?.onAgentSelected?.(issue, agent.name, score);
      this.logger.debug({ issueId: issue.id, agent: agent.name, score, strategy, boosted: candidate.boosted }, "Agent selected");

      const result = await this.invokeAgent(agent, issue);
      attemptedAgents.push(agent.name);
      lastAgent = agent.name;
      await this.remember(issue, embedding, agent, result);

      if (result.success) {
        const outcome: IssueOutcome = { issue, agentName: agent.name, attemptedAgents, result };
        this.options.events?.onIssueResolved?.(outcome);
        return outcome;
      }
      results.push(result);
    }

    const outcome: IssueOutcome = {
      issue,
      agentName: lastAgent,
      attemptedAgents,
      result: mergeAllFixResults(results)
    };
    this.options.events?.onIssueResolved?.(outcome);
    return outcome;
  }

  /** Resolves issues one at a time; fixers may touch the same files. */
  async resolveIssues(issues: readonly Issue[], iteration = 0): Promise<IssueOutcome[]> {
    const outcomes: IssueOutcome[] = [];
    for (const issue of issues) {
      outcomes.push(await this.handleIssue(issue, iteration));
    }
    return outcomes;
  }

  async handleIssues(issues: readonly Issue[], iteration = 0): Promise<FixResult> {
    const outcomes = await this.resolveIssues(issues, iteration);
    return mergeAllFixResults(outcomes.map((outcome) => outcome.result));
  }

  private async embed(issue: Issue): Promise<number[] | undefined> {
    if (!this.options.embedder || !this.options.memory) return undefined;
    try {
      return await this.options.embedder.embed(issue);
    } catch (error: unknown) {
      this.logger.warn({ issueId: issue.id, err: error }, `Issue embedding failed: ${toErrorMessage(error)}`);
      return undefined;
    }
  }

  private async remember(issue: Issue, embedding: number[] | undefined, agent: FixerAgent, result: FixResult): Promise<void> {
    if (!embedding || !this.options.memory) return;
    try {
      await this.options.memory.recordAttempt(
        issue,
        embedding,
        agent.name,
        agent.strategy,
        { success: result.success, confidence: result.confidence },
        this.options.sessionId
      );
    } catch (error: unknown) {
      this.logger.warn({ issueId: issue.id, agent: agent.name, err: error }, "Could not record fix attempt");
    }
  }
}
