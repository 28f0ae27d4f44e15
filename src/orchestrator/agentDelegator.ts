import { createHash } from "node:crypto";
import { createLogger, toErrorMessage } from "../logger";
import type { Logger } from "../logger";
import { createFixResult, failedFixResult, mergeAllFixResults } from "../services/fixResults";
import type { DelegationMetrics, DelegationStats, FixResult, Issue, IssueKind } from "../types";
import { CACHE_CONFIDENCE_THRESHOLD, DELEGATION_THRESHOLD, declinedFixResult, strategyForIteration } from "./agentCoordinator";
import type { AgentCoordinator, IssueFixer } from "./agentCoordinator";

export type DelegationExtras = Record<string, string | number | boolean | null>;

export const GENERIC_ROUTE = "auto";

export const defaultDelegationTable: Readonly<Partial<Record<IssueKind, string>>> = {
  formatting: "formatter",
  type_error: "type-error-fixer",
  security: "security-fixer",
  test_failure: "test-fixer",
  import_error: "import-fixer",
  complexity: "complexity-reducer",
  dead_code: "dead-code-remover",
  dependency: "dependency-updater",
  duplication: "duplication-reducer",
  performance: "performance-optimizer",
  documentation: "docstring-writer",
  regex_validation: "regex-fixer"
};

export const createDelegationCacheKey = (agentName: string, issue: Issue, extras: DelegationExtras = {}): string => {
  const sortedExtras = Object.keys(extras)
    .sort()
    .map((key) => [key, extras[key]]);
  return createHash("sha256")
    .update(
      JSON.stringify([
        agentName,
        issue.kind,
        issue.message,
        issue.filePath ?? null,
        issue.lineNumber ?? null,
        sortedExtras
      ])
    )
    .digest("hex");
};

export const emptyDelegationStats = (): DelegationStats => ({
  totalDelegations: 0,
  successfulDelegations: 0,
  failedDelegations: 0,
  totalLatencyMs: 0,
  cacheHits: 0,
  cacheMisses: 0,
  agentsUsed: {}
});

export const addDelegationStats = (a: DelegationStats, b: DelegationStats): DelegationStats => {
  const agentsUsed = { ...a.agentsUsed };
  for (const [agent, count] of Object.entries(b.agentsUsed)) {
    agentsUsed[agent] = (agentsUsed[agent] ?? 0) + count;
  }
  return {
    totalDelegations: a.totalDelegations + b.totalDelegations,
    successfulDelegations: a.successfulDelegations + b.successfulDelegations,
    failedDelegations: a.failedDelegations + b.failedDelegations,
    totalLatencyMs: a.totalLatencyMs + b.totalLatencyMs,
    cacheHits: a.cacheHits + b.cacheHits,
    cacheMisses: a.cacheMisses + b.cacheMisses,
    agentsUsed
  };
};

export const toDelegationMetrics = (stats: DelegationStats): DelegationMetrics => {
  const lookups = stats.cacheHits + stats.cacheMisses;
  return {
    ...stats,
    agentsUsed: { ...stats.agentsUsed },
    averageLatencyMs: stats.totalDelegations > 0 ? stats.totalLatencyMs / stats.totalDelegations : 0,
    cacheHitRate: lookups > 0 ? stats.cacheHits / lookups : 0
  };
};

export interface DelegatorOptions {
  table?: Readonly<Partial<Record<IssueKind, string>>>;
  logger?: Logger;
}

/**
 * Caching and bookkeeping in front of the coordinator. Only confident
 * successes are cached, so anything that failed or scored low is attempted
 * again on the next pass.
 */
export class AgentDelegator implements IssueFixer {
  private readonly cache = new Map<string, { agentUsed: string; result: FixResult }>();
  private stats: DelegationStats = emptyDelegationStats();
  private readonly table: Readonly<Partial<Record<IssueKind, string>>>;
  private readonly logger: Logger;

  constructor(
    private readonly coordinator: AgentCoordinator,
    options: DelegatorOptions = {}
  ) {
    this.table = options.table ?? defaultDelegationTable;
    this.logger = options.logger ?? createLogger("agent-delegator");
  }

  async delegateToAgent(agentName: string, issue: Issue, extras: DelegationExtras = {}): Promise<FixResult> {
    return this.tracked(agentName, issue, extras, async () => {
      const agent = this.coordinator.agents.get(agentName);
      if (!agent) {
        return { agentUsed: agentName, result: failedFixResult(`Fixer agent not registered: ${agentName}`) };
      }

      let score = 0;
      try {
        score = await agent.canHandle(issue);
      } catch (error: unknown) {
        this.logger.warn({ agent: agentName, issueId: issue.id, err: error }, "canHandle threw during delegation");
      }
      if (score < DELEGATION_THRESHOLD) {
        return { agentUsed: agentName, result: declinedFixResult(issue, score) };
      }
      return { agentUsed: agentName, result: await this.coordinator.attempt(agent, issue) };
    });
  }

  async delegateToTypeSpecialist(issue: Issue, extras?: DelegationExtras): Promise<FixResult> {
    return this.delegateKind("type_error", issue, extras);
  }

  async delegateToDeadCodeRemover(issue: Issue, extras?: DelegationExtras): Promise<FixResult> {
    return this.delegateKind("dead_code", issue, extras);
  }

  async delegateToSecurityFixer(issue: Issue, extras?: DelegationExtras): Promise<FixResult> {
    return this.delegateKind("security", issue, extras);
  }

  async delegateToFormatter(issue: Issue, extras?: DelegationExtras): Promise<FixResult> {
    return this.delegateKind("formatting", issue, extras);
  }

  async delegateToTestFixer(issue: Issue, extras?: DelegationExtras): Promise<FixResult> {
    return this.delegateKind("test_failure", issue, extras);
  }

  /**
   * Dispatches through the kind table when the mapped agent is registered,
   * otherwise lets the coordinator pick by score. From the aggressive
   * iterations on, a failed table dispatch is retried through the coordinator.
   */
  async delegateAuto(issue: Issue, iteration = 0): Promise<FixResult> {
    const mapped = this.table[issue.kind];
    if (mapped && this.coordinator.agents.get(mapped)) {
      const result = await this.delegateToAgent(mapped, issue);
      const strategy = strategyForIteration(iteration);
      if (result.success || (strategy !== "aggressive" && strategy !== "desperate")) {
        return result;
      }
      this.logger.info({ issueId: issue.id, agent: mapped, strategy }, "Table agent failed, falling back to scored routing");
    }
    return this.delegateGeneric(issue, iteration);
  }

  async delegateGeneric(issue: Issue, iteration = 0): Promise<FixResult> {
    return this.tracked(GENERIC_ROUTE, issue, { strategy: strategyForIteration(iteration) }, async () => {
      const outcome = await this.coordinator.handleIssue(issue, iteration);
      return { agentUsed: outcome.agentName ?? "none", result: outcome.result };
    });
  }

  /**
   * Fans out one delegation per issue. A rejected delegation becomes a failed
   * result in its own slot; siblings keep running.
   */
  async delegateBatch(issues: readonly Issue[], iteration = 0): Promise<FixResult[]> {
    const settled = await Promise.allSettled(issues.map((issue) => this.delegateAuto(issue, iteration)));
    return settled.map((entry, index) => {
      if (entry.status === "fulfilled") return entry.value;
      const issueId = issues[index]?.id ?? String(index);
      this.logger.error({ issueId, err: entry.reason }, "Delegation rejected");
      return failedFixResult(`Delegation for issue ${issueId} failed: ${toErrorMessage(entry.reason)}`);
    });
  }

  /** Sequential variant used by the fix loop, where fixers may share files. */
  async handleIssues(issues: readonly Issue[], iteration = 0): Promise<FixResult> {
    const results: FixResult[] = [];
    for (const issue of issues) {
      results.push(await this.delegateAuto(issue, iteration));
    }
    return mergeAllFixResults(results);
  }

  getDelegationStats(): DelegationStats {
    return { ...this.stats, agentsUsed: { ...this.stats.agentsUsed } };
  }

  getDelegationMetrics(): DelegationMetrics {
    return toDelegationMetrics(this.stats);
  }

  resetStats(): void {
    this.stats = emptyDelegationStats();
  }

  clearCache(): void {
    this.cache.clear();
  }

  get cacheSize(): number {
    return this.cache.size;
  }

  private async delegateKind(kind: IssueKind, issue: Issue, extras?: DelegationExtras): Promise<FixResult> {
    const agentName = this.table[kind];
    if (agentName && this.coordinator.agents.get(agentName)) {
      return this.delegateToAgent(agentName, issue, extras);
    }
    return this.delegateGeneric(issue);
  }

  private async tracked(
    route: string,
    issue: Issue,
    extras: DelegationExtras,
    invoke: () => Promise<{ agentUsed: string; result: FixResult }>
  ): Promise<FixResult> {
    const key = createDelegationCacheKey(route, issue, extras);
    const startedAt = Date.now();
    const cached = this.cache.get(key);

    if (cached) {
      this.stats.cacheHits += 1;
      this.record(cached.agentUsed, cached.result, startedAt);
      this.logger.debug({ issueId: issue.id, route, agent: cached.agentUsed }, "Delegation served from cache");
      return createFixResult(cached.result);
    }

    this.stats.cacheMisses += 1;
    let agentUsed = route;
    let result: FixResult;
    try {
      const outcome = await invoke();
      agentUsed = outcome.agentUsed;
      result = outcome.result;
    } catch (error: unknown) {
      this.logger.error({ issueId: issue.id, route, err: error }, "Delegation failed");
      result = failedFixResult(`${route} failed on issue ${issue.id}: ${toErrorMessage(error)}`);
    }

    if (result.success && result.confidence > CACHE_CONFIDENCE_THRESHOLD) {
      this.cache.set(key, { agentUsed, result: createFixResult(result) });
    }
    this.record(agentUsed, result, startedAt);
    return result;
  }

  private record(agentName: string, result: FixResult, startedAt: number): void {
    this.stats.totalDelegations += 1;
    if (result.success) {
      this.stats.successfulDelegations += 1;
    } else {
      this.stats.failedDelegations += 1;
    }
    this.stats.totalLatencyMs += Date.now() - startedAt;
    this.stats.agentsUsed[agentName] = (this.stats.agentsUsed[agentName] ?? 0) + 1;
  }
}
