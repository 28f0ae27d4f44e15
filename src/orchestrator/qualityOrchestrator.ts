import path from "node:path";
import type { AdapterRegistry } from "../checks/checkAdapter";
import type { AgentRegistry } from "../agents/fixerAgent";
import type { FaultSink } from "../agents/errorBoundary";
import { createLogger, toErrorMessage } from "../logger";
import type { Logger } from "../logger";
import type { FixStrategyMemory, StrategyStatistics } from "../memory/fixStrategyMemory";
import type { IssueEmbedder } from "../memory/issueEmbedder";
import { CheckResultCache } from "../services/checkResultCache";
import { IncrementalTracker } from "../services/incrementalTracker";
import { IssueExtractor } from "../services/issueExtractor";
import { RunStore } from "../services/runStore";
import type {
  CheckResult,
  CheckStage,
  DelegationMetrics,
  DelegationStats,
  FixLoopReport,
  OrchestratorConfig,
  RunInput,
  RunReport,
  StageSummary
} from "../types";
import { AgentCoordinator } from "./agentCoordinator";
import { AgentDelegator, addDelegationStats, emptyDelegationStats, toDelegationMetrics } from "./agentDelegator";
import { CheckScheduler, isPassingStatus, summarizeStage } from "./checkScheduler";
import type { CheckRunCallbacks } from "./checkScheduler";
import { FixVerifyLoop } from "./fixVerifyLoop";

export const CACHE_FILE_NAME = "check-results.json";

export interface QualityOrchestratorDeps {
  config: OrchestratorConfig;
  adapters: AdapterRegistry;
  agents: AgentRegistry;
  store?: RunStore;
  memory?: FixStrategyMemory;
  embedder?: IssueEmbedder;
  faultSink?: FaultSink;
  extractor?: IssueExtractor;
  logger?: Logger;
}

interface StagePass {
  stages: RunReport["stages"];
  results: CheckResult[];
  /** Fail-fast stopped the pass, so some requested checks did not run. */
  halted: boolean;
  failing: boolean;
  issuesFound: number;
  issuesFixed: number;
}

const stageOrder: CheckStage[] = ["fast", "comprehensive"];

export const normalizeRunInput = (input: Partial<RunInput> = {}): RunInput => ({
  files: input.files ?? [],
  stages: stageOrder.filter((stage) => (input.stages?.length ? input.stages.includes(stage) : true)),
  fix: input.fix ?? true
});

/**
 * Runs the configured stages, hands failures to the fix loop and keeps the
 * per-run event log in the RunStore.
 */
export class QualityOrchestrator {
  readonly store: RunStore;
  private readonly cache = new CheckResultCache();
  private readonly scheduler: CheckScheduler;
  private readonly extractor: IssueExtractor;
  private readonly logger: Logger;
  private delegationTotals: DelegationStats = emptyDelegationStats();
  private initialized?: Promise<void>;

  constructor(private readonly deps: QualityOrchestratorDeps) {
    this.store = deps.store ?? new RunStore();
    this.logger = deps.logger ?? createLogger("quality-orchestrator");
    this.extractor = deps.extractor ?? new IssueExtractor();
    this.scheduler = new CheckScheduler(deps.config, deps.adapters, {
      cache: this.cache,
      incremental: deps.config.enableIncremental ? new IncrementalTracker(deps.config.projectRoot) : undefined,
      logger: this.logger.child({ component: "check-scheduler" })
    });
  }

  private get cacheFile(): string | undefined {
    const directory = this.deps.config.cacheDirectory;
    return directory ? path.resolve(this.deps.config.projectRoot, directory, CACHE_FILE_NAME) : undefined;
  }

  async init(): Promise<void> {
    if (!this.initialized) {
      this.initialized = this.loadPersistentState();
    }
    return this.initialized;
  }

  private async loadPersistentState(): Promise<void> {
    const cacheFile = this.cacheFile;
    if (cacheFile && this.deps.config.enableCaching) {
      const loaded = await this.cache.load(cacheFile);
      this.logger.debug({ cacheFile, loaded }, "Check result cache loaded");
    }
    if (this.deps.memory) {
      await this.deps.memory.load();
    }
  }

  /** Creates the run and executes it in the background; poll the store or subscribe for progress. */
  start(input: Partial<RunInput> = {}): string {
    const run = this.store.create(normalizeRunInput(input));
    this.execute(run.id).catch((error: unknown) => {
      this.logger.error({ runId: run.id, err: error }, "Run crashed");
    });
    return run.id;
  }

  async run(input: Partial<RunInput> = {}): Promise<RunReport> {
    const run = this.store.create(normalizeRunInput(input));
    return this.execute(run.id);
  }

  getDelegationMetrics(): DelegationMetrics {
    return toDelegationMetrics(this.delegationTotals);
  }

  getStrategyStatistics(): StrategyStatistics | undefined {
    return this.deps.memory?.getStatistics();
  }

  private async execute(runId: string): Promise<RunReport> {
    const run = this.store.get(runId);
    if (!run) {
      throw new Error(`Run not found: ${runId}`);
    }

    const startedAt = new Date().toISOString();
    const files = run.input.files.length > 0 ? run.input.files : undefined;
    const { delegator } = this.createFixers(runId);

    try {
      await this.init();
      this.store.updateStatus(runId, "running");
      this.store.pushEvent(runId, "orchestrator", "run_started", `Run started for ${files?.length ?? "all"} file(s)`, {
        stages: run.input.stages,
        fix: run.input.fix
      });

      const callbacks = this.checkCallbacks(runId);
      let pass = await this.runStages(runId, run.input.stages, files, callbacks);
      let totalIssuesFound = pass.issuesFound;
      let totalIssuesFixed = pass.issuesFixed;
      let success = !pass.failing;
      let fixLoop: FixLoopReport | undefined;
      let reruns = 0;

      while (run.input.fix && pass.failing) {
        fixLoop = await this.createLoop(runId, delegator, callbacks).run(pass.results, files);
        totalIssuesFixed += fixLoop.issuesFixed;
        success = fixLoop.success;
        // a halted pass left checks unrun
        if (!fixLoop.success || !pass.halted) break;

        reruns += 1;
        if (reruns > this.deps.config.maxFixIterations) {
          this.store.pushEvent(runId, "orchestrator", "rerun_limit", `Stopped re-running stages after ${reruns - 1} attempt(s)`);
          success = false;
          break;
        }
        this.store.pushEvent(runId, "orchestrator", "stages_rerun", "Re-running the stages fail-fast skipped", { rerun: reruns });
        pass = await this.runStages(runId, run.input.stages, files, { ...callbacks, refresh: true });
        totalIssuesFound += pass.issuesFound;
        totalIssuesFixed += pass.issuesFixed;
        success = !pass.failing;
      }

      const report: RunReport = {
        runId,
        success,
        stages: pass.stages,
        totalIssuesFound,
        totalIssuesFixed,
        fixLoop,
        delegation: delegator.getDelegationMetrics(),
        startedAt,
        finishedAt: new Date().toISOString()
      };

      await this.persistCache();
      this.store.pushEvent(runId, "orchestrator", "run_finished", success ? "All checks passed" : "Checks still failing", {
        totalIssuesFound: report.totalIssuesFound,
        totalIssuesFixed: report.totalIssuesFixed,
        iterations: fixLoop?.iterations ?? 0,
        exhausted: fixLoop?.exhausted ?? false
      });
      this.store.updateStatus(runId, success ? "success" : "failed", { report });
      return report;
    } catch (error: unknown) {
      const message = toErrorMessage(error);
      this.store.pushEvent(runId, "orchestrator", "run_failed", message);
      this.store.updateStatus(runId, "failed", { errorMessage: message });
      throw error;
    } finally {
      this.delegationTotals = addDelegationStats(this.delegationTotals, delegator.getDelegationStats());
    }
  }

  /** Runs the stages in order; under fail-fast the first failing stage halts the pass. */
  private async runStages(
    runId: string,
    requested: readonly CheckStage[],
    files: readonly string[] | undefined,
    callbacks: CheckRunCallbacks
  ): Promise<StagePass> {
    const stages: RunReport["stages"] = {};
    const results: CheckResult[] = [];
    let halted = false;

    for (const stage of requested) {
      const stageResults = await this.scheduler.runChecks(stage, files, callbacks);
      const summary = summarizeStage(stage, stageResults);
      stages[stage] = { results: stageResults, summary };
      results.push(...stageResults);
      this.store.pushEvent(runId, "scheduler", "stage_finished", this.describeStage(summary), { summary });

      if (this.deps.config.failFast && stageResults.some((result) => !isPassingStatus(result.status))) {
        this.store.pushEvent(runId, "scheduler", "stage_halted", `Fail-fast stopped after the ${stage} stage`);
        halted = true;
        break;
      }
    }

    return {
      stages,
      results,
      halted,
      failing: results.some((result) => !isPassingStatus(result.status)),
      issuesFound: results.reduce((sum, result) => sum + result.issuesFound, 0),
      issuesFixed: results.reduce((sum, result) => sum + result.issuesFixed, 0)
    };
  }

  private createFixers(runId: string): { coordinator: AgentCoordinator; delegator: AgentDelegator } {
    const coordinator = new AgentCoordinator(this.deps.agents, {
      workspaceRoot: this.deps.config.projectRoot,
      memory: this.deps.memory,
      embedder: this.deps.embedder,
      faultSink: this.deps.faultSink,
      sessionId: runId,
      logger: this.logger.child({ component: "agent-coordinator", runId }),
      events: {
        onAgentSelected: (issue, agentName, score) => {
          this.store.pushEvent(runId, "coordinator", "agent_selected", `${agentName} selected for ${issue.id}`, {
            issueId: issue.id,
            agent: agentName,
            score
          });
        },
        onIssueResolved: (outcome) => {
          this.store.pushEvent(
            runId,
            "coordinator",
            outcome.result.success ? "issue_fixed" : "issue_unresolved",
            `${outcome.issue.kind} issue ${outcome.issue.id} ${outcome.result.success ? "fixed" : "unresolved"}`,
            { issueId: outcome.issue.id, attemptedAgents: outcome.attemptedAgents, confidence: outcome.result.confidence }
          );
        }
      }
    });
    const delegator = new AgentDelegator(coordinator, {
      logger: this.logger.child({ component: "agent-delegator", runId })
    });
    return { coordinator, delegator };
  }

  private createLoop(runId: string, delegator: AgentDelegator, callbacks: CheckRunCallbacks): FixVerifyLoop {
    return new FixVerifyLoop(
      {
        scheduler: this.scheduler,
        fixer: delegator,
        checks: this.deps.config.checks,
        extractor: this.extractor,
        checkCallbacks: callbacks,
        logger: this.logger.child({ component: "fix-verify-loop", runId }),
        events: {
          onIssuesExtracted: (issues, iteration) => {
            this.store.pushEvent(runId, "fix_loop", "issues_extracted", `${issues.length} issue(s) at iteration ${iteration}`, {
              iteration,
              issues: issues.length
            });
          },
          onEnvironmentFault: (faults) => {
            this.store.pushEvent(runId, "fix_loop", "environment_fault", faults[0]?.message ?? "Environment fault", {
              faults: faults.map((fault) => fault.message)
            });
          },
          onIterationFinished: (iteration, fixResult) => {
            this.store.pushEvent(runId, "fix_loop", "iteration_finished", `Iteration ${iteration} finished`, {
              iteration,
              success: fixResult.success,
              filesModified: fixResult.filesModified
            });
          },
          onExhausted: (reason, iteration) => {
            this.store.pushEvent(runId, "fix_loop", "budget_exhausted", `Fix budget exhausted (${reason})`, { reason, iteration });
          }
        }
      },
      { maxIterations: this.deps.config.maxFixIterations, maxMinutes: this.deps.config.maxFixMinutes }
    );
  }

  private checkCallbacks(runId: string): CheckRunCallbacks {
    return {
      onCheckStarted: (check) => {
        if (this.deps.config.verbose) {
          this.store.pushEvent(runId, "scheduler", "check_started", `${check.name} started`, { checkId: check.id });
        }
      },
      onCheckFinished: (check, result, meta) => {
        this.store.pushEvent(runId, "scheduler", "check_finished", `${check.name}: ${result.status}`, {
          checkId: check.id,
          status: result.status,
          issuesFound: result.issuesFound,
          executionTimeMs: result.executionTimeMs,
          cached: meta.cached,
          retried: meta.retried
        });
      }
    };
  }

  private describeStage(summary: StageSummary): string {
    return `${summary.stage}: ${summary.passed}/${summary.total} passed, ${summary.issuesFound} issue(s)`;
  }

  private async persistCache(): Promise<void> {
    const cacheFile = this.cacheFile;
    if (!cacheFile || !this.deps.config.enableCaching) return;
    try {
      await this.cache.save(cacheFile);
    } catch (error: unknown) {
      this.logger.warn({ cacheFile, err: error }, "Could not persist check result cache");
    }
  }
}
