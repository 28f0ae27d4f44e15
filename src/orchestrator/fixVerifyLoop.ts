import { createLogger } from "../logger";
import type { Logger } from "../logger";
import { BudgetTracker } from "../services/budgetTracker";
import { createFixResult, mergeAllFixResults } from "../services/fixResults";
import { IssueExtractor } from "../services/issueExtractor";
import type { BudgetExhaustedReason, CheckConfig, CheckResult, FixLoopReport, FixLoopState, FixResult, Issue } from "../types";
import type { IssueFixer } from "./agentCoordinator";
import type { CheckRunCallbacks } from "./checkScheduler";

export interface CheckRerunner {
  runCheckList(checks: readonly CheckConfig[], files?: readonly string[], callbacks?: CheckRunCallbacks): Promise<CheckResult[]>;
}

export interface FixLoopEvents {
  onStateChange?: (state: FixLoopState, iteration: number) => void;
  onIssuesExtracted?: (issues: readonly Issue[], iteration: number) => void;
  onEnvironmentFault?: (faults: readonly Issue[]) => void;
  onIterationFinished?: (iteration: number, fixResult: FixResult, results: readonly CheckResult[]) => void;
  onExhausted?: (reason: BudgetExhaustedReason, iteration: number) => void;
}

export interface FixLoopDeps {
  scheduler: CheckRerunner;
  fixer: IssueFixer;
  checks: readonly CheckConfig[];
  extractor?: IssueExtractor;
  logger?: Logger;
  events?: FixLoopEvents;
  checkCallbacks?: CheckRunCallbacks;
  now?: () => number;
}

export interface FixLoopLimits {
  maxIterations: number;
  maxMinutes: number;
}

interface LoopProgress {
  iteration: number;
  initialIssues: number;
  fixResults: FixResult[];
  results: CheckResult[];
}

/**
 * Detect, fix, re-check. Each pass extracts issues from the latest results,
 * hands them to the fixer and re-runs only the checks those issues came from.
 */
export class FixVerifyLoop {
  private current: FixLoopState = "idle";
  private readonly extractor: IssueExtractor;
  private readonly logger: Logger;
  private readonly now: () => number;

  constructor(
    private readonly deps: FixLoopDeps,
    private readonly limits: FixLoopLimits
  ) {
    this.extractor = deps.extractor ?? new IssueExtractor();
    this.logger = deps.logger ?? createLogger("fix-verify-loop");
    this.now = deps.now ?? Date.now;
  }

  get state(): FixLoopState {
    return this.current;
  }

  async run(initialResults: readonly CheckResult[], files?: readonly string[]): Promise<FixLoopReport> {
    const budget = new BudgetTracker(this.limits.maxIterations, this.limits.maxMinutes, this.now());
    const progress: LoopProgress = { iteration: 0, initialIssues: 0, fixResults: [], results: [...initialResults] };

    while (true) {
      this.transition("extracting", progress.iteration);
      const issues = this.extractor.extract(progress.results);
      if (progress.iteration === 0) {
        progress.initialIssues = issues.length;
      }
      this.deps.events?.onIssuesExtracted?.(issues, progress.iteration);

      if (issues.length === 0) {
        this.transition("idle", progress.iteration);
        return this.report(progress, issues, { success: true });
      }

      const faults = this.extractor.findEnvironmentFaults(issues);
      if (faults.length > 0) {
        this.logger.warn(
          { faults: faults.map((fault) => fault.message) },
          "Environment fault detected, skipping remediation"
        );
        this.deps.events?.onEnvironmentFault?.(faults);
        this.transition("idle", progress.iteration);
        return this.report(progress, issues, { success: false, environmentFault: true });
      }

      const gate = budget.canStartIteration(progress.iteration + 1, this.now());
      if (!gate.ok) {
        const reason = gate.reason ?? "iterations";
        this.logger.warn({ reason, iteration: progress.iteration, remaining: issues.length }, "Fix budget exhausted");
        this.deps.events?.onExhausted?.(reason, progress.iteration);
        this.transition("exhausted", progress.iteration);
        return this.report(progress, issues, { success: false, exhaustedReason: reason });
      }

      progress.iteration += 1;
      this.transition("delegating", progress.iteration);
      const fixResult = await this.deps.fixer.handleIssues(issues, progress.iteration);
      progress.fixResults.push(fixResult);

      this.transition("reverifying", progress.iteration);
      progress.results = await this.reverify(issues, progress.results, files);
      this.deps.events?.onIterationFinished?.(progress.iteration, fixResult, progress.results);
      this.transition("idle", progress.iteration);
    }
  }

  private async reverify(
    issues: readonly Issue[],
    previous: readonly CheckResult[],
    files?: readonly string[]
  ): Promise<CheckResult[]> {
    const origins = new Set(issues.map((issue) => issue.originStage));
    const checks = this.deps.checks.filter((check) => origins.has(check.id));
    if (checks.length === 0) {
      this.logger.warn({ origins: [...origins] }, "No configured checks match the issues' origins, keeping previous results");
      return [...previous];
    }
    return this.deps.scheduler.runCheckList(checks, files, { ...this.deps.checkCallbacks, refresh: true });
  }

  private transition(next: FixLoopState, iteration: number): void {
    if (this.current === next) return;
    this.logger.debug({ from: this.current, to: next, iteration }, "Fix loop state change");
    this.current = next;
    this.deps.events?.onStateChange?.(next, iteration);
  }

  private report(
    progress: LoopProgress,
    remaining: Issue[],
    outcome: { success: boolean; environmentFault?: boolean; exhaustedReason?: BudgetExhaustedReason }
  ): FixLoopReport {
    const fixResult =
      progress.fixResults.length > 0
        ? mergeAllFixResults(progress.fixResults)
        : createFixResult({ success: outcome.success, confidence: outcome.success ? 1 : 0 });
    const issuesFixed = Math.max(0, progress.initialIssues - remaining.length);
    const exhausted = outcome.exhaustedReason !== undefined;

    const summary = outcome.success
      ? progress.iteration === 0
        ? "No issues found."
        : `All issues resolved after ${progress.iteration} iteration(s).`
      : outcome.environmentFault
        ? `Remediation skipped: environment fault (${remaining.length} issue(s)).`
        : `Fix budget exhausted (${outcome.exhaustedReason ?? "iterations"}) after ${progress.iteration} iteration(s), ${remaining.length} issue(s) remaining.`;

    return {
      success: outcome.success,
      iterations: progress.iteration,
      exhausted,
      exhaustedReason: outcome.exhaustedReason,
      environmentFault: outcome.environmentFault ?? false,
      state: this.current,
      issuesFound: progress.initialIssues,
      issuesFixed,
      remainingIssues: outcome.success ? [] : remaining,
      fixResult,
      checkResults: progress.results,
      summary
    };
  }
}
