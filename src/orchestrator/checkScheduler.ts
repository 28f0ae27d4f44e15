import { emptyCheckResult } from "../checks/checkAdapter";
import type { AdapterRegistry, CheckAdapter } from "../checks/checkAdapter";
import { createLogger, toErrorMessage } from "../logger";
import type { Logger } from "../logger";
import { CheckResultCache, createCheckCacheKey } from "../services/checkResultCache";
import { ConcurrencyLimiter } from "../services/concurrencyLimiter";
import { filterFiles } from "../services/filePatterns";
import type { IncrementalTracker } from "../services/incrementalTracker";
import type { CheckConfig, CheckResult, CheckStage, CheckStatus, OrchestratorConfig, StageSummary } from "../types";
import { raceTimeout, TIMED_OUT } from "../utils/timeout";

export type SchedulerSettings = Pick<
  OrchestratorConfig,
  "maxParallelChecks" | "enableCaching" | "failFast" | "runFormattersFirst" | "enableIncremental" | "checks"
>;

export interface CheckRunCallbacks {
  onCheckStarted?: (check: CheckConfig) => void;
  onCheckFinished?: (check: CheckConfig, result: CheckResult, meta: { cached: boolean; retried: boolean }) => void;
  /** Skip the cache lookup (results are still written back). Used when re-verifying after fixes. */
  refresh?: boolean;
}

export interface SchedulerDeps {
  cache?: CheckResultCache;
  incremental?: IncrementalTracker;
  logger?: Logger;
}

export interface AllChecksSummary {
  success: boolean;
  total: number;
  passed: number;
  failed: number;
  passRate: number;
  issuesFound: number;
  issuesFixed: number;
  executionTimeMs: number;
}

export interface AllChecksResult {
  stages: Record<CheckStage, { results: CheckResult[]; summary: StageSummary }>;
  summary: AllChecksSummary;
}

interface LaunchOutcome {
  index: number;
  result?: CheckResult;
}

export const isPassingStatus = (status: CheckStatus): boolean => status === "success" || status === "skipped";

export const orderChecks = (checks: readonly CheckConfig[], formattersFirst: boolean): CheckConfig[] => {
  const byName = [...checks].sort((a, b) => a.name.localeCompare(b.name));
  if (!formattersFirst) return byName;
  return [...byName.filter((check) => check.isFormatter), ...byName.filter((check) => !check.isFormatter)];
};

export const summarizeStage = (stage: CheckStage, results: readonly CheckResult[]): StageSummary => {
  const count = (status: CheckStatus): number => results.filter((result) => result.status === status).length;
  const passed = count("success");
  const skipped = count("skipped");
  const executed = results.length - skipped;

  return {
    stage,
    total: results.length,
    passed,
    failed: count("failure"),
    errored: count("error"),
    skipped,
    warnings: count("warning"),
    passRate: executed > 0 ? passed / executed : 1,
    issuesFound: results.reduce((sum, result) => sum + result.issuesFound, 0),
    issuesFixed: results.reduce((sum, result) => sum + result.issuesFixed, 0),
    executionTimeMs: results.reduce((sum, result) => sum + result.executionTimeMs, 0)
  };
};

export class CheckScheduler {
  private readonly limiter: ConcurrencyLimiter;
  private readonly serialLimiter = new ConcurrencyLimiter(1);
  private readonly cache: CheckResultCache;
  private readonly logger: Logger;

  constructor(
    private readonly settings: SchedulerSettings,
    private readonly adapters: AdapterRegistry,
    private readonly deps: SchedulerDeps = {}
  ) {
    this.limiter = new ConcurrencyLimiter(settings.maxParallelChecks);
    this.cache = deps.cache ?? new CheckResultCache();
    this.logger = deps.logger ?? createLogger("check-scheduler");
  }

  checksFor(stage: CheckStage): CheckConfig[] {
    return orderChecks(
      this.settings.checks.filter((check) => check.enabled && check.stage === stage),
      this.settings.runFormattersFirst
    );
  }

  async runChecks(stage: CheckStage, files?: readonly string[], callbacks: CheckRunCallbacks = {}): Promise<CheckResult[]> {
    const checks = this.checksFor(stage);
    this.logger.info({ stage, checks: checks.map((check) => check.id) }, `Running ${checks.length} ${stage} check(s)`);
    return this.runCheckList(checks, files, callbacks);
  }

  /**
   * Launches every check through the permit pool. With fail-fast on, the
   * first check to complete with a non-passing status wins: the remaining
   * checks are aborted and only that result is returned.
   */
  async runCheckList(
    checks: readonly CheckConfig[],
    files?: readonly string[],
    callbacks: CheckRunCallbacks = {}
  ): Promise<CheckResult[]> {
    const controller = new AbortController();
    const pending = new Map<number, Promise<LaunchOutcome>>();

    checks.forEach((check, index) => {
      const launched = this.launch(check, files, controller.signal, callbacks).then((result) => ({ index, result }));
      pending.set(index, launched);
    });

    const results: Array<CheckResult | undefined> = new Array(checks.length);

    while (pending.size > 0) {
      const finished = await Promise.race(pending.values());
      pending.delete(finished.index);
      if (!finished.result) continue;

      if (this.settings.failFast && !isPassingStatus(finished.result.status)) {
        controller.abort();
        this.logger.warn(
          { checkId: finished.result.checkId, cancelled: pending.size },
          `Fail-fast: ${finished.result.checkName} reported ${finished.result.status}, cancelling remaining checks`
        );
        return [finished.result];
      }
      results[finished.index] = finished.result;
    }

    return results.filter((result): result is CheckResult => result !== undefined);
  }

  async runAllChecks(files?: readonly string[], callbacks: CheckRunCallbacks = {}): Promise<AllChecksResult> {
    const fast = await this.runChecks("fast", files, callbacks);
    const fastPassed = fast.every((result) => isPassingStatus(result.status));
    const comprehensive =
      this.settings.failFast && !fastPassed ? [] : await this.runChecks("comprehensive", files, callbacks);

    const all = [...fast, ...comprehensive];
    const passed = all.filter((result) => isPassingStatus(result.status)).length;

    return {
      stages: {
        fast: { results: fast, summary: summarizeStage("fast", fast) },
        comprehensive: { results: comprehensive, summary: summarizeStage("comprehensive", comprehensive) }
      },
      summary: {
        success: passed === all.length,
        total: all.length,
        passed,
        failed: all.length - passed,
        passRate: all.length > 0 ? passed / all.length : 1,
        issuesFound: all.reduce((sum, result) => sum + result.issuesFound, 0),
        issuesFixed: all.reduce((sum, result) => sum + result.issuesFixed, 0),
        executionTimeMs: all.reduce((sum, result) => sum + result.executionTimeMs, 0)
      }
    };
  }

  private async launch(
    check: CheckConfig,
    files: readonly string[] | undefined,
    signal: AbortSignal,
    callbacks: CheckRunCallbacks
  ): Promise<CheckResult | undefined> {
    const adapter = this.adapters.get(check.adapter);
    if (!adapter) {
      this.logger.debug({ checkId: check.id, adapter: check.adapter }, "No adapter registered, skipping check");
      return undefined;
    }

    let targetFiles = files ? filterFiles(files, check.filePatterns, check.excludePatterns) : [];
    if (files && files.length > 0 && targetFiles.length === 0) {
      return emptyCheckResult(check, { status: "skipped", message: "No matching files" });
    }

    if (this.settings.enableIncremental && this.deps.incremental && targetFiles.length > 0) {
      const pendingFiles = await this.deps.incremental.pendingFiles(check.id, targetFiles);
      if (pendingFiles.length === 0) {
        return emptyCheckResult(check, { status: "skipped", message: "No changes since last passing run" });
      }
      targetFiles = pendingFiles;
    }

    const cacheKey = createCheckCacheKey(adapter.name, check.id, targetFiles);
    if (this.settings.enableCaching && !callbacks.refresh) {
      const cached = this.cache.get(cacheKey);
      if (cached) {
        this.logger.debug({ checkId: check.id }, "Check result served from cache");
        callbacks.onCheckFinished?.(check, cached, { cached: true, retried: false });
        return cached;
      }
    }

    const pool = check.parallelSafe ? this.limiter : this.serialLimiter;
    const outcome = await pool.run(async () => {
      if (signal.aborted) return undefined;
      callbacks.onCheckStarted?.(check);

      let result = await this.execute(adapter, check, targetFiles, signal);
      let retried = false;
      if (check.retryOnFailure && !isPassingStatus(result.status) && !signal.aborted) {
        this.logger.info({ checkId: check.id, status: result.status }, `Retrying ${check.name} once`);
        result = await this.execute(adapter, check, targetFiles, signal);
        retried = true;
      }
      return { result, retried };
    });

    // a result that lands after fail-fast fired belongs to a cancelled run
    if (!outcome || signal.aborted) return undefined;
    const { result, retried } = outcome;

    if (this.settings.enableCaching && result.status !== "error") {
      this.cache.set(cacheKey, result);
    }
    if (this.settings.enableIncremental && this.deps.incremental) {
      if (isPassingStatus(result.status)) {
        await this.deps.incremental.markPassed(check.id, targetFiles);
      } else {
        this.deps.incremental.forget(check.id, targetFiles);
      }
    }

    callbacks.onCheckFinished?.(check, result, { cached: false, retried });
    return result;
  }

  private async execute(
    adapter: CheckAdapter,
    check: CheckConfig,
    files: readonly string[],
    parentSignal: AbortSignal
  ): Promise<CheckResult> {
    const controller = new AbortController();
    const forwardAbort = (): void => controller.abort();
    parentSignal.addEventListener("abort", forwardAbort, { once: true });
    const startedAt = Date.now();

    try {
      const running = adapter.check(files, check, { signal: controller.signal });
      running.catch((error: unknown) => {
        this.logger.debug({ checkId: check.id, err: error }, "Check settled with an error after it was abandoned");
      });
      const outcome = await raceTimeout(running, check.timeoutMs);
      if (outcome === TIMED_OUT) {
        controller.abort();
        return emptyCheckResult(check, {
          status: "failure",
          message: `${check.name} timed out after ${check.timeoutMs}ms`,
          filesChecked: [...files],
          issuesFound: 1,
          executionTimeMs: Date.now() - startedAt
        });
      }
      return { ...outcome, executionTimeMs: outcome.executionTimeMs || Date.now() - startedAt };
    } catch (error: unknown) {
      const message = toErrorMessage(error);
      this.logger.error({ checkId: check.id, adapter: adapter.name, err: error }, `Check adapter failed: ${message}`);
      return emptyCheckResult(check, {
        status: "error",
        message,
        filesChecked: [...files],
        executionTimeMs: Date.now() - startedAt
      });
    } finally {
      parentSignal.removeEventListener("abort", forwardAbort);
    }
  }
}
