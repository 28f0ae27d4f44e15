import { describe, expect, it, vi } from "vitest";
import { AdapterRegistry, emptyCheckResult } from "../../src/checks/checkAdapter";
import type { CheckAdapter, CheckRunOptions } from "../../src/checks/checkAdapter";
import { CheckScheduler, orderChecks, summarizeStage } from "../../src/orchestrator/checkScheduler";
import type { SchedulerSettings } from "../../src/orchestrator/checkScheduler";
import type { CheckConfig, CheckResult, CheckStatus } from "../../src/types";
import { createCheck, createCheckResult, wait } from "../helpers";

interface Behaviour {
  statuses: CheckStatus[];
  delayMs?: number;
  error?: string;
}

class FakeAdapter implements CheckAdapter {
  readonly name = "fake";
  readonly calls: string[] = [];
  readonly aborted = new Set<string>();

  constructor(private readonly behaviours: Record<string, Behaviour>) {}

  buildCommand(): string[] {
    return ["fake"];
  }

  parseOutput() {
    return [];
  }

  async check(files: readonly string[], check: CheckConfig, options?: CheckRunOptions): Promise<CheckResult> {
    const behaviour = this.behaviours[check.id] ?? { statuses: ["success"] };
    const attempt = this.calls.filter((id) => id === check.id).length;
    this.calls.push(check.id);
    if (behaviour.error) {
      throw new Error(behaviour.error);
    }

    await new Promise<void>((resolve) => {
      const timer = setTimeout(resolve, behaviour.delayMs ?? 0);
      options?.signal?.addEventListener("abort", () => {
        this.aborted.add(check.id);
        clearTimeout(timer);
        resolve();
      });
    });

    const status = behaviour.statuses[Math.min(attempt, behaviour.statuses.length - 1)] ?? "success";
    return emptyCheckResult(check, {
      status,
      message: `${check.id} ${status}`,
      filesChecked: [...files],
      issuesFound: status === "success" ? 0 : 1,
      executionTimeMs: 3
    });
  }
}

const createScheduler = (
  checks: CheckConfig[],
  behaviours: Record<string, Behaviour>,
  overrides: Partial<SchedulerSettings> = {}
) => {
  const adapter = new FakeAdapter(behaviours);
  const scheduler = new CheckScheduler(
    {
      maxParallelChecks: 4,
      enableCaching: false,
      failFast: false,
      runFormattersFirst: true,
      enableIncremental: false,
      checks,
      ...overrides
    },
    new AdapterRegistry([adapter])
  );
  return { scheduler, adapter };
};

describe("CheckScheduler", () => {
  it("returns only the first failure under fail-fast and aborts the rest", async () => {
    const checks = [createCheck({ id: "broken" }), createCheck({ id: "slow" })];
    const { scheduler, adapter } = createScheduler(
      checks,
      { broken: { statuses: ["failure"], delayMs: 5 }, slow: { statuses: ["success"], delayMs: 500 } },
      { failFast: true }
    );

    const results = await scheduler.runCheckList(checks);

    expect(results.map((result) => result.checkId)).toEqual(["broken"]);
    expect(adapter.aborted.has("slow")).toBe(true);
  });

  it("keeps a check cancelled by fail-fast out of the cache and the callbacks", async () => {
    const checks = [createCheck({ id: "broken" }), createCheck({ id: "slow" })];
    const { scheduler, adapter } = createScheduler(
      checks,
      { broken: { statuses: ["failure"], delayMs: 5 }, slow: { statuses: ["success"], delayMs: 500 } },
      { failFast: true, enableCaching: true }
    );
    const onCheckFinished = vi.fn();

    await scheduler.runCheckList(checks, undefined, { onCheckFinished });
    await wait(20);

    expect(onCheckFinished).toHaveBeenCalledTimes(1);
    expect(onCheckFinished).toHaveBeenCalledWith(checks[0], expect.objectContaining({ status: "failure" }), {
      cached: false,
      retried: false
    });

    const [second] = await scheduler.runCheckList([createCheck({ id: "slow" })]);
    expect(adapter.calls.filter((id) => id === "slow")).toHaveLength(2);
    expect(second?.status).toBe("success");
  });

  it("collects every result when fail-fast is off", async () => {
    const checks = [createCheck({ id: "a" }), createCheck({ id: "b" })];
    const { scheduler } = createScheduler(checks, { a: { statuses: ["failure"] } });

    const results = await scheduler.runCheckList(checks);
    expect(results.map((result) => [result.checkId, result.status])).toEqual([
      ["a", "failure"],
      ["b", "success"]
    ]);
  });

  it("retries a failed check exactly once", async () => {
    const check = createCheck({ id: "flaky", retryOnFailure: true });
    const { scheduler, adapter } = createScheduler([check], { flaky: { statuses: ["failure", "success", "failure"] } });
    const onCheckFinished = vi.fn();

    const [result] = await scheduler.runCheckList([check], undefined, { onCheckFinished });

    expect(result?.status).toBe("success");
    expect(adapter.calls).toEqual(["flaky", "flaky"]);
    expect(onCheckFinished).toHaveBeenCalledWith(check, expect.objectContaining({ status: "success" }), {
      cached: false,
      retried: true
    });
  });

  it("does not retry twice when the retry also fails", async () => {
    const check = createCheck({ id: "flaky", retryOnFailure: true });
    const { scheduler, adapter } = createScheduler([check], { flaky: { statuses: ["failure"] } });

    const [result] = await scheduler.runCheckList([check]);
    expect(result?.status).toBe("failure");
    expect(adapter.calls).toHaveLength(2);
  });

  it("serves repeated runs from the cache unless refresh is requested", async () => {
    const check = createCheck({ id: "lint" });
    const { scheduler, adapter } = createScheduler([check], {}, { enableCaching: true });
    const onCheckFinished = vi.fn();

    await scheduler.runCheckList([check], ["a.ts"]);
    await scheduler.runCheckList([check], ["a.ts"], { onCheckFinished });
    expect(adapter.calls).toEqual(["lint"]);
    expect(onCheckFinished).toHaveBeenCalledWith(check, expect.objectContaining({ status: "success" }), {
      cached: true,
      retried: false
    });

    await scheduler.runCheckList([check], ["a.ts"], { refresh: true });
    expect(adapter.calls).toEqual(["lint", "lint"]);
  });

  it("never caches error results", async () => {
    const check = createCheck({ id: "crash" });
    const { scheduler, adapter } = createScheduler([check], { crash: { statuses: ["success"], error: "adapter exploded" } }, {
      enableCaching: true
    });

    const [first] = await scheduler.runCheckList([check]);
    await scheduler.runCheckList([check]);

    expect(first?.status).toBe("error");
    expect(first?.message).toBe("adapter exploded");
    expect(adapter.calls).toEqual(["crash", "crash"]);
  });

  it("skips checks whose adapter is not registered", async () => {
    const checks = [createCheck({ id: "known" }), createCheck({ id: "unknown", adapter: "missing" })];
    const { scheduler } = createScheduler(checks, {});

    const results = await scheduler.runCheckList(checks);
    expect(results.map((result) => result.checkId)).toEqual(["known"]);
  });

  it("skips checks with no matching files", async () => {
    const check = createCheck({ id: "ts-only", filePatterns: ["*.ts"] });
    const { scheduler, adapter } = createScheduler([check], {});

    const [result] = await scheduler.runCheckList([check], ["README.md"]);
    expect(result?.status).toBe("skipped");
    expect(result?.message).toBe("No matching files");
    expect(adapter.calls).toEqual([]);
  });

  it("fails a check that exceeds its timeout", async () => {
    const check = createCheck({ id: "slow", name: "slow", timeoutMs: 20 });
    const { scheduler, adapter } = createScheduler([check], { slow: { statuses: ["success"], delayMs: 1_000 } });

    const [result] = await scheduler.runCheckList([check]);
    expect(result?.status).toBe("failure");
    expect(result?.message).toBe("slow timed out after 20ms");
    expect(adapter.aborted.has("slow")).toBe(true);
  });

  it("starts formatters before other checks", async () => {
    const checks = [
      createCheck({ id: "b-lint" }),
      createCheck({ id: "a-types" }),
      createCheck({ id: "z-format", isFormatter: true })
    ];
    const { scheduler } = createScheduler(checks, {}, { maxParallelChecks: 1 });
    const started: string[] = [];

    const results = await scheduler.runChecks("fast", undefined, { onCheckStarted: (check) => started.push(check.id) });

    expect(started).toEqual(["z-format", "a-types", "b-lint"]);
    expect(results.map((result) => result.checkId)).toEqual(["z-format", "a-types", "b-lint"]);
  });

  it("skips the comprehensive stage when fast checks fail under fail-fast", async () => {
    const checks = [
      createCheck({ id: "fast-lint", stage: "fast" }),
      createCheck({ id: "deep-tests", stage: "comprehensive" })
    ];
    const { scheduler, adapter } = createScheduler(checks, { "fast-lint": { statuses: ["failure"] } }, { failFast: true });

    const all = await scheduler.runAllChecks();

    expect(adapter.calls).toEqual(["fast-lint"]);
    expect(all.stages.comprehensive.results).toEqual([]);
    expect(all.summary).toMatchObject({ success: false, total: 1, passed: 0, failed: 1, passRate: 0 });
  });
});

describe("orderChecks", () => {
  it("sorts by name and keeps formatters in front only when asked", () => {
    const checks = [createCheck({ id: "b" }), createCheck({ id: "c", isFormatter: true }), createCheck({ id: "a" })];
    expect(orderChecks(checks, true).map((check) => check.id)).toEqual(["c", "a", "b"]);
    expect(orderChecks(checks, false).map((check) => check.id)).toEqual(["a", "b", "c"]);
  });
});

describe("summarizeStage", () => {
  it("computes pass rate over executed checks", () => {
    const summary = summarizeStage("fast", [
      createCheckResult({ status: "success", executionTimeMs: 10 }),
      createCheckResult({ status: "failure", issuesFound: 3, executionTimeMs: 5 }),
      createCheckResult({ status: "skipped", executionTimeMs: 0 }),
      createCheckResult({ status: "error", executionTimeMs: 1 })
    ]);

    expect(summary).toEqual({
      stage: "fast",
      total: 4,
      passed: 1,
      failed: 1,
      errored: 1,
      skipped: 1,
      warnings: 0,
      passRate: 1 / 3,
      issuesFound: 3,
      issuesFixed: 0,
      executionTimeMs: 16
    });
  });
});
