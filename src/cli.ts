#!/usr/bin/env node
import { describeAgentFault } from "./agents/errorBoundary";
import type { FaultSink } from "./agents/errorBoundary";
import { config, toBool } from "./config";
import { createRuntime, loadOrchestratorConfig } from "./runtime";
import type { CheckStage, RunEvent, RunReport } from "./types";

const getArgValue = (name: string): string | undefined => {
  const marker = `--${name}`;
  const index = process.argv.findIndex((arg) => arg === marker);
  if (index === -1) return undefined;
  return process.argv[index + 1];
};

const parseStages = (value: string | undefined): CheckStage[] | undefined => {
  const normalized = value?.trim().toLowerCase();
  if (!normalized || normalized === "all") return undefined;
  if (normalized === "fast" || normalized === "comprehensive") return [normalized];
  throw new Error(`Unknown --stage "${value}". Use fast, comprehensive or all.`);
};

const consoleFaultSink: FaultSink = {
  report: (fault) => console.error(`! ${describeAgentFault(fault)}`)
};

const printEvent = (event: RunEvent): void => {
  console.log(`[${event.timestamp}] [${event.role}] ${event.type}: ${event.message}`);
};

const printReport = (report: RunReport): void => {
  console.log("");
  for (const entry of Object.values(report.stages)) {
    if (!entry) continue;
    const { summary } = entry;
    console.log(
      `${summary.stage.padEnd(13)} ${summary.passed}/${summary.total} passed` +
        ` (${summary.failed} failed, ${summary.errored} errored, ${summary.skipped} skipped) in ${summary.executionTimeMs}ms`
    );
  }
  if (report.fixLoop) {
    console.log(`fix loop      ${report.fixLoop.summary}`);
    for (const issue of report.fixLoop.remainingIssues.slice(0, 20)) {
      const location = issue.filePath ? `${issue.filePath}${issue.lineNumber ? `:${issue.lineNumber}` : ""} ` : "";
      console.log(`  - [${issue.kind}] ${location}${issue.message}`);
    }
  }
  console.log(
    `delegations   ${report.delegation.totalDelegations} (${report.delegation.successfulDelegations} ok, cache hit rate ${(report.delegation.cacheHitRate * 100).toFixed(0)}%)`
  );
  console.log(`issues        found ${report.totalIssuesFound}, fixed ${report.totalIssuesFixed}`);
  console.log(`\nFinal status: ${report.success ? "success" : "failed"}`);
};

const main = async (): Promise<boolean> => {
  const configPath = getArgValue("config") ?? config.orchestratorConfigPath;
  const files = getArgValue("files")
    ?.split(",")
    .map((item) => item.trim())
    .filter(Boolean);

  const runtime = createRuntime(await loadOrchestratorConfig(configPath), { faultSink: consoleFaultSink });
  runtime.store.subscribeAll(printEvent);

  const report = await runtime.orchestrator.run({
    files,
    stages: parseStages(getArgValue("stage")),
    fix: toBool(getArgValue("fix"), true)
  });
  printReport(report);
  return report.success;
};

main()
  .then((success) => {
    process.exitCode = success ? 0 : 1;
  })
  .catch((error: unknown) => {
    const message = error instanceof Error ? error.message : String(error);
    console.error(message);
    console.error("Usage: quality-remediation --config quality.config.json [--files a.ts,b.ts] [--stage fast|comprehensive|all] [--fix true|false]");
    process.exitCode = 1;
  });
