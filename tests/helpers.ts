import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import type { CheckConfig, CheckResult, Issue } from "../src/types";

export const createIssue = (overrides: Partial<Issue> = {}): Issue => ({
  id: overrides.id ?? "issue-1",
  kind: overrides.kind ?? "type_error",
  severity: overrides.severity ?? "high",
  message: overrides.message ?? "Argument of type 'string' is not assignable to parameter of type 'number'",
  filePath: overrides.filePath,
  lineNumber: overrides.lineNumber,
  errorCode: overrides.errorCode,
  details: overrides.details ?? [],
  originStage: overrides.originStage ?? "tsc"
});

export const createCheck = (overrides: Partial<CheckConfig> = {}): CheckConfig => ({
  id: overrides.id ?? "lint",
  name: overrides.name ?? overrides.id ?? "lint",
  kind: overrides.kind ?? "formatting",
  adapter: overrides.adapter ?? "fake",
  enabled: overrides.enabled ?? true,
  filePatterns: overrides.filePatterns ?? ["**/*"],
  excludePatterns: overrides.excludePatterns ?? [],
  timeoutMs: overrides.timeoutMs ?? 5000,
  stage: overrides.stage ?? "fast",
  isFormatter: overrides.isFormatter ?? false,
  parallelSafe: overrides.parallelSafe ?? true,
  retryOnFailure: overrides.retryOnFailure ?? false,
  settings: overrides.settings ?? {}
});

export const createCheckResult = (overrides: Partial<CheckResult> = {}): CheckResult => ({
  checkId: overrides.checkId ?? "lint",
  checkName: overrides.checkName ?? overrides.checkId ?? "lint",
  kind: overrides.kind ?? "formatting",
  stage: overrides.stage ?? "fast",
  status: overrides.status ?? "success",
  message: overrides.message ?? "",
  filesChecked: overrides.filesChecked ?? [],
  filesModified: overrides.filesModified ?? [],
  issuesFound: overrides.issuesFound ?? 0,
  issuesFixed: overrides.issuesFixed ?? 0,
  executionTimeMs: overrides.executionTimeMs ?? 1,
  findings: overrides.findings ?? [],
  output: overrides.output
});

export const createTempDir = async (prefix = "quality-remediation-"): Promise<string> =>
  fs.mkdtemp(path.join(os.tmpdir(), prefix));

export const wait = (ms: number) => new Promise((resolve) => setTimeout(resolve, ms));
