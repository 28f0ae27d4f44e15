import { z } from "zod";
import { toErrorMessage } from "../logger";
import type { CommandRunnerLike } from "../services/commandRunner";
import { changedPaths, snapshotFiles } from "../services/fileSnapshot";
import type { CheckConfig, CheckResult, CheckStatus, Finding, Severity } from "../types";
import { emptyCheckResult } from "./checkAdapter";
import type { CheckAdapter, CheckRunOptions, RawCheckOutput } from "./checkAdapter";

const settingsSchema = z.object({
  command: z.string().min(1),
  appendFiles: z.boolean().default(true),
  warningExitCodes: z.array(z.number().int()).default([]),
  maxFindings: z.number().int().min(1).default(200)
});

export type CommandCheckSettings = z.infer<typeof settingsSchema>;

const FILES_PLACEHOLDER = "{files}";

// path(line,col): error TS1234: message
const parenLocationPattern = /^(?<file>[^\s()][^()]*?)\((?<line>\d+),(?<col>\d+)\):\s*(?<rest>.+)$/;
// path:line[:col][:] message
const colonLocationPattern = /^(?<file>[^\s:][^:]*?):(?<line>\d+)(?::(?<col>\d+))?:?\s+(?<rest>.+)$/;
const codePattern = /^(?:(?<level>error|warning|note|info)\s+)?(?<code>[A-Z]{1,6}\d{2,5}|\[[\w/@.-]+\])?:?\s*(?<message>.*)$/i;

const shellQuote = (value: string): string =>
  /^[\w@%+=:,./-]+$/.test(value) ? value : `'${value.replace(/'/g, `'\\''`)}'`;

const levelToSeverity = (level: string | undefined): Severity | undefined => {
  if (!level) return undefined;
  const normalized = level.toLowerCase();
  if (normalized === "error") return "high";
  if (normalized === "warning") return "medium";
  return "low";
};

export const parseFindingLine = (line: string): Finding | undefined => {
  const trimmed = line.trim();
  if (!trimmed) return undefined;

  const match = parenLocationPattern.exec(trimmed) ?? colonLocationPattern.exec(trimmed);
  const groups = match?.groups;
  if (!groups?.file || !groups.line || !groups.rest) {
    return undefined;
  }

  const detail = codePattern.exec(groups.rest.trim())?.groups;
  const rawCode = detail?.code?.replace(/^\[|\]$/g, "");
  const message = detail?.message?.trim() || groups.rest.trim();

  return {
    filePath: groups.file.trim(),
    lineNumber: Number.parseInt(groups.line, 10),
    column: groups.col ? Number.parseInt(groups.col, 10) : undefined,
    code: rawCode || undefined,
    message,
    severity: levelToSeverity(detail?.level)
  };
};

export class CommandCheckAdapter implements CheckAdapter {
  readonly name = "command";

  constructor(
    private readonly runner: CommandRunnerLike,
    private readonly workspaceRoot?: string
  ) {}

  private settings(check: CheckConfig): CommandCheckSettings {
    const parsed = settingsSchema.safeParse(check.settings);
    if (!parsed.success) {
      throw new Error(`Check "${check.id}" has invalid command settings: ${parsed.error.issues[0]?.message ?? "unknown"}`);
    }
    return parsed.data;
  }

  buildCommand(files: readonly string[], check: CheckConfig): string[] {
    const settings = this.settings(check);
    const quoted = files.map(shellQuote);

    if (settings.command.includes(FILES_PLACEHOLDER)) {
      return [settings.command.replace(FILES_PLACEHOLDER, quoted.join(" ")).trim()];
    }
    if (settings.appendFiles && quoted.length > 0) {
      return [settings.command, ...quoted];
    }
    return [settings.command];
  }

  parseOutput(raw: RawCheckOutput, check: CheckConfig): Finding[] {
    const settings = this.settings(check);
    const findings: Finding[] = [];
    for (const line of raw.output.split(/\r?\n/)) {
      const finding = parseFindingLine(line);
      if (finding) {
        findings.push(finding);
      }
      if (findings.length >= settings.maxFindings) break;
    }
    return findings;
  }

  private status(raw: RawCheckOutput, settings: CommandCheckSettings): CheckStatus {
    if (raw.timedOut) return "failure";
    if (raw.exitCode === 0) return "success";
    if (settings.warningExitCodes.includes(raw.exitCode)) return "warning";
    return "failure";
  }

  async check(files: readonly string[], check: CheckConfig, options?: CheckRunOptions): Promise<CheckResult> {
    const settings = this.settings(check);
    const command = this.buildCommand(files, check).join(" ");
    const root = this.workspaceRoot ?? process.cwd();
    const before = check.isFormatter ? await snapshotFiles(files, root) : undefined;

    let raw: RawCheckOutput;
    try {
      raw = await this.runner.run(command, {
        workspaceRoot: this.workspaceRoot,
        timeoutMs: check.timeoutMs,
        signal: options?.signal
      });
    } catch (error: unknown) {
      return emptyCheckResult(check, {
        status: "error",
        message: `Failed to run "${command}": ${toErrorMessage(error)}`,
        filesChecked: [...files]
      });
    }

    const findings = this.parseOutput(raw, check);
    const status = this.status(raw, settings);
    const filesModified = before ? changedPaths(before, await snapshotFiles(files, root)) : [];
    const issuesFound = status === "success" ? 0 : Math.max(findings.length, 1);
    const message = raw.timedOut
      ? `${check.name} timed out after ${check.timeoutMs}ms`
      : status === "success"
        ? `${check.name} passed`
        : `${check.name} exited with code ${raw.exitCode} (${findings.length} finding(s))`;

    return emptyCheckResult(check, {
      status,
      message,
      filesChecked: [...files],
      filesModified,
      issuesFound,
      issuesFixed: filesModified.length,
      findings,
      output: raw.output
    });
  }
}
