import type { z } from "zod";
import { config } from "../config";
import { commandFixerSettingsSchema } from "../schemas/orchestratorConfig";
import type { CommandRunnerLike } from "../services/commandRunner";
import { changedPaths, snapshotFiles } from "../services/fileSnapshot";
import { createFixResult, failedFixResult } from "../services/fixResults";
import type { CommandFixerSettings, FixResult, Issue, IssueKind } from "../types";
import type { FixerAgent } from "./fixerAgent";

const FILE_PLACEHOLDER = "{file}";

const quote = (value: string): string => `'${value.replace(/'/g, `'\\''`)}'`;

/**
 * Runs a tool's own autofix command (e.g. `eslint --fix {file}`) against the
 * issue's file and reports the files whose bytes actually changed.
 */
export class CommandFixerAgent implements FixerAgent {
  readonly name: string;
  readonly strategy: string;
  private readonly settings: CommandFixerSettings;
  private readonly kinds: ReadonlySet<IssueKind>;

  constructor(
    settings: z.input<typeof commandFixerSettingsSchema>,
    private readonly runner: CommandRunnerLike,
    private readonly workspaceRoot = config.workspaceRoot
  ) {
    this.settings = commandFixerSettingsSchema.parse(settings);
    this.name = this.settings.name;
    this.strategy = this.settings.strategy;
    this.kinds = new Set(this.settings.kinds);
  }

  supportedKinds(): ReadonlySet<IssueKind> {
    return this.kinds;
  }

  async canHandle(issue: Issue): Promise<number> {
    if (!this.kinds.has(issue.kind)) return 0;
    if (this.settings.requiresFile && !issue.filePath) return 0;
    return this.settings.confidence;
  }

  buildCommand(issue: Issue): string {
    const target = issue.filePath ? quote(issue.filePath) : "";
    if (this.settings.command.includes(FILE_PLACEHOLDER)) {
      return this.settings.command.split(FILE_PLACEHOLDER).join(target).trim();
    }
    return target ? `${this.settings.command} ${target}` : this.settings.command;
  }

  async fix(issue: Issue): Promise<FixResult> {
    const watched = issue.filePath ? [issue.filePath] : [];
    const before = await snapshotFiles(watched, this.workspaceRoot);
    const command = this.buildCommand(issue);
    const result = await this.runner.run(command, { timeoutMs: this.settings.timeoutMs });
    const modified = changedPaths(before, await snapshotFiles(watched, this.workspaceRoot));

    if (result.timedOut) {
      return failedFixResult(`${command} timed out after ${this.settings.timeoutMs}ms`);
    }
    if (modified.length === 0) {
      return createFixResult({
        success: false,
        confidence: 0,
        remainingIssues: [`${command} made no changes (exit ${result.exitCode})`],
        recommendations: result.exitCode !== 0 ? [result.output.split(/\r?\n/).slice(-5).join("\n")] : []
      });
    }

    return createFixResult({
      success: result.exitCode === 0,
      confidence: this.settings.confidence,
      fixesApplied: [`${this.name}: ran ${command}`],
      remainingIssues: result.exitCode === 0 ? [] : [`${command} exited with code ${result.exitCode}`],
      filesModified: modified
    });
  }
}
