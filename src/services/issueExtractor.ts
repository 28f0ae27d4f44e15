import { createHash } from "node:crypto";
import { z } from "zod";
import { severitySchema } from "../schemas/checkResult";
import { issueKindSchema } from "../schemas/orchestratorConfig";
import type { CheckResult, Finding, Issue, IssueKind, Severity } from "../types";
import issuePatterns from "./issuePatterns.json";

const patternTableSchema = z.object({
  environmentFaultPatterns: z.array(z.string().min(1)),
  kindKeywords: z.record(issueKindSchema, z.array(z.string().min(1))),
  severityByKind: z.record(issueKindSchema, severitySchema)
});

export type IssuePatternTable = z.infer<typeof patternTableSchema>;

export const defaultIssuePatterns: IssuePatternTable = patternTableSchema.parse(issuePatterns);

const MAX_ISSUES_PER_CHECK = 50;
const DETAIL_LINES = 20;

const shortHash = (text: string): string => createHash("sha1").update(text).digest("hex").slice(0, 10);

export const createIssueId = (checkId: string, filePath: string | undefined, lineNumber: number | undefined, message: string): string =>
  `${checkId}:${filePath ?? "-"}:${lineNumber ?? 0}:${shortHash(message)}`;

const compile = (sources: readonly string[]): RegExp[] => sources.map((source) => new RegExp(source, "i"));

/**
 * Turns failed check results into issues. Structured findings win; without
 * them the raw output is scanned for lines that look like the check's kind,
 * and a single summary issue is the last resort.
 */
export class IssueExtractor {
  private readonly environmentPatterns: RegExp[];
  private readonly keywords: Map<IssueKind, RegExp[]>;

  constructor(private readonly table: IssuePatternTable = defaultIssuePatterns) {
    this.environmentPatterns = compile(table.environmentFaultPatterns);
    this.keywords = new Map<IssueKind, RegExp[]>();
    for (const [kind, sources] of Object.entries(table.kindKeywords)) {
      const parsed = issueKindSchema.safeParse(kind);
      if (parsed.success && sources) {
        this.keywords.set(parsed.data, compile(sources));
      }
    }
  }

  severityFor(kind: IssueKind): Severity {
    return this.table.severityByKind[kind] ?? "medium";
  }

  matchesKind(text: string, kind: IssueKind): boolean {
    return (this.keywords.get(kind) ?? []).some((pattern) => pattern.test(text));
  }

  /** First kind whose keywords match, or the fallback. */
  classify(text: string, fallback: IssueKind): IssueKind {
    if (this.matchesKind(text, fallback)) return fallback;
    for (const [kind, patterns] of this.keywords) {
      if (patterns.some((pattern) => pattern.test(text))) return kind;
    }
    return fallback;
  }

  isEnvironmentFaultText(text: string): boolean {
    return this.environmentPatterns.some((pattern) => pattern.test(text));
  }

  isEnvironmentFault(issue: Issue): boolean {
    return [issue.message, ...issue.details].some((text) => this.isEnvironmentFaultText(text));
  }

  findEnvironmentFaults(issues: readonly Issue[]): Issue[] {
    return issues.filter((issue) => this.isEnvironmentFault(issue));
  }

  extract(results: readonly CheckResult[]): Issue[] {
    const seen = new Set<string>();
    const issues: Issue[] = [];
    for (const result of results) {
      for (const issue of this.extractFromResult(result)) {
        if (seen.has(issue.id)) continue;
        seen.add(issue.id);
        issues.push(issue);
      }
    }
    return issues;
  }

  extractFromResult(result: CheckResult): Issue[] {
    if (result.status === "success" || result.status === "skipped") {
      return [];
    }

    const outputLines = (result.output ?? "")
      .split(/\r?\n/)
      .map((line) => line.trim())
      .filter(Boolean);

    const environmentLine = outputLines.find((line) => this.isEnvironmentFaultText(line));
    if (environmentLine) {
      return [this.build(result, "import_error", environmentLine, { details: outputLines.slice(-DETAIL_LINES), severity: "critical" })];
    }

    if (result.findings.length > 0) {
      return result.findings.slice(0, MAX_ISSUES_PER_CHECK).map((finding) => this.fromFinding(result, finding));
    }

    const matchingLines = outputLines.filter((line) => this.matchesKind(line, result.kind)).slice(0, MAX_ISSUES_PER_CHECK);
    if (matchingLines.length > 0) {
      return matchingLines.map((line) => this.build(result, result.kind, line, {}));
    }

    return [
      this.build(result, result.kind, result.message || `${result.checkName} reported ${result.status}`, {
        details: outputLines.slice(-DETAIL_LINES)
      })
    ];
  }

  private fromFinding(result: CheckResult, finding: Finding): Issue {
    const kind = this.classify(finding.message, result.kind);
    return this.build(result, kind, finding.message, {
      filePath: finding.filePath,
      lineNumber: finding.lineNumber,
      errorCode: finding.code,
      severity: finding.severity,
      details: finding.column !== undefined ? [`column ${finding.column}`] : []
    });
  }

  private build(
    result: CheckResult,
    kind: IssueKind,
    message: string,
    extra: {
      filePath?: string;
      lineNumber?: number;
      errorCode?: string;
      severity?: Severity;
      details?: string[];
    }
  ): Issue {
    return {
      id: createIssueId(result.checkId, extra.filePath, extra.lineNumber, message),
      kind,
      severity: extra.severity ?? this.severityFor(kind),
      message,
      filePath: extra.filePath,
      lineNumber: extra.lineNumber,
      errorCode: extra.errorCode,
      details: extra.details ?? [],
      originStage: result.checkId
    };
  }
}
