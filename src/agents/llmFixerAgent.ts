import { z } from "zod";
import type { LlmLike } from "../llm/openaiClient";
import { createLogger } from "../logger";
import type { Logger } from "../logger";
import { clampConfidence, createFixResult, failedFixResult } from "../services/fixResults";
import type { WorkspaceLike } from "../services/workspace";
import { issueKinds } from "../types";
import type { FixResult, Issue, IssueKind } from "../types";
import { extractJsonObject } from "../utils/json";
import { withTimeout } from "../utils/timeout";
import type { FixerAgent } from "./fixerAgent";

const changeSchema = z
  .object({
    path: z.string().min(1),
    patch: z.string().optional(),
    fallbackContent: z.string().optional(),
    content: z.string().optional()
  })
  .transform((value) => ({
    path: value.path,
    patch: value.patch,
    fallbackContent: value.fallbackContent ?? value.content
  }))
  .refine((value) => Boolean(value.patch?.trim() || value.fallbackContent !== undefined), {
    message: "Each change must include patch or fallbackContent/content."
  });

export const llmFixSchema = z.object({
  rationale: z.string().min(1),
  confidence: z.number().min(0).max(1).optional(),
  changes: z.array(changeSchema)
});

export type LlmFixProposal = z.infer<typeof llmFixSchema>;

export interface LlmFixerOptions {
  name?: string;
  kinds?: readonly IssueKind[];
  baseConfidence?: number;
  timeoutMs?: number;
  maxFileChars?: number;
  logger?: Logger;
}

const SYSTEM_PROMPT = [
  "You fix one static-analysis issue in one source file.",
  "Return only a JSON object with keys: rationale, confidence (0..1), changes.",
  "changes is an array of { path, patch, fallbackContent } for the given file only.",
  "patch must be a unified diff against the current file content.",
  "fallbackContent must be the complete corrected file.",
  "Return an empty changes array if the issue cannot be fixed safely.",
  "Do not return markdown."
].join(" ");

/**
 * Generic fallback fixer backed by an OpenAI-compatible model. It only ever
 * writes the file the issue points at.
 */
export class LlmFixerAgent implements FixerAgent {
  readonly name: string;
  readonly strategy = "llm-patch";
  private readonly kinds: ReadonlySet<IssueKind>;
  private readonly baseConfidence: number;
  private readonly timeoutMs: number;
  private readonly maxFileChars: number;
  private readonly logger: Logger;

  constructor(
    private readonly llm: LlmLike,
    private readonly workspace: WorkspaceLike,
    options: LlmFixerOptions = {}
  ) {
    this.name = options.name ?? "llm-fixer";
    this.kinds = new Set(options.kinds ?? issueKinds);
    this.baseConfidence = options.baseConfidence ?? 0.45;
    this.timeoutMs = options.timeoutMs ?? 60_000;
    this.maxFileChars = options.maxFileChars ?? 40_000;
    this.logger = options.logger ?? createLogger("llm-fixer");
  }

  supportedKinds(): ReadonlySet<IssueKind> {
    return this.kinds;
  }

  async canHandle(issue: Issue): Promise<number> {
    if (!this.kinds.has(issue.kind) || !issue.filePath) return 0;
    return this.baseConfidence;
  }

  buildPrompt(issue: Issue, content: string): string {
    return [
      `Issue kind: ${issue.kind}`,
      `Severity: ${issue.severity}`,
      `Location: ${issue.filePath}${issue.lineNumber ? `:${issue.lineNumber}` : ""}`,
      issue.errorCode ? `Code: ${issue.errorCode}` : "",
      `Message: ${issue.message}`,
      issue.details.length > 0 ? `Details:\n${issue.details.join("\n")}` : "",
      `FILE: ${issue.filePath}\n${content || "<EMPTY>"}`
    ]
      .filter(Boolean)
      .join("\n\n");
  }

  async propose(issue: Issue, content: string): Promise<LlmFixProposal> {
    const raw = await withTimeout(
      this.llm.completeJsonObject(SYSTEM_PROMPT, this.buildPrompt(issue, content)),
      this.timeoutMs,
      `${this.name} llm call`
    );
    const parsed = llmFixSchema.safeParse(JSON.parse(extractJsonObject(raw)));
    if (!parsed.success) {
      throw new Error(`Model returned an invalid change set: ${parsed.error.issues[0]?.message ?? "unknown"}`);
    }
    return parsed.data;
  }

  async fix(issue: Issue): Promise<FixResult> {
    const filePath = issue.filePath;
    if (!filePath) {
      return failedFixResult(`${this.name} needs a file path for issue ${issue.id}`);
    }

    const content = await this.workspace.readFile(filePath);
    if (content === undefined) {
      return failedFixResult(`${filePath} does not exist`);
    }
    if (content.length > this.maxFileChars) {
      return failedFixResult(`${filePath} is too large for ${this.name} (${content.length} chars)`);
    }

    const proposal = await this.propose(issue, content);
    const changes = proposal.changes.filter((change) => change.path === filePath);
    if (changes.length < proposal.changes.length) {
      this.logger.warn({ issueId: issue.id, filePath }, "Ignoring proposed changes outside the issue's file");
    }
    if (changes.length === 0) {
      return createFixResult({
        success: false,
        confidence: clampConfidence(proposal.confidence ?? 0),
        remainingIssues: [`${this.name} proposed no change for ${issue.id}`],
        recommendations: [proposal.rationale]
      });
    }

    const applied = await this.workspace.applyChanges(changes);
    return createFixResult({
      success: true,
      confidence: clampConfidence(proposal.confidence ?? this.baseConfidence),
      fixesApplied: applied.map(
        (change) => `${this.name}: ${change.path} via ${change.mode} (+${change.delta.added}/-${change.delta.removed})`
      ),
      filesModified: applied.map((change) => change.path),
      recommendations: [proposal.rationale]
    });
  }
}
