export const issueKinds = [
  "formatting",
  "type_error",
  "security",
  "test_failure",
  "import_error",
  "complexity",
  "dead_code",
  "dependency",
  "duplication",
  "performance",
  "documentation",
  "regex_validation"
] as const;

export type IssueKind = (typeof issueKinds)[number];

export type Severity = "low" | "medium" | "high" | "critical";

export type CheckStage = "fast" | "comprehensive";

export type CheckStatus = "success" | "failure" | "warning" | "skipped" | "error";

export interface Issue {
  readonly id: string;
  readonly kind: IssueKind;
  readonly severity: Severity;
  readonly message: string;
  readonly filePath?: string;
  readonly lineNumber?: number;
  readonly errorCode?: string;
  readonly details: readonly string[];
  readonly originStage: string;
}

export interface FixResult {
  success: boolean;
  confidence: number;
  fixesApplied: string[];
  remainingIssues: string[];
  recommendations: string[];
  filesModified: string[];
}

export interface CheckConfig {
  id: string;
  name: string;
  kind: IssueKind;
  adapter: string;
  enabled: boolean;
  filePatterns: string[];
  excludePatterns: string[];
  timeoutMs: number;
  stage: CheckStage;
  isFormatter: boolean;
  parallelSafe: boolean;
  retryOnFailure: boolean;
  settings: Record<string, unknown>;
}

export interface Finding {
  filePath?: string;
  lineNumber?: number;
  column?: number;
  code?: string;
  message: string;
  severity?: Severity;
}

export interface CheckResult {
  checkId: string;
  checkName: string;
  kind: IssueKind;
  stage: CheckStage;
  status: CheckStatus;
  message: string;
  filesChecked: string[];
  filesModified: string[];
  issuesFound: number;
  issuesFixed: number;
  executionTimeMs: number;
  findings: Finding[];
  output?: string;
}

export interface StageSummary {
  stage: CheckStage;
  total: number;
  passed: number;
  failed: number;
  errored: number;
  skipped: number;
  warnings: number;
  passRate: number;
  issuesFound: number;
  issuesFixed: number;
  executionTimeMs: number;
}

export interface CommandFixerSettings {
  name: string;
  strategy: string;
  command: string;
  kinds: IssueKind[];
  confidence: number;
  timeoutMs: number;
  requiresFile: boolean;
}

export interface OrchestratorConfig {
  projectRoot: string;
  maxParallelChecks: number;
  enableCaching: boolean;
  cacheDirectory?: string;
  failFast: boolean;
  runFormattersFirst: boolean;
  enableIncremental: boolean;
  verbose: boolean;
  maxFixIterations: number;
  maxFixMinutes: number;
  checks: CheckConfig[];
  fixers: CommandFixerSettings[];
}

export interface DelegationStats {
  totalDelegations: number;
  successfulDelegations: number;
  failedDelegations: number;
  totalLatencyMs: number;
  cacheHits: number;
  cacheMisses: number;
  agentsUsed: Record<string, number>;
}

export interface DelegationMetrics extends DelegationStats {
  averageLatencyMs: number;
  cacheHitRate: number;
}

export interface FixStrategyRecord {
  issueKind: IssueKind;
  errorCode: string | null;
  issueMessage: string;
  filePath: string | null;
  embedding: number[];
  agentUsed: string;
  strategy: string;
  success: boolean;
  confidence: number;
  timestamp: string;
  sessionId: string | null;
}

export interface StrategyRecommendation {
  agentName: string;
  strategy: string;
  key: string;
  confidence: number;
  successCount: number;
  attempts: number;
}

export type FixLoopState = "idle" | "extracting" | "delegating" | "reverifying" | "exhausted";

export type BudgetExhaustedReason = "iterations" | "minutes";

export interface FixLoopReport {
  success: boolean;
  iterations: number;
  exhausted: boolean;
  exhaustedReason?: BudgetExhaustedReason;
  environmentFault: boolean;
  state: FixLoopState;
  issuesFound: number;
  issuesFixed: number;
  remainingIssues: Issue[];
  fixResult: FixResult;
  checkResults: CheckResult[];
  summary: string;
}

export type RunStatus = "pending" | "running" | "success" | "failed";

export interface RunInput {
  files: string[];
  stages: CheckStage[];
  fix: boolean;
}

export interface RunReport {
  runId: string;
  success: boolean;
  stages: Partial<Record<CheckStage, { results: CheckResult[]; summary: StageSummary }>>;
  totalIssuesFound: number;
  totalIssuesFixed: number;
  fixLoop?: FixLoopReport;
  delegation: DelegationMetrics;
  startedAt: string;
  finishedAt: string;
}

export interface RunState {
  id: string;
  status: RunStatus;
  input: RunInput;
  startedAt: string;
  endedAt?: string;
  report?: RunReport;
  errorMessage?: string;
}

export type RunEventRole = "scheduler" | "coordinator" | "delegator" | "fix_loop" | "orchestrator";

export interface RunEvent {
  id: string;
  runId: string;
  timestamp: string;
  role: RunEventRole;
  type: string;
  message: string;
  data?: Record<string, unknown>;
}

export interface FileChange {
  path: string;
  patch?: string;
  fallbackContent?: string;
}

export interface AppliedChangeResult {
  path: string;
  mode: "patch" | "fallbackContent";
}
