export * from "./types";
export { AdapterRegistry, emptyCheckResult } from "./checks/checkAdapter";
export type { CheckAdapter, CheckRunOptions, RawCheckOutput } from "./checks/checkAdapter";
export { CommandCheckAdapter, parseFindingLine } from "./checks/commandCheckAdapter";
export { AgentRegistry } from "./agents/fixerAgent";
export type { FixerAgent } from "./agents/fixerAgent";
export { describeAgentFault, runWithErrorBoundary } from "./agents/errorBoundary";
export type { AgentFault, FaultSink } from "./agents/errorBoundary";
export { CommandFixerAgent } from "./agents/commandFixerAgent";
export { LlmFixerAgent } from "./agents/llmFixerAgent";
export { CheckScheduler, isPassingStatus, orderChecks, summarizeStage } from "./orchestrator/checkScheduler";
export type { AllChecksResult, CheckRunCallbacks } from "./orchestrator/checkScheduler";
export {
  AgentCoordinator,
  CACHE_CONFIDENCE_THRESHOLD,
  DELEGATION_THRESHOLD,
  strategyForIteration
} from "./orchestrator/agentCoordinator";
export type { IssueFixer, IssueOutcome, IterationStrategy } from "./orchestrator/agentCoordinator";
export { AgentDelegator, createDelegationCacheKey, defaultDelegationTable } from "./orchestrator/agentDelegator";
export { FixVerifyLoop } from "./orchestrator/fixVerifyLoop";
export { QualityOrchestrator } from "./orchestrator/qualityOrchestrator";
export { FixStrategyMemory } from "./memory/fixStrategyMemory";
export type { SimilarAttempt, StrategyStatistics } from "./memory/fixStrategyMemory";
export { HashingIssueEmbedder, OpenAiIssueEmbedder } from "./memory/issueEmbedder";
export type { IssueEmbedder } from "./memory/issueEmbedder";
export { cosineSimilarity, EMBEDDING_DIMENSIONS } from "./memory/vectorMath";
export { BaselineManager } from "./services/baselineManager";
export type { BaselineComparison, BenchmarkResult } from "./services/baselineManager";
export { CheckResultCache, createCheckCacheKey } from "./services/checkResultCache";
export { IssueExtractor } from "./services/issueExtractor";
export { mergeFixResults, mergeAllFixResults, createFixResult, failedFixResult } from "./services/fixResults";
export { RunStore } from "./services/runStore";
export { parseOrchestratorConfig, orchestratorConfigSchema } from "./schemas/orchestratorConfig";
export { createRuntime, loadOrchestratorConfig } from "./runtime";
