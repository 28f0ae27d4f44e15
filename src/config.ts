import dotenv from "dotenv";
import os from "node:os";
import path from "node:path";

dotenv.config();

const defaultWorkspaceRoot = path.resolve(__dirname, "..");

export const toInt = (value: string | undefined, fallback: number): number => {
  const parsed = Number.parseInt(value ?? "", 10);
  return Number.isFinite(parsed) ? parsed : fallback;
};

export const toBool = (value: string | undefined, fallback: boolean): boolean => {
  if (!value) return fallback;
  const normalized = value.trim().toLowerCase();
  if (["true", "1", "yes", "y", "on"].includes(normalized)) return true;
  if (["false", "0", "no", "n", "off"].includes(normalized)) return false;
  return fallback;
};

export const config = {
  port: toInt(process.env.PORT, 3000),
  openaiApiKey: process.env.OPENAI_API_KEY ?? "",
  openaiBaseUrl: process.env.OPENAI_BASE_URL ?? "http://localhost:8000/v1",
  model: process.env.OPENAI_MODEL ?? "gpt-4.1-mini",
  embeddingModel: process.env.OPENAI_EMBEDDING_MODEL ?? "text-embedding-3-small",
  workspaceRoot: path.resolve(process.env.WORKSPACE_ROOT ?? defaultWorkspaceRoot),
  logLevel: process.env.LOG_LEVEL ?? "info",
  maxCommandOutputChars: toInt(process.env.MAX_COMMAND_OUTPUT_CHARS, 12000),
  maxCommandRuntimeMs: toInt(process.env.MAX_COMMAND_RUNTIME_MS, 120000),
  fixStrategyLogPath: path.resolve(
    process.env.FIX_STRATEGY_LOG || path.join(os.homedir(), ".cache", "quality-remediation", "fix-strategies.jsonl")
  ),
  useLlmFixer: toBool(process.env.USE_LLM_FIXER, false),
  useOpenAiEmbeddings: toBool(process.env.USE_OPENAI_EMBEDDINGS, false),
  orchestratorConfigPath: process.env.ORCHESTRATOR_CONFIG || "quality.config.json"
};

export const assertLlmConfig = (): void => {
  if (!config.openaiApiKey) {
    throw new Error("OPENAI_API_KEY is required when the LLM fixer is enabled. Add it to .env or shell env.");
  }
};
