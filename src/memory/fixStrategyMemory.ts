import fs from "node:fs/promises";
import path from "node:path";
import { createLogger } from "../logger";
import type { Logger } from "../logger";
import { fixStrategyRecordSchema } from "../schemas/fixStrategyRecord";
import type { FixStrategyRecord, Issue, IssueKind, StrategyRecommendation } from "../types";
import { cosineSimilarity } from "./vectorMath";

export interface SimilarAttempt {
  record: FixStrategyRecord;
  similarity: number;
}

export interface AttemptOutcome {
  success: boolean;
  confidence: number;
}

export interface StrategyStatistics {
  totalAttempts: number;
  successfulAttempts: number;
  successRate: number;
  topStrategies: Array<{ key: string; attempts: number; successes: number; successRate: number }>;
}

export interface FixStrategyMemoryLike {
  recordAttempt(
    issue: Issue,
    embedding: readonly number[],
    agentUsed: string,
    strategy: string,
    outcome: AttemptOutcome,
    sessionId?: string
  ): Promise<FixStrategyRecord>;
  findSimilarIssues(embedding: readonly number[], kind?: IssueKind, k?: number, minSimilarity?: number): SimilarAttempt[];
  recommendStrategy(issue: Issue, embedding: readonly number[], k?: number): StrategyRecommendation | null;
}

export const strategyKey = (agentUsed: string, strategy: string): string => `${agentUsed}:${strategy}`;

/**
 * Append-only log of fix attempts (one JSON record per line) with an
 * in-memory index grouped by issue kind. Records are never rewritten.
 */
export class FixStrategyMemory implements FixStrategyMemoryLike {
  private readonly byKind = new Map<IssueKind, FixStrategyRecord[]>();
  private writeQueue: Promise<void> = Promise.resolve();
  private readonly logger: Logger;

  constructor(
    private readonly logPath: string | null,
    options: { logger?: Logger } = {}
  ) {
    this.logger = options.logger ?? createLogger("fix-strategy-memory");
  }

  get size(): number {
    let total = 0;
    for (const records of this.byKind.values()) {
      total += records.length;
    }
    return total;
  }

  all(): FixStrategyRecord[] {
    return [...this.byKind.values()].flat();
  }

  async load(): Promise<number> {
    if (!this.logPath) return 0;

    let raw: string;
    try {
      raw = await fs.readFile(this.logPath, "utf8");
    } catch {
      return 0;
    }

    let loaded = 0;
    raw.split(/\r?\n/).forEach((line, index) => {
      if (!line.trim()) return;
      try {
        const parsed = fixStrategyRecordSchema.safeParse(JSON.parse(line));
        if (!parsed.success) {
          this.logger.warn({ line: index + 1 }, "Skipping malformed fix-strategy record");
          return;
        }
        this.index(parsed.data);
        loaded += 1;
      } catch (error: unknown) {
        this.logger.warn({ line: index + 1, err: error }, "Skipping unparseable fix-strategy line");
      }
    });

    this.logger.debug({ loaded, logPath: this.logPath }, "Fix-strategy memory loaded");
    return loaded;
  }

  async recordAttempt(
    issue: Issue,
    embedding: readonly number[],
    agentUsed: string,
    strategy: string,
    outcome: AttemptOutcome,
    sessionId?: string
  ): Promise<FixStrategyRecord> {
    const record: FixStrategyRecord = {
      issueKind: issue.kind,
      errorCode: issue.errorCode ?? null,
      issueMessage: issue.message,
      filePath: issue.filePath ?? null,
      embedding: [...embedding],
      agentUsed,
      strategy,
      success: outcome.success,
      confidence: outcome.confidence,
      timestamp: new Date().toISOString(),
      sessionId: sessionId ?? null
    };

    this.index(record);
    await this.append(record);
    return record;
  }

  findSimilarIssues(embedding: readonly number[], kind?: IssueKind, k = 10, minSimilarity = 0.3): SimilarAttempt[] {
    const candidates = kind ? this.byKind.get(kind) ?? [] : this.all();
    return candidates
      .map((record) => ({ record, similarity: cosineSimilarity(embedding, record.embedding) }))
      .filter((item) => item.similarity >= minSimilarity)
      .sort((a, b) => b.similarity - a.similarity)
      .slice(0, Math.max(0, k));
  }

  /**
   * Groups the nearest neighbours by agent:strategy and picks the pair with
   * the most successes, breaking ties on mean similarity-weighted confidence
   * of those successes.
   */
  recommendStrategy(issue: Issue, embedding: readonly number[], k = 10): StrategyRecommendation | null {
    const neighbours = this.findSimilarIssues(embedding, issue.kind, k);
    if (neighbours.length === 0) return null;

    const groups = new Map<string, { agentName: string; strategy: string; attempts: number; successes: number; weighted: number }>();
    for (const { record, similarity } of neighbours) {
      const key = strategyKey(record.agentUsed, record.strategy);
      const group = groups.get(key) ?? {
        agentName: record.agentUsed,
        strategy: record.strategy,
        attempts: 0,
        successes: 0,
        weighted: 0
      };
      group.attempts += 1;
      if (record.success) {
        group.successes += 1;
        group.weighted += similarity * record.confidence;
      }
      groups.set(key, group);
    }

    let best: StrategyRecommendation | null = null;
    for (const [key, group] of groups) {
      if (group.successes === 0) continue;
      const meanConfidence = group.weighted / group.successes;
      const candidate: StrategyRecommendation = {
        agentName: group.agentName,
        strategy: group.strategy,
        key,
        confidence: Math.min(1, meanConfidence + Math.min(0.1, group.successes * 0.02)),
        successCount: group.successes,
        attempts: group.attempts
      };
      if (
        !best ||
        candidate.successCount > best.successCount ||
        (candidate.successCount === best.successCount && candidate.confidence > best.confidence)
      ) {
        best = candidate;
      }
    }

    if (best) {
      this.logger.debug({ key: best.key, confidence: best.confidence, successes: best.successCount }, "Strategy recommended");
    }
    return best;
  }

  getStatistics(limit = 10): StrategyStatistics {
    const records = this.all();
    const successfulAttempts = records.filter((record) => record.success).length;
    const byStrategy = new Map<string, { attempts: number; successes: number }>();

    for (const record of records) {
      const key = strategyKey(record.agentUsed, record.strategy);
      const current = byStrategy.get(key) ?? { attempts: 0, successes: 0 };
      current.attempts += 1;
      current.successes += record.success ? 1 : 0;
      byStrategy.set(key, current);
    }

    const topStrategies = [...byStrategy.entries()]
      .map(([key, value]) => ({ key, ...value, successRate: value.successes / value.attempts }))
      .sort((a, b) => b.successRate - a.successRate || b.attempts - a.attempts || a.key.localeCompare(b.key))
      .slice(0, limit);

    return {
      totalAttempts: records.length,
      successfulAttempts,
      successRate: records.length > 0 ? successfulAttempts / records.length : 0,
      topStrategies
    };
  }

  /** Resolves once every pending append has reached the log. */
  async flush(): Promise<void> {
    await this.writeQueue;
  }

  private index(record: FixStrategyRecord): void {
    const list = this.byKind.get(record.issueKind) ?? [];
    list.push(record);
    this.byKind.set(record.issueKind, list);
  }

  private async append(record: FixStrategyRecord): Promise<void> {
    const logPath = this.logPath;
    if (!logPath) return;

    const write = this.writeQueue.then(async () => {
      await fs.mkdir(path.dirname(logPath), { recursive: true });
      await fs.appendFile(logPath, `${JSON.stringify(record)}\n`, "utf8");
    });
    this.writeQueue = write.catch((error: unknown) => {
      this.logger.error({ err: error, logPath }, "Failed to append fix-strategy record");
    });
    await write;
  }
}
