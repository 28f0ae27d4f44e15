import { createHash } from "node:crypto";
import fs from "node:fs/promises";
import path from "node:path";
import { persistedCacheEntrySchema } from "../schemas/checkResult";
import type { CheckResult } from "../types";

export const CHECK_RESULT_TTL_MS = 60 * 60 * 1000;

interface CacheEntry {
  result: CheckResult;
  expiresAt: number;
}

export const createCheckCacheKey = (adapterName: string, checkId: string, files: readonly string[]): string => {
  const sortedFiles = [...new Set(files)].sort();
  return createHash("sha256")
    .update(JSON.stringify([adapterName, checkId, sortedFiles]))
    .digest("hex");
};

/**
 * TTL-only cache of check results. Entries are never invalidated by file
 * changes; they simply expire.
 */
export class CheckResultCache {
  private readonly entries = new Map<string, CacheEntry>();

  constructor(
    private readonly ttlMs = CHECK_RESULT_TTL_MS,
    private readonly now: () => number = Date.now
  ) {}

  get(key: string): CheckResult | undefined {
    const entry = this.entries.get(key);
    if (!entry) return undefined;
    if (entry.expiresAt <= this.now()) {
      this.entries.delete(key);
      return undefined;
    }
    return { ...entry.result, findings: [...entry.result.findings] };
  }

  set(key: string, result: CheckResult): void {
    this.entries.set(key, { result, expiresAt: this.now() + this.ttlMs });
  }

  clear(): void {
    this.entries.clear();
  }

  get size(): number {
    return this.entries.size;
  }

  async load(filePath: string): Promise<number> {
    let parsed: unknown;
    try {
      parsed = JSON.parse(await fs.readFile(filePath, "utf8"));
    } catch {
      return 0;
    }
    if (!Array.isArray(parsed)) return 0;

    const now = this.now();
    let loaded = 0;
    for (const item of parsed) {
      const entry = persistedCacheEntrySchema.safeParse(item);
      if (!entry.success || entry.data.expiresAt <= now) continue;
      this.entries.set(entry.data.key, { result: entry.data.result, expiresAt: entry.data.expiresAt });
      loaded += 1;
    }
    return loaded;
  }

  async save(filePath: string): Promise<void> {
    const now = this.now();
    const payload = [...this.entries.entries()]
      .filter(([, entry]) => entry.expiresAt > now)
      .map(([key, entry]) => ({ key, ...entry }));
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    await fs.writeFile(filePath, JSON.stringify(payload, null, 2), "utf8");
  }
}
