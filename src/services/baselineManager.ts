import fs from "node:fs/promises";
import path from "node:path";
import { z } from "zod";

export const benchmarkResultSchema = z.object({
  name: z.string().min(1),
  min: z.number().nonnegative(),
  max: z.number().nonnegative(),
  mean: z.number().nonnegative(),
  median: z.number().nonnegative(),
  stddev: z.number().nonnegative().default(0),
  rounds: z.number().int().min(1).default(1),
  iterations: z.number().int().min(1).default(1),
  timestamp: z.string().default(() => new Date().toISOString())
});

export type BenchmarkResult = z.infer<typeof benchmarkResultSchema>;
export type BenchmarkInput = z.input<typeof benchmarkResultSchema>;

const baselineFileSchema = z.record(benchmarkResultSchema);

export const DEFAULT_REGRESSION_THRESHOLD = 0.15;

export interface BaselineComparison {
  name: string;
  isNew: boolean;
  isRegression: boolean;
  isImprovement: boolean;
  changePercent: number;
  current: BenchmarkResult;
  baseline: BenchmarkResult | null;
}

/**
 * Stored benchmark medians keyed by benchmark name. A run is a regression
 * when its median is slower than the baseline by more than the threshold.
 */
export class BaselineManager {
  private readonly baselines = new Map<string, BenchmarkResult>();

  constructor(private readonly filePath: string) {}

  get count(): number {
    return this.baselines.size;
  }

  async load(): Promise<number> {
    let raw: string;
    try {
      raw = await fs.readFile(this.filePath, "utf8");
    } catch {
      return 0;
    }

    const parsed = baselineFileSchema.safeParse(JSON.parse(raw));
    if (!parsed.success) {
      throw new Error(`Baseline file ${this.filePath} is invalid: ${parsed.error.issues[0]?.message ?? "unknown"}`);
    }
    this.baselines.clear();
    for (const [name, result] of Object.entries(parsed.data)) {
      this.baselines.set(name, result);
    }
    return this.baselines.size;
  }

  async save(): Promise<void> {
    await fs.mkdir(path.dirname(this.filePath), { recursive: true });
    const body = Object.fromEntries([...this.baselines.entries()].sort(([a], [b]) => a.localeCompare(b)));
    await fs.writeFile(this.filePath, `${JSON.stringify(body, null, 2)}\n`, "utf8");
  }

  update(name: string, result: BenchmarkInput): BenchmarkResult {
    const parsed = benchmarkResultSchema.parse({ ...result, name });
    this.baselines.set(name, parsed);
    return parsed;
  }

  getBaseline(name: string): BenchmarkResult | undefined {
    return this.baselines.get(name);
  }

  getAllNames(): string[] {
    return [...this.baselines.keys()].sort();
  }

  clear(name?: string): void {
    if (name === undefined) {
      this.baselines.clear();
      return;
    }
    this.baselines.delete(name);
  }

  compare(name: string, currentInput: BenchmarkInput, threshold = DEFAULT_REGRESSION_THRESHOLD): BaselineComparison {
    const current = benchmarkResultSchema.parse(currentInput);
    const baseline = this.baselines.get(name) ?? null;

    if (!baseline || baseline.median === 0) {
      return { name, isNew: baseline === null, isRegression: false, isImprovement: false, changePercent: 0, current, baseline };
    }

    const changePercent = ((current.median - baseline.median) / baseline.median) * 100;
    return {
      name,
      isNew: false,
      isRegression: changePercent > threshold * 100,
      isImprovement: changePercent < -threshold * 100,
      changePercent,
      current,
      baseline
    };
  }
}
