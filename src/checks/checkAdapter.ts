import type { CheckConfig, CheckResult, Finding } from "../types";

export interface RawCheckOutput {
  exitCode: number;
  output: string;
  timedOut: boolean;
}

export interface CheckRunOptions {
  signal?: AbortSignal;
}

export interface CheckAdapter {
  readonly name: string;
  buildCommand(files: readonly string[], check: CheckConfig): string[];
  parseOutput(raw: RawCheckOutput, check: CheckConfig): Finding[];
  check(files: readonly string[], check: CheckConfig, options?: CheckRunOptions): Promise<CheckResult>;
}

export class AdapterRegistry {
  private readonly byName = new Map<string, CheckAdapter>();

  constructor(adapters: readonly CheckAdapter[] = []) {
    for (const adapter of adapters) {
      this.register(adapter);
    }
  }

  register(adapter: CheckAdapter): void {
    if (this.byName.has(adapter.name)) {
      throw new Error(`Check adapter already registered: ${adapter.name}`);
    }
    this.byName.set(adapter.name, adapter);
  }

  get(name: string): CheckAdapter | undefined {
    return this.byName.get(name);
  }

  names(): string[] {
    return [...this.byName.keys()].sort();
  }
}

export const emptyCheckResult = (check: CheckConfig, overrides: Partial<CheckResult> = {}): CheckResult => ({
  checkId: check.id,
  checkName: check.name,
  kind: check.kind,
  stage: check.stage,
  status: "skipped",
  message: "",
  filesChecked: [],
  filesModified: [],
  issuesFound: 0,
  issuesFixed: 0,
  executionTimeMs: 0,
  findings: [],
  ...overrides
});
