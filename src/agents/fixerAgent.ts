import type { FixResult, Issue, IssueKind } from "../types";

export interface FixerAgent {
  readonly name: string;
  /** Label recorded in the fix-strategy memory for attempts made by this agent. */
  readonly strategy: string;
  canHandle(issue: Issue): Promise<number>;
  fix(issue: Issue): Promise<FixResult>;
  supportedKinds(): ReadonlySet<IssueKind>;
  /** Files the agent may write besides the issue's own file; snapshotted before fix() runs. */
  targetFiles?(issue: Issue): string[];
}

export class AgentRegistry {
  private readonly byName = new Map<string, FixerAgent>();

  constructor(agents: readonly FixerAgent[] = []) {
    for (const agent of agents) {
      this.register(agent);
    }
  }

  register(agent: FixerAgent): void {
    if (this.byName.has(agent.name)) {
      throw new Error(`Fixer agent already registered: ${agent.name}`);
    }
    this.byName.set(agent.name, agent);
  }

  get(name: string): FixerAgent | undefined {
    return this.byName.get(name);
  }

  all(): FixerAgent[] {
    return [...this.byName.values()];
  }

  supporting(kind: IssueKind): FixerAgent[] {
    return this.all().filter((agent) => agent.supportedKinds().has(kind));
  }

  capabilities(): Array<{ name: string; strategy: string; supportedKinds: IssueKind[] }> {
    return this.all().map((agent) => ({
      name: agent.name,
      strategy: agent.strategy,
      supportedKinds: [...agent.supportedKinds()].sort()
    }));
  }
}
