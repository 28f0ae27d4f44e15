import type { BudgetExhaustedReason } from "../types";

export interface BudgetState {
  maxIterations: number;
  maxMinutes: number;
  startedAt: string;
  deadlineAt: string;
  elapsedMs: number;
  remainingIterations: number;
  exhaustedReason?: BudgetExhaustedReason;
}

export interface BudgetGateResult {
  ok: boolean;
  reason?: BudgetExhaustedReason;
  snapshot: BudgetState;
}

/**
 * Bounds the fix loop by iteration count and wall-clock minutes. Iterations
 * are numbered from 1; iteration 0 is the initial check and costs nothing.
 */
export class BudgetTracker {
  private readonly startedAtMs: number;
  private readonly deadlineMs: number;

  constructor(
    private readonly maxIterations: number,
    private readonly maxMinutes: number,
    startedAt: string | number = Date.now()
  ) {
    this.startedAtMs = typeof startedAt === "number" ? startedAt : new Date(startedAt).getTime();
    this.deadlineMs = this.startedAtMs + maxMinutes * 60_000;
  }

  snapshot(iteration: number, nowMs = Date.now(), exhaustedReason?: BudgetExhaustedReason): BudgetState {
    return {
      maxIterations: this.maxIterations,
      maxMinutes: this.maxMinutes,
      startedAt: new Date(this.startedAtMs).toISOString(),
      deadlineAt: new Date(this.deadlineMs).toISOString(),
      elapsedMs: Math.max(0, nowMs - this.startedAtMs),
      remainingIterations: Math.max(0, this.maxIterations - iteration + 1),
      exhaustedReason
    };
  }

  canStartIteration(iteration: number, nowMs = Date.now()): BudgetGateResult {
    if (iteration > this.maxIterations) {
      return { ok: false, reason: "iterations", snapshot: this.snapshot(iteration, nowMs, "iterations") };
    }
    if (nowMs > this.deadlineMs) {
      return { ok: false, reason: "minutes", snapshot: this.snapshot(iteration, nowMs, "minutes") };
    }
    return { ok: true, snapshot: this.snapshot(iteration, nowMs) };
  }
}
