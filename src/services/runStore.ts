import { randomUUID } from "node:crypto";
import { EventEmitter } from "node:events";
import type { RunEvent, RunEventRole, RunInput, RunReport, RunState, RunStatus } from "../types";

const ALL_EVENTS = "run:*";

export class RunStore {
  private readonly runs = new Map<string, RunState>();
  private readonly events = new Map<string, RunEvent[]>();
  private readonly emitter = new EventEmitter();

  create(input: RunInput): RunState {
    const run: RunState = {
      id: randomUUID(),
      status: "pending",
      input,
      startedAt: new Date().toISOString()
    };
    this.runs.set(run.id, run);
    this.events.set(run.id, []);
    return run;
  }

  get(runId: string): RunState | undefined {
    return this.runs.get(runId);
  }

  all(): RunState[] {
    return [...this.runs.values()].sort((a, b) => (a.startedAt > b.startedAt ? -1 : 1));
  }

  updateStatus(runId: string, status: RunStatus, outcome: { report?: RunReport; errorMessage?: string } = {}): void {
    const current = this.runs.get(runId);
    if (!current) return;

    current.status = status;
    if (status === "success" || status === "failed") {
      current.endedAt = new Date().toISOString();
      current.report = outcome.report;
      current.errorMessage = outcome.errorMessage;
    }
  }

  pushEvent(runId: string, role: RunEventRole, type: string, message: string, data?: Record<string, unknown>): RunEvent {
    const event: RunEvent = {
      id: randomUUID(),
      runId,
      timestamp: new Date().toISOString(),
      role,
      type,
      message,
      data
    };
    const list = this.events.get(runId) ?? [];
    list.push(event);
    this.events.set(runId, list);
    this.emitter.emit(`run:${runId}`, event);
    this.emitter.emit(ALL_EVENTS, event);
    return event;
  }

  getEvents(runId: string): RunEvent[] {
    return [...(this.events.get(runId) ?? [])];
  }

  subscribe(runId: string, handler: (event: RunEvent) => void): () => void {
    const channel = `run:${runId}`;
    this.emitter.on(channel, handler);
    return () => this.emitter.off(channel, handler);
  }

  subscribeAll(handler: (event: RunEvent) => void): () => void {
    this.emitter.on(ALL_EVENTS, handler);
    return () => this.emitter.off(ALL_EVENTS, handler);
  }
}
