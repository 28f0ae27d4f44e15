import { createLogger } from "../logger";
import type { Logger } from "../logger";
import { failedFixResult } from "../services/fixResults";
import type { FixResult, Issue } from "../types";

export interface AgentFault {
  agentName: string;
  issueId: string;
  message: string;
  stack?: string;
}

export interface FaultSink {
  report(fault: AgentFault): void;
}

export interface ErrorBoundaryOptions {
  logger?: Logger;
  sink?: FaultSink;
}

const defaultLogger = createLogger("agent-error-boundary");

export const describeAgentFault = (fault: Pick<AgentFault, "agentName" | "issueId" | "message">): string =>
  `${fault.agentName} failed on issue ${fault.issueId}: ${fault.message}`;

/**
 * Calls a fixer and maps anything it throws to a failed FixResult. Nothing
 * escapes to the caller.
 */
export const runWithErrorBoundary = async (
  agentName: string,
  issue: Issue,
  invoke: () => Promise<FixResult>,
  options: ErrorBoundaryOptions = {}
): Promise<FixResult> => {
  try {
    return await invoke();
  } catch (error: unknown) {
    const fault: AgentFault = {
      agentName,
      issueId: issue.id,
      message: error instanceof Error ? error.message : String(error),
      stack: error instanceof Error ? error.stack : undefined
    };

    (options.logger ?? defaultLogger).error(
      { agent: agentName, issueId: issue.id, kind: issue.kind, filePath: issue.filePath, err: error },
      describeAgentFault(fault)
    );

    try {
      options.sink?.report(fault);
    } catch (sinkError: unknown) {
      (options.logger ?? defaultLogger).warn({ err: sinkError }, "Fault sink rejected a report");
    }

    return failedFixResult(describeAgentFault(fault));
  }
};
