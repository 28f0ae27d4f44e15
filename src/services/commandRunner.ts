import { spawn } from "node:child_process";
import path from "node:path";
import { config } from "../config";

export interface CommandResult {
  exitCode: number;
  output: string;
  timedOut: boolean;
  durationMs: number;
}

export interface CommandRunOptions {
  workspaceRoot?: string;
  timeoutMs?: number;
  signal?: AbortSignal;
}

export interface CommandRunnerLike {
  run(command: string, options?: CommandRunOptions): Promise<CommandResult>;
}

const isWithinOrEqual = (candidate: string, root: string): boolean => {
  const relative = path.relative(root, candidate);
  return !relative.startsWith("..") && !path.isAbsolute(relative);
};

export const TIMEOUT_EXIT_CODE = 124;

export class CommandRunner implements CommandRunnerLike {
  constructor(
    private readonly root = config.workspaceRoot,
    private readonly maxOutputChars = config.maxCommandOutputChars
  ) {}

  resolveWorkspaceRoot(workspaceRoot?: string): string {
    const input = workspaceRoot?.trim();
    if (!input) {
      return this.root;
    }
    const absolute = path.resolve(this.root, input);
    if (!isWithinOrEqual(absolute, this.root)) {
      throw new Error(`Unsafe workspaceRoot rejected: ${workspaceRoot}`);
    }
    return absolute;
  }

  async run(command: string, options?: CommandRunOptions): Promise<CommandResult> {
    const cwd = this.resolveWorkspaceRoot(options?.workspaceRoot);
    const timeoutMs = options?.timeoutMs ?? config.maxCommandRuntimeMs;
    const startedAt = Date.now();

    return new Promise((resolve, reject) => {
      const child = spawn(command, {
        cwd,
        shell: true,
        signal: options?.signal,
        env: {
          ...process.env,
          CI: process.env.CI ?? "1"
        }
      });

      let combined = "";
      let timedOut = false;
      const timer = setTimeout(() => {
        timedOut = true;
        child.kill("SIGTERM");
      }, timeoutMs);

      child.stdout.on("data", (chunk: Buffer) => {
        combined += chunk.toString("utf8");
      });
      child.stderr.on("data", (chunk: Buffer) => {
        combined += chunk.toString("utf8");
      });
      child.on("error", (err) => {
        clearTimeout(timer);
        reject(err);
      });
      child.on("close", (code) => {
        clearTimeout(timer);
        const output = combined.slice(-this.maxOutputChars);
        resolve({
          exitCode: timedOut ? TIMEOUT_EXIT_CODE : code ?? 1,
          output: timedOut ? `${output}\nCommand timed out after ${timeoutMs}ms` : output,
          timedOut,
          durationMs: Date.now() - startedAt
        });
      });
    });
  }
}
