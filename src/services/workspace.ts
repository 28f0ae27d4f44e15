import fs from "node:fs/promises";
import path from "node:path";
import { config } from "../config";
import { toErrorMessage } from "../logger";
import type { AppliedChangeResult, FileChange } from "../types";
import { applyUnifiedPatch, countLineDelta } from "./patchApply";
import type { LineDelta } from "./patchApply";

const isWithinOrEqual = (candidate: string, root: string): boolean => {
  const relative = path.relative(root, candidate);
  return !relative.startsWith("..") && !path.isAbsolute(relative);
};

export interface AppliedChange extends AppliedChangeResult {
  delta: LineDelta;
  patchError?: string;
}

export interface WorkspaceLike {
  readonly root: string;
  readFile(filePath: string): Promise<string | undefined>;
  applyChanges(changes: readonly FileChange[]): Promise<AppliedChange[]>;
}

export class WorkspaceService implements WorkspaceLike {
  readonly root: string;

  constructor(root = config.workspaceRoot) {
    this.root = path.resolve(root);
  }

  resolveSafePath(relativePath: string): string {
    const absolute = path.resolve(this.root, relativePath.replace(/^\/+/, ""));
    if (!isWithinOrEqual(absolute, this.root)) {
      throw new Error(`Unsafe path rejected: ${relativePath}`);
    }
    return absolute;
  }

  async readFile(filePath: string): Promise<string | undefined> {
    try {
      return await fs.readFile(this.resolveSafePath(filePath), "utf8");
    } catch (error: unknown) {
      if (error instanceof Error && "code" in error && error.code === "ENOENT") {
        return undefined;
      }
      throw error;
    }
  }

  /**
   * Writes each change, patch first. A patch that no longer applies falls
   * back to the full replacement content when one was supplied.
   */
  async applyChanges(changes: readonly FileChange[]): Promise<AppliedChange[]> {
    const applied: AppliedChange[] = [];

    for (const change of changes) {
      const absolute = this.resolveSafePath(change.path);
      const current = (await this.readFile(change.path)) ?? "";
      let next: string | undefined;
      let mode: AppliedChange["mode"] = "patch";
      let patchError: string | undefined;

      if (change.patch?.trim()) {
        try {
          next = applyUnifiedPatch(current, change.patch, change.path);
        } catch (error: unknown) {
          patchError = toErrorMessage(error);
        }
      }
      if (next === undefined && typeof change.fallbackContent === "string") {
        next = change.fallbackContent;
        mode = "fallbackContent";
      }
      if (next === undefined) {
        throw new Error(`Unable to apply change for ${change.path}: ${patchError ?? "missing patch and fallback content"}`);
      }

      await fs.mkdir(path.dirname(absolute), { recursive: true });
      await fs.writeFile(absolute, next, "utf8");
      applied.push({ path: change.path, mode, delta: countLineDelta(current, next), patchError });
    }

    return applied;
  }
}
