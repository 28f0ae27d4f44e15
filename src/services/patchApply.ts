import { applyPatch, diffLines } from "diff";

const HUNK_HEADER = /^@@ -\d+(?:,\d+)? \+\d+(?:,\d+)? @@/m;

const withFileHeaders = (patch: string, filePath: string): string => {
  if (/^---\s/m.test(patch) || /^diff --git\s/m.test(patch)) {
    return patch;
  }
  return [`--- a/${filePath}`, `+++ b/${filePath}`, patch].join("\n");
};

/**
 * Applies a unified diff (with or without file headers) to the given text.
 * Throws when the patch has no hunks or its context no longer matches.
 */
export const applyUnifiedPatch = (original: string, patch: string, filePath = "file"): string => {
  if (!patch.trim()) {
    throw new Error("Patch text is empty.");
  }
  if (!HUNK_HEADER.test(patch)) {
    throw new Error("Patch does not include unified diff hunks.");
  }

  for (const candidate of [patch, withFileHeaders(patch, filePath)]) {
    const applied = applyPatch(original, candidate, { fuzzFactor: 1 });
    if (typeof applied === "string") {
      return applied;
    }
  }
  throw new Error(`Failed to apply unified patch to ${filePath}.`);
};

export interface LineDelta {
  added: number;
  removed: number;
}

export const countLineDelta = (before: string, after: string): LineDelta =>
  diffLines(before, after).reduce<LineDelta>(
    (delta, part) => ({
      added: delta.added + (part.added ? part.count ?? 0 : 0),
      removed: delta.removed + (part.removed ? part.count ?? 0 : 0)
    }),
    { added: 0, removed: 0 }
  );
