import { describe, expect, it } from "vitest";
import {
  clampConfidence,
  createFixResult,
  failedFixResult,
  mergeAllFixResults,
  mergeFixResults
} from "../../src/services/fixResults";

describe("fixResults", () => {
  it("merges success as AND and confidence as max", () => {
    const merged = mergeFixResults(
      createFixResult({ success: true, confidence: 0.4 }),
      createFixResult({ success: false, confidence: 0.9 })
    );

    expect(merged.success).toBe(false);
    expect(merged.confidence).toBe(0.9);
  });

  it("unions fixes, remaining issues and files but concatenates recommendations", () => {
    const merged = mergeFixResults(
      createFixResult({
        fixesApplied: ["a"],
        remainingIssues: ["x"],
        recommendations: ["retry"],
        filesModified: ["src/a.ts"]
      }),
      createFixResult({
        fixesApplied: ["a", "b"],
        remainingIssues: ["x", "y"],
        recommendations: ["retry"],
        filesModified: ["src/a.ts", "src/b.ts"]
      })
    );

    expect(merged.fixesApplied).toEqual(["a", "b"]);
    expect(merged.remainingIssues).toEqual(["x", "y"]);
    expect(merged.recommendations).toEqual(["retry", "retry"]);
    expect(merged.filesModified).toEqual(["src/a.ts", "src/b.ts"]);
  });

  it("folds a list and returns a neutral success for an empty one", () => {
    expect(mergeAllFixResults([])).toEqual(createFixResult());

    const merged = mergeAllFixResults([
      createFixResult({ confidence: 0.2, filesModified: ["a"] }),
      createFixResult({ confidence: 0.5, filesModified: ["b"] }),
      failedFixResult("still broken", 0.3)
    ]);
    expect(merged.success).toBe(false);
    expect(merged.confidence).toBe(0.5);
    expect(merged.filesModified).toEqual(["a", "b"]);
    expect(merged.remainingIssues).toEqual(["still broken"]);
  });

  it("clamps confidence into [0, 1]", () => {
    expect(clampConfidence(1.4)).toBe(1);
    expect(clampConfidence(-0.2)).toBe(0);
    expect(clampConfidence(Number.NaN)).toBe(0);
    expect(clampConfidence(0.35)).toBe(0.35);
  });
});
