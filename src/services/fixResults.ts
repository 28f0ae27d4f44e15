import type { FixResult } from "../types";

const unique = (values: readonly string[]): string[] => [...new Set(values)];

export const createFixResult = (overrides: Partial<FixResult> = {}): FixResult => ({
  success: overrides.success ?? true,
  confidence: overrides.confidence ?? 1,
  fixesApplied: unique(overrides.fixesApplied ?? []),
  remainingIssues: unique(overrides.remainingIssues ?? []),
  recommendations: [...(overrides.recommendations ?? [])],
  filesModified: unique(overrides.filesModified ?? [])
});

export const failedFixResult = (reason: string, confidence = 0): FixResult =>
  createFixResult({
    success: false,
    confidence,
    remainingIssues: [reason]
  });

/**
 * Combines two fixer outcomes: success only if both succeeded, the higher
 * confidence wins, descriptive lists and modified files are unioned and
 * recommendations are concatenated as-is.
 */
export const mergeFixResults = (a: FixResult, b: FixResult): FixResult => ({
  success: a.success && b.success,
  confidence: Math.max(a.confidence, b.confidence),
  fixesApplied: unique([...a.fixesApplied, ...b.fixesApplied]),
  remainingIssues: unique([...a.remainingIssues, ...b.remainingIssues]),
  recommendations: [...a.recommendations, ...b.recommendations],
  filesModified: unique([...a.filesModified, ...b.filesModified])
});

export const mergeAllFixResults = (results: readonly FixResult[]): FixResult => {
  const [first, ...rest] = results;
  if (!first) {
    return createFixResult();
  }
  return rest.reduce(mergeFixResults, first);
};

export const clampConfidence = (value: number): number => {
  if (!Number.isFinite(value)) return 0;
  return Math.min(1, Math.max(0, value));
};
