import { describe, expect, it } from "vitest";
import { cosineSimilarity, norm, normalize } from "../../src/memory/vectorMath";

describe("vectorMath", () => {
  it("scores identical directions 1 and orthogonal ones 0", () => {
    expect(cosineSimilarity([1, 0], [2, 0])).toBeCloseTo(1);
    expect(cosineSimilarity([1, 0], [0, 1])).toBe(0);
    expect(cosineSimilarity([1, 0], [-1, 0])).toBeCloseTo(-1);
  });

  it("scores zero vectors and mismatched shapes as 0", () => {
    expect(cosineSimilarity([0, 0], [1, 0])).toBe(0);
    expect(cosineSimilarity([1, 0, 0], [1, 0])).toBe(0);
    expect(cosineSimilarity([], [])).toBe(0);
  });

  it("normalizes to unit length and leaves zero vectors alone", () => {
    expect(normalize([3, 4])).toEqual([0.6, 0.8]);
    expect(norm(normalize([1, 2, 3]))).toBeCloseTo(1);
    expect(normalize([0, 0])).toEqual([0, 0]);
  });
});
