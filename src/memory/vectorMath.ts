export const EMBEDDING_DIMENSIONS = 384;

export const dot = (a: readonly number[], b: readonly number[]): number => {
  let sum = 0;
  for (let index = 0; index < a.length; index += 1) {
    sum += a[index] * b[index];
  }
  return sum;
};

export const norm = (vector: readonly number[]): number => Math.sqrt(dot(vector, vector));

/** Direction-only similarity in [-1, 1]; zero vectors and shape mismatches score 0. */
export const cosineSimilarity = (a: readonly number[], b: readonly number[]): number => {
  if (a.length === 0 || a.length !== b.length) return 0;
  const denominator = norm(a) * norm(b);
  if (denominator === 0) return 0;
  return dot(a, b) / denominator;
};

export const normalize = (vector: readonly number[]): number[] => {
  const length = norm(vector);
  if (length === 0) return [...vector];
  return vector.map((value) => value / length);
};
