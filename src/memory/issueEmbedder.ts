import { createHash } from "node:crypto";
import type { EmbeddingClientLike } from "../llm/openaiClient";
import type { Issue } from "../types";
import { EMBEDDING_DIMENSIONS, normalize } from "./vectorMath";

export interface IssueEmbedder {
  embed(issue: Issue): Promise<number[]>;
}

export const describeIssue = (issue: Issue): string =>
  [issue.kind, issue.errorCode, issue.message].filter((part): part is string => Boolean(part)).join(" ");

export const tokenize = (text: string): string[] =>
  text
    .toLowerCase()
    // numbers and quoted identifiers vary per occurrence, the shape of the message does not
    .replace(/(["'`]).*?\1/g, " ")
    .replace(/\d+/g, " ")
    .split(/[^a-z_]+/)
    .filter((token) => token.length > 1);

const bucketOf = (feature: string, dimensions: number): { index: number; sign: number } => {
  const digest = createHash("sha256").update(feature).digest();
  return {
    index: digest.readUInt32BE(0) % dimensions,
    sign: (digest[4] ?? 0) & 1 ? -1 : 1
  };
};

/**
 * Deterministic feature-hashing embedder. Kind and error code are weighted
 * above message tokens so issues of the same kind cluster together.
 */
export class HashingIssueEmbedder implements IssueEmbedder {
  constructor(private readonly dimensions = EMBEDDING_DIMENSIONS) {}

  embedText(features: ReadonlyArray<{ feature: string; weight: number }>): number[] {
    const vector = new Array<number>(this.dimensions).fill(0);
    for (const { feature, weight } of features) {
      const { index, sign } = bucketOf(feature, this.dimensions);
      vector[index] = (vector[index] ?? 0) + sign * weight;
    }
    return normalize(vector);
  }

  async embed(issue: Issue): Promise<number[]> {
    const features = [
      { feature: `kind:${issue.kind}`, weight: 2 },
      ...(issue.errorCode ? [{ feature: `code:${issue.errorCode}`, weight: 2 }] : []),
      ...tokenize(issue.message).map((token) => ({ feature: `tok:${token}`, weight: 1 }))
    ];
    return this.embedText(features);
  }
}

export class OpenAiIssueEmbedder implements IssueEmbedder {
  constructor(
    private readonly client: EmbeddingClientLike,
    private readonly dimensions = EMBEDDING_DIMENSIONS
  ) {}

  async embed(issue: Issue): Promise<number[]> {
    const vector = await this.client.embed(describeIssue(issue), this.dimensions);
    if (vector.length !== this.dimensions) {
      throw new Error(`Embedding has ${vector.length} dimensions, expected ${this.dimensions}.`);
    }
    return normalize(vector);
  }
}
