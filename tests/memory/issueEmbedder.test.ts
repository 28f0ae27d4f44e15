import { describe, expect, it, vi } from "vitest";
import { describeIssue, HashingIssueEmbedder, OpenAiIssueEmbedder, tokenize } from "../../src/memory/issueEmbedder";
import { cosineSimilarity, norm } from "../../src/memory/vectorMath";
import { createIssue } from "../helpers";

describe("tokenize", () => {
  it("drops quoted text, numbers and single letters", () => {
    expect(tokenize("Name 'fooBar' is not defined (line 12) x")).toEqual(["name", "is", "not", "defined", "line"]);
  });
});

describe("HashingIssueEmbedder", () => {
  const embedder = new HashingIssueEmbedder();

  it("is deterministic and unit length", async () => {
    const issue = createIssue();
    const first = await embedder.embed(issue);
    const second = await embedder.embed(issue);

    expect(first).toEqual(second);
    expect(first).toHaveLength(384);
    expect(norm(first)).toBeCloseTo(1);
  });

  it("maps messages that differ only in quoted names to the same vector", async () => {
    const a = await embedder.embed(createIssue({ message: "Type 'string' is not assignable to type 'number'" }));
    const b = await embedder.embed(createIssue({ message: "Type 'boolean' is not assignable to type 'Date'" }));
    expect(cosineSimilarity(a, b)).toBeCloseTo(1);
  });

  it("keeps unrelated issues apart", async () => {
    const a = await embedder.embed(createIssue({ kind: "type_error", message: "Type 'string' is not assignable to type 'number'" }));
    const c = await embedder.embed(createIssue({ kind: "security", message: "possible injection in query builder" }));
    expect(cosineSimilarity(a, c)).toBeLessThan(0.5);
  });
});

describe("OpenAiIssueEmbedder", () => {
  it("embeds the issue description and normalizes the vector", async () => {
    const client = { embed: vi.fn(async () => [3, 4]) };
    const issue = createIssue({ errorCode: "TS2322", message: "bad type" });

    const vector = await new OpenAiIssueEmbedder(client, 2).embed(issue);

    expect(client.embed).toHaveBeenCalledWith("type_error TS2322 bad type", 2);
    expect(describeIssue(issue)).toBe("type_error TS2322 bad type");
    expect(vector).toEqual([0.6, 0.8]);
  });

  it("rejects vectors of the wrong size", async () => {
    const client = { embed: async () => [1, 2, 3] };
    await expect(new OpenAiIssueEmbedder(client, 2).embed(createIssue())).rejects.toThrow(
      "Embedding has 3 dimensions, expected 2."
    );
  });
});
