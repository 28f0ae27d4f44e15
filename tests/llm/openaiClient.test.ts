import { beforeEach, describe, expect, it, vi } from "vitest";
import { config } from "../../src/config";

const mockModelsList = vi.fn();
const mockChatCreate = vi.fn();
const mockEmbeddingsCreate = vi.fn();

vi.mock("openai", () => {
  class MockOpenAI {
    readonly models = { list: mockModelsList };
    readonly chat = {
      completions: {
        create: mockChatCreate
      }
    };
    readonly embeddings = {
      create: mockEmbeddingsCreate
    };

    constructor(_: unknown) {}
  }

  return { default: MockOpenAI };
});

import { OpenAiClient } from "../../src/llm/openaiClient";

const originalModel = config.model;

beforeEach(() => {
  config.model = originalModel;
  mockModelsList.mockReset();
  mockChatCreate.mockReset();
  mockEmbeddingsCreate.mockReset();
});

describe("OpenAiClient model validation", () => {
  it("checks the model list once per client", async () => {
    config.model = "supported-model";
    mockModelsList.mockResolvedValue({ data: [{ id: "supported-model" }, { id: "other-model" }] });

    const client = new OpenAiClient();
    await client.assertModelAvailable();
    await client.assertModelAvailable();

    expect(mockModelsList).toHaveBeenCalledTimes(1);
  });

  it("rejects a model the provider does not list", async () => {
    config.model = "bad-model";
    mockModelsList.mockResolvedValue({ data: [{ id: "a" }, { id: "b" }] });

    await expect(new OpenAiClient().assertModelAvailable()).rejects.toThrow(
      'Configured OPENAI_MODEL "bad-model" is not in provider model list. Available models (sample): a, b'
    );
  });

  it("skips validation when the provider has no models endpoint", async () => {
    mockModelsList.mockRejectedValueOnce({ status: 404, message: "models endpoint not found" });

    await expect(new OpenAiClient().assertModelAvailable()).resolves.toBeUndefined();
  });
});

describe("OpenAiClient.completeJsonObject", () => {
  beforeEach(() => {
    config.model = "supported-model";
    mockModelsList.mockResolvedValue({ data: [{ id: "supported-model" }] });
  });

  it("asks for a JSON object response", async () => {
    mockChatCreate.mockResolvedValueOnce({ choices: [{ message: { content: ' {"ok":true} ' } }] });

    await expect(new OpenAiClient().completeJsonObject("sys", "user")).resolves.toBe('{"ok":true}');
    expect(mockChatCreate).toHaveBeenCalledWith({
      model: "supported-model",
      messages: [
        { role: "system", content: "sys" },
        { role: "user", content: "user" }
      ],
      response_format: { type: "json_object" }
    });
  });

  it("retries as plain chat when response_format is not supported", async () => {
    mockChatCreate
      .mockRejectedValueOnce({ status: 404, message: "response_format not found" })
      .mockResolvedValueOnce({ choices: [{ message: { content: '{"ok":true}' } }] });

    await expect(new OpenAiClient().completeJsonObject("sys", "user")).resolves.toBe('{"ok":true}');
    expect(mockChatCreate).toHaveBeenCalledTimes(2);
    expect(mockChatCreate).toHaveBeenLastCalledWith({
      model: "supported-model",
      messages: [
        { role: "system", content: "sys" },
        { role: "user", content: "user" }
      ]
    });
  });

  it("passes other failures through without retrying", async () => {
    mockChatCreate.mockRejectedValueOnce({ status: 500, message: "upstream down" });

    await expect(new OpenAiClient().completeJsonObject("sys", "user")).rejects.toMatchObject({ status: 500 });
    expect(mockChatCreate).toHaveBeenCalledTimes(1);
  });

  it("rejects empty output", async () => {
    mockChatCreate.mockResolvedValueOnce({ choices: [{ message: { content: "   " } }] });

    await expect(new OpenAiClient().completeJsonObject("sys", "user")).rejects.toThrow("LLM returned empty output.");
  });
});

describe("OpenAiClient.embed", () => {
  it("requests the configured dimensions and returns the vector", async () => {
    mockEmbeddingsCreate.mockResolvedValueOnce({ data: [{ embedding: [0.1, 0.2] }] });

    await expect(new OpenAiClient().embed("type error", 384)).resolves.toEqual([0.1, 0.2]);
    expect(mockEmbeddingsCreate).toHaveBeenCalledWith({ model: config.embeddingModel, input: "type error", dimensions: 384 });
  });

  it("throws when the endpoint returns no vector", async () => {
    mockEmbeddingsCreate.mockResolvedValueOnce({ data: [] });

    await expect(new OpenAiClient().embed("type error", 384)).rejects.toThrow("Embedding endpoint returned no vector.");
  });
});
