import OpenAI from "openai";
import { config } from "../config";

export interface LlmLike {
  completeJsonObject(system: string, user: string): Promise<string>;
}

export interface EmbeddingClientLike {
  embed(text: string, dimensions: number): Promise<number[]>;
}

const statusOf = (error: unknown): number | undefined => {
  if (typeof error !== "object" || error === null || !("status" in error)) return undefined;
  return typeof error.status === "number" ? error.status : undefined;
};

export class OpenAiClient implements LlmLike, EmbeddingClientLike {
  private readonly client: OpenAI;
  private modelValidationPromise?: Promise<void>;

  constructor(client?: OpenAI) {
    this.client =
      client ??
      new OpenAI({
        apiKey: config.openaiApiKey,
        baseURL: config.openaiBaseUrl
      });
  }

  private static isNotFoundError(error: unknown): boolean {
    if (statusOf(error) === 404) return true;
    const message = error instanceof Error ? error.message : String(error);
    return /not found/i.test(message);
  }

  private static isModelsListUnsupportedError(error: unknown): boolean {
    const status = statusOf(error);
    if (status === 404 || status === 405 || status === 501) {
      return true;
    }
    const message = error instanceof Error ? error.message : String(error);
    return /models?.*(not found|unsupported)|unsupported.*models?/i.test(message);
  }

  private async runModelValidation(): Promise<void> {
    let modelIds: string[];
    try {
      const response = await this.client.models.list();
      modelIds = response.data.map((item) => item.id.trim()).filter(Boolean);
    } catch (error: unknown) {
      if (OpenAiClient.isModelsListUnsupportedError(error)) {
        return;
      }
      throw error;
    }

    if (modelIds.length === 0 || modelIds.includes(config.model)) {
      return;
    }

    const sample = modelIds.slice(0, 8).join(", ");
    throw new Error(`Configured OPENAI_MODEL "${config.model}" is not in provider model list. Available models (sample): ${sample}`);
  }

  async assertModelAvailable(): Promise<void> {
    if (!this.modelValidationPromise) {
      this.modelValidationPromise = this.runModelValidation();
    }
    return this.modelValidationPromise;
  }

  private async completeWithChat(
    system: string,
    user: string,
    options?: { response_format?: { type: "json_object" } }
  ): Promise<string> {
    const response = await this.client.chat.completions.create({
      model: config.model,
      messages: [
        { role: "system", content: system },
        { role: "user", content: user }
      ],
      ...(options?.response_format ? { response_format: options.response_format } : {})
    });

    const text = response.choices[0]?.message?.content?.trim();
    if (!text) {
      throw new Error("LLM returned empty output.");
    }
    return text;
  }

  async completeJsonObject(system: string, user: string): Promise<string> {
    await this.assertModelAvailable();

    try {
      return await this.completeWithChat(system, user, {
        response_format: { type: "json_object" }
      });
    } catch (error: unknown) {
      if (!OpenAiClient.isNotFoundError(error)) {
        throw error;
      }
    }

    // some compatible servers reject response_format; retry as plain chat
    return this.completeWithChat(system, user);
  }

  async embed(text: string, dimensions: number): Promise<number[]> {
    const response = await this.client.embeddings.create({
      model: config.embeddingModel,
      input: text,
      dimensions
    });

    const vector = response.data[0]?.embedding;
    if (!vector || vector.length === 0) {
      throw new Error("Embedding endpoint returned no vector.");
    }
    return vector;
  }
}
