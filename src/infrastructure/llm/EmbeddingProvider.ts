/**
 * OpenAI-backed Embedder.
 *
 * Timeouts and retries are applied by the use cases, so the SDK client is
 * created with its own retries disabled.
 */
import type { Embedder } from "@domain/rag/ports";
import { logEvent } from "@infrastructure/logging/Logger";
import OpenAI from "openai";

/** The slice of the OpenAI SDK this adapter calls. */
export interface EmbeddingsApi {
  embeddings: {
    create(body: {
      model: string;
      input: string | string[];
    }): Promise<{ data: Array<{ embedding: number[]; index: number }> }>;
  };
}

export interface OpenAIClientOptions {
  apiKey: string;
  baseUrl?: string;
  timeoutMs: number;
}

export function createOpenAIClient(options: OpenAIClientOptions): OpenAI {
  return new OpenAI({
    apiKey: options.apiKey,
    baseURL: options.baseUrl,
    timeout: options.timeoutMs,
    maxRetries: 0,
  });
}

export class OpenAIEmbedder implements Embedder {
  constructor(
    private readonly client: EmbeddingsApi,
    private readonly model: string
  ) {}

  async embed(text: string): Promise<number[]> {
    const [vector] = await this.request(text.trim(), 1);
    if (!vector) {
      throw new Error("Embedding API returned no vector");
    }
    return vector;
  }

  async embedBatch(texts: string[]): Promise<number[][]> {
    if (texts.length === 0) {
      return [];
    }
    return this.request(texts, texts.length);
  }

  private async request(
    input: string | string[],
    expected: number
  ): Promise<number[][]> {
    const startedAt = Date.now();

    try {
      const response = await this.client.embeddings.create({
        model: this.model,
        input,
      });

      const vectors = [...response.data]
        .sort((a, b) => a.index - b.index)
        .map((item) => item.embedding);

      if (vectors.length !== expected || vectors.some((v) => !v.length)) {
        throw new Error("Embedding API returned invalid data");
      }

      logEvent("EMBEDDING_SUCCESS", {
        model: this.model,
        durationMs: Date.now() - startedAt,
        batchSize: expected,
        vectorLength: vectors[0]?.length ?? 0,
      });

      return vectors;
    } catch (error: unknown) {
      logEvent("EMBEDDING_FAILURE", {
        model: this.model,
        durationMs: Date.now() - startedAt,
        batchSize: expected,
        message: error instanceof Error ? error.message : String(error),
      });
      throw error;
    }
  }
}
