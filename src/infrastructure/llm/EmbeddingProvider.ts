/**
 * OpenAI implementation of the EmbeddingService port.
 *
 * Sends a whole batch in one embeddings.create call and returns the vectors
 * in input order. Provider errors are logged and rethrown untouched so the
 * batcher can tell rate limits from rejected inputs.
 */
import type { EmbeddingService } from "@domain/llm/ports";
import { logEvent } from "@infra/logging/Logger";
import type OpenAI from "openai";

export interface OpenAIEmbeddingOptions {
  model: string;
  dimension: number;
}

export class OpenAIEmbeddingService implements EmbeddingService {
  readonly modelName: string;
  readonly dimension: number;

  constructor(
    private readonly client: OpenAI,
    options: OpenAIEmbeddingOptions
  ) {
    this.modelName = options.model;
    this.dimension = options.dimension;
  }

  async embedBatch(texts: string[]): Promise<number[][]> {
    if (texts.length === 0) {
      return [];
    }

    const startedAt = Date.now();

    try {
      const response = await this.client.embeddings.create({
        model: this.modelName,
        input: texts,
        dimensions: this.dimension,
      });

      const ordered = [...response.data].sort((a, b) => a.index - b.index);

      logEvent("EMBEDDING_SUCCESS", {
        model: this.modelName,
        durationMs: Date.now() - startedAt,
        batchSize: texts.length,
        totalTokens: response.usage?.total_tokens,
      });

      return ordered.map((item) => item.embedding);
    } catch (error: unknown) {
      logEvent("EMBEDDING_FAILURE", {
        model: this.modelName,
        durationMs: Date.now() - startedAt,
        batchSize: texts.length,
        message: error instanceof Error ? error.message : String(error),
        name: error instanceof Error ? error.name : undefined,
      });
      throw error;
    }
  }
}
