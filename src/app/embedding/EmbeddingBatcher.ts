/**
 * Batched, retried access to the embedding service.
 *
 * Items are grouped into batches of at most `maxBatchSize` and batches run
 * with bounded parallelism. Transient failures retry the whole batch with
 * backoff; when retries run out the call rejects with EmbeddingUnavailable.
 * Permanent input failures are narrowed down by bisecting the batch so only
 * the offending items are reported and their siblings still get vectors.
 */
import type { EmbeddingService } from "@domain/llm/ports";
import { logEvent } from "@infra/logging/Logger";
import {
  DimensionMismatch,
  EmbeddingUnavailable,
  ValidationError,
  errorMessage,
  isAppError,
} from "@typesLocal/AppError";
import { mapWithConcurrency } from "@utils/concurrency";
import {
  isPermanentInputError,
  isRetryableError,
  withRetry,
} from "@utils/retry";

export interface EmbeddingItem {
  id: string;
  text: string;
}

export interface EmbeddingVector {
  id: string;
  vector: number[];
  modelName: string;
  dimension: number;
}

export interface EmbeddingItemError {
  index: number;
  id: string;
  reason: string;
}

export interface EmbeddingBatchResult {
  /** Aligned with the input; undefined where the item failed. */
  vectors: Array<EmbeddingVector | undefined>;
  errors: EmbeddingItemError[];
}

export interface EmbeddingBatcherOptions {
  maxBatchSize: number;
  concurrency: number;
  maxRetries: number;
  baseDelayMs: number;
  maxDelayMs: number;
  maxInputChars: number;
  sleep?: (ms: number) => Promise<void>;
  random?: () => number;
}

export class EmbeddingBatcher {
  constructor(
    private readonly service: EmbeddingService,
    private readonly options: EmbeddingBatcherOptions
  ) {}

  get modelName(): string {
    return this.service.modelName;
  }

  get dimension(): number {
    return this.service.dimension;
  }

  async embed(items: EmbeddingItem[]): Promise<EmbeddingBatchResult> {
    const vectors: Array<EmbeddingVector | undefined> = new Array(items.length).fill(undefined);
    const errors: EmbeddingItemError[] = [];
    const accepted: number[] = [];

    items.forEach((item, index) => {
      const rejection = this.rejectLocally(item);
      if (rejection) {
        errors.push({ index, id: item.id, reason: rejection });
      } else {
        accepted.push(index);
      }
    });

    const batches: number[][] = [];
    for (let i = 0; i < accepted.length; i += this.options.maxBatchSize) {
      batches.push(accepted.slice(i, i + this.options.maxBatchSize));
    }

    const startedAt = Date.now();

    await mapWithConcurrency(batches, this.options.concurrency, (batch) =>
      this.embedIndices(batch, items, vectors, errors)
    );

    errors.sort((a, b) => a.index - b.index);

    logEvent("EMBEDDING_BATCH_COMPLETE", {
      model: this.service.modelName,
      durationMs: Date.now() - startedAt,
      items: items.length,
      batches: batches.length,
      failedItems: errors.length,
    });

    return { vectors, errors };
  }

  /** Embeds a single text; a permanent rejection surfaces as a ValidationError. */
  async embedOne(text: string): Promise<number[]> {
    const { vectors, errors } = await this.embed([{ id: "query", text }]);
    const first = vectors[0];

    if (!first) {
      throw new ValidationError(errors[0]?.reason ?? "Text could not be embedded", {
        stage: "embedding",
      });
    }

    return first.vector;
  }

  private rejectLocally(item: EmbeddingItem): string | undefined {
    if (!item.text.trim()) {
      return "empty input";
    }
    if (item.text.length > this.options.maxInputChars) {
      return `input exceeds ${this.options.maxInputChars} characters`;
    }
    return undefined;
  }

  private async embedIndices(
    indices: number[],
    items: EmbeddingItem[],
    vectors: Array<EmbeddingVector | undefined>,
    errors: EmbeddingItemError[]
  ): Promise<void> {
    const batch = indices.flatMap((index) => {
      const item = items[index];
      return item ? [item] : [];
    });

    let raw: number[][];
    try {
      raw = await withRetry(
        () => this.service.embedBatch(batch.map((item) => item.text)),
        {
          operation: "embeddings.batch",
          maxRetries: this.options.maxRetries,
          baseDelayMs: this.options.baseDelayMs,
          maxDelayMs: this.options.maxDelayMs,
          sleep: this.options.sleep,
          random: this.options.random,
        }
      );
    } catch (error: unknown) {
      if (isAppError(error) && !error.retryable) {
        throw error;
      }

      if (!isRetryableError(error) && isPermanentInputError(error)) {
        await this.isolate(indices, items, vectors, errors, error);
        return;
      }

      logEvent("EMBEDDING_BATCH_FAILURE", {
        model: this.service.modelName,
        batchSize: batch.length,
        message: errorMessage(error),
      });

      throw new EmbeddingUnavailable(
        `Embedding service unavailable: ${errorMessage(error)}`,
        batch,
        error
      );
    }

    if (raw.length !== batch.length) {
      throw new EmbeddingUnavailable(
        `Embedding service returned ${raw.length} vectors for ${batch.length} inputs`,
        batch
      );
    }

    raw.forEach((vector, position) => {
      const index = indices[position];
      const item = batch[position];
      if (index === undefined || !item) {
        return;
      }
      if (vector.length !== this.service.dimension) {
        throw new DimensionMismatch(this.service.dimension, vector.length, "embedding");
      }
      vectors[index] = {
        id: item.id,
        vector,
        modelName: this.service.modelName,
        dimension: vector.length,
      };
    });
  }

  private async isolate(
    indices: number[],
    items: EmbeddingItem[],
    vectors: Array<EmbeddingVector | undefined>,
    errors: EmbeddingItemError[],
    error: unknown
  ): Promise<void> {
    const [only] = indices;
    if (indices.length === 1 && only !== undefined) {
      errors.push({
        index: only,
        id: items[only]?.id ?? String(only),
        reason: errorMessage(error),
      });
      return;
    }

    const middle = Math.ceil(indices.length / 2);
    await this.embedIndices(indices.slice(0, middle), items, vectors, errors);
    await this.embedIndices(indices.slice(middle), items, vectors, errors);
  }
}
