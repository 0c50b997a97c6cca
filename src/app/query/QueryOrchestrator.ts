/**
 * Query pipeline: cache → embed → retrieve → assemble context → generate → cache.
 *
 * The cache key is built from the normalized query text, top_k, the model
 * versions, any filters and the conversation history; the original casing is
 * what gets embedded. Each response reports how long every stage took.
 * A request past its deadline is abandoned at the next stage boundary and
 * nothing from it is cached. When generation keeps failing the response is
 * degraded (sources, no answer) and also not cached.
 */
import type { EmbeddingBatcher } from "@app/embedding/EmbeddingBatcher";
import { isLive, type CacheEntry, type CacheStore } from "@domain/cache/ports";
import type {
  ConversationTurn,
  GenerationPort,
  GenerationRequest,
} from "@domain/llm/ports";
import type { VectorFilters, VectorMatch, VectorStore } from "@domain/rag/ports";
import { logEvent, logger } from "@infra/logging/Logger";
import {
  GenerationFailure,
  QueryTimeout,
  ValidationError,
  errorMessage,
  type PipelineStage,
} from "@typesLocal/AppError";
import { sha256Hex } from "@utils/hash";

export interface QueryRequest {
  query: string;
  topK?: number | undefined;
  filters?: VectorFilters | undefined;
  /** Earlier turns of the conversation, oldest first. */
  history?: ConversationTurn[] | undefined;
}

export interface QuerySource {
  chunkId: string;
  documentId: string;
  score: number;
}

/** Wall-clock milliseconds per stage; zero for stages a cache hit skips. */
export interface QueryTimings {
  embeddingMs: number;
  searchMs: number;
  generationMs: number;
  totalMs: number;
}

export interface QueryResponse {
  answer: string;
  sources: QuerySource[];
  cacheHit: boolean;
  /** No passage was retrieved; the answer is not grounded in any document. */
  unsupportedByContext: boolean;
  degraded: boolean;
  /** Stage that failed when the response is degraded. */
  stage?: PipelineStage | undefined;
  timings: QueryTimings;
}

export interface QueryOrchestratorOptions {
  topK: number;
  maxTopK: number;
  /** Matches scoring below this are dropped; 0 or less disables the filter. */
  minScore: number;
  contextBudgetChars: number;
  timeoutMs: number;
  maxQueryChars: number;
  /** Extra generation attempts after the first failure. */
  generationRetries: number;
  cacheTtlMs: number;
}

export interface QueryOrchestratorDeps {
  batcher: EmbeddingBatcher;
  vectorStore: VectorStore;
  cache: CacheStore;
  generator: GenerationPort;
  options: QueryOrchestratorOptions;
  now?: () => number;
}

export const DEGRADED_ANSWER =
  "Relevant passages were retrieved, but the answer could not be generated. The sources are listed below.";

export const DEGRADED_ANSWER_NO_CONTEXT =
  "No relevant passages were found and the answer could not be generated.";

export function normalizeQuery(query: string): string {
  return query.trim().replace(/\s+/g, " ").toLowerCase();
}

export function cacheKeyFor(input: {
  normalizedQuery: string;
  topK: number;
  modelVersion: string;
  filters?: VectorFilters | undefined;
  history?: ConversationTurn[] | undefined;
}): string {
  const filters = input.filters
    ? JSON.stringify(
        Object.keys(input.filters)
          .sort()
          .map((field) => [field, input.filters?.[field]])
      )
    : "";
  const history = input.history?.length
    ? JSON.stringify(input.history.map((turn) => [turn.role, turn.content]))
    : "";

  return sha256Hex(
    [input.normalizedQuery, String(input.topK), input.modelVersion, filters, history].join(
      "\u0000"
    )
  );
}

/** Numbered passages in rank order, cut to the character budget. */
export function assembleContext(matches: VectorMatch[], budgetChars: number): string {
  return matches
    .map((match, index) => {
      const text = match.metadata.text;
      return `[${index + 1}] ${typeof text === "string" ? text : ""}`;
    })
    .join("\n\n")
    .slice(0, budgetChars);
}

export class QueryOrchestrator {
  private readonly now: () => number;

  constructor(private readonly deps: QueryOrchestratorDeps) {
    this.now = deps.now ?? Date.now;
  }

  get modelVersion(): string {
    return `${this.deps.batcher.modelName}|${this.deps.generator.modelName}`;
  }

  async answer(request: QueryRequest): Promise<QueryResponse> {
    const { options } = this.deps;
    const query = request.query.trim();
    const topK = request.topK ?? options.topK;
    const history = request.history ?? [];

    if (!query) {
      throw new ValidationError("query must not be empty");
    }
    if (query.length > options.maxQueryChars) {
      throw new ValidationError(
        `query exceeds ${options.maxQueryChars} characters`,
        { length: query.length }
      );
    }
    if (!Number.isInteger(topK) || topK < 1 || topK > options.maxTopK) {
      throw new ValidationError(`top_k must be an integer between 1 and ${options.maxTopK}`, {
        topK,
      });
    }

    const startedAt = this.now();
    const deadline = startedAt + options.timeoutMs;
    const checkDeadline = (stage: PipelineStage) => {
      if (this.now() >= deadline) {
        logEvent("QUERY_TIMEOUT", { stage, timeoutMs: options.timeoutMs });
        throw new QueryTimeout(options.timeoutMs, stage);
      }
    };

    const normalizedQuery = normalizeQuery(query);
    const cacheKey = cacheKeyFor({
      normalizedQuery,
      topK,
      modelVersion: this.modelVersion,
      filters: request.filters,
      history,
    });

    const cached = await this.readCache(cacheKey);
    if (cached) {
      logEvent("QUERY_CACHE_HIT", { cacheKey, topK });
      return {
        answer: cached.answer,
        sources: cached.sources,
        cacheHit: true,
        unsupportedByContext: cached.unsupportedByContext,
        degraded: false,
        timings: { embeddingMs: 0, searchMs: 0, generationMs: 0, totalMs: this.now() - startedAt },
      };
    }

    const embeddingStartedAt = this.now();
    const vector = await this.deps.batcher.embedOne(query);
    const searchStartedAt = this.now();
    checkDeadline("embedding");

    const matches = (await this.deps.vectorStore.search(vector, topK, request.filters)).filter(
      (match) => options.minScore <= 0 || match.score >= options.minScore
    );
    const generationStartedAt = this.now();
    checkDeadline("retrieval");

    const sources: QuerySource[] = matches.map((match) => ({
      chunkId: match.id,
      documentId: String(match.metadata.document_id ?? ""),
      score: match.score,
    }));
    const context = assembleContext(matches, options.contextBudgetChars);
    const unsupportedByContext = matches.length === 0;

    const timings = (): QueryTimings => {
      const finishedAt = this.now();
      return {
        embeddingMs: searchStartedAt - embeddingStartedAt,
        searchMs: generationStartedAt - searchStartedAt,
        generationMs: finishedAt - generationStartedAt,
        totalMs: finishedAt - startedAt,
      };
    };

    let answer: string;
    try {
      answer = await this.generate({ query, context, history }, checkDeadline);
    } catch (error: unknown) {
      if (error instanceof QueryTimeout) {
        throw error;
      }
      checkDeadline("generation");

      logEvent("QUERY_DEGRADED", {
        stage: "generation",
        sources: sources.length,
        message: errorMessage(error),
      });
      return {
        answer: unsupportedByContext ? DEGRADED_ANSWER_NO_CONTEXT : DEGRADED_ANSWER,
        sources,
        cacheHit: false,
        unsupportedByContext,
        degraded: true,
        stage: "generation",
        timings: timings(),
      };
    }
    checkDeadline("generation");

    const elapsed = timings();
    const createdAt = this.now();
    await this.writeCache({
      cacheKey,
      queryTextNormalized: normalizedQuery,
      topK,
      answer,
      sources,
      retrievedChunkIds: sources.map((source) => source.chunkId),
      unsupportedByContext,
      createdAt,
      expiresAt: createdAt + options.cacheTtlMs,
    });

    logEvent("QUERY_ANSWERED", {
      topK,
      matches: matches.length,
      contextLength: context.length,
      historyCount: history.length,
      ...elapsed,
    });

    return {
      answer,
      sources,
      cacheHit: false,
      unsupportedByContext,
      degraded: false,
      timings: elapsed,
    };
  }

  private async generate(
    request: GenerationRequest,
    checkDeadline: (stage: PipelineStage) => void
  ): Promise<string> {
    const attempts = this.deps.options.generationRetries + 1;
    let lastError: unknown;

    for (let attempt = 1; attempt <= attempts; attempt++) {
      try {
        return await this.deps.generator.generate(request);
      } catch (error: unknown) {
        lastError = error;
        if (attempt < attempts) {
          checkDeadline("generation");
          logger.log("warn", "RETRY", {
            operation: "generate",
            attempt,
            message: errorMessage(error),
          });
        }
      }
    }

    throw new GenerationFailure(
      `Generation failed after ${attempts} attempt(s): ${errorMessage(lastError)}`,
      lastError
    );
  }

  private async readCache(cacheKey: string): Promise<CacheEntry | undefined> {
    try {
      const entry = await this.deps.cache.get(cacheKey);
      return entry && isLive(entry, this.now()) ? entry : undefined;
    } catch (error: unknown) {
      logger.log("warn", "Cache read failed; treating as miss", {
        cacheKey,
        message: errorMessage(error),
      });
      return undefined;
    }
  }

  private async writeCache(entry: CacheEntry): Promise<void> {
    try {
      await this.deps.cache.put(entry, this.deps.options.cacheTtlMs);
    } catch (error: unknown) {
      logger.log("warn", "Cache write failed", {
        cacheKey: entry.cacheKey,
        message: errorMessage(error),
      });
    }
  }
}
