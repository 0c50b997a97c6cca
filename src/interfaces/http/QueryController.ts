/**
 * HTTP boundary for POST /query.
 *
 * Validates the snake_case body, runs the query pipeline and maps the result
 * back to the wire format. Errors go to the global error handler.
 */
import type { QueryOrchestrator, QueryResponse } from "@app/query/QueryOrchestrator";
import {
  QueryRequestSchema,
  type QueryResponseBody,
} from "@interfaces/http/query/schema";
import { parseInput } from "@interfaces/http/validation";
import type { NextFunction, Request, Response } from "express";

export function toQueryResponseBody(response: QueryResponse): QueryResponseBody {
  return {
    answer: response.answer,
    sources: response.sources.map((source) => ({
      chunk_id: source.chunkId,
      document_id: source.documentId,
      score: source.score,
    })),
    cache_hit: response.cacheHit,
    unsupported_by_context: response.unsupportedByContext,
    degraded: response.degraded,
    ...(response.stage ? { stage: response.stage } : {}),
    timings: {
      embedding_ms: response.timings.embeddingMs,
      search_ms: response.timings.searchMs,
      llm_ms: response.timings.generationMs,
      total_ms: response.timings.totalMs,
    },
  };
}

export function createQueryController(orchestrator: QueryOrchestrator) {
  return async function queryController(
    req: Request,
    res: Response,
    next: NextFunction
  ): Promise<void> {
    try {
      const body = parseInput(QueryRequestSchema, req.body);

      const response = await orchestrator.answer({
        query: body.query,
        topK: body.top_k,
        filters: body.filters,
        history: body.history,
      });

      res.json(toQueryResponseBody(response));
    } catch (err: unknown) {
      next(err);
    }
  };
}
