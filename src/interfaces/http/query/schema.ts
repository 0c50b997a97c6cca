import { z } from "zod";

/**
 * Request/response DTOs for POST /query. The wire format is snake_case;
 * `history` carries earlier conversation turns, oldest first.
 */
export const QueryRequestSchema = z.object({
  query: z.string().min(1, "query is required"),
  top_k: z.number().int().positive().optional(),
  filters: z.record(z.union([z.string(), z.number(), z.boolean()])).optional(),
  history: z
    .array(
      z.object({
        role: z.enum(["user", "assistant"]),
        content: z.string().min(1, "content is required"),
      })
    )
    .max(20, "history is limited to 20 turns")
    .optional(),
});

export type QueryRequestBody = z.infer<typeof QueryRequestSchema>;

export const QueryResponseSchema = z.object({
  answer: z.string(),
  sources: z.array(
    z.object({
      chunk_id: z.string(),
      document_id: z.string(),
      score: z.number(),
    })
  ),
  cache_hit: z.boolean(),
  unsupported_by_context: z.boolean(),
  degraded: z.boolean(),
  stage: z.string().optional(),
  timings: z.object({
    embedding_ms: z.number(),
    search_ms: z.number(),
    llm_ms: z.number(),
    total_ms: z.number(),
  }),
});

export type QueryResponseBody = z.infer<typeof QueryResponseSchema>;
