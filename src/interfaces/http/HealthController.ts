import type { VectorStore } from "@domain/rag/ports";
import type { NextFunction, Request, Response } from "express";

/** GET /health: reports the vector store backend and its record count. */
export function createHealthController(vectorStore: VectorStore) {
  return async function healthController(
    _req: Request,
    res: Response,
    next: NextFunction
  ): Promise<void> {
    try {
      const stats = await vectorStore.stats();
      res.json({
        status: "ok",
        vector_store: {
          backend: stats.backend,
          metric: stats.metric,
          dimension: stats.dimension,
          record_count: stats.recordCount,
        },
      });
    } catch (err: unknown) {
      next(err);
    }
  };
}
