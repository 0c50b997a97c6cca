import type { VectorStore } from "@domain/rag/ports";
import { createHealthController } from "@interfaces/http/HealthController";
import { Router } from "express";

export function createHealthRouter(vectorStore: VectorStore): Router {
  const router = Router();
  router.get("/", createHealthController(vectorStore));
  return router;
}
