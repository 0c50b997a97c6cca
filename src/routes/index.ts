/**
 * Express route registration.
 *
 * - GET  /health: vector store status
 * - POST /query: retrieval-augmented answers
 * - /ingest/*: object events, uploads, status and resume
 */
import type { IngestionCoordinator } from "@app/ingest/IngestionCoordinator";
import type { QueryOrchestrator } from "@app/query/QueryOrchestrator";
import type { VectorStore } from "@domain/rag/ports";
import { createHealthRouter } from "@routes/health";
import { createIngestRouter } from "@routes/ingest";
import { createQueryRouter } from "@routes/query";
import type { Express } from "express";

export interface RouteDeps {
  coordinator: IngestionCoordinator;
  orchestrator: QueryOrchestrator;
  vectorStore: VectorStore;
}

export function registerRoutes(app: Express, deps: RouteDeps): void {
  app.use("/health", createHealthRouter(deps.vectorStore));
  app.use("/query", createQueryRouter(deps.orchestrator));
  app.use("/ingest", createIngestRouter(deps.coordinator));
}
