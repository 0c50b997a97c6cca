import type { IngestionCoordinator } from "@app/ingest/IngestionCoordinator";
import { createIngestController } from "@interfaces/http/IngestController";
import { Router } from "express";

export function createIngestRouter(coordinator: IngestionCoordinator): Router {
  const router = Router();
  const controller = createIngestController(coordinator);

  router.post("/events", controller.objectCreated);
  router.post("/documents", controller.upload);
  router.get("/documents/:documentId/status", controller.status);
  router.post("/documents/:documentId/resume", controller.resume);

  return router;
}
