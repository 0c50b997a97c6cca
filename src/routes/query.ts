import type { QueryOrchestrator } from "@app/query/QueryOrchestrator";
import { createQueryController } from "@interfaces/http/QueryController";
import { Router } from "express";

export function createQueryRouter(orchestrator: QueryOrchestrator): Router {
  const router = Router();
  router.post("/", createQueryController(orchestrator));
  return router;
}
