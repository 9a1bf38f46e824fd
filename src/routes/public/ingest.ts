import type { IngestUseCase } from "@app/ingest/IngestUseCase";
import { createIngestController } from "@interfaces/http/IngestController";
import { Router } from "express";

export function ingestRouter(ingest: Pick<IngestUseCase, "ingest">): Router {
  const router = Router();

  router.post("/", createIngestController(ingest));

  return router;
}
