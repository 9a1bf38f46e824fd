/**
 * Document ingestion HTTP controller for POST /api/documents/ingest.
 */
import type { IngestUseCase } from "@app/ingest/IngestUseCase";
import {
  IngestRequestSchema,
  IngestResponseSchema,
} from "@interfaces/http/ingest/schema";
import { parseRequest } from "@interfaces/http/validation";
import type { Request, Response } from "express";

export function createIngestController(ingest: Pick<IngestUseCase, "ingest">) {
  return async function ingestController(
    req: Request,
    res: Response
  ): Promise<void> {
    const body = parseRequest(IngestRequestSchema, req.body);

    const result = await ingest.ingest(body);

    res.json(
      IngestResponseSchema.parse({
        status: "ok",
        source: result.source,
        totalChunks: result.totalChunks,
        ids: result.ids,
      })
    );
  };
}
