import { z } from "zod";

/**
 * Wire format of the document ingestion endpoint.
 */
export const IngestRequestSchema = z.object({
  source: z.string().trim().min(1),
  title: z.string().trim().min(1).optional(),
  content: z.string().min(1),
});

export const IngestResponseSchema = z.object({
  status: z.literal("ok"),
  source: z.string(),
  totalChunks: z.number().int().nonnegative(),
  ids: z.array(z.string()),
});
