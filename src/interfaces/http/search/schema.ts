import { MAX_SEARCH_LIMIT } from "@app/search/SearchUseCase";
import { z } from "zod";

export const SearchRequestSchema = z.object({
  query: z.string().trim().min(1),
  limit: z.number().int().min(1).max(MAX_SEARCH_LIMIT).optional(),
});

export const SearchResponseSchema = z.object({
  query: z.string(),
  results: z.array(
    z.object({
      text: z.string(),
      source: z.string(),
      score: z.number(),
    })
  ),
});
