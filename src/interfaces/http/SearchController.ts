/**
 * Semantic search HTTP controller for POST /api/search.
 *
 * Exposes raw retrieval (no generation) for checking what the chat endpoint
 * would feed the model for a given query.
 */
import type { SearchUseCase } from "@app/search/SearchUseCase";
import {
  SearchRequestSchema,
  SearchResponseSchema,
} from "@interfaces/http/search/schema";
import { parseRequest } from "@interfaces/http/validation";
import type { Request, Response } from "express";

export function createSearchController(search: Pick<SearchUseCase, "search">) {
  return async function searchController(
    req: Request,
    res: Response
  ): Promise<void> {
    const body = parseRequest(SearchRequestSchema, req.body);

    const result = await search.search(body);

    res.json(SearchResponseSchema.parse(result));
  };
}
