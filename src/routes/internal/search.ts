import type { SearchUseCase } from "@app/search/SearchUseCase";
import { createSearchController } from "@interfaces/http/SearchController";
import { Router } from "express";

/**
 * POST /api/search { query, limit? } -> { query, results }
 */
export function searchRouter(search: Pick<SearchUseCase, "search">): Router {
  const router = Router();

  router.post("/", createSearchController(search));

  return router;
}
