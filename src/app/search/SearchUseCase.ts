/**
 * Raw semantic search: embed a query and return the ranked passages without
 * generating an answer. Used to inspect retrieval quality.
 */
import type { UpstreamPolicy } from "@config/index";
import type { Embedder, RetrievedPassage, Retriever } from "@domain/rag/ports";
import { rankPassages } from "@domain/rag/ragEngine";
import { logEvent } from "@infrastructure/logging/Logger";
import { ValidationError } from "@middleware/errorHandler";
import { callUpstream } from "@utils/retry";

export const MAX_SEARCH_LIMIT = 50;

export interface SemanticSearchRequest {
  query: string;
  limit?: number;
}

export interface SemanticSearchResponse {
  query: string;
  results: RetrievedPassage[];
}

export interface SearchUseCaseDeps {
  embedder: Embedder;
  retriever: Retriever;
  defaultLimit: number;
  upstream: UpstreamPolicy;
}

export class SearchUseCase {
  constructor(private readonly deps: SearchUseCaseDeps) {}

  async search(input: SemanticSearchRequest): Promise<SemanticSearchResponse> {
    const normalized = input.query?.trim();

    if (!normalized) {
      throw new ValidationError("query is required");
    }

    const limit = Math.min(input.limit ?? this.deps.defaultLimit, MAX_SEARCH_LIMIT);
    if (!Number.isInteger(limit) || limit < 1) {
      throw new ValidationError("limit must be a positive integer");
    }

    const { embedder, retriever, upstream } = this.deps;

    const embedding = await callUpstream("embed", upstream, () =>
      embedder.embed(normalized)
    );
    const results = rankPassages(
      await callUpstream("retrieve", upstream, () =>
        retriever.search(embedding, limit)
      )
    );

    logEvent("RAG_SEMANTIC_SEARCH", { limit, returned: results.length });

    return { query: normalized, results };
  }
}
