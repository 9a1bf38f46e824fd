/**
 * Composition root: builds provider adapters from AppConfig and injects them
 * into the use cases. The only module that knows which concrete vector store
 * is in use.
 */
import { ChatUseCase } from "@app/chat/ChatUseCase";
import { IngestUseCase } from "@app/ingest/IngestUseCase";
import { SearchUseCase } from "@app/search/SearchUseCase";
import type { AppConfig } from "@config/index";
import type { Retriever, VectorStore } from "@domain/rag/ports";
import { createPool } from "@infrastructure/database/db";
import { PgVectorRagRepository } from "@infrastructure/database/PgVectorRagRepository";
import { createDocsAgent } from "@infrastructure/llm/agent";
import {
  createOpenAIClient,
  OpenAIEmbedder,
} from "@infrastructure/llm/EmbeddingProvider";
import { MastraGenerator } from "@infrastructure/llm/MastraGenerator";
import {
  createPineconeIndex,
  PineconeRagRepository,
} from "@infrastructure/pinecone/PineconeRagRepository";

export interface Container {
  chat: ChatUseCase;
  ingest: IngestUseCase;
  search: SearchUseCase;
  close(): Promise<void>;
}

interface PassageStore {
  store: Retriever & VectorStore;
  close(): Promise<void>;
}

function createPassageStore(config: AppConfig): PassageStore {
  const vectorStore = config.vectorStore;

  if (vectorStore.provider === "pinecone") {
    return {
      store: new PineconeRagRepository(createPineconeIndex(vectorStore)),
      close: async () => undefined,
    };
  }

  const pool = createPool(vectorStore);
  return {
    store: new PgVectorRagRepository(pool),
    close: () => pool.end(),
  };
}

export function buildContainer(config: AppConfig): Container {
  const openai = createOpenAIClient({
    apiKey: config.openai.key,
    baseUrl: config.openai.baseUrl,
    timeoutMs: config.upstream.timeoutMs,
  });

  const embedder = new OpenAIEmbedder(openai, config.openai.embeddingModel);
  const generator = new MastraGenerator(
    createDocsAgent({
      apiKey: config.openai.key,
      baseUrl: config.openai.baseUrl,
      model: config.openai.model,
    }),
    config.openai.model
  );
  const passages = createPassageStore(config);

  return {
    chat: new ChatUseCase({
      embedder,
      retriever: passages.store,
      generator,
      rag: config.rag,
      upstream: config.upstream,
    }),
    ingest: new IngestUseCase({
      embedder,
      vectorStore: passages.store,
      chunkSize: config.ingest.chunkSize,
      upstream: config.upstream,
    }),
    search: new SearchUseCase({
      embedder,
      retriever: passages.store,
      defaultLimit: config.rag.topK,
      upstream: config.upstream,
    }),
    close: passages.close,
  };
}
