/**
 * Domain ports for the retrieval-augmented generation pipeline.
 *
 * Use cases depend only on these interfaces; concrete adapters live under
 * src/infrastructure and are wired together in the composition root, so
 * tests can substitute deterministic fakes.
 */

/** A passage returned by vector search, ranked by `score` (higher is closer). */
export interface RetrievedPassage {
  text: string;
  source: string;
  score: number;
}

/** A chunk ready to be written to the vector index. */
export interface PassageRecord {
  id: string;
  source: string;
  title: string;
  chunkIndex: number;
  text: string;
  embedding: number[];
}

export type PromptRole = "system" | "user" | "assistant";

export interface PromptMessage {
  role: PromptRole;
  content: string;
}

export type Prompt = PromptMessage[];

export interface Embedder {
  embed(text: string): Promise<number[]>;
  embedBatch(texts: string[]): Promise<number[][]>;
}

export interface Retriever {
  search(queryEmbedding: number[], topK: number): Promise<RetrievedPassage[]>;
}

export interface VectorStore {
  /**
   * Makes `records` the only passages stored for `source`: chunks from an
   * earlier ingest of the same source that are not in `records` are removed.
   * Returns the ids written.
   */
  replaceSource(source: string, records: PassageRecord[]): Promise<string[]>;
}

export interface Generator {
  generate(prompt: Prompt): Promise<string>;
}
