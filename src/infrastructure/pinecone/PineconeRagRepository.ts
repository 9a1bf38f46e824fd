/**
 * Pinecone implementation of the Retriever and VectorStore ports.
 *
 * Passage text and source are stored as record metadata; the index metric
 * (cosine or dot product) is whatever the index was created with.
 *
 * Record ids are `<source>#<chunk>`, so the chunks of a source are listed by
 * id prefix when it is replaced.
 */
import type {
  PassageRecord,
  RetrievedPassage,
  Retriever,
  VectorStore,
} from "@domain/rag/ports";
import { logger } from "@infrastructure/logging/Logger";
import { Pinecone } from "@pinecone-database/pinecone";
import { z } from "zod";

type PassageMetadata = Record<string, string | number>;

/** The slice of a Pinecone index handle used here. */
export interface PineconeIndexLike {
  query(options: {
    vector: number[];
    topK: number;
    includeMetadata: boolean;
  }): Promise<{
    matches?: Array<{ id: string; score?: number; metadata?: unknown }>;
  }>;
  upsert(
    records: Array<{ id: string; values: number[]; metadata: PassageMetadata }>
  ): Promise<void>;
  listPaginated(options: {
    prefix: string;
    paginationToken?: string;
  }): Promise<{
    vectors?: Array<{ id?: string }>;
    pagination?: { next?: string };
  }>;
  deleteMany(ids: string[]): Promise<void>;
}

const MatchMetadataSchema = z.object({
  text: z.string(),
  source: z.string(),
});

// Pinecone caps upsert requests at 2MB; batches of 100 vectors stay under it.
export const UPSERT_BATCH_SIZE = 100;
export const DELETE_BATCH_SIZE = 1000;

export function sourceIdPrefix(source: string): string {
  return `${source}#`;
}

export function createPineconeIndex(options: {
  apiKey: string;
  index: string;
  host: string;
}): PineconeIndexLike {
  const client = new Pinecone({ apiKey: options.apiKey });
  return client.index(options.index, options.host);
}

export class PineconeRagRepository implements Retriever, VectorStore {
  constructor(private readonly index: PineconeIndexLike) {}

  async search(
    queryEmbedding: number[],
    topK: number
  ): Promise<RetrievedPassage[]> {
    const response = await this.index.query({
      vector: queryEmbedding,
      topK,
      includeMetadata: true,
    });

    const passages: RetrievedPassage[] = [];

    for (const match of response.matches ?? []) {
      const metadata = MatchMetadataSchema.safeParse(match.metadata);

      if (!metadata.success) {
        logger.log("warn", "Skipping Pinecone match without passage metadata", {
          id: match.id,
        });
        continue;
      }

      passages.push({
        text: metadata.data.text,
        source: metadata.data.source,
        score: match.score ?? 0,
      });
    }

    return passages;
  }

  async replaceSource(
    source: string,
    records: PassageRecord[]
  ): Promise<string[]> {
    const previous = await this.listSourceIds(source);

    for (let start = 0; start < records.length; start += UPSERT_BATCH_SIZE) {
      const batch = records.slice(start, start + UPSERT_BATCH_SIZE);

      await this.index.upsert(
        batch.map((r) => ({
          id: r.id,
          values: r.embedding,
          metadata: {
            text: r.text,
            source: r.source,
            title: r.title,
            chunkIndex: r.chunkIndex,
          },
        }))
      );
    }

    const ids = records.map((r) => r.id);
    const written = new Set(ids);
    const stale = previous.filter((id) => !written.has(id));

    for (let start = 0; start < stale.length; start += DELETE_BATCH_SIZE) {
      await this.index.deleteMany(stale.slice(start, start + DELETE_BATCH_SIZE));
    }

    return ids;
  }

  private async listSourceIds(source: string): Promise<string[]> {
    const ids: string[] = [];
    let paginationToken: string | undefined;

    do {
      const page = await this.index.listPaginated({
        prefix: sourceIdPrefix(source),
        paginationToken,
      });

      for (const vector of page.vectors ?? []) {
        if (vector.id) {
          ids.push(vector.id);
        }
      }

      paginationToken = page.pagination?.next;
    } while (paginationToken);

    return ids;
  }
}
