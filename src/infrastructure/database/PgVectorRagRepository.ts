import type {
  PassageRecord,
  RetrievedPassage,
  Retriever,
  VectorStore,
} from "@domain/rag/ports";
import { z } from "zod";

/**
 * Postgres + pgvector implementation of the Retriever and VectorStore ports.
 *
 * Passages live in a single `passages` table (see sql/schema.sql). Scores
 * are cosine similarities, `1 - (embedding <=> query)`, so higher is closer.
 */

/** The slice of pg's Pool/Client used here. */
export interface SqlExecutor {
  query(text: string, values?: unknown[]): Promise<{ rows: unknown[] }>;
}

/** A pooled connection, held for the length of a transaction. */
export interface SqlClient extends SqlExecutor {
  release(): void;
}

export interface SqlPool extends SqlExecutor {
  connect(): Promise<SqlClient>;
}

const PassageRowSchema = z.object({
  content: z.string(),
  source: z.string(),
  score: z.coerce.number(),
});

const IdRowSchema = z.object({ id: z.string() });

export const SEARCH_SQL = `
  SELECT
    content,
    source,
    1 - (embedding <=> $1::vector) AS score
  FROM passages
  ORDER BY embedding <=> $1::vector ASC
  LIMIT $2;
`;

export const DELETE_SOURCE_SQL = `DELETE FROM passages WHERE source = $1;`;

const UPSERT_COLUMNS = 6;

export function toPgVectorLiteral(vector: number[]): string {
  if (vector.length === 0) {
    throw new Error("Cannot store an empty vector");
  }

  if (!vector.every((v) => Number.isFinite(v))) {
    throw new Error("Vector contains a non-finite value");
  }

  return `[${vector.join(",")}]`;
}

export function buildUpsertSql(count: number): string {
  const tuples = Array.from({ length: count }, (_, row) => {
    const base = row * UPSERT_COLUMNS;
    const params = Array.from(
      { length: UPSERT_COLUMNS },
      (_, col) => `$${base + col + 1}`
    );
    params[UPSERT_COLUMNS - 1] = `${params[UPSERT_COLUMNS - 1]}::vector`;
    return `(${params.join(", ")})`;
  });

  return `
  INSERT INTO passages (id, source, title, chunk_index, content, embedding)
  VALUES ${tuples.join(",\n    ")}
  ON CONFLICT (id) DO UPDATE SET
    source = EXCLUDED.source,
    title = EXCLUDED.title,
    chunk_index = EXCLUDED.chunk_index,
    content = EXCLUDED.content,
    embedding = EXCLUDED.embedding
  RETURNING id;
`;
}

export class PgVectorRagRepository implements Retriever, VectorStore {
  constructor(private readonly db: SqlPool) {}

  async search(
    queryEmbedding: number[],
    topK: number
  ): Promise<RetrievedPassage[]> {
    const result = await this.db.query(SEARCH_SQL, [
      toPgVectorLiteral(queryEmbedding),
      topK,
    ]);

    return result.rows.map((row) => {
      const parsed = PassageRowSchema.parse(row);
      return { text: parsed.content, source: parsed.source, score: parsed.score };
    });
  }

  async replaceSource(
    source: string,
    records: PassageRecord[]
  ): Promise<string[]> {
    const values = records.flatMap((r) => [
      r.id,
      r.source,
      r.title,
      r.chunkIndex,
      r.text,
      toPgVectorLiteral(r.embedding),
    ]);

    const client = await this.db.connect();

    try {
      await client.query("BEGIN");
      await client.query(DELETE_SOURCE_SQL, [source]);

      let ids: string[] = [];
      if (records.length > 0) {
        const result = await client.query(buildUpsertSql(records.length), values);
        ids = result.rows.map((row) => IdRowSchema.parse(row).id);
      }

      await client.query("COMMIT");
      return ids;
    } catch (error: unknown) {
      await client.query("ROLLBACK");
      throw error;
    } finally {
      client.release();
    }
  }
}
