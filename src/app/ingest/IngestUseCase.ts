/**
 * Document ingestion for the retrieval index.
 *
 * Markdown is rendered and reduced to plain text, split into chunks on
 * paragraph boundaries, embedded in a single batch call and written to the
 * vector store. Chunk ids are derived from the source and chunk position.
 * Ingesting the same source again replaces all of its chunks, including
 * ones beyond the new chunk count.
 */
import type { UpstreamPolicy } from "@config/index";
import type { Embedder, PassageRecord, VectorStore } from "@domain/rag/ports";
import { logEvent } from "@infrastructure/logging/Logger";
import { ValidationError } from "@middleware/errorHandler";
import { callUpstream } from "@utils/retry";
import MarkdownIt from "markdown-it";

export const MAX_DOCUMENT_BYTES = 5 * 1024 * 1024;

const md = new MarkdownIt();

const BLOCK_END = /<\/(p|h[1-6]|li|pre|blockquote|tr|table|ul|ol)>/g;

const ENTITIES: Array<[RegExp, string]> = [
  [/&lt;/g, "<"],
  [/&gt;/g, ">"],
  [/&quot;/g, '"'],
  [/&#39;/g, "'"],
  [/&amp;/g, "&"],
];

export interface IngestDocument {
  source: string;
  title?: string;
  content: string;
}

export interface IngestResult {
  source: string;
  totalChunks: number;
  ids: string[];
}

export interface IngestUseCaseDeps {
  embedder: Embedder;
  vectorStore: VectorStore;
  chunkSize: number;
  upstream: UpstreamPolicy;
}

export function normalizeMarkdown(raw: string): string {
  let text = md
    .render(raw)
    .replace(BLOCK_END, "\n\n")
    .replace(/<br\s*\/?>/g, "\n")
    .replace(/<[^>]+>/g, "");

  for (const [pattern, replacement] of ENTITIES) {
    text = text.replace(pattern, replacement);
  }

  return text
    .replace(/[ \t]+\n/g, "\n")
    .replace(/\n{3,}/g, "\n\n")
    .trim();
}

function sliceParagraph(paragraph: string, maxLen: number): string[] {
  const slices: string[] = [];
  for (let start = 0; start < paragraph.length; start += maxLen) {
    const slice = paragraph.slice(start, start + maxLen).trim();
    if (slice) {
      slices.push(slice);
    }
  }
  return slices;
}

/**
 * Packs consecutive paragraphs into chunks of at most `maxLen` characters.
 * A paragraph longer than `maxLen` is cut into fixed-size slices.
 */
export function chunkText(text: string, maxLen = 800): string[] {
  const paragraphs = text
    .split(/\n{2,}/)
    .map((p) => p.trim())
    .filter(Boolean);

  const chunks: string[] = [];
  let current = "";

  for (const p of paragraphs) {
    if (p.length > maxLen) {
      if (current) {
        chunks.push(current);
        current = "";
      }
      chunks.push(...sliceParagraph(p, maxLen));
      continue;
    }

    if (!current) {
      current = p;
    } else if (current.length + 2 + p.length <= maxLen) {
      current = `${current}\n\n${p}`;
    } else {
      chunks.push(current);
      current = p;
    }
  }

  if (current) {
    chunks.push(current);
  }

  return chunks;
}

export class IngestUseCase {
  constructor(private readonly deps: IngestUseCaseDeps) {}

  async ingest(document: IngestDocument): Promise<IngestResult> {
    const source = document.source?.trim();

    if (!source) {
      throw new ValidationError("source is required");
    }

    if (!document.content || !document.content.trim()) {
      throw new ValidationError("content is required");
    }

    if (Buffer.byteLength(document.content, "utf-8") > MAX_DOCUMENT_BYTES) {
      throw new ValidationError("Document too large (max 5MB)");
    }

    const { embedder, vectorStore, chunkSize, upstream } = this.deps;
    const title = document.title?.trim() || source;
    const chunks = chunkText(normalizeMarkdown(document.content), chunkSize);

    if (chunks.length === 0) {
      logEvent("INGEST_SKIPPED", { source, reason: "No text after normalization" });
      return { source, totalChunks: 0, ids: [] };
    }

    const startedAt = Date.now();

    const embeddings = await callUpstream("embed", upstream, async () => {
      const vectors = await embedder.embedBatch(chunks);
      if (vectors.length !== chunks.length) {
        throw new Error(
          `Expected ${chunks.length} embeddings, received ${vectors.length}`
        );
      }
      return vectors;
    });

    const records: PassageRecord[] = chunks.map((text, chunkIndex) => ({
      id: `${source}#${chunkIndex}`,
      source,
      title,
      chunkIndex,
      text,
      embedding: embeddings[chunkIndex] ?? [],
    }));

    const ids = await callUpstream("upsert", upstream, () =>
      vectorStore.replaceSource(source, records)
    );

    logEvent("INGEST_SUCCESS", {
      source,
      totalChunks: chunks.length,
      upserted: ids.length,
      durationMs: Date.now() - startedAt,
    });

    return { source, totalChunks: chunks.length, ids };
  }
}
