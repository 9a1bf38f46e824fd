/**
 * Pure RAG helpers: ranking retrieved passages, rendering them into a
 * context block, assembling the generation prompt and collecting the cited
 * sources. Same inputs always produce the same output.
 */
import type { ChatHistory } from "@domain/chat/types";
import type { Prompt, RetrievedPassage } from "@domain/rag/ports";

export const CONTEXT_SEPARATOR = "\n\n---\n\n";

export interface PromptInput {
  systemPrompt: string;
  history: ChatHistory;
  passages: RetrievedPassage[];
  message: string;
}

/**
 * Orders passages by descending score. Ties keep the order the retriever
 * returned them in.
 */
export function rankPassages(passages: RetrievedPassage[]): RetrievedPassage[] {
  return passages
    .map((passage, position) => ({ passage, position }))
    .sort((a, b) => b.passage.score - a.passage.score || a.position - b.position)
    .map(({ passage }) => passage);
}

export function buildContextFromPassages(passages: RetrievedPassage[]): string {
  if (!passages.length) {
    return "";
  }

  return passages
    .map((p, index) => `[${index + 1}] (source: ${p.source})\n${p.text}`)
    .join(CONTEXT_SEPARATOR);
}

/**
 * Assembles the message list sent to the generator:
 * system instruction, context section (omitted when empty), history, question.
 */
export function buildPrompt(input: PromptInput): Prompt {
  const prompt: Prompt = [{ role: "system", content: input.systemPrompt }];

  const context = buildContextFromPassages(input.passages);
  if (context) {
    prompt.push({ role: "system", content: `CONTEXT:\n${context}` });
  }

  for (const turn of input.history) {
    prompt.push({ role: turn.role, content: turn.content });
  }

  prompt.push({ role: "user", content: input.message });

  return prompt;
}

/** Distinct sources in passage order; the first (most relevant) occurrence wins. */
export function collectSources(passages: RetrievedPassage[]): string[] {
  const seen = new Set<string>();
  const sources: string[] = [];

  for (const passage of passages) {
    if (!seen.has(passage.source)) {
      seen.add(passage.source);
      sources.push(passage.source);
    }
  }

  return sources;
}
