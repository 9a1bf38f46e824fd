/**
 * Chat orchestration: embed the question, retrieve the closest passages,
 * generate an answer grounded in them and return it with its sources.
 *
 * One request makes exactly one call to each provider, in that order. The
 * use case keeps no state between requests, so concurrent calls to
 * `handle()` never interact.
 */
import crypto from "crypto";

import type { UpstreamPolicy } from "@config/index";
import type { ChatRequest, ChatResponse } from "@domain/chat/types";
import type { Embedder, Generator, Retriever } from "@domain/rag/ports";
import { buildPrompt, collectSources, rankPassages } from "@domain/rag/ragEngine";
import { logEvent } from "@infrastructure/logging/Logger";
import { UpstreamError, ValidationError } from "@middleware/errorHandler";
import { callUpstream } from "@utils/retry";

export interface ChatUseCaseDeps {
  embedder: Embedder;
  retriever: Retriever;
  generator: Generator;
  rag: {
    topK: number;
    systemPrompt: string;
  };
  upstream: UpstreamPolicy;
}

export class ChatUseCase {
  constructor(private readonly deps: ChatUseCaseDeps) {}

  async handle(request: ChatRequest): Promise<ChatResponse> {
    const { message } = request;

    if (typeof message !== "string" || !message.trim()) {
      throw new ValidationError("Message is required");
    }

    const history = request.conversationHistory ?? [];
    const { embedder, retriever, generator, rag, upstream } = this.deps;

    const requestId = crypto.randomUUID();
    const startTime = Date.now();

    logEvent("CHAT_REQUEST", {
      requestId,
      messageLength: message.length,
      historyCount: history.length,
    });

    try {
      const embedding = await callUpstream("embed", upstream, () =>
        embedder.embed(message)
      );

      const retrieved = await callUpstream("retrieve", upstream, () =>
        retriever.search(embedding, rag.topK)
      );
      const passages = rankPassages(retrieved);

      const prompt = buildPrompt({
        systemPrompt: rag.systemPrompt,
        history,
        passages,
        message,
      });

      const answer = await callUpstream("generate", upstream, () =>
        generator.generate(prompt)
      );

      const response: ChatResponse = {
        response: answer,
        sources: collectSources(passages),
      };

      logEvent("CHAT_RESPONSE", {
        requestId,
        passages: passages.length,
        sources: response.sources.length,
        answerLength: answer.length,
        durationMs: Date.now() - startTime,
      });

      return response;
    } catch (error: unknown) {
      logEvent("CHAT_FAILURE", {
        requestId,
        stage: error instanceof UpstreamError ? error.stage : undefined,
        message: error instanceof Error ? error.message : String(error),
        durationMs: Date.now() - startTime,
      });
      throw error;
    }
  }
}
