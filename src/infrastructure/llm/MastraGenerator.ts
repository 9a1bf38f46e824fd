/**
 * Generator backed by a Mastra agent running an OpenAI chat model.
 */
import type { Generator, Prompt } from "@domain/rag/ports";
import { logEvent } from "@infrastructure/logging/Logger";

/** What the generator needs from an agent: one prompt in, text out. */
export interface TextAgent {
  generate(prompt: Prompt): Promise<{ text: string }>;
}

export class MastraGenerator implements Generator {
  constructor(
    private readonly agent: TextAgent,
    private readonly model: string
  ) {}

  async generate(prompt: Prompt): Promise<string> {
    const startedAt = Date.now();

    try {
      const result = await this.agent.generate(prompt);
      const text = result.text.trim();

      if (!text) {
        throw new Error("Model returned an empty answer");
      }

      logEvent("LLM_SUCCESS", {
        model: this.model,
        durationMs: Date.now() - startedAt,
        messageCount: prompt.length,
        promptLength: prompt.reduce((sum, m) => sum + m.content.length, 0),
        answerLength: text.length,
      });

      return text;
    } catch (error: unknown) {
      logEvent("LLM_FAILURE", {
        model: this.model,
        durationMs: Date.now() - startedAt,
        name: error instanceof Error ? error.name : undefined,
        message: error instanceof Error ? error.message : String(error),
      });
      throw error;
    }
  }
}
