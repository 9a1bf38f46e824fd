/**
 * Mastra agent construction. Kept apart from MastraGenerator so the
 * generator can be exercised without loading the agent runtime.
 */
import { createOpenAI } from "@ai-sdk/openai";
import type { Prompt } from "@domain/rag/ports";
import type { TextAgent } from "@infrastructure/llm/MastraGenerator";
import { Agent } from "@mastra/core/agent";

export interface AgentOptions {
  apiKey: string;
  baseUrl?: string;
  model: string;
}

// The system instruction travels inside every prompt.
const AGENT_INSTRUCTIONS =
  "Follow the system messages supplied with each conversation.";

export function createDocsAgent(options: AgentOptions): TextAgent {
  const provider = createOpenAI({
    apiKey: options.apiKey,
    baseURL: options.baseUrl,
  });

  const agent = new Agent({
    name: "docs-chat-agent",
    instructions: AGENT_INSTRUCTIONS,
    model: provider(options.model),
  });

  return {
    async generate(prompt: Prompt) {
      const result = await agent.generate(
        prompt as Parameters<(typeof agent)["generate"]>[0]
      );
      return { text: result.text };
    },
  };
}
