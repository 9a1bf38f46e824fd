import { z } from "zod";

/**
 * Wire format of the chat endpoint.
 *
 * `message` may be empty here; ChatUseCase rejects empty and
 * whitespace-only messages.
 */
export const ChatTurnSchema = z.object({
  role: z.enum(["user", "assistant"]),
  content: z.string(),
});

export const MAX_HISTORY_TURNS = 50;

export const ChatRequestSchema = z.object({
  message: z.string(),
  conversation_history: z
    .array(ChatTurnSchema)
    .max(MAX_HISTORY_TURNS)
    .default([]),
});

export const ChatResponseSchema = z.object({
  response: z.string(),
  sources: z.array(z.string()),
});
