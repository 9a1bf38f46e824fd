/**
 * Chat HTTP controller.
 *
 * Maps the snake_case wire body onto ChatUseCase and the use case result back
 * onto `{ response, sources }`. Errors propagate to the global error handler.
 */
import type { ChatUseCase } from "@app/chat/ChatUseCase";
import {
  ChatRequestSchema,
  ChatResponseSchema,
} from "@interfaces/http/chat/schema";
import { parseRequest } from "@interfaces/http/validation";
import type { Request, Response } from "express";

export function createChatController(chat: Pick<ChatUseCase, "handle">) {
  return async function chatController(
    req: Request,
    res: Response
  ): Promise<void> {
    const body = parseRequest(ChatRequestSchema, req.body);

    const result = await chat.handle({
      message: body.message,
      conversationHistory: body.conversation_history,
    });

    res.json(ChatResponseSchema.parse(result));
  };
}
