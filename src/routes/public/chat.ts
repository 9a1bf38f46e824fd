import type { ChatUseCase } from "@app/chat/ChatUseCase";
import { createChatController } from "@interfaces/http/ChatController";
import { Router } from "express";

export function chatRouter(chat: Pick<ChatUseCase, "handle">): Router {
  const router = Router();

  router.post("/", createChatController(chat));

  return router;
}
