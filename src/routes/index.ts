/**
 * Route registration for the chat backend.
 *
 * Chat and health are served both at the root and under /api, so the app
 * works behind a router that strips or keeps the /api prefix.
 */
import type { ChatUseCase } from "@app/chat/ChatUseCase";
import type { IngestUseCase } from "@app/ingest/IngestUseCase";
import type { SearchUseCase } from "@app/search/SearchUseCase";
import { searchRouter } from "@routes/internal/search";
import { chatRouter } from "@routes/public/chat";
import { healthRouter } from "@routes/public/health";
import { ingestRouter } from "@routes/public/ingest";
import type { Express } from "express";

export interface RouteDeps {
  chat: Pick<ChatUseCase, "handle">;
  ingest: Pick<IngestUseCase, "ingest">;
  search: Pick<SearchUseCase, "search">;
  version: string;
}

export function registerRoutes(app: Express, deps: RouteDeps): void {
  const health = healthRouter(deps.version);
  const chat = chatRouter(deps.chat);

  app.use("/api/health", health);
  app.use("/health", health);
  app.use("/api/chat", chat);
  app.use("/chat", chat);
  app.use("/api/documents/ingest", ingestRouter(deps.ingest));
  app.use("/api/search", searchRouter(deps.search));
}
