import type { Request, Response } from "express";

export const SERVICE_NAME = "docs-chat-backend";

/**
 * Liveness probe. Answers without touching any provider.
 */
export function createHealthController(version: string) {
  return function healthController(_req: Request, res: Response): void {
    res.json({ status: "ok", service: SERVICE_NAME, version });
  };
}
