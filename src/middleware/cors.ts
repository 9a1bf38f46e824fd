import type { NextFunction, Request, Response } from "express";

/**
 * Adds CORS headers for the browser chat widget and answers preflight
 * requests directly.
 */
export function cors(origin: string) {
  return function corsMiddleware(
    req: Request,
    res: Response,
    next: NextFunction
  ): void {
    res.setHeader("Access-Control-Allow-Origin", origin);
    res.setHeader("Access-Control-Allow-Methods", "GET, POST, OPTIONS");
    res.setHeader("Access-Control-Allow-Headers", "Content-Type");

    if (req.method === "OPTIONS") {
      res.status(204).end();
      return;
    }

    next();
  };
}
