import { createHealthController } from "@interfaces/http/HealthController";
import { Router } from "express";

export function healthRouter(version: string): Router {
  const router = Router();

  router.get("/", createHealthController(version));

  return router;
}
