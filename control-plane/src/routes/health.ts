import { Router } from "express";
import type { ImageOrchestrator } from "../services/image-orchestrator.js";

export function createHealthRouter(orchestrator: ImageOrchestrator): Router {
  const router = Router();

  router.get("/health", (_req, res) => {
    res.json({
      status: "ok",
      time: new Date().toISOString(),
      executing: orchestrator.isExecuting(),
    });
  });

  return router;
}
