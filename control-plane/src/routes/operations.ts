import { Router, type Request, type Response } from "express";
import { z } from "zod";
import type { OperationEvent } from "../domain/operation.js";
import type { ActionDispatcher } from "../services/action-dispatcher.js";
import type { PendingConfirmationRegistry } from "../services/confirmation-gate.js";
import type { ImageOrchestrator } from "../services/image-orchestrator.js";
import type { StreamBus } from "../services/stream-bus.js";
import { sendActionResponse } from "./action-response.js";
import { asyncHandler } from "./async-handler.js";

const rebaseSchema = z.object({
  imageRef: z.string().min(1),
});

const rollbackSchema = z.object({
  deploymentId: z.string().min(1),
});

export function createOperationsRouter(input: {
  orchestrator: ImageOrchestrator;
  dispatcher: ActionDispatcher;
  confirmations: PendingConfirmationRegistry;
  streamBus: StreamBus<OperationEvent>;
  heartbeatMs?: number;
}): Router {
  const router = Router();

  router.post(
    "/operations/rebase",
    asyncHandler(async (req, res) => {
      const parsed = rebaseSchema.safeParse(req.body);
      if (!parsed.success) {
        return res.status(400).json({ error: parsed.error.flatten() });
      }
      const response = await input.dispatcher.dispatch({
        type: "rebase",
        imageRef: parsed.data.imageRef,
      });
      return sendActionResponse(res, response, 202);
    }),
  );

  router.post(
    "/operations/rollback",
    asyncHandler(async (req, res) => {
      const parsed = rollbackSchema.safeParse(req.body);
      if (!parsed.success) {
        return res.status(400).json({ error: parsed.error.flatten() });
      }
      const response = await input.dispatcher.dispatch({
        type: "rollback",
        deploymentId: parsed.data.deploymentId,
      });
      return sendActionResponse(res, response, 202);
    }),
  );

  router.get("/operations", (_req, res) => {
    res.json({ operations: input.orchestrator.listOperations() });
  });

  router.get("/operations/:operationId", (req, res) => {
    const snapshot = input.orchestrator.getOperation(req.params.operationId);
    if (!snapshot) {
      return res.status(404).json({ error: "operation not found" });
    }
    return res.json(snapshot);
  });

  router.get("/operations/:operationId/confirmation", (req, res) => {
    const pending = input.confirmations.get(req.params.operationId);
    if (!pending) {
      return res.status(404).json({ error: "no pending confirmation" });
    }
    return res.json({
      operationId: pending.operationId,
      confirmation: pending.confirmation,
      createdAt: pending.createdAt.toISOString(),
    });
  });

  router.post(
    "/operations/:operationId/confirm",
    asyncHandler(async (req, res) => {
      const response = await input.dispatcher.dispatch({
        type: "confirm",
        operationId: req.params.operationId,
      });
      return sendActionResponse(res, response);
    }),
  );

  router.post(
    "/operations/:operationId/cancel",
    asyncHandler(async (req, res) => {
      const response = await input.dispatcher.dispatch({
        type: "cancel",
        operationId: req.params.operationId,
      });
      return sendActionResponse(res, response);
    }),
  );

  router.get("/operations/:operationId/stream", (req, res) => {
    const snapshot = input.orchestrator.getOperation(req.params.operationId);
    if (!snapshot) {
      return res.status(404).json({ error: "operation not found" });
    }

    return streamOperationAsSse({
      req,
      res,
      operationId: req.params.operationId,
      streamBus: input.streamBus,
      heartbeatMs: input.heartbeatMs ?? 15_000,
    });
  });

  return router;
}

function streamOperationAsSse(input: {
  req: Request;
  res: Response;
  operationId: string;
  streamBus: StreamBus<OperationEvent>;
  heartbeatMs: number;
}): void {
  input.res.status(200);
  input.res.setHeader("content-type", "text/event-stream; charset=utf-8");
  input.res.setHeader("cache-control", "no-cache");
  input.res.setHeader("connection", "keep-alive");
  input.res.flushHeaders();

  const afterSeq = parseAfterSeq(input.req);

  const heartbeat = setInterval(() => {
    input.res.write(": heartbeat\n\n");
  }, input.heartbeatMs);

  const unsubscribe = input.streamBus.subscribe({
    streamId: input.operationId,
    afterSeq,
    onEvent: (entry) => {
      input.res.write(`id: ${entry.seq}\n`);
      input.res.write(`event: ${entry.event.type}\n`);
      input.res.write(`data: ${JSON.stringify(entry.event)}\n\n`);
    },
    onClose: () => {
      clearInterval(heartbeat);
      input.res.write(
        `event: operation.closed\ndata: ${JSON.stringify({ operationId: input.operationId })}\n\n`,
      );
      input.res.end();
    },
  });

  input.req.on("close", () => {
    clearInterval(heartbeat);
    unsubscribe();
  });
}

function parseAfterSeq(req: Request): number {
  const queryCursor =
    typeof req.query.cursor === "string" ? req.query.cursor : undefined;
  const lastEventId = req.headers["last-event-id"];
  const headerCursor = Array.isArray(lastEventId) ? lastEventId[0] : lastEventId;
  const raw = queryCursor ?? headerCursor;
  if (!raw) {
    return 0;
  }
  const parsed = Number(raw);
  if (!Number.isInteger(parsed) || parsed < 0) {
    return 0;
  }
  return parsed;
}
