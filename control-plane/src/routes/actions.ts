import { Router } from "express";
import {
  imageManagerActionSchema,
  type ActionDispatcher,
} from "../services/action-dispatcher.js";
import { sendActionResponse } from "./action-response.js";
import { asyncHandler } from "./async-handler.js";

export function createActionsRouter(dispatcher: ActionDispatcher): Router {
  const router = Router();

  router.post(
    "/actions",
    asyncHandler(async (req, res) => {
      const parsed = imageManagerActionSchema.safeParse(req.body);
      if (!parsed.success) {
        return res.status(400).json({ error: parsed.error.flatten() });
      }
      return sendActionResponse(res, await dispatcher.dispatch(parsed.data));
    }),
  );

  return router;
}
