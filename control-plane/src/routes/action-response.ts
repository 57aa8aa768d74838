import type { Response } from "express";
import type {
  ActionErrorCode,
  ActionResponse,
} from "../services/action-dispatcher.js";

const ERROR_STATUS: Record<ActionErrorCode, number> = {
  not_found: 404,
  conflict: 409,
  rejected: 422,
};

export function sendActionResponse(
  res: Response,
  response: ActionResponse,
  successStatus = 200,
): Response {
  if (response.ok) {
    return res.status(successStatus).json(response.data);
  }
  return res.status(ERROR_STATUS[response.code]).json({
    error: response.error,
    reason: response.reason,
    operationId: response.operationId,
  });
}
