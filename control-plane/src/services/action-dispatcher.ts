import { z } from "zod";
import { formatDeploymentInfo } from "../domain/deployment.js";
import type {
  OperationSnapshot,
  OperationState,
} from "../domain/operation.js";
import type { StatusSource } from "../ports/status-source.js";
import type { HistoryLedger } from "../repositories/history-ledger.js";
import { summarizeHistory } from "./history-report.js";
import type { ImageCatalog } from "./image-catalog.js";
import type { ImageOrchestrator } from "./image-orchestrator.js";

export const imageManagerActionSchema = z.discriminatedUnion("type", [
  z.object({ type: z.literal("rebase"), imageRef: z.string().min(1) }),
  z.object({ type: z.literal("rollback"), deploymentId: z.string().min(1) }),
  z.object({ type: z.literal("get-deployments") }),
  z.object({
    type: z.literal("get-history"),
    limit: z.number().int().positive().optional(),
    success: z.boolean().optional(),
  }),
  z.object({ type: z.literal("clear-history") }),
  z.object({ type: z.literal("get-history-report") }),
  z.object({ type: z.literal("get-catalog") }),
  z.object({ type: z.literal("confirm"), operationId: z.string().min(1) }),
  z.object({ type: z.literal("cancel"), operationId: z.string().min(1) }),
  z.object({ type: z.literal("get-operation"), operationId: z.string().min(1) }),
]);

export type ImageManagerAction = z.infer<typeof imageManagerActionSchema>;

export type ActionResponse =
  | { readonly ok: true; readonly data: unknown }
  | {
      readonly ok: false;
      readonly error: string;
      readonly code: ActionErrorCode;
      readonly operationId?: string;
      readonly reason?: string;
    };

export type ActionErrorCode = "not_found" | "conflict" | "rejected";

export interface ActionDispatcherDependencies {
  readonly orchestrator: ImageOrchestrator;
  readonly statusSource: StatusSource;
  readonly ledger: HistoryLedger;
  readonly catalog: ImageCatalog;
}

/** Single entry point for every request a presentation layer can make. */
export class ActionDispatcher {
  constructor(private readonly deps: ActionDispatcherDependencies) {}

  async dispatch(action: ImageManagerAction): Promise<ActionResponse> {
    switch (action.type) {
      case "rebase":
        return this.started(this.deps.orchestrator.startRebase(action.imageRef).operationId);
      case "rollback":
        return this.started(
          this.deps.orchestrator.startRollback(action.deploymentId).operationId,
        );
      case "get-deployments": {
        const listing = await this.deps.statusSource.readDeployments();
        if (!listing.available) {
          return { ok: true, data: listing };
        }
        return {
          ok: true,
          data: {
            available: true,
            deployments: listing.deployments,
            formatted: listing.deployments.map(formatDeploymentInfo),
          },
        };
      }
      case "get-history":
        return {
          ok: true,
          data: {
            entries:
              action.success === undefined
                ? await this.deps.ledger.getRecentEntries(action.limit)
                : (await this.deps.ledger.getEntriesByOutcome(action.success)).slice(
                    0,
                    action.limit,
                  ),
          },
        };
      case "clear-history":
        await this.deps.ledger.clear();
        return { ok: true, data: { cleared: true } };
      case "get-history-report":
        return {
          ok: true,
          data: summarizeHistory(await this.deps.ledger.getRecentEntries()),
        };
      case "get-catalog":
        return {
          ok: true,
          data: {
            families: this.deps.catalog.listFamilies(),
            images: this.deps.catalog.listImages(),
          },
        };
      case "confirm":
        return this.decision(
          action.operationId,
          this.deps.orchestrator.confirm(action.operationId),
        );
      case "cancel":
        return this.decision(
          action.operationId,
          this.deps.orchestrator.requestCancel(action.operationId),
        );
      case "get-operation": {
        const snapshot = this.deps.orchestrator.getOperation(action.operationId);
        if (!snapshot) {
          return notFound(action.operationId);
        }
        return { ok: true, data: snapshot };
      }
      default:
        return assertNever(action);
    }
  }

  private async started(operationId: string): Promise<ActionResponse> {
    const snapshot =
      await this.deps.orchestrator.waitForDecisionPoint(operationId);
    if (!snapshot) {
      return notFound(operationId);
    }
    return describeStart(snapshot);
  }

  private decision(
    operationId: string,
    result: { accepted: boolean; reason?: string; state?: OperationState },
  ): ActionResponse {
    if (result.accepted) {
      return { ok: true, data: { operationId, accepted: true, state: result.state } };
    }
    if (result.state === undefined) {
      return notFound(operationId);
    }
    return {
      ok: false,
      code: "conflict",
      error: result.reason ?? "operation cannot change state",
      operationId,
    };
  }
}

/**
 * A start request that already ended as rejected reports the rejection;
 * anything else is accepted and proceeds in the background.
 */
export function describeStart(snapshot: OperationSnapshot): ActionResponse {
  const outcome = snapshot.outcome;
  if (outcome?.state === "rejected") {
    return {
      ok: false,
      code: outcome.reason === "operation_in_progress" ? "conflict" : "rejected",
      error: outcome.message,
      operationId: snapshot.operationId,
      reason: outcome.reason,
    };
  }
  return {
    ok: true,
    data: { operationId: snapshot.operationId, state: snapshot.state },
  };
}

function notFound(operationId: string): ActionResponse {
  return { ok: false, code: "not_found", error: `operation not found: ${operationId}` };
}

function assertNever(value: never): never {
  throw new Error(`unhandled action: ${JSON.stringify(value)}`);
}
