import type {
  Command,
  RemedialAction,
  RuntimeErrorKind,
  ValidationErrorKind,
} from "@atomic-image-manager/executor";

export type OperationType = "rebase" | "rollback";

export type OperationState =
  | "idle"
  | "validating"
  | "awaiting_confirmation"
  | "executing"
  | "completed"
  | "cancelled"
  | "rejected";

export const TERMINAL_OPERATION_STATES: readonly OperationState[] = [
  "completed",
  "cancelled",
  "rejected",
];

export type OrchestratorErrorKind =
  | "operation_in_progress"
  | "no_current_deployment_target"
  | "unknown_deployment"
  | "status_unavailable";

export type RejectionReason = OrchestratorErrorKind | ValidationErrorKind;

export interface OperationConfirmation {
  readonly title: string;
  readonly description: string;
  /** Display copy; the executed argument vector is kept separately. */
  readonly command: Command;
  readonly warnings: readonly string[];
  readonly requiresReboot: boolean;
}

interface OutcomeBase {
  readonly operationId: string;
  readonly operationType: OperationType;
  readonly message: string;
}

export type OperationOutcome =
  | (OutcomeBase & {
      readonly state: "completed";
      readonly success: boolean;
      readonly errorKind: RuntimeErrorKind | null;
      readonly exitCode: number | null;
      readonly remedy: RemedialAction | null;
      /** Set when the history ledger could not record the execution. */
      readonly historyWarning: string | null;
    })
  | (OutcomeBase & { readonly state: "cancelled" })
  | (OutcomeBase & {
      readonly state: "rejected";
      readonly reason: RejectionReason;
    });

export interface OperationTicket {
  readonly operationId: string;
  readonly outcome: Promise<OperationOutcome>;
}

export type ProgressPhase =
  | "downloading"
  | "writing"
  | "staging"
  | "finished";

export interface ProgressUpdate {
  readonly phase: ProgressPhase;
  readonly percent: number | null;
}

export interface OperationSnapshot {
  readonly operationId: string;
  readonly operationType: OperationType;
  /** Image reference for a rebase, deployment id for a rollback. */
  readonly target: string;
  readonly state: OperationState;
  readonly confirmation: OperationConfirmation | null;
  readonly progress: ProgressUpdate | null;
  readonly outcome: OperationOutcome | null;
  readonly startedAt: Date;
  readonly endedAt: Date | null;
}

export type OperationEvent =
  | {
      readonly type: "operation.state";
      readonly operationId: string;
      readonly state: OperationState;
      readonly ts: string;
      readonly detail?: string;
    }
  | {
      readonly type: "operation.confirmation";
      readonly operationId: string;
      readonly confirmation: OperationConfirmation;
      readonly ts: string;
    }
  | {
      readonly type: "operation.line";
      readonly operationId: string;
      readonly line: string;
      readonly ts: string;
    }
  | {
      readonly type: "operation.progress";
      readonly operationId: string;
      readonly progress: ProgressUpdate;
      readonly ts: string;
    }
  | {
      readonly type: "operation.executed";
      readonly operationId: string;
      readonly success: boolean;
      readonly errorKind: RuntimeErrorKind | null;
      readonly exitCode: number | null;
      readonly ts: string;
    }
  | {
      readonly type: "operation.result";
      readonly operationId: string;
      readonly outcome: OperationOutcome;
      readonly ts: string;
    };

export function isTerminalState(state: OperationState): boolean {
  return TERMINAL_OPERATION_STATES.includes(state);
}
