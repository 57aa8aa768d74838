import { randomUUID } from "node:crypto";
import {
  describeFailure,
  remedyFor,
  validateCommand,
  validateImageReference,
  type Command,
  type ExecutionEngine,
  type ExecutionResult,
  type RegistryAllowlist,
} from "@atomic-image-manager/executor";
import {
  findBootedDeployment,
  findDeployment,
  formatDeploymentInfo,
  generateRollbackCommand,
  type Deployment,
} from "../domain/deployment.js";
import {
  isTerminalState,
  type OperationConfirmation,
  type OperationEvent,
  type OperationOutcome,
  type OperationSnapshot,
  type OperationState,
  type OperationTicket,
  type OperationType,
  type ProgressUpdate,
  type RejectionReason,
} from "../domain/operation.js";
import { createLogger, type Logger } from "../observability/logger.js";
import type { StatusSource } from "../ports/status-source.js";
import type { HistoryLedger } from "../repositories/history-ledger.js";
import {
  ConfirmationGate,
  type ConfirmationPresenter,
} from "./confirmation-gate.js";
import type { ImageCatalog } from "./image-catalog.js";
import { OperationLease } from "./operation-lease.js";
import { detectProgress, type ProgressObserver } from "./progress-observer.js";
import { BackgroundScheduler, type Scheduler } from "./scheduler.js";
import type { StreamBus } from "./stream-bus.js";

export interface ImageOrchestratorOptions {
  readonly engine: ExecutionEngine;
  readonly statusSource: StatusSource;
  readonly ledger: HistoryLedger;
  readonly presenter: ConfirmationPresenter;
  readonly scheduler?: Scheduler;
  readonly lease?: OperationLease;
  readonly observer?: ProgressObserver;
  readonly streamBus?: StreamBus<OperationEvent>;
  readonly allowlist?: RegistryAllowlist;
  readonly catalog?: ImageCatalog;
  readonly logger?: Logger;
  readonly maxRetainedOperations?: number;
}

export type DecisionResult =
  | { readonly accepted: true; readonly state: OperationState }
  | {
      readonly accepted: false;
      readonly reason: string;
      readonly state?: OperationState;
    };

interface OperationContext {
  readonly operationId: string;
  readonly operationType: OperationType;
  readonly target: string;
  readonly logger: Logger;
  readonly startedAt: Date;
  state: OperationState;
  confirmation: OperationConfirmation | null;
  progress: ProgressUpdate | null;
  outcome: OperationOutcome | null;
  endedAt: Date | null;
  gate: ConfirmationGate | null;
  cancelRequested: boolean;
  decisionWaiters: Array<(snapshot: OperationSnapshot) => void>;
}

const REBOOT_WARNING = "You will need to reboot for the change to take effect.";
const BACKUP_WARNING =
  "Back up important data before changing the system image.";
const UNVERIFIED_WARNING =
  "Custom images are not verified. Only use images from trusted sources.";
const EXECUTING_CANCEL_REASON =
  "The operation is already executing and cannot be interrupted safely; wait for it to finish.";

/**
 * Drives rebase and rollback requests through validation, confirmation,
 * execution and the history ledger. At most one operation executes at a
 * time; a second one is rejected, never queued.
 */
export class ImageOrchestrator {
  private readonly operations = new Map<string, OperationContext>();
  private readonly scheduler: Scheduler;
  private readonly lease: OperationLease;
  private readonly logger: Logger;
  private readonly maxRetainedOperations: number;

  constructor(private readonly options: ImageOrchestratorOptions) {
    this.scheduler = options.scheduler ?? new BackgroundScheduler();
    this.lease = options.lease ?? new OperationLease();
    this.logger = (options.logger ?? createLogger()).child({
      component: "orchestrator",
    });
    this.maxRetainedOperations = options.maxRetainedOperations ?? 100;
  }

  startRebase(imageRef: string): OperationTicket {
    const context = this.createContext("rebase", imageRef);
    return {
      operationId: context.operationId,
      outcome: this.guard(context, () => this.runRebase(context, imageRef)),
    };
  }

  startRollback(deploymentId: string): OperationTicket {
    const context = this.createContext("rollback", deploymentId);
    return {
      operationId: context.operationId,
      outcome: this.guard(context, () => this.runRollback(context, deploymentId)),
    };
  }

  rebaseTo(imageRef: string): Promise<OperationOutcome> {
    return this.startRebase(imageRef).outcome;
  }

  rollbackTo(deploymentId: string): Promise<OperationOutcome> {
    return this.startRollback(deploymentId).outcome;
  }

  requestCancel(operationId: string): DecisionResult {
    const context = this.operations.get(operationId);
    if (!context) {
      return { accepted: false, reason: "operation not found" };
    }

    switch (context.state) {
      case "idle":
      case "validating":
        context.cancelRequested = true;
        context.logger.info("cancel requested before confirmation");
        return { accepted: true, state: context.state };
      case "awaiting_confirmation":
        if (this.settleGate(context, false)) {
          return { accepted: true, state: context.state };
        }
        return {
          accepted: false,
          reason: "confirmation already resolved",
          state: context.state,
        };
      case "executing":
        context.logger.info("cancel ignored while executing");
        return {
          accepted: false,
          reason: EXECUTING_CANCEL_REASON,
          state: context.state,
        };
      case "completed":
      case "cancelled":
      case "rejected":
        return {
          accepted: false,
          reason: `operation already ${context.state}`,
          state: context.state,
        };
    }
  }

  confirm(operationId: string): DecisionResult {
    const context = this.operations.get(operationId);
    if (!context) {
      return { accepted: false, reason: "operation not found" };
    }
    if (context.state !== "awaiting_confirmation" || !this.settleGate(context, true)) {
      return {
        accepted: false,
        reason: `operation is ${context.state}, not awaiting confirmation`,
        state: context.state,
      };
    }
    return { accepted: true, state: context.state };
  }

  private settleGate(context: OperationContext, accepted: boolean): boolean {
    const gate = context.gate;
    if (!gate) {
      return false;
    }
    try {
      return accepted ? gate.confirm() : gate.dismiss();
    } catch (error) {
      context.logger.warn("confirmation presenter failed to withdraw", {
        error: error instanceof Error ? error.message : String(error),
      });
      return gate.getState() === (accepted ? "confirmed" : "cancelled");
    }
  }

  /**
   * Resolves once the operation waits for the user or has ended, which is
   * when a remote caller can tell whether its request was accepted.
   */
  waitForDecisionPoint(operationId: string): Promise<OperationSnapshot | null> {
    const context = this.operations.get(operationId);
    if (!context) {
      return Promise.resolve(null);
    }
    if (isDecisionPoint(context.state)) {
      return Promise.resolve(toSnapshot(context));
    }
    return new Promise((resolve) => {
      context.decisionWaiters.push(resolve);
    });
  }

  getOperation(operationId: string): OperationSnapshot | null {
    const context = this.operations.get(operationId);
    return context ? toSnapshot(context) : null;
  }

  listOperations(): OperationSnapshot[] {
    return [...this.operations.values()]
      .map(toSnapshot)
      .sort((a, b) => b.startedAt.getTime() - a.startedAt.getTime());
  }

  isExecuting(): boolean {
    return this.lease.isHeld();
  }

  private async runRebase(
    context: OperationContext,
    imageRef: string,
  ): Promise<OperationOutcome> {
    this.transition(context, "validating");
    if (this.lease.isHeld()) {
      return this.rejectInProgress(context);
    }

    const validation = validateImageReference(imageRef, {
      allowlist: this.options.allowlist,
    });
    if (!validation.ok) {
      return this.reject(context, validation.error.kind, validation.error.message);
    }

    const command: Command = ["rpm-ostree", "rebase", imageRef];
    const curated = this.options.catalog?.contains(imageRef) ?? true;
    const confirmation: OperationConfirmation = {
      title: curated ? "Rebase System?" : "Rebase to Custom Image?",
      description: `This will rebase your system to:\n${imageRef}\n\nThis operation will download a new system image. Running applications and user data are not affected.`,
      command: [...command],
      warnings: curated
        ? [REBOOT_WARNING, BACKUP_WARNING]
        : [UNVERIFIED_WARNING, REBOOT_WARNING, BACKUP_WARNING],
      requiresReboot: true,
    };

    return this.confirmAndExecute(context, confirmation, command, imageRef);
  }

  private async runRollback(
    context: OperationContext,
    deploymentId: string,
  ): Promise<OperationOutcome> {
    this.transition(context, "validating");
    if (this.lease.isHeld()) {
      return this.rejectInProgress(context);
    }

    const listing = await this.options.statusSource.readDeployments();
    if (context.cancelRequested) {
      return this.cancel(context, "Cancelled before confirmation");
    }
    if (!listing.available) {
      return this.reject(
        context,
        "status_unavailable",
        `System status is unavailable: ${listing.reason}`,
      );
    }

    const deployments = listing.deployments;
    const target = findDeployment(deployments, deploymentId);
    if (!target) {
      return this.reject(
        context,
        "unknown_deployment",
        `Unknown deployment: ${deploymentId}`,
      );
    }

    const command = generateRollbackCommand(target.id, deployments);
    if (!command) {
      return this.reject(
        context,
        "no_current_deployment_target",
        `Deployment ${target.id} is the currently booted deployment; there is nothing to roll back to.`,
      );
    }

    const commandCheck = validateCommand(command, {
      allowlist: this.options.allowlist,
    });
    if (!commandCheck.ok) {
      return this.reject(context, commandCheck.error.kind, commandCheck.error.message);
    }

    const confirmation = buildRollbackConfirmation(target, deployments, command);
    return this.confirmAndExecute(context, confirmation, command, target.origin);
  }

  private async confirmAndExecute(
    context: OperationContext,
    confirmation: OperationConfirmation,
    command: Command,
    imageName: string,
  ): Promise<OperationOutcome> {
    if (context.cancelRequested) {
      return this.cancel(context, "Cancelled before confirmation");
    }

    const accepted = await this.awaitConfirmation(context, confirmation);
    if (!accepted) {
      return this.cancel(context, "Operation cancelled by the user");
    }

    const lease = this.lease.tryAcquire(context.operationId);
    if (!lease) {
      return this.rejectInProgress(context);
    }

    try {
      this.transition(context, "executing");
      const result = await this.scheduler.schedule(() =>
        this.execute(context, command),
      );
      this.notify(context, (observer) =>
        observer.onResult(context.operationId, result),
      );
      const historyWarning = await this.record(context, command, imageName, result);
      return this.complete(context, result, historyWarning);
    } finally {
      lease.release();
    }
  }

  private awaitConfirmation(
    context: OperationContext,
    confirmation: OperationConfirmation,
  ): Promise<boolean> {
    const gate = new ConfirmationGate(context.operationId, this.options.presenter);
    context.gate = gate;
    context.confirmation = confirmation;
    this.transition(context, "awaiting_confirmation");
    this.publish(context.operationId, {
      type: "operation.confirmation",
      operationId: context.operationId,
      confirmation,
      ts: new Date().toISOString(),
    });

    return new Promise<boolean>((resolve) => {
      gate.open(confirmation, (accepted) => {
        context.gate = null;
        context.confirmation = null;
        resolve(accepted);
      });
    });
  }

  private async execute(
    context: OperationContext,
    command: Command,
  ): Promise<ExecutionResult> {
    context.logger.info("executing", { command: command.join(" ") });
    try {
      return await this.options.engine.executeWithProgress(command, (line) =>
        this.handleLine(context, line),
      );
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      context.logger.error("execution engine threw", { error: message });
      return {
        success: false,
        output: [`error: ${message}`],
        errorKind: "unknown",
        exitCode: null,
      };
    }
  }

  private handleLine(context: OperationContext, line: string): void {
    this.notify(context, (observer) => observer.onLine(context.operationId, line));
    const progress = detectProgress(line);
    if (progress) {
      context.progress = progress;
      this.notify(context, (observer) =>
        observer.onProgress(context.operationId, progress),
      );
    }
  }

  private async record(
    context: OperationContext,
    command: Command,
    imageName: string,
    result: ExecutionResult,
  ): Promise<string | null> {
    try {
      await this.options.ledger.addEntry({
        command: command.join(" "),
        success: result.success,
        imageName,
        operationType: context.operationType,
        errorMessage:
          result.success || result.errorKind === null
            ? undefined
            : describeFailure(result.errorKind, result.output),
      });
      return null;
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      context.logger.error("failed to record history entry", { error: message });
      return `The operation was not recorded in history: ${message}`;
    }
  }

  private complete(
    context: OperationContext,
    result: ExecutionResult,
    historyWarning: string | null,
  ): OperationOutcome {
    const message = result.success
      ? context.operationType === "rebase"
        ? `Successfully rebased to ${context.target}. Please reboot.`
        : "Successfully rolled back. Please reboot."
      : describeFailure(result.errorKind ?? "unknown", result.output);

    return this.finish(context, {
      state: "completed",
      operationId: context.operationId,
      operationType: context.operationType,
      message,
      success: result.success,
      errorKind: result.errorKind,
      exitCode: result.exitCode,
      remedy: remedyFor(result.errorKind),
      historyWarning,
    });
  }

  private cancel(context: OperationContext, message: string): OperationOutcome {
    return this.finish(context, {
      state: "cancelled",
      operationId: context.operationId,
      operationType: context.operationType,
      message,
    });
  }

  private reject(
    context: OperationContext,
    reason: RejectionReason,
    message: string,
  ): OperationOutcome {
    return this.finish(context, {
      state: "rejected",
      operationId: context.operationId,
      operationType: context.operationType,
      reason,
      message,
    });
  }

  private rejectInProgress(context: OperationContext): OperationOutcome {
    return this.reject(
      context,
      "operation_in_progress",
      `Another operation is already executing (${this.lease.holder ?? "unknown"}).`,
    );
  }

  private finish(
    context: OperationContext,
    outcome: OperationOutcome,
  ): OperationOutcome {
    context.outcome = outcome;
    context.endedAt = new Date();
    this.transition(context, outcome.state, outcome.message);
    this.publish(context.operationId, {
      type: "operation.result",
      operationId: context.operationId,
      outcome,
      ts: context.endedAt.toISOString(),
    });
    this.options.streamBus?.close(context.operationId);

    const fields = {
      state: outcome.state,
      reason: outcome.state === "rejected" ? outcome.reason : undefined,
      errorKind: outcome.state === "completed" ? outcome.errorKind : undefined,
    };
    if (outcome.state === "completed" && outcome.success) {
      context.logger.info("operation finished", fields);
    } else {
      context.logger.warn("operation finished", { ...fields, detail: outcome.message });
    }

    this.evictFinishedOperations();
    return outcome;
  }

  private transition(
    context: OperationContext,
    state: OperationState,
    detail?: string,
  ): void {
    context.state = state;
    context.logger.debug("state", { state });
    if (isDecisionPoint(state) && context.decisionWaiters.length > 0) {
      const waiters = context.decisionWaiters;
      context.decisionWaiters = [];
      const snapshot = toSnapshot(context);
      for (const waiter of waiters) {
        waiter(snapshot);
      }
    }
    this.publish(context.operationId, {
      type: "operation.state",
      operationId: context.operationId,
      state,
      ts: new Date().toISOString(),
      detail,
    });
  }

  private publish(operationId: string, event: OperationEvent): void {
    this.options.streamBus?.publish(operationId, event);
  }

  private notify(
    context: OperationContext,
    call: (observer: ProgressObserver) => void,
  ): void {
    const observer = this.options.observer;
    if (!observer) {
      return;
    }
    try {
      call(observer);
    } catch (error) {
      context.logger.warn("progress observer threw", {
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }

  /**
   * An unexpected failure before execution (a presenter or status source
   * that throws) ends the operation as cancelled, with nothing spawned.
   */
  private async guard(
    context: OperationContext,
    run: () => Promise<OperationOutcome>,
  ): Promise<OperationOutcome> {
    try {
      return await run();
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      context.logger.error("operation failed unexpectedly", { error: message });
      if (context.outcome) {
        return context.outcome;
      }
      return this.cancel(context, `Operation aborted: ${message}`);
    }
  }

  private createContext(operationType: OperationType, target: string): OperationContext {
    const operationId = randomUUID();
    const context: OperationContext = {
      operationId,
      operationType,
      target,
      logger: this.logger.child({ operationId, operationType }),
      startedAt: new Date(),
      state: "idle",
      confirmation: null,
      progress: null,
      outcome: null,
      endedAt: null,
      gate: null,
      cancelRequested: false,
      decisionWaiters: [],
    };
    this.operations.set(operationId, context);
    context.logger.info("operation requested", { target });
    return context;
  }

  private evictFinishedOperations(): void {
    const finished = [...this.operations.values()].filter((context) =>
      isTerminalState(context.state),
    );
    const excess = finished.length - this.maxRetainedOperations;
    for (let index = 0; index < excess; index += 1) {
      this.operations.delete(finished[index].operationId);
    }
  }
}

function buildRollbackConfirmation(
  target: Deployment,
  deployments: readonly Deployment[],
  command: Command,
): OperationConfirmation {
  const booted = findBootedDeployment(deployments);
  const warnings = [REBOOT_WARNING];
  if (booted && target.index < booted.index) {
    warnings.push(
      "The selected deployment is newer than the booted one; it is usually a pending update.",
    );
  }

  return {
    title: "Rollback to Previous Deployment?",
    description: `This will roll your system back to:\n${formatDeploymentInfo(target)}`,
    command: [...command],
    warnings,
    requiresReboot: true,
  };
}

function isDecisionPoint(state: OperationState): boolean {
  return (
    state === "awaiting_confirmation" ||
    state === "executing" ||
    isTerminalState(state)
  );
}

function toSnapshot(context: OperationContext): OperationSnapshot {
  return {
    operationId: context.operationId,
    operationType: context.operationType,
    target: context.target,
    state: context.state,
    confirmation: context.confirmation,
    progress: context.progress,
    outcome: context.outcome,
    startedAt: context.startedAt,
    endedAt: context.endedAt,
  };
}
