import type { OperationConfirmation } from "../domain/operation.js";

export type GateState = "pending" | "confirmed" | "cancelled";

export interface ConfirmationRequest {
  readonly operationId: string;
  readonly confirmation: OperationConfirmation;
  readonly createdAt: Date;
  respond(accepted: boolean): void;
}

/** The user-facing side of a gate: shows the payload, later calls `respond`. */
export interface ConfirmationPresenter {
  present(request: ConfirmationRequest): void;
  /** Called once the gate has resolved, whoever resolved it. */
  withdraw(operationId: string): void;
}

export class ConfirmationGate {
  private state: GateState = "pending";
  private onResolved: ((accepted: boolean) => void) | null = null;
  private opened = false;

  constructor(
    readonly operationId: string,
    private readonly presenter: ConfirmationPresenter,
  ) {}

  open(
    confirmation: OperationConfirmation,
    onResolved: (accepted: boolean) => void,
  ): void {
    if (this.opened) {
      throw new Error(`confirmation gate already opened: ${this.operationId}`);
    }
    this.opened = true;
    this.onResolved = onResolved;
    this.presenter.present({
      operationId: this.operationId,
      confirmation,
      createdAt: new Date(),
      respond: (accepted) => this.resolve(accepted),
    });
  }

  confirm(): boolean {
    return this.resolve(true);
  }

  cancel(): boolean {
    return this.resolve(false);
  }

  /** Closing the gate without an answer counts as a cancellation. */
  dismiss(): boolean {
    return this.resolve(false);
  }

  getState(): GateState {
    return this.state;
  }

  private resolve(accepted: boolean): boolean {
    if (this.state !== "pending" || !this.onResolved) {
      return false;
    }
    this.state = accepted ? "confirmed" : "cancelled";
    const callback = this.onResolved;
    this.onResolved = null;
    try {
      this.presenter.withdraw(this.operationId);
    } finally {
      callback(accepted);
    }
    return true;
  }
}

/**
 * Presenter for remote clients: keeps each pending request until a confirm
 * or cancel call arrives for its operation id.
 */
export class PendingConfirmationRegistry implements ConfirmationPresenter {
  private readonly pending = new Map<string, ConfirmationRequest>();

  present(request: ConfirmationRequest): void {
    this.pending.set(request.operationId, request);
  }

  withdraw(operationId: string): void {
    this.pending.delete(operationId);
  }

  get(operationId: string): ConfirmationRequest | undefined {
    return this.pending.get(operationId);
  }

  list(): ConfirmationRequest[] {
    return [...this.pending.values()];
  }

  resolve(operationId: string, accepted: boolean): boolean {
    const request = this.pending.get(operationId);
    if (!request) {
      return false;
    }
    request.respond(accepted);
    return true;
  }
}
