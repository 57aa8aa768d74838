export interface LeaseHandle {
  readonly operationId: string;
  release(): void;
}

/** Single-holder lease over the right to execute a system mutation. */
export class OperationLease {
  private holderId: string | null = null;

  tryAcquire(operationId: string): LeaseHandle | null {
    if (this.holderId !== null) {
      return null;
    }
    this.holderId = operationId;

    let released = false;
    return {
      operationId,
      release: () => {
        if (released) {
          return;
        }
        released = true;
        if (this.holderId === operationId) {
          this.holderId = null;
        }
      },
    };
  }

  get holder(): string | null {
    return this.holderId;
  }

  isHeld(): boolean {
    return this.holderId !== null;
  }
}
