import type { ExecutionResult } from "@atomic-image-manager/executor";
import type {
  OperationEvent,
  ProgressUpdate,
} from "../domain/operation.js";
import type { Logger } from "../observability/logger.js";
import type { StreamBus } from "./stream-bus.js";

/**
 * Receives the output of one execution in emission order, then exactly one
 * result once the process has exited.
 */
export interface ProgressObserver {
  onLine(operationId: string, line: string): void;
  onProgress(operationId: string, progress: ProgressUpdate): void;
  onResult(operationId: string, result: ExecutionResult): void;
}

const PERCENT_PATTERN = /(\d{1,3})%/;

export function detectProgress(line: string): ProgressUpdate | null {
  if (line.includes("Downloading") || line.includes("Pulling")) {
    const match = PERCENT_PATTERN.exec(line);
    const percent = match ? Math.min(100, Number(match[1])) : null;
    return { phase: "downloading", percent };
  }
  if (line.includes("Writing") || line.includes("Storing")) {
    return { phase: "writing", percent: null };
  }
  if (line.includes("Staging")) {
    return { phase: "staging", percent: 80 };
  }
  if (line.includes("Deployment") && line.includes("complete")) {
    return { phase: "finished", percent: 95 };
  }
  return null;
}

export class StreamBusProgressObserver implements ProgressObserver {
  constructor(private readonly streamBus: StreamBus<OperationEvent>) {}

  onLine(operationId: string, line: string): void {
    this.streamBus.publish(operationId, {
      type: "operation.line",
      operationId,
      line,
      ts: new Date().toISOString(),
    });
  }

  onProgress(operationId: string, progress: ProgressUpdate): void {
    this.streamBus.publish(operationId, {
      type: "operation.progress",
      operationId,
      progress,
      ts: new Date().toISOString(),
    });
  }

  onResult(operationId: string, result: ExecutionResult): void {
    this.streamBus.publish(operationId, {
      type: "operation.executed",
      operationId,
      success: result.success,
      errorKind: result.errorKind,
      exitCode: result.exitCode,
      ts: new Date().toISOString(),
    });
  }
}

export class LoggingProgressObserver implements ProgressObserver {
  private readonly logger: Logger;

  constructor(logger: Logger) {
    this.logger = logger.child({ component: "progress" });
  }

  onLine(operationId: string, line: string): void {
    this.logger.debug("output", { operationId, line });
  }

  onProgress(operationId: string, progress: ProgressUpdate): void {
    this.logger.debug("phase", {
      operationId,
      phase: progress.phase,
      percent: progress.percent ?? undefined,
    });
  }

  onResult(operationId: string, result: ExecutionResult): void {
    const fields = {
      operationId,
      success: result.success,
      errorKind: result.errorKind ?? undefined,
      exitCode: result.exitCode ?? undefined,
      lines: result.output.length,
    };
    if (result.success) {
      this.logger.info("execution finished", fields);
      return;
    }
    this.logger.warn("execution failed", fields);
  }
}

export class CompositeProgressObserver implements ProgressObserver {
  constructor(private readonly observers: readonly ProgressObserver[]) {}

  onLine(operationId: string, line: string): void {
    for (const observer of this.observers) {
      observer.onLine(operationId, line);
    }
  }

  onProgress(operationId: string, progress: ProgressUpdate): void {
    for (const observer of this.observers) {
      observer.onProgress(operationId, progress);
    }
  }

  onResult(operationId: string, result: ExecutionResult): void {
    for (const observer of this.observers) {
      observer.onResult(operationId, result);
    }
  }
}
