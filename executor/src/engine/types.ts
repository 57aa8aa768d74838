export const RUNTIME_ERROR_KINDS = [
  "network",
  "auth",
  "timeout",
  "busy",
  "not_found",
  "unknown",
  "invalid_command",
] as const;

export type RuntimeErrorKind = (typeof RUNTIME_ERROR_KINDS)[number];

export type Command = readonly string[];

export interface ExecutionResult {
  readonly success: boolean;
  readonly output: readonly string[];
  /** null exactly when `success` is true. */
  readonly errorKind: RuntimeErrorKind | null;
  readonly exitCode: number | null;
}

export type LineHandler = (line: string) => void;

export interface ExecutionEngine {
  executeWithProgress(
    command: Command,
    onLine: LineHandler,
  ): Promise<ExecutionResult>;
}

/**
 * Subset of the control-plane logger the engine writes to. Kept structural
 * so the executor package has no dependency on the control plane.
 */
export interface ExecutionLogger {
  info(message: string, fields?: Record<string, unknown>): void;
  warn(message: string, fields?: Record<string, unknown>): void;
  error(message: string, fields?: Record<string, unknown>): void;
}

export const silentExecutionLogger: ExecutionLogger = {
  info: () => {},
  warn: () => {},
  error: () => {},
};
