import {
  validateCommand,
  type ValidationOptions,
} from "../commands/command-validator.js";
import type { PrivilegeEscalator } from "../ports/privilege-escalator.js";
import {
  silentExecutionLogger,
  type Command,
  type ExecutionEngine,
  type ExecutionLogger,
  type ExecutionResult,
  type LineHandler,
} from "./types.js";

export interface PrivilegedExecutionEngineOptions extends ValidationOptions {
  readonly logger?: ExecutionLogger;
}

/**
 * Wraps another engine so that a command only reaches it after the
 * escalator has granted elevated privileges.
 */
export class PrivilegedExecutionEngine implements ExecutionEngine {
  private readonly logger: ExecutionLogger;

  constructor(
    private readonly inner: ExecutionEngine,
    private readonly escalator: PrivilegeEscalator,
    private readonly options: PrivilegedExecutionEngineOptions = {},
  ) {
    this.logger = options.logger ?? silentExecutionLogger;
  }

  async executeWithProgress(
    command: Command,
    onLine: LineHandler,
  ): Promise<ExecutionResult> {
    const validation = validateCommand(command, {
      allowlist: this.options.allowlist,
    });
    if (!validation.ok) {
      return {
        success: false,
        output: [validation.error.message],
        errorKind: "invalid_command",
        exitCode: null,
      };
    }

    let denial: string | null;
    try {
      const grant = await this.escalator.requestElevatedPrivileges();
      denial = grant.granted ? null : (grant.error ?? "privileges not granted");
    } catch (error) {
      denial = error instanceof Error ? error.message : String(error);
    }

    if (denial !== null) {
      this.logger.warn("privilege escalation denied", { error: denial });
      return {
        success: false,
        output: [`Authentication failed: ${denial}`],
        errorKind: "auth",
        exitCode: null,
      };
    }

    return this.inner.executeWithProgress(command, onLine);
  }
}
