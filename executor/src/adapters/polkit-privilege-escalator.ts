import { execFile } from "node:child_process";
import { promisify } from "node:util";
import type {
  PrivilegeEscalator,
  PrivilegeGrant,
} from "../ports/privilege-escalator.js";

const execFileAsync = promisify(execFile);

export const RPM_OSTREE_POLKIT_ACTION = "org.projectatomic.rpmostree1.rebase";

export interface PolkitPrivilegeEscalatorOptions {
  readonly pkcheckBinary?: string;
  readonly actionId?: string;
  readonly launcher?: readonly string[];
  readonly pid?: number;
  readonly timeoutMs?: number;
}

/**
 * Asks polkit whether this process may perform the rpm-ostree action,
 * letting the agent show an authentication dialog when needed.
 */
export class PolkitPrivilegeEscalator implements PrivilegeEscalator {
  private readonly pkcheckBinary: string;
  private readonly actionId: string;
  private readonly launcher: readonly string[];
  private readonly pid: number;
  private readonly timeoutMs: number;

  constructor(options: PolkitPrivilegeEscalatorOptions = {}) {
    this.pkcheckBinary = options.pkcheckBinary ?? "pkcheck";
    this.actionId = options.actionId ?? RPM_OSTREE_POLKIT_ACTION;
    this.launcher = options.launcher ?? [];
    this.pid = options.pid ?? process.pid;
    this.timeoutMs = options.timeoutMs ?? 120_000;
  }

  async requestElevatedPrivileges(): Promise<PrivilegeGrant> {
    const argv = [
      ...this.launcher,
      this.pkcheckBinary,
      "--action-id",
      this.actionId,
      "--process",
      String(this.pid),
      "--allow-user-interaction",
    ];
    try {
      await execFileAsync(argv[0], argv.slice(1), {
        encoding: "utf8",
        timeout: this.timeoutMs,
      });
      return { granted: true };
    } catch (error) {
      return { granted: false, error: describeExecError(error) };
    }
  }
}

function describeExecError(error: unknown): string {
  if (error instanceof Error) {
    const stderr = "stderr" in error ? error.stderr : undefined;
    if (typeof stderr === "string" && stderr.trim().length > 0) {
      return stderr.trim();
    }
    return error.message;
  }
  return String(error);
}
