import { validateCommand } from "@atomic-image-manager/executor";
import { parseStatus } from "../domain/deployment.js";
import { createLogger, type Logger } from "../observability/logger.js";
import type {
  DeploymentListing,
  StatusSource,
} from "../ports/status-source.js";
import { execFileRunner, type CommandRunner } from "./command-runner.js";

export const STATUS_COMMAND = ["rpm-ostree", "status", "--json"] as const;

export interface RpmOstreeStatusSourceOptions {
  readonly launcher?: readonly string[];
  readonly timeoutMs?: number;
  readonly runner?: CommandRunner;
  readonly logger?: Logger;
}

export class RpmOstreeStatusSource implements StatusSource {
  private readonly launcher: readonly string[];
  private readonly timeoutMs: number;
  private readonly runner: CommandRunner;
  private readonly logger: Logger;

  constructor(options: RpmOstreeStatusSourceOptions = {}) {
    this.launcher = options.launcher ?? [];
    this.timeoutMs = options.timeoutMs ?? 10_000;
    this.runner = options.runner ?? execFileRunner;
    this.logger = (options.logger ?? createLogger()).child({
      component: "status-source",
    });
  }

  async readDeployments(): Promise<DeploymentListing> {
    const validation = validateCommand(STATUS_COMMAND);
    if (!validation.ok) {
      return { available: false, reason: validation.error.message };
    }

    const argv = [...this.launcher, ...STATUS_COMMAND];
    let stdout: string;
    try {
      stdout = await this.runner(argv[0], argv.slice(1), {
        timeoutMs: this.timeoutMs,
      });
    } catch (error) {
      const reason = `rpm-ostree status failed: ${describeError(error)}`;
      this.logger.warn("status unavailable", { reason });
      return { available: false, reason };
    }

    let document: unknown;
    try {
      document = JSON.parse(stdout);
    } catch (error) {
      const reason = `rpm-ostree status returned invalid JSON: ${describeError(error)}`;
      this.logger.warn("status unavailable", { reason });
      return { available: false, reason };
    }

    try {
      return { available: true, deployments: parseStatus(document) };
    } catch (error) {
      const reason = describeError(error);
      this.logger.warn("status unavailable", { reason });
      return { available: false, reason };
    }
  }
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
