import { spawn } from "node:child_process";
import type { Readable } from "node:stream";
import { finished } from "node:stream/promises";
import {
  validateCommand,
  type ValidationOptions,
} from "../commands/command-validator.js";
import {
  classifyFailure,
  DEFAULT_CLASSIFICATION_TAIL,
  DEFAULT_ERROR_CLASSIFICATION,
  type ErrorClassificationRule,
} from "./error-classifier.js";
import { LineSplitter } from "./line-splitter.js";
import {
  silentExecutionLogger,
  type Command,
  type ExecutionEngine,
  type ExecutionLogger,
  type ExecutionResult,
  type LineHandler,
} from "./types.js";

export interface SpawnedProcess {
  readonly stdout: Readable | null;
  readonly stderr: Readable | null;
  once(event: "error", listener: (error: Error) => void): this;
  once(
    event: "close",
    listener: (code: number | null, signal: NodeJS.Signals | null) => void,
  ): this;
}

export type ProcessSpawner = (
  file: string,
  args: readonly string[],
) => SpawnedProcess;

export const spawnWithoutShell: ProcessSpawner = (file, args) =>
  spawn(file, [...args], {
    shell: false,
    stdio: ["ignore", "pipe", "pipe"],
    env: { ...process.env, LC_ALL: "C.UTF-8" },
  });

export interface ProcessExecutionEngineOptions extends ValidationOptions {
  /** Prepended to every validated command, e.g. `["flatpak-spawn", "--host"]`. */
  readonly launcher?: readonly string[];
  readonly spawner?: ProcessSpawner;
  readonly classificationRules?: readonly ErrorClassificationRule[];
  readonly classificationTail?: number;
  /** Lines kept in `ExecutionResult.output`; older lines are dropped first. */
  readonly maxOutputLines?: number;
  readonly logger?: ExecutionLogger;
}

export const DEFAULT_MAX_OUTPUT_LINES = 1000;

type ProcessExit =
  | { readonly kind: "exited"; readonly code: number | null }
  | { readonly kind: "spawn_failed"; readonly error: Error };

export class ProcessExecutionEngine implements ExecutionEngine {
  private readonly launcher: readonly string[];
  private readonly spawner: ProcessSpawner;
  private readonly rules: readonly ErrorClassificationRule[];
  private readonly tail: number;
  private readonly maxOutputLines: number;
  private readonly logger: ExecutionLogger;

  constructor(private readonly options: ProcessExecutionEngineOptions = {}) {
    this.launcher = options.launcher ?? [];
    this.spawner = options.spawner ?? spawnWithoutShell;
    this.rules = options.classificationRules ?? DEFAULT_ERROR_CLASSIFICATION;
    this.tail = options.classificationTail ?? DEFAULT_CLASSIFICATION_TAIL;
    this.maxOutputLines = Math.max(
      1,
      options.maxOutputLines ?? DEFAULT_MAX_OUTPUT_LINES,
    );
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
      this.logger.warn("command rejected before spawn", {
        reason: validation.error.kind,
        detail: validation.error.message,
      });
      return {
        success: false,
        output: [validation.error.message],
        errorKind: "invalid_command",
        exitCode: null,
      };
    }

    const argv = [...this.launcher, ...command];
    const output: string[] = [];
    const deliver = (line: string): void => {
      output.push(line);
      if (output.length > this.maxOutputLines) {
        output.splice(0, output.length - this.maxOutputLines);
      }
      try {
        onLine(line);
      } catch (error) {
        this.logger.warn("progress line handler threw", {
          error: error instanceof Error ? error.message : String(error),
        });
      }
    };

    const exit = await this.runProcess(argv, deliver);

    if (exit.kind === "spawn_failed") {
      deliver(`error: ${exit.error.message}`);
      const errorKind = classifyFailure(output, this.rules, this.tail);
      this.logger.error("command failed to start", {
        program: argv[0],
        error: exit.error.message,
        errorKind,
      });
      return { success: false, output, errorKind, exitCode: null };
    }

    if (exit.code === 0) {
      this.logger.info("command finished", { program: command[0], exitCode: 0 });
      return { success: true, output, errorKind: null, exitCode: 0 };
    }

    const errorKind = classifyFailure(output, this.rules, this.tail);
    this.logger.warn("command failed", {
      program: command[0],
      exitCode: exit.code,
      errorKind,
    });
    return { success: false, output, errorKind, exitCode: exit.code };
  }

  private async runProcess(
    argv: readonly string[],
    deliver: (line: string) => void,
  ): Promise<ProcessExit> {
    let child: SpawnedProcess;
    try {
      child = this.spawner(argv[0], argv.slice(1));
    } catch (error) {
      return {
        kind: "spawn_failed",
        error: error instanceof Error ? error : new Error(String(error)),
      };
    }

    const exited = new Promise<ProcessExit>((resolve) => {
      child.once("error", (error) => resolve({ kind: "spawn_failed", error }));
      child.once("close", (code) => resolve({ kind: "exited", code }));
    });

    const drained = Promise.all(
      [child.stdout, child.stderr].map((stream) =>
        stream ? drainLines(stream, deliver, this.logger) : Promise.resolve(),
      ),
    );

    const exit = await exited;
    if (exit.kind === "exited") {
      await drained;
    }
    return exit;
  }
}

async function drainLines(
  stream: Readable,
  deliver: (line: string) => void,
  logger: ExecutionLogger,
): Promise<void> {
  const splitter = new LineSplitter(deliver);
  stream.setEncoding("utf8");
  stream.on("data", (chunk: string | Buffer) => {
    splitter.push(typeof chunk === "string" ? chunk : chunk.toString("utf8"));
  });
  try {
    await finished(stream);
  } catch (error) {
    logger.warn("output stream closed abnormally", {
      error: error instanceof Error ? error.message : String(error),
    });
  } finally {
    splitter.flush();
  }
}
