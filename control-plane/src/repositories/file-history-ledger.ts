import { randomUUID } from "node:crypto";
import { chmod, mkdir, readFile, rename, rm, writeFile } from "node:fs/promises";
import { homedir } from "node:os";
import path from "node:path";
import type { OperationType } from "../domain/operation.js";
import { createLogger, type Logger } from "../observability/logger.js";
import {
  createHistoryEntry,
  currentAuditIdentity,
  historyEntrySchema,
  normalizeLimit,
  prependBounded,
  type AddHistoryEntryInput,
  type AuditIdentity,
  type HistoryEntry,
  type HistoryLedger,
} from "./history-ledger.js";

export const HISTORY_FILE_NAME = "command_history.json";
export const APP_DATA_DIRECTORY = "atomic-image-manager";

const FILE_MODE = 0o600;
const DIRECTORY_MODE = 0o700;

export interface FileHistoryLedgerOptions {
  /** Directory holding the ledger file; defaults to the XDG data home. */
  readonly dataDir?: string;
  readonly identity?: AuditIdentity;
  readonly logger?: Logger;
}

export function resolveDataDirectory(
  env: NodeJS.ProcessEnv = process.env,
  home: string = homedir(),
): string {
  const base = env.XDG_DATA_HOME || path.join(home, ".local", "share");
  return path.join(base, APP_DATA_DIRECTORY);
}

/**
 * JSON-file ledger. Every read and write goes through one promise chain, so
 * a prune never interleaves with another append.
 */
export class FileHistoryLedger implements HistoryLedger {
  readonly filePath: string;
  private readonly dataDir: string;
  private readonly identity: AuditIdentity;
  private readonly logger: Logger;
  private queue: Promise<void> = Promise.resolve();

  constructor(options: FileHistoryLedgerOptions = {}) {
    this.dataDir = options.dataDir ?? resolveDataDirectory();
    this.filePath = path.join(this.dataDir, HISTORY_FILE_NAME);
    this.identity = options.identity ?? currentAuditIdentity();
    this.logger = (options.logger ?? createLogger()).child({
      component: "history-ledger",
    });
  }

  addEntry(input: AddHistoryEntryInput): Promise<HistoryEntry> {
    return this.serialize(async () => {
      const entry = createHistoryEntry(input, this.identity);
      this.audit(entry);
      const entries = await this.load();
      await this.save(prependBounded(entries, entry));
      return entry;
    });
  }

  getRecentEntries(limit?: number): Promise<readonly HistoryEntry[]> {
    return this.serialize(async () => {
      const entries = await this.load();
      return entries.slice(0, normalizeLimit(limit));
    });
  }

  getEntriesByType(
    operationType: OperationType,
  ): Promise<readonly HistoryEntry[]> {
    return this.serialize(async () => {
      const entries = await this.load();
      return entries.filter((entry) => entry.operationType === operationType);
    });
  }

  getEntriesByOutcome(success: boolean): Promise<readonly HistoryEntry[]> {
    return this.serialize(async () => {
      const entries = await this.load();
      return entries.filter((entry) => entry.success === success);
    });
  }

  clear(): Promise<void> {
    return this.serialize(() => this.save([]));
  }

  private serialize<T>(task: () => Promise<T>): Promise<T> {
    const run = this.queue.then(task);
    // The caller observes failures through `run`; the chain itself keeps going.
    this.queue = run.then(
      () => undefined,
      () => undefined,
    );
    return run;
  }

  private async load(): Promise<HistoryEntry[]> {
    let raw: string;
    try {
      raw = await readFile(this.filePath, "utf8");
    } catch (error) {
      if (isErrnoCode(error, "ENOENT")) {
        return [];
      }
      throw error;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (error) {
      this.logger.warn("history file is not valid json; starting empty", {
        file: this.filePath,
        error: error instanceof Error ? error.message : String(error),
      });
      return [];
    }

    if (!Array.isArray(parsed)) {
      this.logger.warn("history file does not hold an array; starting empty", {
        file: this.filePath,
      });
      return [];
    }

    const entries: HistoryEntry[] = [];
    parsed.forEach((item: unknown, index) => {
      const entry = historyEntrySchema.safeParse(item);
      if (entry.success) {
        entries.push(entry.data);
        return;
      }
      this.logger.warn("skipping malformed history entry", {
        file: this.filePath,
        index,
      });
    });
    return entries;
  }

  private async save(entries: readonly HistoryEntry[]): Promise<void> {
    await mkdir(this.dataDir, { recursive: true, mode: DIRECTORY_MODE });

    const tempPath = `${this.filePath}.${randomUUID()}.tmp`;
    try {
      await writeFile(tempPath, `${JSON.stringify(entries, null, 2)}\n`, {
        encoding: "utf8",
        mode: FILE_MODE,
      });
      await rename(tempPath, this.filePath);
      await chmod(this.filePath, FILE_MODE);
    } catch (error) {
      await rm(tempPath, { force: true });
      this.logger.error("failed to write history file", {
        file: this.filePath,
        error: error instanceof Error ? error.message : String(error),
      });
      throw error;
    }
  }

  private audit(entry: HistoryEntry): void {
    const fields = {
      operationType: entry.operationType,
      command: entry.command,
      imageName: entry.imageName,
      success: entry.success,
      userId: entry.userId ?? "unknown",
      sessionId: entry.sessionId ?? "unknown",
      errorMessage: entry.errorMessage ?? undefined,
    };
    if (entry.success) {
      this.logger.info(`${entry.operationType} command executed`, fields);
      return;
    }
    this.logger.warn(`${entry.operationType} command failed`, fields);
  }
}

function isErrnoCode(error: unknown, code: string): boolean {
  return (
    error instanceof Error && "code" in error && error.code === code
  );
}
