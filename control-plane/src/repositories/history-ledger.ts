import { z } from "zod";
import type { OperationType } from "../domain/operation.js";

export const MAX_HISTORY_ENTRIES = 50;

export interface HistoryEntry {
  readonly command: string;
  /** ISO-8601 time the entry was appended. */
  readonly timestamp: string;
  readonly success: boolean;
  readonly imageName: string;
  readonly operationType: OperationType;
  readonly userId: number | null;
  readonly sessionId: string | null;
  readonly errorMessage: string | null;
}

export interface AddHistoryEntryInput {
  readonly command: string;
  readonly success: boolean;
  readonly imageName: string;
  readonly operationType: OperationType;
  readonly errorMessage?: string;
  readonly timestamp?: Date;
}

/**
 * Append-only audit log of executed mutations, newest entry first, never
 * more than {@link MAX_HISTORY_ENTRIES} long.
 */
export interface HistoryLedger {
  addEntry(input: AddHistoryEntryInput): Promise<HistoryEntry>;
  getRecentEntries(limit?: number): Promise<readonly HistoryEntry[]>;
  getEntriesByType(
    operationType: OperationType,
  ): Promise<readonly HistoryEntry[]>;
  getEntriesByOutcome(success: boolean): Promise<readonly HistoryEntry[]>;
  clear(): Promise<void>;
}

export interface AuditIdentity {
  readonly userId: number | null;
  readonly sessionId: string | null;
}

export function currentAuditIdentity(
  env: NodeJS.ProcessEnv = process.env,
): AuditIdentity {
  return {
    userId: typeof process.getuid === "function" ? process.getuid() : null,
    sessionId: env.XDG_SESSION_ID ?? env.SESSIONID ?? null,
  };
}

export const historyEntrySchema = z.object({
  command: z.string(),
  timestamp: z.string(),
  success: z.boolean(),
  imageName: z.string(),
  operationType: z.enum(["rebase", "rollback"]),
  userId: z.number().int().nullable().default(null),
  sessionId: z.string().nullable().default(null),
  errorMessage: z.string().nullable().default(null),
});

export function createHistoryEntry(
  input: AddHistoryEntryInput,
  identity: AuditIdentity,
): HistoryEntry {
  return {
    command: input.command,
    timestamp: (input.timestamp ?? new Date()).toISOString(),
    success: input.success,
    imageName: input.imageName,
    operationType: input.operationType,
    userId: identity.userId,
    sessionId: identity.sessionId,
    errorMessage: input.errorMessage ?? null,
  };
}

export function prependBounded(
  entries: readonly HistoryEntry[],
  entry: HistoryEntry,
  max: number = MAX_HISTORY_ENTRIES,
): HistoryEntry[] {
  return [entry, ...entries].slice(0, max);
}

export function normalizeLimit(limit: number | undefined): number {
  if (limit === undefined || !Number.isFinite(limit)) {
    return MAX_HISTORY_ENTRIES;
  }
  return Math.max(0, Math.min(MAX_HISTORY_ENTRIES, Math.floor(limit)));
}
