import type { OperationType } from "../domain/operation.js";
import {
  createHistoryEntry,
  currentAuditIdentity,
  normalizeLimit,
  prependBounded,
  type AddHistoryEntryInput,
  type AuditIdentity,
  type HistoryEntry,
  type HistoryLedger,
} from "./history-ledger.js";

export class InMemoryHistoryLedger implements HistoryLedger {
  private entries: HistoryEntry[] = [];

  constructor(
    private readonly identity: AuditIdentity = currentAuditIdentity(),
  ) {}

  async addEntry(input: AddHistoryEntryInput): Promise<HistoryEntry> {
    const entry = createHistoryEntry(input, this.identity);
    this.entries = prependBounded(this.entries, entry);
    return entry;
  }

  async getRecentEntries(limit?: number): Promise<readonly HistoryEntry[]> {
    return this.entries.slice(0, normalizeLimit(limit));
  }

  async getEntriesByType(
    operationType: OperationType,
  ): Promise<readonly HistoryEntry[]> {
    return this.entries.filter((entry) => entry.operationType === operationType);
  }

  async getEntriesByOutcome(success: boolean): Promise<readonly HistoryEntry[]> {
    return this.entries.filter((entry) => entry.success === success);
  }

  async clear(): Promise<void> {
    this.entries = [];
  }
}
