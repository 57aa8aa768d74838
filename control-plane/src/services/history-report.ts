import type {
  HistoryEntry,
  HistoryLedger,
} from "../repositories/history-ledger.js";

export interface OutcomeCounts {
  total: number;
  success: number;
  failed: number;
}

export interface HistoryReport {
  readonly generatedAt: string;
  readonly summary: OutcomeCounts & {
    /** Percentage with one decimal, e.g. "66.7%", or "N/A" when empty. */
    readonly successRate: string;
  };
  readonly byUser: Record<string, OutcomeCounts>;
  readonly byOperation: Record<string, OutcomeCounts>;
  readonly recentFailures: readonly {
    readonly timestamp: string;
    readonly command: string;
    readonly error: string;
    readonly user: string;
  }[];
}

/** Only the newest entries are searched for failures to report. */
const FAILURE_WINDOW = 10;

export function summarizeHistory(
  entries: readonly HistoryEntry[],
  now: Date = new Date(),
): HistoryReport {
  const summary: OutcomeCounts = { total: 0, success: 0, failed: 0 };
  const byUser: Record<string, OutcomeCounts> = {};
  const byOperation: Record<string, OutcomeCounts> = {};

  for (const entry of entries) {
    count(summary, entry.success);
    count(bucket(byUser, userLabel(entry)), entry.success);
    count(bucket(byOperation, entry.operationType), entry.success);
  }

  return {
    generatedAt: now.toISOString(),
    summary: {
      ...summary,
      successRate:
        summary.total > 0
          ? `${((summary.success / summary.total) * 100).toFixed(1)}%`
          : "N/A",
    },
    byUser,
    byOperation,
    recentFailures: entries
      .slice(0, FAILURE_WINDOW)
      .filter((entry) => !entry.success)
      .map((entry) => ({
        timestamp: entry.timestamp,
        command: entry.command,
        error: entry.errorMessage ?? "Unknown error",
        user: userLabel(entry),
      })),
  };
}

function userLabel(entry: HistoryEntry): string {
  return entry.userId === null ? "unknown" : String(entry.userId);
}

function bucket(
  groups: Record<string, OutcomeCounts>,
  key: string,
): OutcomeCounts {
  const existing = groups[key];
  if (existing) {
    return existing;
  }
  const created = { total: 0, success: 0, failed: 0 };
  groups[key] = created;
  return created;
}

function count(counts: OutcomeCounts, success: boolean): void {
  counts.total += 1;
  if (success) {
    counts.success += 1;
  } else {
    counts.failed += 1;
  }
}

/** Every stored entry as an indented JSON array, newest first. */
export async function exportHistory(ledger: HistoryLedger): Promise<string> {
  const entries = await ledger.getRecentEntries();
  return `${JSON.stringify(entries, null, 2)}\n`;
}
