import { describe, expect, test } from "vitest";
import type { HistoryEntry } from "../src/repositories/history-ledger.js";
import { InMemoryHistoryLedger } from "../src/repositories/in-memory-history-ledger.js";
import { exportHistory, summarizeHistory } from "../src/services/history-report.js";

function entry(overrides: Partial<HistoryEntry>): HistoryEntry {
  return {
    command: "rpm-ostree rebase ghcr.io/example/os:latest",
    timestamp: "2024-10-01T12:00:00.000Z",
    success: true,
    imageName: "ghcr.io/example/os:latest",
    operationType: "rebase",
    userId: 1000,
    sessionId: "3",
    errorMessage: null,
    ...overrides,
  };
}

describe("summarizeHistory", () => {
  test("should report N/A for an empty history", () => {
    const report = summarizeHistory([], new Date("2024-10-02T00:00:00.000Z"));

    expect(report).toEqual({
      generatedAt: "2024-10-02T00:00:00.000Z",
      summary: { total: 0, success: 0, failed: 0, successRate: "N/A" },
      byUser: {},
      byOperation: {},
      recentFailures: [],
    });
  });

  test("should group outcomes by user and operation", () => {
    const report = summarizeHistory([
      entry({}),
      entry({
        success: false,
        operationType: "rollback",
        command: "rpm-ostree rollback",
        userId: null,
        errorMessage: "Authentication failed: denied",
      }),
      entry({ operationType: "rollback", command: "rpm-ostree rollback" }),
    ]);

    expect(report.summary).toEqual({
      total: 3,
      success: 2,
      failed: 1,
      successRate: "66.7%",
    });
    expect(report.byUser).toEqual({
      "1000": { total: 2, success: 2, failed: 0 },
      unknown: { total: 1, success: 0, failed: 1 },
    });
    expect(report.byOperation).toEqual({
      rebase: { total: 1, success: 1, failed: 0 },
      rollback: { total: 2, success: 1, failed: 1 },
    });
    expect(report.recentFailures).toEqual([
      {
        timestamp: "2024-10-01T12:00:00.000Z",
        command: "rpm-ostree rollback",
        error: "Authentication failed: denied",
        user: "unknown",
      },
    ]);
  });

  test("should only list failures among the ten newest entries", () => {
    const entries = [
      ...Array.from({ length: 10 }, () => entry({})),
      entry({ success: false }),
    ];
    entries[2] = entry({ success: false, errorMessage: null });

    const report = summarizeHistory(entries);
    expect(report.summary.failed).toBe(2);
    expect(report.recentFailures).toHaveLength(1);
    expect(report.recentFailures[0].error).toBe("Unknown error");
  });
});

describe("exportHistory", () => {
  test("should export every entry as indented JSON, newest first", async () => {
    const ledger = new InMemoryHistoryLedger({ userId: 1000, sessionId: "3" });
    await ledger.addEntry({
      command: "rpm-ostree rollback",
      success: true,
      imageName: "previous",
      operationType: "rollback",
      timestamp: new Date("2024-10-01T12:00:00.000Z"),
    });
    await ledger.addEntry({
      command: "rpm-ostree rebase ghcr.io/example/os:latest",
      success: false,
      imageName: "ghcr.io/example/os:latest",
      operationType: "rebase",
      errorMessage: "Network error",
      timestamp: new Date("2024-10-02T12:00:00.000Z"),
    });

    const exported = await exportHistory(ledger);

    expect(exported.endsWith("\n")).toBe(true);
    expect(exported.split("\n")[1]).toBe("  {");
    expect(JSON.parse(exported)).toEqual([
      {
        command: "rpm-ostree rebase ghcr.io/example/os:latest",
        timestamp: "2024-10-02T12:00:00.000Z",
        success: false,
        imageName: "ghcr.io/example/os:latest",
        operationType: "rebase",
        userId: 1000,
        sessionId: "3",
        errorMessage: "Network error",
      },
      {
        command: "rpm-ostree rollback",
        timestamp: "2024-10-01T12:00:00.000Z",
        success: true,
        imageName: "previous",
        operationType: "rollback",
        userId: 1000,
        sessionId: "3",
        errorMessage: null,
      },
    ]);
  });

  test("should export an empty history as an empty array", async () => {
    expect(await exportHistory(new InMemoryHistoryLedger())).toBe("[]\n");
  });
});
