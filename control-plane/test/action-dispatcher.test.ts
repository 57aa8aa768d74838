import type { ExecutionEngine } from "@atomic-image-manager/executor";
import { describe, expect, test, vi } from "vitest";
import { StaticStatusSource } from "../src/adapters/static-status-source.js";
import { createLogger } from "../src/observability/logger.js";
import { InMemoryHistoryLedger } from "../src/repositories/in-memory-history-ledger.js";
import {
  ActionDispatcher,
  imageManagerActionSchema,
} from "../src/services/action-dispatcher.js";
import { PendingConfirmationRegistry } from "../src/services/confirmation-gate.js";
import { ImageCatalog } from "../src/services/image-catalog.js";
import { ImageOrchestrator } from "../src/services/image-orchestrator.js";
import { ImmediateScheduler } from "../src/services/scheduler.js";
import { BlockingEngine, ScriptedEngine } from "./fakes.js";
import { twoDeploymentStatus } from "./fixtures/status.js";

const IMAGE = "ghcr.io/ublue-os/bluefin:stable";

async function createDispatcher(engine: ExecutionEngine = new ScriptedEngine()) {
  const statusSource = new StaticStatusSource(twoDeploymentStatus());
  const ledger = new InMemoryHistoryLedger({ userId: 1000, sessionId: null });
  const catalog = await ImageCatalog.load();
  const orchestrator = new ImageOrchestrator({
    engine,
    statusSource,
    ledger,
    presenter: new PendingConfirmationRegistry(),
    scheduler: new ImmediateScheduler(),
    catalog,
    logger: createLogger({}, { level: "error" }),
  });
  const dispatcher = new ActionDispatcher({ orchestrator, statusSource, ledger, catalog });
  return { dispatcher, orchestrator, ledger, statusSource };
}

describe("imageManagerActionSchema", () => {
  test("should accept known actions and reject others", () => {
    expect(
      imageManagerActionSchema.safeParse({ type: "rebase", imageRef: IMAGE }).success,
    ).toBe(true);
    expect(imageManagerActionSchema.safeParse({ type: "reboot" }).success).toBe(false);
    expect(imageManagerActionSchema.safeParse({ type: "rebase" }).success).toBe(false);
  });
});

describe("ActionDispatcher", () => {
  test("should start a rebase and stop at the confirmation", async () => {
    const { dispatcher, orchestrator } = await createDispatcher();

    const response = await dispatcher.dispatch({ type: "rebase", imageRef: IMAGE });

    expect(response.ok).toBe(true);
    const [operation] = orchestrator.listOperations();
    expect(response).toEqual({
      ok: true,
      data: { operationId: operation.operationId, state: "awaiting_confirmation" },
    });
  });

  test("should report a rejected rebase with its reason", async () => {
    const { dispatcher } = await createDispatcher();

    const response = await dispatcher.dispatch({
      type: "rebase",
      imageRef: "ghcr.io/someone/else:latest",
    });

    expect(response).toMatchObject({
      ok: false,
      code: "rejected",
      reason: "disallowed_registry_or_path",
    });
    expect(response.ok ? "" : response.error).toMatch(
      /^Image path someone\/else is not allowed on ghcr\.io\. Permitted paths: ublue-os\/bluefin, ublue-os\/bluefin-dx, /,
    );
  });

  test("should confirm and record the executed rebase", async () => {
    const { dispatcher, orchestrator, ledger } = await createDispatcher();
    const started = await dispatcher.dispatch({ type: "rebase", imageRef: IMAGE });
    const operationId = orchestrator.listOperations()[0].operationId;

    const confirmed = await dispatcher.dispatch({ type: "confirm", operationId });
    expect(started.ok).toBe(true);
    expect(confirmed).toEqual({
      ok: true,
      data: { operationId, accepted: true, state: "awaiting_confirmation" },
    });

    await vi.waitFor(() => {
      expect(orchestrator.getOperation(operationId)?.state).toBe("completed");
    });
    const history = await dispatcher.dispatch({ type: "get-history", limit: 5 });
    expect(history).toEqual({ ok: true, data: { entries: await ledger.getRecentEntries(5) } });
    expect(await ledger.getRecentEntries()).toHaveLength(1);
  });

  test("should filter history by outcome", async () => {
    const { dispatcher, ledger } = await createDispatcher();
    await ledger.addEntry({
      command: "rpm-ostree rollback",
      success: false,
      imageName: "previous",
      operationType: "rollback",
    });

    const failed = await dispatcher.dispatch({ type: "get-history", success: false });
    const succeeded = await dispatcher.dispatch({ type: "get-history", success: true });

    expect(failed).toMatchObject({
      ok: true,
      data: { entries: [{ command: "rpm-ostree rollback", success: false }] },
    });
    expect(succeeded).toEqual({ ok: true, data: { entries: [] } });
  });

  test("should report conflicts and unknown operations", async () => {
    const engine = new BlockingEngine();
    const { dispatcher, orchestrator } = await createDispatcher(engine);

    await dispatcher.dispatch({ type: "rebase", imageRef: IMAGE });
    const operationId = orchestrator.listOperations()[0].operationId;
    await dispatcher.dispatch({ type: "confirm", operationId });
    await engine.started;

    expect(await dispatcher.dispatch({ type: "rebase", imageRef: IMAGE })).toMatchObject({
      ok: false,
      code: "conflict",
      reason: "operation_in_progress",
    });
    expect(await dispatcher.dispatch({ type: "cancel", operationId })).toMatchObject({
      ok: false,
      code: "conflict",
      operationId,
    });
    expect(await dispatcher.dispatch({ type: "cancel", operationId: "missing" })).toEqual({
      ok: false,
      code: "not_found",
      error: "operation not found: missing",
    });
    expect(await dispatcher.dispatch({ type: "get-operation", operationId: "missing" })).toEqual({
      ok: false,
      code: "not_found",
      error: "operation not found: missing",
    });

    engine.finish();
  });

  test("should list deployments with their formatted lines", async () => {
    const { dispatcher } = await createDispatcher();

    const response = await dispatcher.dispatch({ type: "get-deployments" });

    expect(response.ok).toBe(true);
    expect(response.ok && response.data).toMatchObject({
      available: true,
      formatted: [
        "Deployment 1: ostree-image-signed:docker://ghcr.io/example/os:latest (41.20241001.0, 2024-10-01T00:00:00.000Z) [222222222222] [Currently Booted]",
        "Deployment 2: fedora:fedora/41/x86_64/silverblue (41.20240915.0, 2024-09-15T00:00:00.000Z) [333333333333] [Pinned]",
      ],
    });
  });

  test("should pass an unavailable status through", async () => {
    const { dispatcher, statusSource } = await createDispatcher();
    statusSource.setDocument({});

    expect(await dispatcher.dispatch({ type: "get-deployments" })).toEqual({
      ok: true,
      data: { available: false, reason: "Status document has no deployments array" },
    });
  });

  test("should summarise and clear history", async () => {
    const { dispatcher, ledger } = await createDispatcher();
    await ledger.addEntry({
      command: "rpm-ostree rollback",
      success: false,
      imageName: "previous",
      operationType: "rollback",
      errorMessage: "rpm-ostree is busy with another transaction.",
    });

    const report = await dispatcher.dispatch({ type: "get-history-report" });
    expect(report.ok && report.data).toMatchObject({
      summary: { total: 1, success: 0, failed: 1, successRate: "0.0%" },
    });

    expect(await dispatcher.dispatch({ type: "clear-history" })).toEqual({
      ok: true,
      data: { cleared: true },
    });
    expect(await ledger.getRecentEntries()).toEqual([]);
  });

  test("should return the catalog", async () => {
    const { dispatcher } = await createDispatcher();

    const response = await dispatcher.dispatch({ type: "get-catalog" });
    expect(response.ok && response.data).toMatchObject({
      families: expect.arrayContaining([expect.objectContaining({ id: "bluefin" })]),
    });
  });
});
