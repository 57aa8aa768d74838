import { describe, expect, test } from "vitest";
import { OperationLease } from "../src/services/operation-lease.js";
import {
  BackgroundScheduler,
  createScheduler,
  ImmediateScheduler,
} from "../src/services/scheduler.js";

describe("schedulers", () => {
  test("should run immediate tasks on the caller's chain", async () => {
    const order: string[] = [];
    const done = new ImmediateScheduler().schedule(async () => {
      order.push("task");
      return 1;
    });
    order.push("after schedule");

    expect(await done).toBe(1);
    expect(order).toEqual(["task", "after schedule"]);
  });

  test("should defer background tasks until the caller returns", async () => {
    const order: string[] = [];
    const done = new BackgroundScheduler().schedule(async () => {
      order.push("task");
      return "ok";
    });
    order.push("after schedule");

    expect(await done).toBe("ok");
    expect(order).toEqual(["after schedule", "task"]);
  });

  test("should propagate task failures", async () => {
    await expect(
      new BackgroundScheduler().schedule(async () => {
        throw new Error("boom");
      }),
    ).rejects.toThrow("boom");
  });

  test("should pick the scheduler by kind", () => {
    expect(createScheduler("immediate")).toBeInstanceOf(ImmediateScheduler);
    expect(createScheduler("background")).toBeInstanceOf(BackgroundScheduler);
  });
});

describe("OperationLease", () => {
  test("should grant the lease to one holder at a time", () => {
    const lease = new OperationLease();
    const first = lease.tryAcquire("op-1");

    expect(first?.operationId).toBe("op-1");
    expect(lease.tryAcquire("op-2")).toBeNull();
    expect(lease.holder).toBe("op-1");
    expect(lease.isHeld()).toBe(true);

    first?.release();
    expect(lease.isHeld()).toBe(false);
    expect(lease.tryAcquire("op-2")?.operationId).toBe("op-2");
  });

  test("should ignore a second release of an old handle", () => {
    const lease = new OperationLease();
    const first = lease.tryAcquire("op-1");
    first?.release();
    lease.tryAcquire("op-2");

    first?.release();
    expect(lease.holder).toBe("op-2");
  });
});
