import { EventEmitter } from "node:events";
import { PassThrough } from "node:stream";
import { describe, expect, test, vi } from "vitest";
import {
  ProcessExecutionEngine,
  type ProcessSpawner,
} from "../src/engine/process-execution-engine.js";

interface FakeScript {
  readonly stdout?: readonly string[];
  readonly stderr?: readonly string[];
  readonly exitCode?: number;
  readonly spawnError?: Error;
}

class FakeProcess extends EventEmitter {
  readonly stdout = new PassThrough();
  readonly stderr = new PassThrough();
}

function createFakeSpawner(script: FakeScript): {
  spawner: ProcessSpawner;
  calls: Array<{ file: string; args: readonly string[] }>;
} {
  const calls: Array<{ file: string; args: readonly string[] }> = [];
  const spawner: ProcessSpawner = (file, args) => {
    calls.push({ file, args });
    const child = new FakeProcess();
    setImmediate(() => {
      if (script.spawnError) {
        child.emit("error", script.spawnError);
        return;
      }
      for (const chunk of script.stdout ?? []) {
        child.stdout.write(chunk);
      }
      for (const chunk of script.stderr ?? []) {
        child.stderr.write(chunk);
      }
      child.stdout.end();
      child.stderr.end();
      child.emit("close", script.exitCode ?? 0, null);
    });
    return child;
  };
  return { spawner, calls };
}

describe("ProcessExecutionEngine", () => {
  test("should stream lines in order and report success", async () => {
    const { spawner, calls } = createFakeSpawner({
      stdout: ["Pulling manifest\nDownloading 4", "0%\r", "Staging deployment... done\n"],
    });
    const engine = new ProcessExecutionEngine({ spawner });
    const lines: string[] = [];

    const result = await engine.executeWithProgress(
      ["rpm-ostree", "rebase", "ghcr.io/ublue-os/bluefin:stable"],
      (line) => lines.push(line),
    );

    expect(calls).toEqual([
      { file: "rpm-ostree", args: ["rebase", "ghcr.io/ublue-os/bluefin:stable"] },
    ]);
    expect(lines).toEqual([
      "Pulling manifest",
      "Downloading 40%",
      "Staging deployment... done",
    ]);
    expect(result).toEqual({
      success: true,
      output: lines,
      errorKind: null,
      exitCode: 0,
    });
  });

  test("should reject an invalid command without spawning", async () => {
    const spawner = vi.fn<ProcessSpawner>();
    const engine = new ProcessExecutionEngine({ spawner });

    const result = await engine.executeWithProgress(["sh", "-c", "reboot"], () => {});

    expect(spawner).not.toHaveBeenCalled();
    expect(result.success).toBe(false);
    expect(result.errorKind).toBe("invalid_command");
    expect(result.exitCode).toBeNull();
    expect(result.output).toHaveLength(1);
  });

  test("should prepend the launcher to the validated command", async () => {
    const { spawner, calls } = createFakeSpawner({});
    const engine = new ProcessExecutionEngine({
      spawner,
      launcher: ["flatpak-spawn", "--host"],
    });

    await engine.executeWithProgress(["rpm-ostree", "status"], () => {});

    expect(calls).toEqual([
      { file: "flatpak-spawn", args: ["--host", "rpm-ostree", "status"] },
    ]);
  });

  test("should classify a non-zero exit from the output tail", async () => {
    const { spawner } = createFakeSpawner({
      stderr: ["error: Transaction in progress: deploy\n"],
      exitCode: 1,
    });
    const engine = new ProcessExecutionEngine({ spawner });

    const result = await engine.executeWithProgress(["rpm-ostree", "rollback"], () => {});

    expect(result).toEqual({
      success: false,
      output: ["error: Transaction in progress: deploy"],
      errorKind: "busy",
      exitCode: 1,
    });
  });

  test("should use a custom classification table", async () => {
    const { spawner } = createFakeSpawner({
      stderr: ["error: registry says no\n"],
      exitCode: 1,
    });
    const engine = new ProcessExecutionEngine({
      spawner,
      classificationRules: [{ kind: "auth", keywords: ["registry says no"] }],
    });

    const result = await engine.executeWithProgress(["rpm-ostree", "rollback"], () => {});

    expect(result.errorKind).toBe("auth");
  });

  test("should report a spawn failure as a classified result", async () => {
    const { spawner } = createFakeSpawner({
      spawnError: new Error("spawn rpm-ostree ENOENT"),
    });
    const engine = new ProcessExecutionEngine({ spawner });
    const lines: string[] = [];

    const result = await engine.executeWithProgress(["rpm-ostree", "status"], (line) =>
      lines.push(line),
    );

    expect(lines).toEqual(["error: spawn rpm-ostree ENOENT"]);
    expect(result).toEqual({
      success: false,
      output: ["error: spawn rpm-ostree ENOENT"],
      errorKind: "not_found",
      exitCode: null,
    });
  });

  test("should report a spawner that throws", async () => {
    const engine = new ProcessExecutionEngine({
      spawner: () => {
        throw new Error("spawn EACCES");
      },
    });

    const result = await engine.executeWithProgress(["rpm-ostree", "status"], () => {});

    expect(result.success).toBe(false);
    expect(result.output).toEqual(["error: spawn EACCES"]);
    expect(result.errorKind).toBe("unknown");
  });

  test("should keep running when the line handler throws", async () => {
    const { spawner } = createFakeSpawner({ stdout: ["one\ntwo\n"] });
    const warn = vi.fn();
    const engine = new ProcessExecutionEngine({
      spawner,
      logger: { info: () => {}, warn, error: () => {} },
    });

    const result = await engine.executeWithProgress(["rpm-ostree", "status"], () => {
      throw new Error("observer broke");
    });

    expect(result.success).toBe(true);
    expect(result.output).toEqual(["one", "two"]);
    expect(warn).toHaveBeenCalledTimes(2);
  });

  test("should keep only the newest 1000 output lines", async () => {
    const redraws = Array.from(
      { length: 20000 },
      (_, index) => `Receiving objects: ${index}%\r`,
    );
    const { spawner } = createFakeSpawner({ stdout: [redraws.join("")] });
    const engine = new ProcessExecutionEngine({ spawner });
    let delivered = 0;

    const result = await engine.executeWithProgress(["rpm-ostree", "status"], () => {
      delivered += 1;
    });

    expect(delivered).toBe(20000);
    expect(result.output).toHaveLength(1000);
    expect(result.output[0]).toBe("Receiving objects: 19000%");
    expect(result.output[999]).toBe("Receiving objects: 19999%");
  });

  test("should classify from the retained tail when output is capped", async () => {
    const { spawner } = createFakeSpawner({
      stderr: ["line one\nline two\nerror: Could not resolve host: ghcr.io\n"],
      exitCode: 1,
    });
    const engine = new ProcessExecutionEngine({ spawner, maxOutputLines: 2 });

    const result = await engine.executeWithProgress(["rpm-ostree", "status"], () => {});

    expect(result.output).toEqual([
      "line two",
      "error: Could not resolve host: ghcr.io",
    ]);
    expect(result.errorKind).toBe("network");
  });
});
