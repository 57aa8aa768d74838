import { readFile } from "node:fs/promises";
import {
  DEFAULT_REGISTRY_ALLOWLIST,
  type RegistryAllowlist,
} from "@atomic-image-manager/executor";
import { z } from "zod";
import { parseLogLevel, type LogLevel } from "./observability/logger.js";
import { resolveDataDirectory } from "./repositories/file-history-ledger.js";
import type { SchedulerKind } from "./services/scheduler.js";

export type PrivilegeMode = "polkit" | "none";

export interface ImageManagerConfig {
  readonly port: number;
  readonly host: string;
  readonly dataDir: string;
  readonly launcher: readonly string[];
  readonly privilege: PrivilegeMode;
  readonly scheduler: SchedulerKind;
  readonly logLevel: LogLevel;
  readonly registryAllowlist: RegistryAllowlist;
  readonly statusTimeoutMs: number;
  readonly catalogFile?: string;
}

export class ConfigError extends Error {
  readonly variable: string;

  constructor(variable: string, message: string) {
    super(`${variable}: ${message}`);
    this.name = "ConfigError";
    this.variable = variable;
  }
}

const FLATPAK_LAUNCHER = ["flatpak-spawn", "--host"] as const;

const registryAllowlistSchema = z
  .array(
    z.object({
      host: z.string().min(1).regex(/^[a-z0-9.-]+(?::\d+)?$/i),
      paths: z.array(z.string().min(1)).min(1),
    }),
  )
  .min(1);

export async function loadConfig(
  env: NodeJS.ProcessEnv = process.env,
): Promise<ImageManagerConfig> {
  return {
    port: parseNumber(env.PORT, 8790),
    host: env.IMAGE_MANAGER_HOST || "127.0.0.1",
    dataDir: env.IMAGE_MANAGER_DATA_DIR || resolveDataDirectory(env),
    launcher:
      parseCommand("IMAGE_MANAGER_LAUNCHER", env.IMAGE_MANAGER_LAUNCHER) ??
      (env.FLATPAK_ID ? FLATPAK_LAUNCHER : []),
    privilege: parseChoice(
      "IMAGE_MANAGER_PRIVILEGE",
      env.IMAGE_MANAGER_PRIVILEGE,
      ["polkit", "none"],
      "polkit",
    ),
    scheduler: parseChoice(
      "IMAGE_MANAGER_SCHEDULER",
      env.IMAGE_MANAGER_SCHEDULER,
      ["background", "immediate"],
      "background",
    ),
    logLevel: parseLogLevel(env.IMAGE_MANAGER_LOG_LEVEL) ?? "info",
    registryAllowlist: await loadRegistryAllowlist(
      env.IMAGE_MANAGER_REGISTRY_ALLOWLIST,
    ),
    statusTimeoutMs: parseNumber(env.IMAGE_MANAGER_STATUS_TIMEOUT_MS, 10_000),
    catalogFile: env.IMAGE_MANAGER_CATALOG || undefined,
  };
}

export async function loadRegistryAllowlist(
  file: string | undefined,
): Promise<RegistryAllowlist> {
  if (!file) {
    return DEFAULT_REGISTRY_ALLOWLIST;
  }

  let raw: string;
  try {
    raw = await readFile(file, "utf8");
  } catch (error) {
    throw new ConfigError(
      "IMAGE_MANAGER_REGISTRY_ALLOWLIST",
      `cannot read ${file}: ${error instanceof Error ? error.message : String(error)}`,
    );
  }

  let document: unknown;
  try {
    document = JSON.parse(raw);
  } catch {
    throw new ConfigError(
      "IMAGE_MANAGER_REGISTRY_ALLOWLIST",
      `${file} is not valid JSON`,
    );
  }

  const parsed = registryAllowlistSchema.safeParse(document);
  if (!parsed.success) {
    throw new ConfigError(
      "IMAGE_MANAGER_REGISTRY_ALLOWLIST",
      parsed.error.issues
        .map((issue) => `${issue.path.join(".") || "root"}: ${issue.message}`)
        .join("; "),
    );
  }
  return parsed.data.map((entry) => ({
    host: entry.host.toLowerCase(),
    paths: entry.paths,
  }));
}

function parseCommand(variable: string, raw?: string): readonly string[] | undefined {
  if (raw === undefined) {
    return undefined;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    throw new ConfigError(variable, "expected a JSON array of strings");
  }
  if (Array.isArray(parsed) && parsed.every((item) => typeof item === "string")) {
    return parsed;
  }
  throw new ConfigError(variable, "expected a JSON array of strings");
}

function parseNumber(raw: string | undefined, fallback: number): number {
  if (!raw) {
    return fallback;
  }
  const value = Number(raw);
  if (!Number.isFinite(value) || value < 0) {
    return fallback;
  }
  return value;
}

function parseChoice<T extends string>(
  variable: string,
  raw: string | undefined,
  choices: readonly T[],
  fallback: T,
): T {
  if (!raw) {
    return fallback;
  }
  const match = choices.find((choice) => choice === raw);
  if (match === undefined) {
    throw new ConfigError(variable, `expected one of ${choices.join(", ")}`);
  }
  return match;
}
