import type { Command } from "@atomic-image-manager/executor";
import { z } from "zod";

export interface Deployment {
  /** First 12 characters of the checksum; unique within one listing. */
  readonly id: string;
  readonly checksum: string;
  readonly origin: string;
  readonly version: string;
  readonly timestamp: string;
  readonly isBooted: boolean;
  readonly isPinned: boolean;
  /** Position in the status listing, 0 being the first entry. */
  readonly index: number;
}

export type StatusParseErrorKind =
  | "malformed_status"
  | "no_current_deployment"
  | "ambiguous_booted_deployment";

export class StatusParseError extends Error {
  readonly kind: StatusParseErrorKind;

  constructor(kind: StatusParseErrorKind, message: string) {
    super(message);
    this.name = "StatusParseError";
    this.kind = kind;
  }
}

export const DEPLOYMENT_ID_LENGTH = 12;
const MIN_ID_PREFIX_LENGTH = 8;
const UNKNOWN = "Unknown";

const statusDocumentSchema = z.object({
  deployments: z.array(z.unknown()),
});

const deploymentEntrySchema = z.object({
  checksum: z.string().regex(/^[0-9a-f]{8,64}$/i),
  origin: z.string().optional(),
  "container-image-reference": z.string().optional(),
  version: z.string().optional(),
  timestamp: z.union([z.number(), z.string()]).optional(),
  booted: z.boolean().optional(),
  pinned: z.boolean().optional(),
});

export function parseStatus(raw: unknown): Deployment[] {
  const document = statusDocumentSchema.safeParse(raw);
  if (!document.success) {
    throw new StatusParseError(
      "malformed_status",
      "Status document has no deployments array",
    );
  }

  const deployments = document.data.deployments.map((entry, index) => {
    const parsed = deploymentEntrySchema.safeParse(entry);
    if (!parsed.success) {
      throw new StatusParseError(
        "malformed_status",
        `Deployment entry ${index} is malformed: ${parsed.error.issues
          .map((issue) => `${issue.path.join(".") || "entry"} ${issue.message}`)
          .join("; ")}`,
      );
    }
    const data = parsed.data;
    const checksum = data.checksum.toLowerCase();
    return {
      id: checksum.slice(0, DEPLOYMENT_ID_LENGTH),
      checksum,
      origin: data["container-image-reference"] ?? data.origin ?? UNKNOWN,
      version: data.version ?? UNKNOWN,
      timestamp: formatTimestamp(data.timestamp),
      isBooted: data.booted ?? false,
      isPinned: data.pinned ?? false,
      index,
    };
  });

  const booted = deployments.filter((deployment) => deployment.isBooted);
  if (booted.length === 0) {
    throw new StatusParseError(
      "no_current_deployment",
      "Status lists no booted deployment",
    );
  }
  if (booted.length > 1) {
    throw new StatusParseError(
      "ambiguous_booted_deployment",
      `Status lists ${booted.length} booted deployments`,
    );
  }

  return deployments;
}

export function findBootedDeployment(
  deployments: readonly Deployment[],
): Deployment | undefined {
  return deployments.find((deployment) => deployment.isBooted);
}

export function findDeployment(
  deployments: readonly Deployment[],
  targetId: string,
): Deployment | undefined {
  const needle = targetId.trim().toLowerCase();
  const exact = deployments.find((deployment) => deployment.id === needle);
  if (exact || needle.length < MIN_ID_PREFIX_LENGTH) {
    return exact;
  }
  const matches = deployments.filter((deployment) =>
    deployment.checksum.startsWith(needle),
  );
  return matches.length === 1 ? matches[0] : undefined;
}

/**
 * Returns null when the target is unknown or is the booted deployment.
 * The deployment listed right after the booted one is what
 * `rpm-ostree rollback` switches to; any other is deployed by checksum.
 */
export function generateRollbackCommand(
  targetId: string,
  deployments: readonly Deployment[],
): Command | null {
  const target = findDeployment(deployments, targetId);
  if (!target || target.isBooted) {
    return null;
  }

  const booted = findBootedDeployment(deployments);
  if (booted && target.index === booted.index + 1) {
    return ["rpm-ostree", "rollback"];
  }
  return ["rpm-ostree", "deploy", target.checksum];
}

export function formatDeploymentInfo(deployment: Deployment): string {
  let text = `Deployment ${deployment.index + 1}: ${deployment.origin} (${deployment.version}, ${deployment.timestamp}) [${deployment.id}]`;
  if (deployment.isBooted) {
    text += " [Currently Booted]";
  }
  if (deployment.isPinned) {
    text += " [Pinned]";
  }
  return text;
}

function formatTimestamp(value: number | string | undefined): string {
  if (value === undefined) {
    return UNKNOWN;
  }
  if (typeof value === "number") {
    const date = new Date(value * 1000);
    return Number.isNaN(date.getTime()) ? String(value) : date.toISOString();
  }
  return value;
}
