import type { RuntimeErrorKind } from "./types.js";

export type ClassifiableErrorKind = Exclude<RuntimeErrorKind, "invalid_command">;

export interface ErrorClassificationRule {
  readonly kind: Exclude<ClassifiableErrorKind, "unknown">;
  /** Lower-case substrings; any one of them matches. */
  readonly keywords: readonly string[];
}

/**
 * Rules are tried in order for each line, so "Network timeout" lands on
 * network before timeout is considered.
 */
export const DEFAULT_ERROR_CLASSIFICATION: readonly ErrorClassificationRule[] = [
  {
    kind: "busy",
    keywords: [
      "transaction already in use",
      "another transaction",
      "transaction in progress",
      "daemon is busy",
    ],
  },
  {
    kind: "auth",
    keywords: [
      "permission denied",
      "authentication",
      "authorization failed",
      "not authorized",
      "unauthorized",
      "access denied",
      "polkit",
    ],
  },
  {
    kind: "network",
    keywords: [
      "network",
      "could not resolve host",
      "no such host",
      "name resolution",
      "unable to connect",
      "connection refused",
      "connection reset",
      "dial tcp",
      "tls handshake",
    ],
  },
  {
    kind: "timeout",
    keywords: ["timed out", "timeout", "deadline exceeded"],
  },
  {
    kind: "not_found",
    keywords: [
      "not found",
      "no such deployment",
      "no such image",
      "manifest unknown",
      "failed to resolve ref",
      "enoent",
    ],
  },
];

export const DEFAULT_CLASSIFICATION_TAIL = 5;

export function classifyFailure(
  output: readonly string[],
  rules: readonly ErrorClassificationRule[] = DEFAULT_ERROR_CLASSIFICATION,
  tail: number = DEFAULT_CLASSIFICATION_TAIL,
): ClassifiableErrorKind {
  const recent = output.slice(-Math.max(1, tail));
  for (let index = recent.length - 1; index >= 0; index -= 1) {
    const line = recent[index].toLowerCase();
    for (const rule of rules) {
      if (rule.keywords.some((keyword) => line.includes(keyword))) {
        return rule.kind;
      }
    }
  }
  return "unknown";
}

export interface RemedialAction {
  readonly action: "reauthenticate" | "check_transaction";
  readonly label: string;
  readonly hint: string;
}

export function remedyFor(kind: RuntimeErrorKind | null): RemedialAction | null {
  if (kind === "auth") {
    return {
      action: "reauthenticate",
      label: "Authenticate again",
      hint: "Retry the operation and approve the administrator prompt.",
    };
  }
  if (kind === "busy") {
    return {
      action: "check_transaction",
      label: "Check running transaction",
      hint: "Another rpm-ostree transaction is active; wait for it or run `rpm-ostree cancel` before retrying.",
    };
  }
  return null;
}

export function describeFailure(
  kind: RuntimeErrorKind,
  output: readonly string[],
): string {
  switch (kind) {
    case "network":
      return "Network error: check your internet connection and that the registry is reachable.";
    case "auth":
      return "Authentication failed: you may not have the permissions required to change the system image.";
    case "timeout":
      return "The operation timed out while talking to the registry or the update daemon.";
    case "busy":
      return "rpm-ostree is busy with another transaction.";
    case "not_found":
      return "The requested image or deployment could not be found.";
    case "invalid_command":
      return output[0] ?? "The command was rejected by validation.";
    case "unknown":
      return extractErrorLine(output) ?? "The operation failed for an unknown reason.";
  }
}

function extractErrorLine(output: readonly string[]): string | null {
  for (let index = output.length - 1; index >= 0; index -= 1) {
    const line = output[index].trim();
    const match = /^error:\s*(.+)$/i.exec(line);
    if (match) {
      return match[1];
    }
  }
  return null;
}
