import {
  DEFAULT_REGISTRY_ALLOWLIST,
  findRegistry,
  isPathPermitted,
  parseImageReference,
  stripTransport,
  type RegistryAllowlist,
} from "./registry-allowlist.js";

export const ALLOWED_PROGRAM = "rpm-ostree";

export const ALLOWED_SUBCOMMANDS = [
  "status",
  "rebase",
  "rollback",
  "deploy",
  "cancel",
] as const;

export type AllowedSubcommand = (typeof ALLOWED_SUBCOMMANDS)[number];

export const MAX_IMAGE_REFERENCE_LENGTH = 512;

export const DANGEROUS_CHARACTERS = [
  ";",
  "|",
  "&",
  "`",
  "$",
  ">",
  "<",
  "(",
  ")",
  "{",
  "}",
  "\\",
  "!",
  "*",
  "?",
  "~",
  "\n",
  "\r",
  "\0",
] as const;

export type ValidationErrorKind =
  | "disallowed_program"
  | "unsupported_subcommand"
  | "dangerous_character"
  | "too_long"
  | "suspicious_pattern"
  | "disallowed_registry_or_path";

export class CommandValidationError extends Error {
  readonly kind: ValidationErrorKind;

  constructor(kind: ValidationErrorKind, message: string) {
    super(message);
    this.name = "CommandValidationError";
    this.kind = kind;
  }
}

export type ValidationResult =
  | { readonly ok: true }
  | { readonly ok: false; readonly error: CommandValidationError };

export interface ValidationOptions {
  readonly allowlist?: RegistryAllowlist;
}

const VALID: ValidationResult = { ok: true };

const SUSPICIOUS_PATTERNS: readonly {
  readonly pattern: RegExp;
  readonly description: string;
}[] = [
  { pattern: /\.\./, description: "path traversal" },
  { pattern: /[\u0000-\u001f\u007f]/, description: "control character" },
  { pattern: /\s/, description: "embedded whitespace" },
  { pattern: /\\/, description: "backslash" },
  { pattern: /[;|&`$<>(){}!*?~'"]/, description: "shell metacharacter" },
  { pattern: /%[0-9a-f]{2}/i, description: "percent-encoded sequence" },
  { pattern: /[a-z][a-z0-9+.-]*:\/\//i, description: "embedded protocol" },
  {
    pattern:
      /^(?:file|https?|dir|oci|oci-archive|docker-archive|containers-storage|ostree-[a-z-]+):/i,
    description: "embedded protocol",
  },
  { pattern: /\/\//, description: "empty path segment" },
];

const TAG_PATTERN = /^[A-Za-z0-9_][A-Za-z0-9._-]{0,127}$/;
const DIGEST_PATTERN = /^sha256:[a-f0-9]{64}$/;
const PATH_SEGMENT_PATTERN = /^[a-z0-9]+(?:(?:[._]|__|-+)[a-z0-9]+)*$/;

export function validateCommand(
  command: readonly string[],
  options: ValidationOptions = {},
): ValidationResult {
  if (command.length === 0) {
    return invalid("disallowed_program", "Empty command");
  }

  if (command[0] !== ALLOWED_PROGRAM) {
    return invalid(
      "disallowed_program",
      `Program ${JSON.stringify(command[0])} is not allowed; only ${ALLOWED_PROGRAM} may be executed`,
    );
  }

  for (let index = 1; index < command.length; index += 1) {
    const dangerous = checkArgument(command[index], index);
    if (dangerous) {
      return { ok: false, error: dangerous };
    }
  }

  const subcommand = command[1];
  if (subcommand === undefined) {
    return invalid("unsupported_subcommand", "Missing rpm-ostree subcommand");
  }
  if (!isAllowedSubcommand(subcommand)) {
    return invalid(
      "unsupported_subcommand",
      `Unsupported rpm-ostree subcommand: ${subcommand}`,
    );
  }

  if (subcommand === "rebase") {
    const positional = command.slice(2).filter((arg) => !arg.startsWith("-"));
    if (positional.length !== 1) {
      return invalid(
        "disallowed_registry_or_path",
        "rebase requires exactly one image reference",
      );
    }
    const reference = checkReference(positional[0], options.allowlist);
    if (!reference.ok) {
      return reference;
    }
  }

  return VALID;
}

export function validateImageReference(
  ref: string,
  options: ValidationOptions = {},
): ValidationResult {
  const reference = checkReference(ref, options.allowlist);
  if (!reference.ok) {
    return reference;
  }
  return validateCommand([ALLOWED_PROGRAM, "rebase", ref], options);
}

export function isAllowedSubcommand(value: string): value is AllowedSubcommand {
  return (ALLOWED_SUBCOMMANDS as readonly string[]).includes(value);
}

function checkArgument(
  argument: string,
  index: number,
): CommandValidationError | null {
  const quoted = isQuotedLiteral(argument);
  const found = DANGEROUS_CHARACTERS.find((character) =>
    argument.includes(character),
  );
  if (!found) {
    return null;
  }

  const described = JSON.stringify(found);
  return new CommandValidationError(
    "dangerous_character",
    quoted
      ? `Quoted argument ${index} contains dangerous character ${described}; quoting does not make it safe`
      : `Argument ${index} contains dangerous character ${described}`,
  );
}

function isQuotedLiteral(argument: string): boolean {
  if (argument.length < 2) {
    return false;
  }
  const first = argument[0];
  return (first === "'" || first === '"') && argument.at(-1) === first;
}

// Order matters: length, then patterns, then the allow-list, so that a
// hostile reference on an allowed host is still reported as suspicious.
function checkReference(
  ref: string,
  allowlist: RegistryAllowlist = DEFAULT_REGISTRY_ALLOWLIST,
): ValidationResult {
  if (ref.length > MAX_IMAGE_REFERENCE_LENGTH) {
    return invalid(
      "too_long",
      `Image reference is too long (${ref.length} characters, maximum ${MAX_IMAGE_REFERENCE_LENGTH})`,
    );
  }

  const suspicious = findSuspiciousPattern(ref);
  if (suspicious) {
    return invalid(
      "suspicious_pattern",
      `Image reference contains a suspicious pattern (${suspicious})`,
    );
  }

  const parsed = parseImageReference(ref);
  if (!parsed) {
    return invalid(
      "disallowed_registry_or_path",
      "Image reference must have the form registry/repository:tag",
    );
  }

  const registry = findRegistry(allowlist, parsed.host);
  if (!registry) {
    const hosts = allowlist.map((entry) => entry.host).join(", ");
    return invalid(
      "disallowed_registry_or_path",
      `Registry ${parsed.host} is not an allowed registry. Allowed registries: ${hosts}`,
    );
  }

  const segments = parsed.repository.split("/");
  if (!segments.every((segment) => PATH_SEGMENT_PATTERN.test(segment))) {
    return invalid(
      "disallowed_registry_or_path",
      `Image path ${parsed.repository} is not a valid repository name`,
    );
  }

  if (!isPathPermitted(registry, parsed.repository)) {
    return invalid(
      "disallowed_registry_or_path",
      `Image path ${parsed.repository} is not allowed on ${registry.host}. Permitted paths: ${registry.paths.join(", ")}`,
    );
  }

  if (parsed.tag === null && parsed.digest === null) {
    return invalid(
      "disallowed_registry_or_path",
      "Image reference must include a tag or digest",
    );
  }
  if (parsed.tag !== null && !TAG_PATTERN.test(parsed.tag)) {
    return invalid(
      "disallowed_registry_or_path",
      `Image tag ${JSON.stringify(parsed.tag)} is not allowed`,
    );
  }
  if (parsed.digest !== null && !DIGEST_PATTERN.test(parsed.digest)) {
    return invalid(
      "disallowed_registry_or_path",
      `Image digest ${JSON.stringify(parsed.digest)} is not allowed`,
    );
  }

  return VALID;
}

function findSuspiciousPattern(ref: string): string | null {
  if (ref.length === 0) {
    return "empty reference";
  }

  const { remainder } = stripTransport(ref);
  for (const candidate of SUSPICIOUS_PATTERNS) {
    if (candidate.pattern.test(remainder)) {
      return candidate.description;
    }
  }
  return null;
}

function invalid(kind: ValidationErrorKind, message: string): ValidationResult {
  return { ok: false, error: new CommandValidationError(kind, message) };
}
