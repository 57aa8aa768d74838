export interface RegistryAllowlistEntry {
  readonly host: string;
  /**
   * Repository patterns permitted on this host. A pattern ending in `/`
   * admits every repository below it; any other pattern admits exactly
   * that repository.
   */
  readonly paths: readonly string[];
}

export type RegistryAllowlist = readonly RegistryAllowlistEntry[];

export const DEFAULT_REGISTRY_ALLOWLIST: RegistryAllowlist = [
  {
    host: "ghcr.io",
    paths: [
      "ublue-os/bluefin",
      "ublue-os/bluefin-dx",
      "ublue-os/bluefin-nvidia",
      "ublue-os/bluefin-dx-nvidia",
      "ublue-os/aurora",
      "ublue-os/aurora-dx",
      "ublue-os/aurora-nvidia",
      "ublue-os/aurora-dx-nvidia",
      "ublue-os/bazzite",
      "ublue-os/bazzite-gnome",
      "ublue-os/bazzite-deck",
      "ublue-os/bazzite-deck-gnome",
      "ublue-os/bazzite-dx",
      "ublue-os/bazzite-nvidia",
      "ublue-os/bazzite-asus",
      "ublue-os/ucore",
      "ublue-os/ucore-minimal",
      "ublue-os/ucore-hci",
    ],
  },
  {
    host: "quay.io",
    paths: [
      "fedora/fedora-silverblue",
      "fedora/fedora-kinoite",
      "fedora/fedora-sericea",
      "fedora/fedora-onyx",
      "fedora-ostree-desktop/silverblue",
      "fedora-ostree-desktop/kinoite",
      "fedora-ostree-desktop/sericea",
      "fedora-ostree-desktop/onyx",
    ],
  },
  {
    host: "registry.fedoraproject.org",
    paths: [
      "fedora/fedora-silverblue",
      "fedora/fedora-kinoite",
      "fedora/fedora-sericea",
      "fedora/fedora-onyx",
    ],
  },
];

export const TRANSPORT_PREFIXES = [
  "ostree-image-signed:docker://",
  "ostree-unverified-image:docker://",
  "ostree-unverified-registry:",
  "docker://",
] as const;

export interface ParsedImageReference {
  readonly transport: string | null;
  readonly host: string;
  readonly repository: string;
  readonly tag: string | null;
  readonly digest: string | null;
}

export function stripTransport(ref: string): {
  transport: string | null;
  remainder: string;
} {
  for (const prefix of TRANSPORT_PREFIXES) {
    if (ref.startsWith(prefix)) {
      return { transport: prefix, remainder: ref.slice(prefix.length) };
    }
  }
  return { transport: null, remainder: ref };
}

/**
 * Splits `host/repo/path[:tag][@digest]`. Returns null when there is no
 * host segment or no repository path.
 */
export function parseImageReference(ref: string): ParsedImageReference | null {
  const { transport, remainder } = stripTransport(ref);
  const slash = remainder.indexOf("/");
  if (slash <= 0) {
    return null;
  }

  const host = remainder.slice(0, slash);
  let rest = remainder.slice(slash + 1);

  let digest: string | null = null;
  const at = rest.indexOf("@");
  if (at >= 0) {
    digest = rest.slice(at + 1);
    rest = rest.slice(0, at);
  }

  let tag: string | null = null;
  const colon = rest.lastIndexOf(":");
  if (colon >= 0) {
    tag = rest.slice(colon + 1);
    rest = rest.slice(0, colon);
  }

  if (rest.length === 0) {
    return null;
  }

  return {
    transport,
    host: host.toLowerCase(),
    repository: rest,
    tag,
    digest,
  };
}

export function findRegistry(
  allowlist: RegistryAllowlist,
  host: string,
): RegistryAllowlistEntry | undefined {
  return allowlist.find((entry) => entry.host.toLowerCase() === host);
}

export function isPathPermitted(
  entry: RegistryAllowlistEntry,
  repository: string,
): boolean {
  return entry.paths.some((pattern) => {
    if (pattern.endsWith("/")) {
      return repository.startsWith(pattern) && repository.length > pattern.length;
    }
    return repository === pattern;
  });
}
