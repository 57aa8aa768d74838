export const PENDING_CHECKSUM =
  "1111111111111111aaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaa";
export const BOOTED_CHECKSUM =
  "2222222222222222bbbbbbbbbbbbbbbbbbbbbbbbbbbbbbbbbbbbbbbbbbbbbbbb";
export const PREVIOUS_CHECKSUM =
  "3333333333333333cccccccccccccccccccccccccccccccccccccccccccccccc";
export const OLDEST_CHECKSUM =
  "4444444444444444dddddddddddddddddddddddddddddddddddddddddddddddd";

/** Booted entry first, previous deployment second. */
export function twoDeploymentStatus(): unknown {
  return {
    deployments: [
      {
        checksum: BOOTED_CHECKSUM,
        "container-image-reference":
          "ostree-image-signed:docker://ghcr.io/example/os:latest",
        version: "41.20241001.0",
        timestamp: 1727740800,
        booted: true,
        pinned: false,
      },
      {
        checksum: PREVIOUS_CHECKSUM,
        origin: "fedora:fedora/41/x86_64/silverblue",
        version: "41.20240915.0",
        timestamp: 1726358400,
        booted: false,
        pinned: true,
      },
    ],
  };
}

/** Pending update, booted, previous, oldest. */
export function fourDeploymentStatus(): unknown {
  return {
    deployments: [
      { checksum: PENDING_CHECKSUM, version: "41.3", booted: false },
      { checksum: BOOTED_CHECKSUM, version: "41.2", booted: true },
      { checksum: PREVIOUS_CHECKSUM, version: "41.1", booted: false },
      { checksum: OLDEST_CHECKSUM, version: "41.0", booted: false },
    ],
  };
}
