import type { Deployment } from "../domain/deployment.js";

export type DeploymentListing =
  | { readonly available: true; readonly deployments: readonly Deployment[] }
  | { readonly available: false; readonly reason: string };

/** Read-only view of the system's deployments. */
export interface StatusSource {
  readDeployments(): Promise<DeploymentListing>;
}
