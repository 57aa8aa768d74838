import { parseStatus } from "../domain/deployment.js";
import type {
  DeploymentListing,
  StatusSource,
} from "../ports/status-source.js";

/** Serves a fixed status document, parsed on every read like the real one. */
export class StaticStatusSource implements StatusSource {
  constructor(private document: unknown) {}

  setDocument(document: unknown): void {
    this.document = document;
  }

  async readDeployments(): Promise<DeploymentListing> {
    try {
      return { available: true, deployments: parseStatus(this.document) };
    } catch (error) {
      return {
        available: false,
        reason: error instanceof Error ? error.message : String(error),
      };
    }
  }
}
