import { Router } from "express";
import { formatDeploymentInfo } from "../domain/deployment.js";
import type { StatusSource } from "../ports/status-source.js";
import { asyncHandler } from "./async-handler.js";

export function createDeploymentsRouter(statusSource: StatusSource): Router {
  const router = Router();

  router.get(
    "/deployments",
    asyncHandler(async (_req, res) => {
      const listing = await statusSource.readDeployments();
      if (!listing.available) {
        return res.json(listing);
      }
      return res.json({
        available: true,
        deployments: listing.deployments,
        formatted: listing.deployments.map(formatDeploymentInfo),
      });
    }),
  );

  return router;
}
