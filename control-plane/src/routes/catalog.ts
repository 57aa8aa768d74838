import { Router } from "express";
import type { ImageCatalog } from "../services/image-catalog.js";

export function createCatalogRouter(catalog: ImageCatalog): Router {
  const router = Router();

  router.get("/catalog", (_req, res) => {
    res.json({
      families: catalog.listFamilies(),
      images: catalog.listImages(),
    });
  });

  return router;
}
