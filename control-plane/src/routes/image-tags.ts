import { Router } from "express";
import { z } from "zod";
import type { ImageTagFinder } from "../services/image-tags.js";
import { asyncHandler } from "./async-handler.js";

const tagsQuerySchema = z.object({
  image: z.string().min(1),
  branch: z.string().regex(/^[A-Za-z0-9._-]+$/).optional(),
  days: z.coerce.number().int().positive().max(3650).optional(),
});

export function createImageTagsRouter(finder: ImageTagFinder): Router {
  const router = Router();

  router.get(
    "/images/tags",
    asyncHandler(async (req, res) => {
      const parsed = tagsQuerySchema.safeParse(req.query);
      if (!parsed.success) {
        return res.status(400).json({ error: parsed.error.flatten() });
      }

      const result = await finder.findRecent(parsed.data);
      if (result.ok) {
        return res.json({
          available: true,
          repository: result.repository,
          branch: result.branch,
          days: result.days,
          tags: result.tags,
        });
      }
      if (result.code === "rejected") {
        return res.status(422).json({ error: result.reason });
      }
      return res.json({ available: false, reason: result.reason });
    }),
  );

  return router;
}
