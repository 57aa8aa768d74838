import { Router } from "express";
import { z } from "zod";
import type {
  HistoryEntry,
  HistoryLedger,
} from "../repositories/history-ledger.js";
import { exportHistory, summarizeHistory } from "../services/history-report.js";
import { asyncHandler } from "./async-handler.js";

const historyQuerySchema = z.object({
  limit: z.coerce.number().int().positive().optional(),
  type: z.enum(["rebase", "rollback"]).optional(),
  success: z
    .enum(["true", "false"])
    .transform((value) => value === "true")
    .optional(),
});

type HistoryQuery = z.infer<typeof historyQuerySchema>;

async function queryHistory(
  ledger: HistoryLedger,
  { limit, type, success }: HistoryQuery,
): Promise<readonly HistoryEntry[]> {
  if (type !== undefined) {
    const entries = await ledger.getEntriesByType(type);
    return entries
      .filter((entry) => success === undefined || entry.success === success)
      .slice(0, limit);
  }
  if (success !== undefined) {
    return (await ledger.getEntriesByOutcome(success)).slice(0, limit);
  }
  return ledger.getRecentEntries(limit);
}

export function createHistoryRouter(ledger: HistoryLedger): Router {
  const router = Router();

  router.get(
    "/history",
    asyncHandler(async (req, res) => {
      const parsed = historyQuerySchema.safeParse(req.query);
      if (!parsed.success) {
        return res.status(400).json({ error: parsed.error.flatten() });
      }

      return res.json({ entries: await queryHistory(ledger, parsed.data) });
    }),
  );

  router.delete(
    "/history",
    asyncHandler(async (_req, res) => {
      await ledger.clear();
      return res.json({ ok: true });
    }),
  );

  router.get(
    "/history/report",
    asyncHandler(async (_req, res) => {
      return res.json(summarizeHistory(await ledger.getRecentEntries()));
    }),
  );

  router.get(
    "/history/export",
    asyncHandler(async (_req, res) => {
      const body = await exportHistory(ledger);
      const day = new Date().toISOString().slice(0, 10);
      res.setHeader(
        "Content-Disposition",
        `attachment; filename="command-history-${day}.json"`,
      );
      return res.type("application/json").send(body);
    }),
  );

  return router;
}
