import { Router } from "express";
import { z } from "zod";
import type { AppContext } from "../../bootstrap";
import { idParam, optionalInt, parseOr400 } from "../validation";

const snapshotQuery = z.object({
  accountId: optionalInt,
  platformId: optionalInt,
  platformIds: z
    .string()
    .regex(/^\d+(,\d+)*$/, "expected comma separated ids")
    .transform((v) => v.split(",").map(Number))
    .optional(),
  identityTag: z.string().min(1).optional(),
  from: optionalInt,
  to: optionalInt,
  limit: z.coerce.number().int().min(1).max(1000).default(100),
});

export function snapshotsRoutes(ctx: Pick<AppContext, "snapshots" | "deleteService">): Router {
  const router = Router();

  router.get("/", async (req, res, next) => {
    try {
      const query = parseOr400(snapshotQuery, req.query, res);
      if (!query) return;
      res.json(await ctx.snapshots.query(query));
    } catch (err) {
      next(err);
    }
  });

  router.delete("/:id", async (req, res, next) => {
    try {
      const params = parseOr400(idParam, req.params, res);
      if (!params) return;
      const deleted = await ctx.deleteService.deleteSnapshot(params.id);
      if (!deleted) {
        res.status(404).json({ error: "Snapshot not found" });
        return;
      }
      res.json({ deleted: true });
    } catch (err) {
      next(err);
    }
  });

  return router;
}
