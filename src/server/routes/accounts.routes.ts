import { Router } from "express";
import { z } from "zod";
import type { AppContext } from "../../bootstrap";
import { booleanQuery, idParam, optionalInt, parseOr400 } from "../validation";

const listQuery = z.object({ platformId: optionalInt });
const identityBody = z.object({
  platformId: z.number().int().positive(),
  nativeId: z.string().min(1),
  tag: z.string().min(1),
});
const deleteQuery = z.object({ deleteRecords: booleanQuery });

export function accountsRoutes(ctx: Pick<AppContext, "accounts" | "snapshots" | "deleteService">): Router {
  const router = Router();

  router.get("/", async (req, res, next) => {
    try {
      const query = parseOr400(listQuery, req.query, res);
      if (!query) return;
      res.json(await ctx.accounts.list(query.platformId));
    } catch (err) {
      next(err);
    }
  });

  // Static paths before /:id
  router.put("/identity", async (req, res, next) => {
    try {
      const body = parseOr400(identityBody, req.body, res);
      if (!body) return;
      const updated = await ctx.accounts.setIdentityTag(body.platformId, body.nativeId, body.tag);
      if (!updated) {
        res.status(404).json({ error: "Account not found" });
        return;
      }
      res.json({ updated: true });
    } catch (err) {
      next(err);
    }
  });

  router.get("/:id/latest", async (req, res, next) => {
    try {
      const params = parseOr400(idParam, req.params, res);
      if (!params) return;
      const account = await ctx.accounts.findById(params.id);
      if (!account) {
        res.status(404).json({ error: "Account not found" });
        return;
      }
      const followerCount = await ctx.snapshots.latestFollowerCount(params.id);
      res.json({ accountId: params.id, followerCount });
    } catch (err) {
      next(err);
    }
  });

  router.delete("/:id", async (req, res, next) => {
    try {
      const params = parseOr400(idParam, req.params, res);
      if (!params) return;
      const query = parseOr400(deleteQuery, req.query, res);
      if (!query) return;
      const deleted = await ctx.deleteService.deleteAccount(params.id, query.deleteRecords);
      if (!deleted) {
        res.status(404).json({ error: "Account not found" });
        return;
      }
      res.json({ deleted: true, deleteRecords: query.deleteRecords });
    } catch (err) {
      next(err);
    }
  });

  return router;
}
