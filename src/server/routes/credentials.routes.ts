import { Router } from "express";
import { z } from "zod";
import type { AppContext } from "../../bootstrap";
import { PlatformCodeSchema } from "../../domain/models";
import { parseOr400 } from "../validation";

const platformParam = z.object({ platform: PlatformCodeSchema });
const tokenBody = z.object({ token: z.string().min(1) });

/** Token values are write-only over the API. */
export function credentialsRoutes(ctx: Pick<AppContext, "credentials">): Router {
  const router = Router();

  router.get("/", async (_req, res, next) => {
    try {
      res.json(await ctx.credentials.list());
    } catch (err) {
      next(err);
    }
  });

  router.put("/:platform", async (req, res, next) => {
    try {
      const params = parseOr400(platformParam, req.params, res);
      if (!params) return;
      const body = parseOr400(tokenBody, req.body, res);
      if (!body) return;
      const saved = await ctx.credentials.save(params.platform, body.token);
      if (!saved) {
        res.status(500).json({ error: "Credential not saved" });
        return;
      }
      res.json({ platform: params.platform, saved: true });
    } catch (err) {
      next(err);
    }
  });

  router.delete("/:platform", async (req, res, next) => {
    try {
      const params = parseOr400(platformParam, req.params, res);
      if (!params) return;
      const deleted = await ctx.credentials.delete(params.platform);
      if (!deleted) {
        res.status(404).json({ error: "No credential stored" });
        return;
      }
      res.json({ platform: params.platform, deleted: true });
    } catch (err) {
      next(err);
    }
  });

  return router;
}
