import { Router } from "express";
import type { AppContext } from "../../bootstrap";

export function platformsRoutes(ctx: Pick<AppContext, "platforms">): Router {
  const router = Router();

  router.get("/", async (_req, res, next) => {
    try {
      res.json(await ctx.platforms.listAll());
    } catch (err) {
      next(err);
    }
  });

  return router;
}
