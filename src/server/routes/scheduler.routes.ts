import { Router } from "express";
import type { AppContext } from "../../bootstrap";

export function schedulerRoutes(ctx: Pick<AppContext, "scheduler">): Router {
  const router = Router();

  router.post("/start", async (_req, res, next) => {
    try {
      await ctx.scheduler.start();
      res.json({ running: ctx.scheduler.running });
    } catch (err) {
      next(err);
    }
  });

  router.post("/stop", async (_req, res, next) => {
    try {
      await ctx.scheduler.stop();
      res.json({ running: ctx.scheduler.running });
    } catch (err) {
      next(err);
    }
  });

  return router;
}
