import { Router } from "express";
import { z } from "zod";
import type { AppContext } from "../../bootstrap";
import { SCHEDULE_TIME_PATTERN } from "../../domain/schedule-time";
import { optionalInt, parseOr400 } from "../validation";

const logsQuery = z.object({
  taskId: optionalInt,
  limit: z.coerce.number().int().min(1).max(200).default(20),
});
const nameParam = z.object({ name: z.string().min(1) });
const scheduleBody = z.object({
  time: z.string().regex(SCHEDULE_TIME_PATTERN, "expected HH:MM"),
  enabled: z.boolean().optional(),
});

export function tasksRoutes(ctx: Pick<AppContext, "scheduler" | "taskLogs">): Router {
  const router = Router();

  router.get("/", async (_req, res, next) => {
    try {
      res.json(await ctx.scheduler.getStatus());
    } catch (err) {
      next(err);
    }
  });

  // Static paths must come before /:name/*
  router.get("/logs", async (req, res, next) => {
    try {
      const query = parseOr400(logsQuery, req.query, res);
      if (!query) return;
      res.json(await ctx.taskLogs.list(query.taskId, query.limit));
    } catch (err) {
      next(err);
    }
  });

  router.post("/run-all", async (_req, res, next) => {
    try {
      res.json(await ctx.scheduler.runAll());
    } catch (err) {
      next(err);
    }
  });

  router.post("/:name/run", async (req, res, next) => {
    try {
      const params = parseOr400(nameParam, req.params, res);
      if (!params) return;
      res.json(await ctx.scheduler.runNow(params.name));
    } catch (err) {
      next(err);
    }
  });

  router.put("/:name/schedule", async (req, res, next) => {
    try {
      const params = parseOr400(nameParam, req.params, res);
      if (!params) return;
      const body = parseOr400(scheduleBody, req.body, res);
      if (!body) return;
      res.json(await ctx.scheduler.updateTaskSchedule(params.name, body.time, body.enabled));
    } catch (err) {
      next(err);
    }
  });

  return router;
}
