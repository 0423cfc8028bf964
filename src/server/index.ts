import express from "express";
import type { Server } from "http";
import type { AppContext } from "../bootstrap";
import { SchedulingError, ValidationError } from "../core/errors";
import { accountsRoutes } from "./routes/accounts.routes";
import { credentialsRoutes } from "./routes/credentials.routes";
import { platformsRoutes } from "./routes/platforms.routes";
import { schedulerRoutes } from "./routes/scheduler.routes";
import { snapshotsRoutes } from "./routes/snapshots.routes";
import { tasksRoutes } from "./routes/tasks.routes";

export function createApp(ctx: AppContext): express.Express {
  const app = express();
  const logger = ctx.logger.child({ component: "api" });

  app.use(express.json());

  app.get("/health", (_req, res) => {
    res.json({ status: "ok", timestamp: Math.floor(Date.now() / 1000) });
  });

  app.use("/api/platforms", platformsRoutes(ctx));
  app.use("/api/accounts", accountsRoutes(ctx));
  app.use("/api/snapshots", snapshotsRoutes(ctx));
  app.use("/api/tasks", tasksRoutes(ctx));
  app.use("/api/scheduler", schedulerRoutes(ctx));
  app.use("/api/credentials", credentialsRoutes(ctx));

  app.use(
    (
      err: Error,
      _req: express.Request,
      res: express.Response,
      _next: express.NextFunction
    ) => {
      if (err instanceof ValidationError) {
        res.status(400).json({ error: err.message, code: err.code });
        return;
      }
      if (err instanceof SchedulingError) {
        res.status(err.code === "unknown_task" ? 404 : 409).json({ error: err.message, code: err.code });
        return;
      }
      logger.error({ err }, "Unhandled error");
      res.status(500).json({ error: "Internal server error" });
    }
  );

  return app;
}

export function startServer(ctx: AppContext): Server | null {
  const { enabled, host, port } = ctx.config.api;
  const logger = ctx.logger.child({ component: "api" });
  if (!enabled) {
    logger.warn("API_ENABLED is false, not starting server");
    return null;
  }

  return createApp(ctx).listen(port, host, () => {
    logger.info(`API server listening on http://${host}:${port}`);
  });
}
