import type { Command } from "commander";
import type { ContextProvider } from "../context";
import type { AppContext } from "../../bootstrap";
import { startServer } from "../../server";

/** Stops the scheduler on SIGINT/SIGTERM, then lets in-flight runs settle. */
function stopOnSignal(ctx: AppContext, onStopped: () => void): void {
  const shutdown = (signal: string) => {
    ctx.logger.info({ signal }, "Shutting down");
    ctx.scheduler
      .stop()
      .then(() => ctx.scheduler.drain())
      .then(onStopped)
      .catch((error: unknown) => {
        ctx.logger.error({ err: error }, "Shutdown failed");
        process.exitCode = 1;
        onStopped();
      });
  };
  process.once("SIGINT", shutdown);
  process.once("SIGTERM", shutdown);
}

export const commands = (program: Command, getContext: ContextProvider) => {
  program
    .command("scheduler")
    .description("Task scheduler")
    .command("start")
    .description("Run the scheduler in the foreground until interrupted")
    .action(async () => {
      const ctx = getContext();
      await ctx.scheduler.start();
      stopOnSignal(ctx, () => undefined);
    });

  program
    .command("serve")
    .description("Start the HTTP API, and the scheduler when SCHEDULE_ENABLED is set")
    .action(async () => {
      const ctx = getContext();
      if (ctx.config.schedule.enabled) {
        await ctx.scheduler.start();
      } else {
        ctx.logger.info("SCHEDULE_ENABLED is false, scheduler not starting");
      }
      const server = startServer(ctx);
      stopOnSignal(ctx, () => server?.close());
    });
};
