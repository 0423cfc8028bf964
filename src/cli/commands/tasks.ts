import type { Command } from "commander";
import type { ContextProvider } from "../context";
import type { ExecutionOutcome } from "../../orchestration/scheduler/task-executor";
import { formatTime, parseIntArg } from "../args";

function report(name: string, outcome: ExecutionOutcome): void {
  switch (outcome.kind) {
    case "completed":
      console.log(
        `Task ${name}: ${outcome.status} (${outcome.successCount}/${outcome.recordsCount} succeeded, ${outcome.failedCount} failed)`
      );
      break;
    case "skipped":
      console.log(`Task ${name} skipped: ${outcome.reason}`);
      break;
    case "faulted":
      console.log(`Task ${name} failed: ${outcome.error} (retry ${outcome.retryCount})`);
      process.exitCode = 1;
      break;
  }
}

export const commands = (program: Command, getContext: ContextProvider) => {
  const tasksCmd = program.command("tasks").description("Scheduled crawl tasks");

  tasksCmd
    .command("list")
    .action(async () => {
      const status = await getContext().scheduler.getStatus();
      for (const task of status.tasks) {
        const enabled = task.enabled ? "enabled" : "disabled";
        console.log(
          `  [${task.id}] ${task.name} ${task.scheduleTime} ${enabled} - ${task.status} (retries ${task.retryCount}/${task.maxRetry}, last run ${formatTime(task.lastRunAt)})`
        );
      }
    });

  tasksCmd
    .command("run")
    .argument("<name>", "Task name, e.g. weibo_follower_crawler")
    .action(async (name: string) => {
      report(name, await getContext().scheduler.runNow(name));
    });

  tasksCmd
    .command("run-all")
    .description("Run every enabled task now")
    .action(async () => {
      const ctx = getContext();
      const names = new Map((await ctx.tasks.listAll()).map((t): [number, string] => [t.id, t.name]));
      for (const outcome of await ctx.scheduler.runAll()) {
        report(names.get(outcome.taskId) ?? `#${outcome.taskId}`, outcome);
      }
    });

  tasksCmd
    .command("schedule")
    .argument("<name>", "Task name")
    .argument("<time>", "Daily time as HH:MM")
    .option("--enable", "Enable the task")
    .option("--disable", "Disable the task")
    .action(async (name: string, time: string, options: { enable?: boolean; disable?: boolean }) => {
      const enabled = options.enable ? true : options.disable ? false : undefined;
      const task = await getContext().scheduler.updateTaskSchedule(name, time, enabled);
      console.log(`Task ${task.name} scheduled at ${task.scheduleTime} (${task.enabled === 1 ? "enabled" : "disabled"})`);
    });

  tasksCmd
    .command("logs")
    .option("--task <name>", "Only this task")
    .option("--limit <n>", "Number of runs to show", parseIntArg, 20)
    .action(async (options: { task?: string; limit: number }) => {
      const ctx = getContext();
      let taskId: number | undefined;
      if (options.task) {
        const task = await ctx.tasks.findByName(options.task);
        if (!task) {
          console.log(`Task ${options.task} not found`);
          process.exitCode = 1;
          return;
        }
        taskId = task.id;
      }

      const logs = await ctx.taskLogs.list(taskId, options.limit);
      for (const log of logs) {
        console.log(
          `  [${log.id}] task=${log.taskId} ${log.status} ${log.successCount}/${log.recordsCount} ok, ${log.failedCount} failed, started ${formatTime(log.startedAt)}${log.errorMessage ? ` - ${log.errorMessage}` : ""}`
        );
      }
    });
};
