import type { ScheduleTask } from "../../db/schema";
import type { PlatformsRepository } from "../../db/repositories/platforms.repo";
import type { TasksRepository } from "../../db/repositories/tasks.repo";
import type { TaskLogsRepository } from "../../db/repositories/task-logs.repo";
import type { CrawlerRegistry } from "../../platforms/registry";
import type { FollowerBatchRunner } from "../follower-batch-runner";
import { SchedulingError, errorMessage } from "../../core/errors";
import type { Logger } from "../../core/logger";
import { systemClock, unixSeconds, type Clock } from "../../core/time";
import type { BatchStatus, Trigger } from "../../domain/models";
import { canTransition, deriveBatchStatus, resolveFault } from "../../domain/task-state-machine";

export type SkipReason = "not_found" | "disabled" | "locked";

export type ExecutionOutcome =
  | { kind: "skipped"; taskId: number; reason: SkipReason }
  | {
      kind: "completed";
      taskId: number;
      logId: number;
      status: BatchStatus;
      recordsCount: number;
      successCount: number;
      failedCount: number;
    }
  | {
      kind: "faulted";
      taskId: number;
      logId: number | null;
      error: string;
      retryCount: number;
      willRetry: boolean;
    };

export interface TaskExecutorDeps {
  tasks: TasksRepository;
  taskLogs: TaskLogsRepository;
  platforms: PlatformsRepository;
  crawlers: CrawlerRegistry;
  runner: FollowerBatchRunner;
  logger: Logger;
  clock?: Clock;
}

export class TaskExecutor {
  private readonly logger: Logger;
  private readonly clock: Clock;
  private taskLocks = new Set<number>();

  constructor(private readonly deps: TaskExecutorDeps) {
    this.logger = deps.logger.child({ component: "task-executor" });
    this.clock = deps.clock ?? systemClock;
  }

  private acquireTaskLock(taskId: number): boolean {
    if (this.taskLocks.has(taskId)) return false;
    this.taskLocks.add(taskId);
    return true;
  }

  private releaseTaskLock(taskId: number): void {
    this.taskLocks.delete(taskId);
  }

  isRunning(taskId: number): boolean {
    return this.taskLocks.has(taskId);
  }

  /** Runs one firing of a task. Never rejects: faults come back as a `faulted` outcome. */
  async execute(taskId: number, trigger: Trigger): Promise<ExecutionOutcome> {
    const logCtx = { taskId, trigger };

    let task: ScheduleTask | null;
    try {
      task = await this.deps.tasks.findById(taskId);
    } catch (error) {
      this.logger.error({ ...logCtx, err: error }, "Failed to load task");
      return { kind: "faulted", taskId, logId: null, error: errorMessage(error), retryCount: 0, willRetry: false };
    }

    if (!task) {
      this.logger.warn(logCtx, "Task not found, skipping");
      return { kind: "skipped", taskId, reason: "not_found" };
    }
    if (task.enabled !== 1) {
      this.logger.info({ ...logCtx, name: task.name }, "Task disabled, skipping");
      return { kind: "skipped", taskId, reason: "disabled" };
    }
    if (!this.acquireTaskLock(taskId)) {
      this.logger.warn({ ...logCtx, name: task.name }, "Task already executing, skipping");
      return { kind: "skipped", taskId, reason: "locked" };
    }

    try {
      return await this.run(task, trigger);
    } finally {
      this.releaseTaskLock(taskId);
    }
  }

  private async run(task: ScheduleTask, trigger: Trigger): Promise<ExecutionOutcome> {
    const logCtx = { taskId: task.id, name: task.name, trigger };
    let logId: number | null = null;

    if (!canTransition(task.status, "running")) {
      this.logger.warn({ ...logCtx, status: task.status }, "Task left in running state by an earlier process");
    }

    try {
      const startedAt = unixSeconds(this.clock());
      logId = await this.deps.taskLogs.open(task.id, startedAt);
      await this.deps.tasks.updateStatus(task.id, { status: "running", lastRunAt: startedAt });
      this.logger.info({ ...logCtx, logId, from: task.status, to: "running" }, "Task started");

      const platform = await this.deps.platforms.findById(task.platformId);
      if (!platform) {
        throw new SchedulingError(`Unknown platform ${task.platformId} for task ${task.name}`, "unknown_platform");
      }
      const crawler = this.deps.crawlers.create(platform.code);
      if (!crawler) {
        throw new SchedulingError(`No crawler for platform ${platform.code}`, "missing_crawler");
      }
      const targets = this.deps.crawlers.targetsFor(platform.code);

      const batch = await this.deps.runner.run(platform.id, crawler, targets);
      const status = deriveBatchStatus(batch.successCount, batch.failedCount);

      await this.deps.taskLogs.close(logId, {
        endedAt: unixSeconds(this.clock()),
        status,
        recordsCount: batch.recordsCount,
        successCount: batch.successCount,
        failedCount: batch.failedCount,
        errorMessage: batch.failures.length > 0 ? batch.failures.map((f) => `${f.target}: ${f.error}`).join("; ") : null,
      });
      await this.deps.tasks.updateStatus(task.id, { status, retryCount: 0 });

      this.logger.info(
        { ...logCtx, logId, from: "running", to: status, successCount: batch.successCount, failedCount: batch.failedCount },
        "Task completed"
      );
      return {
        kind: "completed",
        taskId: task.id,
        logId,
        status,
        recordsCount: batch.recordsCount,
        successCount: batch.successCount,
        failedCount: batch.failedCount,
      };
    } catch (error) {
      return this.handleFault(task, logId, error);
    }
  }

  private async handleFault(task: ScheduleTask, logId: number | null, error: unknown): Promise<ExecutionOutcome> {
    const message = errorMessage(error);
    const resolution = resolveFault(task.retryCount, task.maxRetry);
    const logCtx = { taskId: task.id, name: task.name, logId };

    this.logger.error({ ...logCtx, err: error }, "Task execution faulted");

    try {
      if (logId !== null) {
        await this.deps.taskLogs.close(logId, {
          endedAt: unixSeconds(this.clock()),
          status: "failed",
          recordsCount: 0,
          successCount: 0,
          failedCount: 0,
          errorMessage: message,
        });
      }
      await this.deps.tasks.updateStatus(task.id, { status: resolution.status, retryCount: resolution.retryCount });
    } catch (bookkeepingError) {
      this.logger.error({ ...logCtx, err: bookkeepingError }, "Failed to record task fault");
    }

    if (resolution.willRetry) {
      this.logger.warn(
        { ...logCtx, retryCount: resolution.retryCount, maxRetry: task.maxRetry, to: resolution.status },
        "Task will be retried"
      );
    } else {
      this.logger.error(
        { ...logCtx, retryCount: resolution.retryCount, maxRetry: task.maxRetry, to: resolution.status },
        "Task retry budget exhausted"
      );
    }

    return {
      kind: "faulted",
      taskId: task.id,
      logId,
      error: message,
      retryCount: resolution.retryCount,
      willRetry: resolution.willRetry,
    };
  }
}
