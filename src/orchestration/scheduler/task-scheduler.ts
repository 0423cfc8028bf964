import type { ScheduleTask } from "../../db/schema";
import type { TasksRepository } from "../../db/repositories/tasks.repo";
import type { TaskLogsRepository } from "../../db/repositories/task-logs.repo";
import { SchedulingError } from "../../core/errors";
import type { Logger } from "../../core/logger";
import { systemClock, unixSeconds, type Clock } from "../../core/time";
import type { RunLogStatus, Trigger } from "../../domain/models";
import { nextDailyRun, parseScheduleTime } from "../../domain/schedule-time";
import type { ExecutionOutcome, TaskExecutor } from "./task-executor";

interface RegistryEntry {
  taskId: number;
  name: string;
  scheduleTime: string;
  nextFireAt: Date;
}

interface PendingRetry {
  timer: ReturnType<typeof setTimeout>;
  dueAt: Date;
}

export interface TaskStatusView {
  id: number;
  name: string;
  enabled: boolean;
  scheduleTime: string;
  status: ScheduleTask["status"];
  lastRunAt: number | null;
  nextRunAt: number | null;
  retryCount: number;
  maxRetry: number;
  lastRunLogStatus: RunLogStatus | null;
  lastRunLogStartedAt: number | null;
  pendingRetryAt: number | null;
}

export interface SchedulerStatus {
  running: boolean;
  tasks: TaskStatusView[];
}

export interface TaskSchedulerDeps {
  tasks: TasksRepository;
  taskLogs: TaskLogsRepository;
  executor: TaskExecutor;
  logger: Logger;
  tickIntervalMs: number;
  retryDelayMs: number;
  clock?: Clock;
}

export const DEFAULT_STOP_TIMEOUT_MS = 5000;

export class TaskScheduler {
  private readonly logger: Logger;
  private readonly clock: Clock;
  private interval: ReturnType<typeof setInterval> | null = null;
  private isTicking = false;
  private currentTick: Promise<void> | null = null;
  /** Replaced wholesale, never edited key by key from outside a tick. */
  private registry: ReadonlyMap<number, RegistryEntry> = new Map();
  private retries = new Map<number, PendingRetry>();
  private inFlight = new Set<Promise<void>>();

  constructor(private readonly deps: TaskSchedulerDeps) {
    this.logger = deps.logger.child({ component: "scheduler" });
    this.clock = deps.clock ?? systemClock;
  }

  get running(): boolean {
    return this.interval !== null;
  }

  async start(): Promise<void> {
    if (this.interval) {
      this.logger.warn("Scheduler already running");
      return;
    }

    this.registry = await this.buildRegistry();
    await this.resumeRetries();
    this.interval = setInterval(() => {
      this.tick().catch((error: unknown) => {
        this.logger.error({ err: error }, "Scheduler tick failed");
      });
    }, this.deps.tickIntervalMs);

    this.logger.info(
      {
        tasks: [...this.registry.values()].map((e) => ({ name: e.name, nextFireAt: e.nextFireAt.toISOString() })),
        tickIntervalMs: this.deps.tickIntervalMs,
      },
      "Scheduler started"
    );
  }

  /**
   * Stops firing and cancels queued retries. Runs already in flight are left
   * to finish; this waits for the current tick, bounded by `timeoutMs`.
   */
  async stop(timeoutMs: number = DEFAULT_STOP_TIMEOUT_MS): Promise<void> {
    if (this.interval) {
      clearInterval(this.interval);
      this.interval = null;
    }

    for (const [taskId, pending] of this.retries) {
      clearTimeout(pending.timer);
      this.logger.info({ taskId }, "Pending retry cancelled");
    }
    this.retries.clear();

    if (this.currentTick) {
      let timer: ReturnType<typeof setTimeout> | undefined;
      const timeout = new Promise<"timeout">((resolve) => {
        timer = setTimeout(() => resolve("timeout"), timeoutMs);
      });
      const finished = await Promise.race([this.currentTick.then(() => "done" as const), timeout]);
      clearTimeout(timer);
      if (finished === "timeout") {
        this.logger.warn({ timeoutMs }, "Scheduler tick still running at stop timeout");
      }
    }

    this.logger.info({ inFlight: this.inFlight.size }, "Scheduler stopped");
  }

  /** One pass over the registry; fires every task whose time has come. */
  async tick(): Promise<void> {
    if (this.isTicking) {
      this.logger.debug("Scheduler tick already in progress, skipping");
      return;
    }

    this.isTicking = true;
    const tick = this.fireDueTasks();
    this.currentTick = tick;
    try {
      await tick;
    } finally {
      this.isTicking = false;
      this.currentTick = null;
    }
  }

  private async fireDueTasks(): Promise<void> {
    const now = this.clock();
    for (const entry of this.registry.values()) {
      if (entry.nextFireAt.getTime() > now.getTime()) continue;

      entry.nextFireAt = nextDailyRun(entry.scheduleTime, now);
      this.logger.info(
        { taskId: entry.taskId, name: entry.name, nextFireAt: entry.nextFireAt.toISOString() },
        "Firing scheduled task"
      );
      this.fire(entry.taskId, "scheduled");

      try {
        await this.deps.tasks.updateNextRun(entry.taskId, unixSeconds(entry.nextFireAt));
      } catch (error) {
        this.logger.error({ err: error, taskId: entry.taskId }, "Failed to record next run time");
      }
    }
  }

  /** Starts an execution without waiting for it; the outcome feeds the retry queue. */
  private fire(taskId: number, trigger: Trigger): void {
    const execution = this.deps.executor
      .execute(taskId, trigger)
      .then((outcome) => this.afterExecution(outcome))
      .catch((error: unknown) => {
        this.logger.error({ err: error, taskId, trigger }, "Task execution failed unexpectedly");
      })
      .finally(() => {
        this.inFlight.delete(execution);
      });
    this.inFlight.add(execution);
  }

  /** Queued whether or not the tick loop is running; `stop()` cancels it. */
  private afterExecution(outcome: ExecutionOutcome): void {
    if (outcome.kind !== "faulted" || !outcome.willRetry) return;
    this.enqueueRetry(outcome.taskId);
  }

  /** Tasks left `retrying` by an earlier run still get their re-invocation. */
  private async resumeRetries(): Promise<void> {
    const enabled = await this.deps.tasks.listEnabled();
    for (const task of enabled) {
      if (task.status !== "retrying" || task.retryCount > task.maxRetry || this.retries.has(task.id)) continue;
      this.logger.info({ taskId: task.id, name: task.name, retryCount: task.retryCount }, "Resuming pending retry");
      this.enqueueRetry(task.id);
    }
  }

  private enqueueRetry(taskId: number): void {
    const existing = this.retries.get(taskId);
    if (existing) clearTimeout(existing.timer);

    const dueAt = new Date(this.clock().getTime() + this.deps.retryDelayMs);
    const timer = setTimeout(() => {
      this.retries.delete(taskId);
      this.logger.info({ taskId }, "Retrying task");
      this.fire(taskId, "retry");
    }, this.deps.retryDelayMs);
    timer.unref();

    this.retries.set(taskId, { timer, dueAt });
    this.logger.info({ taskId, dueAt: dueAt.toISOString() }, "Task retry queued");
  }

  /** Same execution path as a scheduled firing; resolves with its outcome. */
  async runNow(taskName: string): Promise<ExecutionOutcome> {
    const task = await this.deps.tasks.findByName(taskName);
    if (!task) {
      throw new SchedulingError(`Unknown task: ${taskName}`, "unknown_task");
    }

    this.logger.info({ taskId: task.id, name: task.name }, "Manual run requested");
    const outcome = await this.deps.executor.execute(task.id, "manual");
    this.afterExecution(outcome);
    return outcome;
  }

  /** Runs every enabled task now, one after another. */
  async runAll(): Promise<ExecutionOutcome[]> {
    const enabled = await this.deps.tasks.listEnabled();
    this.logger.info({ tasks: enabled.length }, "Running all enabled tasks");

    const outcomes: ExecutionOutcome[] = [];
    for (const task of enabled) {
      const outcome = await this.deps.executor.execute(task.id, "manual");
      this.afterExecution(outcome);
      outcomes.push(outcome);
    }
    return outcomes;
  }

  async updateTaskSchedule(taskName: string, time: string, enabled?: boolean): Promise<ScheduleTask> {
    parseScheduleTime(time);

    const updated = await this.deps.tasks.updateSchedule(taskName, time.trim(), enabled);
    if (!updated) {
      throw new SchedulingError(`Unknown task: ${taskName}`, "unknown_task");
    }

    if (this.running) {
      this.registry = await this.buildRegistry();
      this.logger.info({ name: taskName, scheduleTime: updated.scheduleTime }, "Scheduler registry rebuilt");
    }
    return updated;
  }

  async getStatus(): Promise<SchedulerStatus> {
    const tasks = await this.deps.tasks.listAll();
    const registry = this.registry;
    const views: TaskStatusView[] = [];

    for (const task of tasks) {
      const latestLog = await this.deps.taskLogs.latestForTask(task.id);
      const entry = this.running ? registry.get(task.id) : undefined;
      const pending = this.retries.get(task.id);
      views.push({
        id: task.id,
        name: task.name,
        enabled: task.enabled === 1,
        scheduleTime: task.scheduleTime,
        status: task.status,
        lastRunAt: task.lastRunAt,
        nextRunAt: entry ? unixSeconds(entry.nextFireAt) : task.nextRunAt,
        retryCount: task.retryCount,
        maxRetry: task.maxRetry,
        lastRunLogStatus: latestLog?.status ?? null,
        lastRunLogStartedAt: latestLog?.startedAt ?? null,
        pendingRetryAt: pending ? unixSeconds(pending.dueAt) : null,
      });
    }

    return { running: this.running, tasks: views };
  }

  /** Resolves once every execution started by this scheduler has settled. */
  async drain(): Promise<void> {
    while (this.inFlight.size > 0) {
      await Promise.all([...this.inFlight]);
    }
  }

  private async buildRegistry(): Promise<ReadonlyMap<number, RegistryEntry>> {
    const now = this.clock();
    const enabled = await this.deps.tasks.listEnabled();
    const next = new Map<number, RegistryEntry>();

    for (const task of enabled) {
      const nextFireAt = nextDailyRun(task.scheduleTime, now);
      next.set(task.id, { taskId: task.id, name: task.name, scheduleTime: task.scheduleTime, nextFireAt });
      await this.deps.tasks.updateNextRun(task.id, unixSeconds(nextFireAt));
    }
    return next;
  }
}
