import { asc, eq } from "drizzle-orm";
import type { NewScheduleTask, ScheduleTask } from "../schema";
import { scheduleTasks } from "../schema";
import type { DatabaseClient } from "../client";
import type { Logger } from "../../core/logger";
import { systemClock, unixSeconds, type Clock } from "../../core/time";
import type { TaskStatus } from "../../domain/models";

export interface TaskStatusUpdate {
  status: TaskStatus;
  lastRunAt?: number;
  nextRunAt?: number | null;
  retryCount?: number;
}

export class TasksRepository {
  private readonly logger: Logger;

  constructor(
    private readonly client: DatabaseClient,
    logger: Logger,
    private readonly clock: Clock = systemClock
  ) {
    this.logger = logger.child({ component: "tasks-repo" });
  }

  async listAll(): Promise<ScheduleTask[]> {
    return this.client.transaction("list_tasks", (db) =>
      db.select().from(scheduleTasks).orderBy(asc(scheduleTasks.id)).all()
    );
  }

  async listEnabled(): Promise<ScheduleTask[]> {
    return this.client.transaction("list_enabled_tasks", (db) =>
      db.select().from(scheduleTasks).where(eq(scheduleTasks.enabled, 1)).orderBy(asc(scheduleTasks.id)).all()
    );
  }

  async findById(id: number): Promise<ScheduleTask | null> {
    return this.client.transaction("find_task", (db) => {
      const result = db.select().from(scheduleTasks).where(eq(scheduleTasks.id, id)).get();
      return result ?? null;
    });
  }

  async findByName(name: string): Promise<ScheduleTask | null> {
    return this.client.transaction("find_task_by_name", (db) => {
      const result = db.select().from(scheduleTasks).where(eq(scheduleTasks.name, name)).get();
      return result ?? null;
    });
  }

  async updateStatus(id: number, update: TaskStatusUpdate): Promise<ScheduleTask | null> {
    const changes: Partial<NewScheduleTask> = {
      status: update.status,
      updatedAt: unixSeconds(this.clock()),
    };
    if (update.lastRunAt !== undefined) changes.lastRunAt = update.lastRunAt;
    if (update.nextRunAt !== undefined) changes.nextRunAt = update.nextRunAt;
    if (update.retryCount !== undefined) changes.retryCount = update.retryCount;

    const result = this.client.transaction("update_task_status", (db) =>
      db.update(scheduleTasks).set(changes).where(eq(scheduleTasks.id, id)).returning().get()
    );
    if (result) {
      this.logger.info({ taskId: id, status: update.status, retryCount: result.retryCount }, "Task status updated");
    }
    return result ?? null;
  }

  async updateSchedule(name: string, scheduleTime: string, enabled?: boolean): Promise<ScheduleTask | null> {
    const changes: Partial<NewScheduleTask> = { scheduleTime, updatedAt: unixSeconds(this.clock()) };
    if (enabled !== undefined) changes.enabled = enabled ? 1 : 0;

    const result = this.client.transaction("update_task_schedule", (db) =>
      db.update(scheduleTasks).set(changes).where(eq(scheduleTasks.name, name)).returning().get()
    );
    if (result) {
      this.logger.info({ taskName: name, scheduleTime, enabled: result.enabled === 1 }, "Task schedule updated");
    }
    return result ?? null;
  }

  /** Advisory only; the scheduler computes firing times itself. */
  async updateNextRun(id: number, nextRunAt: number | null): Promise<void> {
    this.client.transaction("update_task_next_run", (db) =>
      db.update(scheduleTasks).set({ nextRunAt }).where(eq(scheduleTasks.id, id)).run()
    );
  }
}
