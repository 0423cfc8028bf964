import { desc, eq } from "drizzle-orm";
import type { TaskRunLog } from "../schema";
import { taskRunLogs } from "../schema";
import type { DatabaseClient } from "../client";
import type { Logger } from "../../core/logger";
import type { BatchStatus } from "../../domain/models";

export interface RunLogClose {
  endedAt: number;
  status: BatchStatus;
  recordsCount: number;
  successCount: number;
  failedCount: number;
  errorMessage?: string | null;
}

export class TaskLogsRepository {
  private readonly logger: Logger;

  constructor(private readonly client: DatabaseClient, logger: Logger) {
    this.logger = logger.child({ component: "task-logs-repo" });
  }

  async open(taskId: number, startedAt: number): Promise<number> {
    const created = this.client.transaction("open_run_log", (db) =>
      db
        .insert(taskRunLogs)
        .values({ taskId, startedAt, status: "running" })
        .returning({ id: taskRunLogs.id })
        .get()
    );
    this.logger.debug({ logId: created.id, taskId }, "Run log opened");
    return created.id;
  }

  async close(logId: number, result: RunLogClose): Promise<void> {
    this.client.transaction("close_run_log", (db) =>
      db
        .update(taskRunLogs)
        .set({
          endedAt: result.endedAt,
          status: result.status,
          recordsCount: result.recordsCount,
          successCount: result.successCount,
          failedCount: result.failedCount,
          errorMessage: result.errorMessage ?? null,
        })
        .where(eq(taskRunLogs.id, logId))
        .run()
    );
    this.logger.debug({ logId, status: result.status }, "Run log closed");
  }

  async list(taskId?: number, limit: number = 20): Promise<TaskRunLog[]> {
    return this.client.transaction("list_run_logs", (db) =>
      db
        .select()
        .from(taskRunLogs)
        .where(taskId === undefined ? undefined : eq(taskRunLogs.taskId, taskId))
        .orderBy(desc(taskRunLogs.startedAt), desc(taskRunLogs.id))
        .limit(limit)
        .all()
    );
  }

  async latestForTask(taskId: number): Promise<TaskRunLog | null> {
    const [latest] = await this.list(taskId, 1);
    return latest ?? null;
  }
}
