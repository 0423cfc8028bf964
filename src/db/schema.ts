import { sqliteTable, text, integer, uniqueIndex, index } from "drizzle-orm/sqlite-core";
import { sql } from "drizzle-orm";
import { BatchStatusSchema, RunLogStatusSchema, TaskStatusSchema } from "../domain/models";

export const platforms = sqliteTable("platforms", {
  id: integer("id").primaryKey({ autoIncrement: true }),
  name: text("name").notNull().unique(),
  code: text("code").notNull().unique(),
  description: text("description").notNull().default(""),
  createdAt: integer("created_at").notNull().default(sql`(unixepoch())`),
  updatedAt: integer("updated_at").notNull().default(sql`(unixepoch())`),
});

export const accounts = sqliteTable(
  "accounts",
  {
    id: integer("id").primaryKey({ autoIncrement: true }),
    platformId: integer("platform_id").notNull().references(() => platforms.id),
    nativeId: text("native_id").notNull(),
    displayName: text("display_name").notNull().default(""),
    identityTag: text("identity_tag").notNull().default("0"),
    avatar: text("avatar").notNull().default(""),
    isActive: integer("is_active").notNull().default(1),
    createdAt: integer("created_at").notNull().default(sql`(unixepoch())`),
    updatedAt: integer("updated_at").notNull().default(sql`(unixepoch())`),
  },
  (table) => ({
    platformNativeIdx: uniqueIndex("accounts_platform_native_idx").on(table.platformId, table.nativeId),
    identityIdx: index("accounts_identity_idx").on(table.identityTag),
  })
);

export const followerSnapshots = sqliteTable(
  "follower_snapshots",
  {
    id: integer("id").primaryKey({ autoIncrement: true }),
    accountId: integer("account_id").notNull().references(() => accounts.id),
    platformId: integer("platform_id").notNull().references(() => platforms.id),
    identityTag: text("identity_tag").notNull().default("0"),
    followerCount: integer("follower_count").notNull(),
    recordTime: integer("record_time").notNull(),
    status: text("status", { enum: BatchStatusSchema.options }).notNull().default("success"),
    errorMessage: text("error_message").notNull().default(""),
    createdAt: integer("created_at").notNull().default(sql`(unixepoch())`),
  },
  (table) => ({
    accountRecordIdx: index("follower_snapshots_account_record_idx").on(table.accountId, sql`record_time DESC`),
    identityRecordIdx: index("follower_snapshots_identity_record_idx").on(table.identityTag, sql`record_time DESC`),
  })
);

export const scheduleTasks = sqliteTable("schedule_tasks", {
  id: integer("id").primaryKey({ autoIncrement: true }),
  name: text("name").notNull().unique(),
  platformId: integer("platform_id").notNull().unique().references(() => platforms.id),
  scheduleTime: text("schedule_time").notNull(),
  enabled: integer("enabled").notNull().default(1),
  lastRunAt: integer("last_run_at"),
  nextRunAt: integer("next_run_at"),
  retryCount: integer("retry_count").notNull().default(0),
  maxRetry: integer("max_retry").notNull().default(3),
  status: text("status", { enum: TaskStatusSchema.options }).notNull().default("idle"),
  createdAt: integer("created_at").notNull().default(sql`(unixepoch())`),
  updatedAt: integer("updated_at").notNull().default(sql`(unixepoch())`),
});

export const taskRunLogs = sqliteTable(
  "task_run_logs",
  {
    id: integer("id").primaryKey({ autoIncrement: true }),
    taskId: integer("task_id").notNull().references(() => scheduleTasks.id),
    startedAt: integer("started_at").notNull(),
    endedAt: integer("ended_at"),
    status: text("status", { enum: RunLogStatusSchema.options }).notNull().default("running"),
    recordsCount: integer("records_count").notNull().default(0),
    successCount: integer("success_count").notNull().default(0),
    failedCount: integer("failed_count").notNull().default(0),
    errorMessage: text("error_message"),
    createdAt: integer("created_at").notNull().default(sql`(unixepoch())`),
  },
  (table) => ({
    taskStartedIdx: index("task_run_logs_task_started_idx").on(table.taskId, sql`started_at DESC`),
  })
);

export type Platform = typeof platforms.$inferSelect;
export type Account = typeof accounts.$inferSelect;
export type NewAccount = typeof accounts.$inferInsert;
export type FollowerSnapshot = typeof followerSnapshots.$inferSelect;
export type ScheduleTask = typeof scheduleTasks.$inferSelect;
export type NewScheduleTask = typeof scheduleTasks.$inferInsert;
export type TaskRunLog = typeof taskRunLogs.$inferSelect;
