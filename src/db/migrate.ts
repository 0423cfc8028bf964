import { asc } from "drizzle-orm";
import { drizzle } from "drizzle-orm/better-sqlite3";
import type { Logger } from "../core/logger";
import type { Connection, DatabaseClient } from "./client";
import { platforms, scheduleTasks } from "./schema";
import { PLATFORM_SEEDS, taskNameFor } from "../domain/models";

const TABLE_STATEMENTS = [
  `CREATE TABLE IF NOT EXISTS platforms (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    name TEXT NOT NULL UNIQUE,
    code TEXT NOT NULL UNIQUE,
    description TEXT NOT NULL DEFAULT '',
    created_at INTEGER NOT NULL DEFAULT (unixepoch()),
    updated_at INTEGER NOT NULL DEFAULT (unixepoch())
  )`,
  `CREATE TABLE IF NOT EXISTS accounts (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    platform_id INTEGER NOT NULL REFERENCES platforms(id),
    native_id TEXT NOT NULL,
    display_name TEXT NOT NULL DEFAULT '',
    identity_tag TEXT NOT NULL DEFAULT '0',
    avatar TEXT NOT NULL DEFAULT '',
    is_active INTEGER NOT NULL DEFAULT 1,
    created_at INTEGER NOT NULL DEFAULT (unixepoch()),
    updated_at INTEGER NOT NULL DEFAULT (unixepoch())
  )`,
  `CREATE TABLE IF NOT EXISTS follower_snapshots (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    account_id INTEGER NOT NULL REFERENCES accounts(id),
    platform_id INTEGER NOT NULL REFERENCES platforms(id),
    identity_tag TEXT NOT NULL DEFAULT '0',
    follower_count INTEGER NOT NULL,
    record_time INTEGER NOT NULL,
    status TEXT NOT NULL DEFAULT 'success',
    error_message TEXT NOT NULL DEFAULT '',
    created_at INTEGER NOT NULL DEFAULT (unixepoch())
  )`,
  `CREATE TABLE IF NOT EXISTS schedule_tasks (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    name TEXT NOT NULL UNIQUE,
    platform_id INTEGER NOT NULL UNIQUE REFERENCES platforms(id),
    schedule_time TEXT NOT NULL,
    enabled INTEGER NOT NULL DEFAULT 1,
    last_run_at INTEGER,
    next_run_at INTEGER,
    retry_count INTEGER NOT NULL DEFAULT 0,
    max_retry INTEGER NOT NULL DEFAULT 3,
    status TEXT NOT NULL DEFAULT 'idle',
    created_at INTEGER NOT NULL DEFAULT (unixepoch()),
    updated_at INTEGER NOT NULL DEFAULT (unixepoch())
  )`,
  `CREATE TABLE IF NOT EXISTS task_run_logs (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    task_id INTEGER NOT NULL REFERENCES schedule_tasks(id),
    started_at INTEGER NOT NULL,
    ended_at INTEGER,
    status TEXT NOT NULL DEFAULT 'running',
    records_count INTEGER NOT NULL DEFAULT 0,
    success_count INTEGER NOT NULL DEFAULT 0,
    failed_count INTEGER NOT NULL DEFAULT 0,
    error_message TEXT,
    created_at INTEGER NOT NULL DEFAULT (unixepoch())
  )`,
];

/**
 * Columns added after the first schema revision. A database written by an
 * older revision gets each missing column with its default; existing NULLs are
 * backfilled with the same value.
 */
export const COLUMN_BACKFILLS: ReadonlyArray<{
  table: string;
  column: string;
  definition: string;
  backfill: string | number | null;
}> = [
  { table: "accounts", column: "identity_tag", definition: "TEXT NOT NULL DEFAULT '0'", backfill: "0" },
  { table: "accounts", column: "avatar", definition: "TEXT NOT NULL DEFAULT ''", backfill: "" },
  { table: "accounts", column: "is_active", definition: "INTEGER NOT NULL DEFAULT 1", backfill: 1 },
  { table: "follower_snapshots", column: "identity_tag", definition: "TEXT NOT NULL DEFAULT '0'", backfill: "0" },
  { table: "follower_snapshots", column: "status", definition: "TEXT NOT NULL DEFAULT 'success'", backfill: "success" },
  { table: "follower_snapshots", column: "error_message", definition: "TEXT NOT NULL DEFAULT ''", backfill: "" },
  { table: "schedule_tasks", column: "retry_count", definition: "INTEGER NOT NULL DEFAULT 0", backfill: 0 },
  { table: "schedule_tasks", column: "max_retry", definition: "INTEGER NOT NULL DEFAULT 3", backfill: 3 },
  { table: "schedule_tasks", column: "next_run_at", definition: "INTEGER", backfill: null },
];

const INDEX_STATEMENTS = [
  "CREATE UNIQUE INDEX IF NOT EXISTS accounts_platform_native_idx ON accounts (platform_id, native_id)",
  "CREATE INDEX IF NOT EXISTS accounts_identity_idx ON accounts (identity_tag)",
  "CREATE INDEX IF NOT EXISTS follower_snapshots_account_record_idx ON follower_snapshots (account_id, record_time DESC)",
  "CREATE INDEX IF NOT EXISTS follower_snapshots_identity_record_idx ON follower_snapshots (identity_tag, record_time DESC)",
  "CREATE INDEX IF NOT EXISTS task_run_logs_task_started_idx ON task_run_logs (task_id, started_at DESC)",
];

export interface MigrationResult {
  addedColumns: string[];
}

function existingColumns(sqlite: Connection, table: string): Set<string> {
  const rows = sqlite.prepare(`PRAGMA table_info(${table})`).all();
  const names = new Set<string>();
  for (const row of rows) {
    if (row && typeof row === "object" && "name" in row && typeof row.name === "string") {
      names.add(row.name);
    }
  }
  return names;
}

export function runMigrations(
  client: DatabaseClient,
  logger: Logger,
  options: { defaultScheduleTime: string }
): MigrationResult {
  const log = logger.child({ component: "migrate" });
  log.info("Running database migrations...");

  const result: MigrationResult = { addedColumns: [] };

  client.withConnection("migrate", (sqlite) => {
    sqlite.transaction(() => {
      for (const statement of TABLE_STATEMENTS) {
        sqlite.exec(statement);
      }

      for (const { table, column, definition, backfill } of COLUMN_BACKFILLS) {
        const columns = existingColumns(sqlite, table);
        if (!columns.has(column)) {
          sqlite.exec(`ALTER TABLE ${table} ADD COLUMN ${column} ${definition}`);
          result.addedColumns.push(`${table}.${column}`);
          log.info({ table, column, definition }, "Added missing column");
        }
        if (backfill !== null) {
          const changes = sqlite.prepare(`UPDATE ${table} SET ${column} = ? WHERE ${column} IS NULL`).run(backfill).changes;
          if (changes > 0) {
            log.info({ table, column, rows: changes }, "Backfilled column default");
          }
        }
      }

      for (const statement of INDEX_STATEMENTS) {
        sqlite.exec(statement);
      }

      const db = drizzle(sqlite);
      db.insert(platforms).values([...PLATFORM_SEEDS]).onConflictDoNothing().run();

      const seeded = db
        .select({ id: platforms.id, code: platforms.code })
        .from(platforms)
        .orderBy(asc(platforms.id))
        .all();
      for (const platform of seeded) {
        db.insert(scheduleTasks)
          .values({
            name: taskNameFor(platform.code),
            platformId: platform.id,
            scheduleTime: options.defaultScheduleTime,
          })
          .onConflictDoNothing()
          .run();
      }
    })();
  });

  log.info({ addedColumns: result.addedColumns }, "All migrations completed");
  return result;
}

export const CREDENTIALS_TABLE_STATEMENT = `CREATE TABLE IF NOT EXISTS credentials (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  platform TEXT NOT NULL UNIQUE,
  token TEXT NOT NULL,
  created_at INTEGER NOT NULL DEFAULT (unixepoch()),
  updated_at INTEGER NOT NULL DEFAULT (unixepoch())
)`;

export function runCredentialMigrations(client: DatabaseClient, logger: Logger): void {
  client.withConnection("migrate_credentials", (sqlite) => {
    sqlite.exec(CREDENTIALS_TABLE_STATEMENT);
  });
  logger.child({ component: "migrate" }).info("Credential store ready");
}
