import Database from "better-sqlite3";
import { drizzle, type BetterSQLite3Database } from "drizzle-orm/better-sqlite3";
import { mkdirSync } from "fs";
import { dirname } from "path";
import type { Logger } from "../core/logger";
import { PersistenceError, errorMessage } from "../core/errors";

export type Db = BetterSQLite3Database;
export type Connection = Database.Database;

/**
 * Opens a short-lived connection per logical operation. Nothing holds a
 * connection between operations, so two crawls and the API can share the file.
 */
export class DatabaseClient {
  private readonly logger: Logger;

  constructor(readonly path: string, logger: Logger) {
    this.logger = logger.child({ component: "db", file: path });
  }

  private open(): Connection {
    const sqlite = new Database(this.path);
    sqlite.pragma("busy_timeout = 5000");
    // Snapshots may outlive their account.
    sqlite.pragma("foreign_keys = OFF");
    return sqlite;
  }

  /** Creates the parent directory and switches the file to WAL; call once at startup. */
  prepare(): void {
    mkdirSync(dirname(this.path), { recursive: true });
    this.withConnection("prepare", (sqlite) => {
      sqlite.pragma("journal_mode = WAL");
    });
    this.logger.info("Database ready");
  }

  /** Runs `fn` inside one transaction: committed when it returns, rolled back when it throws. */
  transaction<T>(operation: string, fn: (db: Db) => T): T {
    return this.withConnection(operation, (sqlite) => {
      const db = drizzle(sqlite);
      return sqlite.transaction(() => fn(db))();
    });
  }

  withConnection<T>(operation: string, fn: (sqlite: Connection) => T): T {
    let sqlite: Connection | null = null;
    try {
      sqlite = this.open();
      return fn(sqlite);
    } catch (error) {
      this.logger.error({ err: error, operation }, "Database operation failed, rolled back");
      if (error instanceof PersistenceError) throw error;
      throw new PersistenceError(`${operation} failed: ${errorMessage(error)}`, "query_failed", { cause: error });
    } finally {
      sqlite?.close();
    }
  }
}
