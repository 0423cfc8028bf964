import { asc, eq } from "drizzle-orm";
import { credentials } from "../credentials-schema";
import type { DatabaseClient } from "../client";
import type { Logger } from "../../core/logger";
import { systemClock, unixSeconds, type Clock } from "../../core/time";

export interface CredentialSummary {
  platform: string;
  updatedAt: number;
}

/**
 * Per-platform cookie store in its own database file. Failures are logged
 * and reported as `false` / `null`; nothing is thrown to the caller.
 */
export class CredentialsRepository {
  private readonly logger: Logger;

  constructor(
    private readonly client: DatabaseClient,
    logger: Logger,
    private readonly clock: Clock = systemClock
  ) {
    this.logger = logger.child({ component: "credentials-repo" });
  }

  async save(platform: string, token: string): Promise<boolean> {
    const now = unixSeconds(this.clock());
    try {
      this.client.transaction("save_credential", (db) =>
        db
          .insert(credentials)
          .values({ platform, token, createdAt: now, updatedAt: now })
          .onConflictDoUpdate({ target: credentials.platform, set: { token, updatedAt: now } })
          .run()
      );
      this.logger.info({ platform }, "Credential saved");
      return true;
    } catch (error) {
      this.logger.error({ err: error, platform }, "Failed to save credential");
      return false;
    }
  }

  async get(platform: string): Promise<string | null> {
    try {
      return this.client.transaction("get_credential", (db) => {
        const row = db
          .select({ token: credentials.token })
          .from(credentials)
          .where(eq(credentials.platform, platform))
          .get();
        return row?.token ?? null;
      });
    } catch (error) {
      this.logger.error({ err: error, platform }, "Failed to read credential");
      return null;
    }
  }

  async delete(platform: string): Promise<boolean> {
    try {
      const result = this.client.transaction("delete_credential", (db) =>
        db.delete(credentials).where(eq(credentials.platform, platform)).run()
      );
      this.logger.info({ platform, deleted: result.changes > 0 }, "Credential deleted");
      return result.changes > 0;
    } catch (error) {
      this.logger.error({ err: error, platform }, "Failed to delete credential");
      return false;
    }
  }

  async list(): Promise<CredentialSummary[]> {
    try {
      return this.client.transaction("list_credentials", (db) =>
        db
          .select({ platform: credentials.platform, updatedAt: credentials.updatedAt })
          .from(credentials)
          .orderBy(asc(credentials.platform))
          .all()
      );
    } catch (error) {
      this.logger.error({ err: error }, "Failed to list credentials");
      return [];
    }
  }
}
