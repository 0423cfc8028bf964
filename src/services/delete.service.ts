import { eq } from "drizzle-orm";
import type { DatabaseClient } from "../db/client";
import { accounts, followerSnapshots } from "../db/schema";
import type { Logger } from "../core/logger";

export class DeleteService {
  private readonly logger: Logger;

  constructor(private readonly client: DatabaseClient, logger: Logger) {
    this.logger = logger.child({ component: "delete-service" });
  }

  async deleteSnapshot(snapshotId: number): Promise<boolean> {
    const result = this.client.transaction("delete_snapshot", (db) =>
      db.delete(followerSnapshots).where(eq(followerSnapshots.id, snapshotId)).run()
    );
    if (result.changes === 0) {
      this.logger.warn({ snapshotId }, "Snapshot not found");
      return false;
    }
    this.logger.info({ snapshotId }, "Snapshot deleted");
    return true;
  }

  /**
   * Removes the account, and its snapshots when `deleteRecords` is set.
   * Without it the snapshots stay behind as orphans pointing at the old id.
   */
  async deleteAccount(accountId: number, deleteRecords: boolean): Promise<boolean> {
    const outcome = this.client.transaction("delete_account", (db) => {
      const snapshots = deleteRecords
        ? db.delete(followerSnapshots).where(eq(followerSnapshots.accountId, accountId)).run().changes
        : 0;
      const removed = db.delete(accounts).where(eq(accounts.id, accountId)).run().changes;
      return { removed, snapshots };
    });

    if (outcome.removed === 0) {
      this.logger.warn({ accountId }, "Account not found");
      return false;
    }
    this.logger.info(
      { accountId, deleteRecords, snapshotsDeleted: outcome.snapshots },
      deleteRecords ? "Account and its snapshots deleted" : "Account deleted, snapshots kept"
    );
    return true;
  }
}
