import { and, desc, eq, gte, inArray, lte, type SQL } from "drizzle-orm";
import type { FollowerSnapshot } from "../schema";
import { followerSnapshots } from "../schema";
import type { DatabaseClient } from "../client";
import type { Logger } from "../../core/logger";
import { UNASSIGNED_IDENTITY, type SnapshotStatus } from "../../domain/models";

export interface SnapshotRecord {
  accountId: number;
  platformId: number;
  identityTag?: string;
  followerCount: number;
  /** Unix seconds. */
  recordTime: number;
  status?: SnapshotStatus;
  errorMessage?: string;
}

export interface SnapshotQuery {
  accountId?: number;
  /** Takes precedence over `platformIds`. */
  platformId?: number;
  platformIds?: number[];
  identityTag?: string;
  from?: number;
  to?: number;
  limit?: number;
}

export const DEFAULT_SNAPSHOT_LIMIT = 100;

export class SnapshotsRepository {
  private readonly logger: Logger;

  constructor(private readonly client: DatabaseClient, logger: Logger) {
    this.logger = logger.child({ component: "snapshots-repo" });
  }

  /** Append-only; the account must already exist. */
  async record(data: SnapshotRecord): Promise<number> {
    const created = this.client.transaction("record_snapshot", (db) =>
      db
        .insert(followerSnapshots)
        .values({
          accountId: data.accountId,
          platformId: data.platformId,
          identityTag: data.identityTag ? data.identityTag : UNASSIGNED_IDENTITY,
          followerCount: data.followerCount,
          recordTime: data.recordTime,
          status: data.status ?? "success",
          errorMessage: data.errorMessage ?? "",
        })
        .returning({ id: followerSnapshots.id })
        .get()
    );
    this.logger.debug(
      { snapshotId: created.id, accountId: data.accountId, followerCount: data.followerCount },
      "Snapshot recorded"
    );
    return created.id;
  }

  async query(filters: SnapshotQuery = {}): Promise<FollowerSnapshot[]> {
    const conditions: SQL[] = [];
    if (filters.accountId !== undefined) conditions.push(eq(followerSnapshots.accountId, filters.accountId));
    if (filters.platformId !== undefined) {
      conditions.push(eq(followerSnapshots.platformId, filters.platformId));
    } else if (filters.platformIds && filters.platformIds.length > 0) {
      conditions.push(inArray(followerSnapshots.platformId, filters.platformIds));
    }
    if (filters.identityTag !== undefined) conditions.push(eq(followerSnapshots.identityTag, filters.identityTag));
    if (filters.from !== undefined) conditions.push(gte(followerSnapshots.recordTime, filters.from));
    if (filters.to !== undefined) conditions.push(lte(followerSnapshots.recordTime, filters.to));

    return this.client.transaction("query_snapshots", (db) =>
      db
        .select()
        .from(followerSnapshots)
        .where(and(...conditions))
        .orderBy(desc(followerSnapshots.recordTime), desc(followerSnapshots.id))
        .limit(filters.limit ?? DEFAULT_SNAPSHOT_LIMIT)
        .all()
    );
  }

  /** Follower count of the newest snapshot; equal record times go to the latest insert. */
  async latestFollowerCount(accountId: number): Promise<number | null> {
    return this.client.transaction("latest_follower_count", (db) => {
      const latest = db
        .select({ followerCount: followerSnapshots.followerCount })
        .from(followerSnapshots)
        .where(eq(followerSnapshots.accountId, accountId))
        .orderBy(desc(followerSnapshots.recordTime), desc(followerSnapshots.id))
        .limit(1)
        .get();
      return latest?.followerCount ?? null;
    });
  }
}
