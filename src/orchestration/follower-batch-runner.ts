import type { AccountsRepository } from "../db/repositories/accounts.repo";
import type { SnapshotsRepository } from "../db/repositories/snapshots.repo";
import { PersistenceError, errorMessage } from "../core/errors";
import type { Logger } from "../core/logger";
import { systemClock, unixSeconds, type Clock } from "../core/time";
import type { FetchResult, PlatformCrawler } from "../platforms/crawler";

export interface TargetFailure {
  target: string;
  error: string;
}

export interface BatchResult {
  recordsCount: number;
  successCount: number;
  failedCount: number;
  failures: TargetFailure[];
}

export interface FollowerBatchRunnerDeps {
  accounts: AccountsRepository;
  snapshots: SnapshotsRepository;
  logger: Logger;
  clock?: Clock;
}

/**
 * Fetches targets one at a time. A target that cannot be fetched or parsed is
 * counted and skipped; a storage failure aborts the whole batch.
 */
export class FollowerBatchRunner {
  private readonly logger: Logger;
  private readonly clock: Clock;

  constructor(private readonly deps: FollowerBatchRunnerDeps) {
    this.logger = deps.logger.child({ component: "batch-runner" });
    this.clock = deps.clock ?? systemClock;
  }

  async run(platformId: number, crawler: PlatformCrawler, targets: readonly string[]): Promise<BatchResult> {
    const result: BatchResult = { recordsCount: targets.length, successCount: 0, failedCount: 0, failures: [] };
    this.logger.info({ platform: crawler.platform, targets: targets.length }, "Starting follower batch");

    for (const target of targets) {
      let fetched: FetchResult;
      try {
        fetched = await crawler.fetchAccount(target);
      } catch (error) {
        this.recordFailure(result, target, errorMessage(error));
        this.logger.error({ err: error, platform: crawler.platform, target }, "Crawler threw while fetching target");
        continue;
      }

      if (!fetched.ok) {
        this.recordFailure(result, target, fetched.error.message);
        this.logger.warn(
          { platform: crawler.platform, target, kind: fetched.error.kind, status: fetched.error.status },
          "Target fetch failed"
        );
        continue;
      }

      const { account } = fetched;
      const accountId = await this.deps.accounts.upsert({
        platformId,
        nativeId: account.nativeId,
        displayName: account.displayName,
        avatar: account.avatar,
      });
      const stored = await this.deps.accounts.findById(accountId);
      if (!stored) {
        throw new PersistenceError(`Account ${accountId} vanished after upsert`, "account_missing");
      }

      await this.deps.snapshots.record({
        accountId,
        platformId,
        identityTag: stored.identityTag,
        followerCount: account.followerCount,
        recordTime: unixSeconds(this.clock()),
        status: "success",
      });
      result.successCount++;
    }

    this.logger.info(
      {
        platform: crawler.platform,
        recordsCount: result.recordsCount,
        successCount: result.successCount,
        failedCount: result.failedCount,
      },
      "Follower batch finished"
    );
    return result;
  }

  private recordFailure(result: BatchResult, target: string, error: string): void {
    result.failedCount++;
    result.failures.push({ target, error });
  }
}
