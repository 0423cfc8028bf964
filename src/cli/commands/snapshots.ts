import type { Command } from "commander";
import type { ContextProvider } from "../context";
import { formatTime, parseDateArg, parseIntArg, parsePlatformArg } from "../args";
import type { PlatformCode } from "../../domain/models";

interface ListOptions {
  account?: number;
  platform?: PlatformCode;
  identity?: string;
  from?: number;
  to?: number;
  limit: number;
}

export const commands = (program: Command, getContext: ContextProvider) => {
  const snapshotsCmd = program.command("snapshots").description("Follower count history");

  snapshotsCmd
    .command("list")
    .option("--account <id>", "Filter by account id", parseIntArg)
    .option("--platform <code>", "Filter by platform code", parsePlatformArg)
    .option("--identity <tag>", "Filter by identity tag")
    .option("--from <date>", "Earliest record time", parseDateArg)
    .option("--to <date>", "Latest record time", parseDateArg)
    .option("--limit <n>", "Number of snapshots to show", parseIntArg, 100)
    .action(async (options: ListOptions) => {
      const ctx = getContext();
      const platform = options.platform ? await ctx.platforms.findByCode(options.platform) : null;
      const snapshots = await ctx.snapshots.query({
        accountId: options.account,
        platformId: platform?.id,
        identityTag: options.identity,
        from: options.from,
        to: options.to,
        limit: options.limit,
      });

      for (const snapshot of snapshots) {
        console.log(
          `  [${snapshot.id}] account=${snapshot.accountId} tag=${snapshot.identityTag} followers=${snapshot.followerCount} at ${formatTime(snapshot.recordTime)}`
        );
      }
    });

  snapshotsCmd
    .command("latest")
    .argument("<accountId>", "Account id", parseIntArg)
    .action(async (accountId: number) => {
      const count = await getContext().snapshots.latestFollowerCount(accountId);
      console.log(count === null ? `No snapshots for account ${accountId}` : String(count));
    });

  snapshotsCmd
    .command("delete")
    .argument("<id>", "Snapshot id", parseIntArg)
    .action(async (id: number) => {
      const deleted = await getContext().deleteService.deleteSnapshot(id);
      if (!deleted) {
        console.log(`Snapshot ${id} not found`);
        process.exitCode = 1;
        return;
      }
      console.log(`Snapshot ${id} deleted`);
    });
};
