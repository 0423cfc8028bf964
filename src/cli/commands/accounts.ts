import type { Command } from "commander";
import type { ContextProvider } from "../context";
import { formatTime, parseIntArg, parsePlatformArg } from "../args";
import type { PlatformCode } from "../../domain/models";

export const commands = (program: Command, getContext: ContextProvider) => {
  const accountsCmd = program.command("accounts").description("Tracked accounts");

  accountsCmd
    .command("list")
    .option("--platform <code>", "Filter by platform code", parsePlatformArg)
    .action(async (options: { platform?: PlatformCode }) => {
      const ctx = getContext();
      let platformId: number | undefined;
      if (options.platform) {
        const platform = await ctx.platforms.findByCode(options.platform);
        if (!platform) {
          console.log(`Platform ${options.platform} not found`);
          process.exitCode = 1;
          return;
        }
        platformId = platform.id;
      }

      const accounts = await ctx.accounts.list(platformId);
      for (const account of accounts) {
        const latest = await ctx.snapshots.latestFollowerCount(account.id);
        console.log(
          `  [${account.id}] ${account.nativeId} "${account.displayName}" tag=${account.identityTag} followers=${latest ?? "-"} updated=${formatTime(account.updatedAt)}`
        );
      }
    });

  accountsCmd
    .command("tag")
    .description("Assign an identity tag to an account")
    .argument("<platform>", "Platform code", parsePlatformArg)
    .argument("<nativeId>", "Account id on the platform")
    .argument("<tag>", "Identity tag")
    .action(async (platformCode: PlatformCode, nativeId: string, tag: string) => {
      const ctx = getContext();
      const platform = await ctx.platforms.findByCode(platformCode);
      const updated = platform ? await ctx.accounts.setIdentityTag(platform.id, nativeId, tag) : false;
      if (!updated) {
        console.log(`Account ${platformCode}/${nativeId} not found`);
        process.exitCode = 1;
        return;
      }
      console.log(`Account ${platformCode}/${nativeId} tagged ${tag}`);
    });

  accountsCmd
    .command("delete")
    .argument("<id>", "Account id", parseIntArg)
    .option("--delete-records", "Also delete the account's snapshots", false)
    .action(async (id: number, options: { deleteRecords: boolean }) => {
      const deleted = await getContext().deleteService.deleteAccount(id, options.deleteRecords);
      if (!deleted) {
        console.log(`Account ${id} not found`);
        process.exitCode = 1;
        return;
      }
      console.log(options.deleteRecords ? `Account ${id} and its snapshots deleted` : `Account ${id} deleted`);
    });
};
