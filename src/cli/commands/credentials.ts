import type { Command } from "commander";
import type { ContextProvider } from "../context";
import { formatTime, parsePlatformArg } from "../args";
import type { PlatformCode } from "../../domain/models";

export const commands = (program: Command, getContext: ContextProvider) => {
  const credentialsCmd = program.command("credentials").description("Stored platform cookies");

  credentialsCmd
    .command("save")
    .argument("<platform>", "Platform code", parsePlatformArg)
    .argument("<token>", "Cookie header value")
    .action(async (platform: PlatformCode, token: string) => {
      const saved = await getContext().credentials.save(platform, token);
      if (!saved) {
        console.log(`Credential for ${platform} was not saved`);
        process.exitCode = 1;
        return;
      }
      console.log(`Credential for ${platform} saved`);
    });

  credentialsCmd
    .command("get")
    .argument("<platform>", "Platform code", parsePlatformArg)
    .action(async (platform: PlatformCode) => {
      const token = await getContext().credentials.get(platform);
      console.log(token ?? `No credential stored for ${platform}`);
    });

  credentialsCmd
    .command("delete")
    .argument("<platform>", "Platform code", parsePlatformArg)
    .action(async (platform: PlatformCode) => {
      const deleted = await getContext().credentials.delete(platform);
      console.log(deleted ? `Credential for ${platform} deleted` : `No credential stored for ${platform}`);
    });

  credentialsCmd
    .command("list")
    .action(async () => {
      const stored = await getContext().credentials.list();
      for (const entry of stored) {
        console.log(`  ${entry.platform} saved ${formatTime(entry.updatedAt)}`);
      }
    });
};
