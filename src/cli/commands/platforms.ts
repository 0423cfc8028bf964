import type { Command } from "commander";
import type { ContextProvider } from "../context";

export const commands = (program: Command, getContext: ContextProvider) => {
  const platformsCmd = program.command("platforms").description("Tracked platforms");

  platformsCmd
    .command("list")
    .description("List platforms")
    .action(async () => {
      const platforms = await getContext().platforms.listAll();
      for (const platform of platforms) {
        console.log(`  [${platform.id}] ${platform.code} - ${platform.name}`);
      }
    });
};
