import type { Command } from "commander";
import type { ContextProvider } from "../context";

export const commands = (program: Command, getContext: ContextProvider) => {
  const dbCmd = program.command("db");

  dbCmd
    .command("migrate")
    .description("Create or upgrade both database files")
    .action(() => {
      // Building the context runs the migrations.
      getContext().logger.info("Database migrations applied");
    });
};
