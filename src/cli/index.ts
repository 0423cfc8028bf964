#!/usr/bin/env node
import { Command } from "commander";
import { lazyContext } from "./context";
import { commands as platformsCommands } from "./commands/platforms";
import { commands as accountsCommands } from "./commands/accounts";
import { commands as snapshotsCommands } from "./commands/snapshots";
import { commands as tasksCommands } from "./commands/tasks";
import { commands as credentialsCommands } from "./commands/credentials";
import { commands as schedulerCommands } from "./commands/scheduler";
import { commands as dbCommands } from "./commands/db";

export function buildProgram(): Command {
  const program = new Command();
  const getContext = lazyContext();

  program
    .name("follower-tracker")
    .description("Track follower counts on Weibo, Xiaohongshu and Douyin")
    .version("0.1.0");

  platformsCommands(program, getContext);
  accountsCommands(program, getContext);
  snapshotsCommands(program, getContext);
  tasksCommands(program, getContext);
  credentialsCommands(program, getContext);
  schedulerCommands(program, getContext);
  dbCommands(program, getContext);

  return program;
}

if (require.main === module) {
  buildProgram()
    .parseAsync()
    .catch((error: unknown) => {
      console.error(error instanceof Error ? error.message : error);
      process.exitCode = 1;
    });
}
