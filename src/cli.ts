#!/usr/bin/env node
import chalk from "chalk";
import { Command } from "commander";
import { registerAccessCommands } from "./commands/access";
import { registerCleanupCommand } from "./commands/cleanup";
import { registerCreateCommand } from "./commands/create";
import { registerDeleteCommand } from "./commands/delete";
import { registerDoctorCommand } from "./commands/doctor";
import { registerForceCleanupCommand } from "./commands/force-cleanup";
import { registerGuardCommands } from "./commands/guard";
import { registerListCommand } from "./commands/list";
import { registerRequestCommand } from "./commands/request";
import { registerStatsCommand } from "./commands/stats";
import { registerStatusCommand } from "./commands/status";
import { registerStopCommand } from "./commands/stop";
import { CLI_NAME } from "./lib/constants";
import { renderCliError, toCliError } from "./lib/errors";
import { readPackageMeta } from "./lib/package";

const pkg = readPackageMeta();
const program = new Command();
const normalizedArgv = process.argv.map((arg) => (arg === "-v" ? "--version" : arg));

program
  .name(CLI_NAME)
  .description("Per-user lab container manager for a shared Docker host")
  .version(pkg.version ?? "0.0.0", "--version", "output the version number");

registerDoctorCommand(program);
registerListCommand(program);
registerCreateCommand(program);
registerStatusCommand(program);
registerStopCommand(program);
registerDeleteCommand(program);
registerForceCleanupCommand(program);
registerCleanupCommand(program);
registerStatsCommand(program);
registerAccessCommands(program);
registerGuardCommands(program);
registerRequestCommand(program);

program.parseAsync(normalizedArgv).catch((error: unknown) => {
  const cliError = toCliError(error);
  console.error(chalk.red(renderCliError(cliError)));
  process.exitCode = cliError.exitCode;
});
