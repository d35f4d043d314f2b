import chalk from "chalk";
import { Command } from "commander";
import inquirer from "inquirer";
import { getCommandContext } from "../lib/command-context";
import { CliError } from "../lib/errors";
import { type OutputOptions, respond, withJsonOption, withSpinner } from "../lib/output";

interface ForceCleanupOptions extends OutputOptions {
  yes?: boolean;
}

export function registerForceCleanupCommand(program: Command): void {
  withJsonOption(
    program
      .command("force-cleanup <owner>")
      .description("Stop and remove every lab an owner has, whatever its status")
      .option("-y, --yes", "Skip interactive confirmation")
  ).action(async (owner: string, options: ForceCleanupOptions) => {
    await respond(
      options,
      async () => {
        await confirmForceCleanup(owner, options);
        const { controller } = await getCommandContext({ engine: true });
        return await withSpinner(options, `Removing labs of ${owner}...`, () => controller.forceCleanup(owner));
      },
      ({ removed }) => {
        if (removed.length === 0) {
          console.log(`${owner} has no labs to remove.`);
          return;
        }
        console.log(chalk.green(`Removed ${removed.length} lab(s): ${removed.join(", ")}`));
      }
    );
  });
}

async function confirmForceCleanup(owner: string, options: ForceCleanupOptions): Promise<void> {
  if (options.yes) {
    return;
  }
  if (!process.stdout.isTTY || options.json) {
    throw new CliError({
      kind: "validation",
      message: "Force cleanup needs confirmation. Re-run with --yes in non-interactive mode."
    });
  }

  const answer = await inquirer.prompt<{ proceed: boolean }>([
    {
      type: "confirm",
      name: "proceed",
      message: `Remove every lab owned by '${owner}'?`,
      default: false
    }
  ]);
  if (!answer.proceed) {
    throw new CliError({ kind: "validation", message: "Cancelled." });
  }
}
