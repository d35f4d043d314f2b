import chalk from "chalk";
import { Command } from "commander";
import { getCommandContext } from "../lib/command-context";
import { type OutputOptions, respond, withJsonOption, withSpinner } from "../lib/output";

export function registerCreateCommand(program: Command): void {
  withJsonOption(
    program
      .command("create <owner> <labType>")
      .description("Start a new lab instance for an owner")
  ).action(async (owner: string, labType: string, options: OutputOptions) => {
    await respond(
      options,
      async () => {
        const { controller } = await getCommandContext({ engine: true });
        return await withSpinner(options, `Starting ${labType} lab for ${owner}...`, () => controller.create(owner, labType));
      },
      (lab) => {
        console.log(chalk.green(`Started ${lab.name}`));
        console.log(`  IP: ${lab.ip}`);
        console.log(`  Access: ${chalk.bold(lab.url)}`);
        console.log(`  Auto-cleanup in ${lab.ttlHours} hours`);
      }
    );
  });
}
