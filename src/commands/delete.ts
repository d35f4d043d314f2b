import chalk from "chalk";
import { Command } from "commander";
import { getCommandContext } from "../lib/command-context";
import { type OutputOptions, respond, withJsonOption, withSpinner } from "../lib/output";

export function registerDeleteCommand(program: Command): void {
  withJsonOption(
    program
      .command("delete <owner> <target>")
      .description("Stop if needed, then remove an owner's lab and its registry entry")
  ).action(async (owner: string, target: string, options: OutputOptions) => {
    await respond(
      options,
      async () => {
        const { controller } = await getCommandContext({ engine: true });
        return await withSpinner(options, `Deleting ${target}...`, () => controller.delete(owner, target));
      },
      (lab) => {
        console.log(chalk.green(`Deleted ${lab.name}.`));
      }
    );
  });
}
