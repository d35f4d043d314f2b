import chalk from "chalk";
import { Command } from "commander";
import { getCommandContext } from "../lib/command-context";
import { type OutputOptions, respond, withJsonOption, withSpinner } from "../lib/output";

export function registerStopCommand(program: Command): void {
  withJsonOption(
    program
      .command("stop <owner> <target>")
      .description("Stop an owner's running lab, by lab type or instance name")
  ).action(async (owner: string, target: string, options: OutputOptions) => {
    await respond(
      options,
      async () => {
        const { controller } = await getCommandContext({ engine: true });
        return await withSpinner(options, `Stopping ${target}...`, () => controller.stop(owner, target));
      },
      (lab) => {
        console.log(chalk.green(`Stopped ${lab.name}.`));
        console.log(`Remove it with ${chalk.bold(`labkeeper delete ${owner} ${lab.name}`)}.`);
      }
    );
  });
}
