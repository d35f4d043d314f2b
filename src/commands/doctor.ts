import chalk from "chalk";
import { Command } from "commander";
import { loadConfig } from "../lib/config";
import { CLI_NAME } from "../lib/constants";
import { CliError } from "../lib/errors";
import { type OutputOptions, withJsonOption } from "../lib/output";
import { runPreflight } from "../lib/preflight";

export function registerDoctorCommand(program: Command): void {
  withJsonOption(
    program
      .command("doctor")
      .description("Run prerequisite checks for the lab host")
  ).action(async (options: OutputOptions) => {
    const report = await runPreflight(loadConfig());

    if (options.json) {
      console.log(JSON.stringify({ success: report.ok, ...report }));
      process.exitCode = report.ok ? 0 : 1;
      return;
    }

    const suggestedCommands = new Set<string>();
    for (const check of report.checks) {
      const symbol = check.ok ? chalk.green("✔") : chalk.red("✖");
      console.log(`${symbol} ${check.message}`);
      if (!check.ok && check.fix) {
        console.log(`  fix: ${check.fix}`);
      }
      if (!check.ok && check.suggestedCommands && check.suggestedCommands.length > 0) {
        for (const command of check.suggestedCommands) {
          console.log(`  please run: ${chalk.bold(command)}`);
          suggestedCommands.add(command);
        }
      }
    }

    if (!report.ok) {
      if (suggestedCommands.size > 0) {
        console.log("");
        console.log(chalk.yellow(`Action required: run the command(s) above, then re-run \`${CLI_NAME} doctor\`.`));
      }
      throw new CliError({ kind: "dependency", message: "Preflight failed." });
    }
  });
}
