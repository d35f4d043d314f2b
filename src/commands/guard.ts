import chalk from "chalk";
import { Command } from "commander";
import { getCommandContext } from "../lib/command-context";
import { type OutputOptions, respond, withJsonOption } from "../lib/output";

export function registerGuardCommands(program: Command): void {
  withJsonOption(
    program
      .command("sanitize <input>")
      .description("Check free-text input against the blocked patterns")
      .option("--identity <identity>", "Requester to record in the audit log")
  ).action(async (input: string, options: OutputOptions & { identity?: string }) => {
    await respond(
      options,
      async () => {
        const { admission } = await getCommandContext();
        return { cleaned: await admission.sanitize(input, options.identity) };
      },
      ({ cleaned }) => {
        console.log(cleaned);
      }
    );
  });

  withJsonOption(
    program
      .command("rate-limit <identity>")
      .description("Record one request for an identity and report the rate-limit decision")
  ).action(async (identity: string, options: OutputOptions) => {
    await respond(
      options,
      async () => {
        const { rateLimiter } = await getCommandContext();
        return await rateLimiter.check(identity);
      },
      (decision) => {
        if (!decision.allowed) {
          console.log(chalk.red(`Rate limit exceeded. Try again in ${decision.waitSeconds} seconds.`));
          return;
        }
        console.log(`Allowed (${decision.count} in the last minute).`);
        if (decision.warning) {
          console.log(chalk.yellow(decision.warning));
        }
      }
    );
  });
}
