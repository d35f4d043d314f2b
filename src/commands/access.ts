import chalk from "chalk";
import { Command } from "commander";
import { getCommandContext } from "../lib/command-context";
import { type OutputOptions, respond, withJsonOption } from "../lib/output";
import { parseCsv } from "../lib/utils";

interface CheckAccessOptions extends OutputOptions {
  roles?: string;
}

interface VerifyOptions extends OutputOptions {
  by?: string;
}

export function registerAccessCommands(program: Command): void {
  withJsonOption(
    program
      .command("check-access <identity> <numericId>")
      .description("Decide whether a requester may use the labs")
      .option("--roles <roles>", "Comma-separated roles the requester holds", "")
  ).action(async (identity: string, numericId: string, options: CheckAccessOptions) => {
    await respond(
      options,
      async () => {
        const { access } = await getCommandContext();
        return await access.check(identity, numericId, parseCsv(options.roles));
      },
      (decision) => {
        if (decision.allowed) {
          console.log(chalk.green(`${identity} is allowed (${decision.via}${decision.admin ? ", admin" : ""}).`));
        } else {
          console.log(chalk.yellow(decision.message));
        }
      }
    );
  });

  withJsonOption(
    program
      .command("verify <identity> <numericId>")
      .description("Record a requester as a verified member")
      .option("--by <granter>", "Who granted the verification")
  ).action(async (identity: string, numericId: string, options: VerifyOptions) => {
    await respond(
      options,
      async () => {
        const { access } = await getCommandContext();
        return { member: await access.verify(identity, numericId, options.by) };
      },
      ({ member }) => {
        console.log(chalk.green(`Verified ${member.identity} at ${member.verifiedAt}.`));
      }
    );
  });
}
