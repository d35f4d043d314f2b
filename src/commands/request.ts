import chalk from "chalk";
import { Command } from "commander";
import { getCommandContext } from "../lib/command-context";
import { type OutputOptions, respond, withJsonOption } from "../lib/output";
import { REQUEST_ACTIONS, handleRequest } from "../lib/requests";
import { parseCsv } from "../lib/utils";

interface RequestOptions extends OutputOptions {
  roles?: string;
}

export function registerRequestCommand(program: Command): void {
  withJsonOption(
    program
      .command("request <identity> <numericId> <action> [labType]")
      .description(`Admit a requester, then run an action for them (${REQUEST_ACTIONS.join(", ")})`)
      .option("--roles <roles>", "Comma-separated roles the requester holds", "")
  ).action(async (identity: string, numericId: string, action: string, labType: string | undefined, options: RequestOptions) => {
    await respond(
      options,
      async () => {
        const context = await getCommandContext({ engine: action !== "list" });
        return await handleRequest(context, {
          identity,
          numericId,
          roles: parseCsv(options.roles),
          action,
          labType
        });
      },
      (result) => {
        if (typeof result.warning === "string") {
          console.error(chalk.yellow(result.warning));
        }
        const { success: _success, warning: _warning, ...payload } = result;
        console.log(JSON.stringify(payload, null, 2));
      }
    );
  });
}
