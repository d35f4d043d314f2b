import { Command } from "commander";
import { getCommandContext } from "../lib/command-context";
import { type OutputOptions, respond, withJsonOption } from "../lib/output";
import { renderTable } from "../lib/table";
import { formatHours } from "../lib/utils";

export function registerStatusCommand(program: Command): void {
  withJsonOption(
    program
      .command("status <owner>")
      .description("Show an owner's running labs, checked against the container engine")
  ).action(async (owner: string, options: OutputOptions) => {
    await respond(
      options,
      async () => {
        const { controller } = await getCommandContext({ engine: true });
        return { activeLabs: await controller.status(owner) };
      },
      ({ activeLabs }) => {
        if (activeLabs.length === 0) {
          console.log(`${owner} has no active labs.`);
          return;
        }
        const rows = activeLabs.map((lab) => [
          lab.name,
          lab.labType,
          `${lab.ip}:${lab.port}`,
          formatHours(lab.uptimeHours),
          formatHours(lab.remainingHours)
        ]);
        console.log(renderTable(["NAME", "TYPE", "ADDRESS", "UPTIME", "REMAINING"], rows));
      }
    );
  });
}
