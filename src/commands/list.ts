import { Command } from "commander";
import { getCommandContext } from "../lib/command-context";
import { type OutputOptions, respond, withJsonOption } from "../lib/output";
import { renderTable } from "../lib/table";

export function registerListCommand(program: Command): void {
  withJsonOption(
    program
      .command("list")
      .alias("ls")
      .description("List the lab types that can be created")
  ).action(async (options: OutputOptions) => {
    await respond(
      options,
      async () => {
        const { controller } = await getCommandContext();
        const labs = controller.list().map((lab) => ({
          id: lab.id,
          name: lab.name,
          category: lab.category,
          difficulty: lab.difficulty,
          port: lab.port,
          description: lab.description
        }));
        return { labs };
      },
      ({ labs }) => {
        const rows = labs.map((lab) => [lab.id, lab.name, lab.category, lab.difficulty, String(lab.port)]);
        console.log(renderTable(["ID", "NAME", "CATEGORY", "DIFFICULTY", "PORT"], rows));
      }
    );
  });
}
