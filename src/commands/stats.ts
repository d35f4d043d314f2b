import chalk from "chalk";
import { Command } from "commander";
import { getCommandContext } from "../lib/command-context";
import { CliError } from "../lib/errors";
import type { ServerStats } from "../lib/lifecycle";
import { type OutputOptions, respond, withJsonOption } from "../lib/output";
import { sleep } from "../lib/utils";

interface StatsOptions extends OutputOptions {
  watch?: boolean;
  interval?: string;
}

export function registerStatsCommand(program: Command): void {
  withJsonOption(
    program
      .command("stats")
      .description("Show active lab count and host resource usage")
      .option("-w, --watch", "Live update in terminal")
      .option("--interval <seconds>", "Refresh interval in seconds", "5")
  ).action(async (options: StatsOptions) => {
    const intervalSeconds = parseIntervalSeconds(options.interval);
    const watch = Boolean(options.watch) && !options.json && process.stdout.isTTY;
    const context = await getCommandContext({ engine: true });

    if (watch) {
      console.log(chalk.dim("Live mode enabled. Press Ctrl+C to stop."));
    }

    do {
      if (watch) {
        process.stdout.write("\x1Bc");
      }
      await respond(options, () => context.controller.serverStats(), (stats) => renderStats(stats, watch));
      if (!watch) {
        return;
      }
      await sleep(intervalSeconds * 1000);
    } while (true);
  });
}

function renderStats(stats: ServerStats, watch: boolean): void {
  const ratio = stats.activeLabs / stats.maxLabs;
  const count = `${stats.activeLabs}/${stats.maxLabs}`;
  const colored = ratio >= 1 ? chalk.red(count) : ratio >= 0.8 ? chalk.yellow(count) : chalk.green(count);

  console.log(chalk.bold("lab server"));
  console.log(`updated: ${new Date().toLocaleTimeString()}`);
  console.log(`active labs: ${colored}`);
  console.log(`disk: ${stats.disk}`);
  console.log(`cpu cores: ${stats.cpuCores}`);
  console.log(`memory: ${stats.memory}`);
  console.log(`gpu: ${stats.gpu}`);

  if (watch) {
    console.log("");
    console.log(chalk.dim("Refreshing... Ctrl+C to stop."));
  }
}

function parseIntervalSeconds(input?: string): number {
  if (!input) {
    return 5;
  }
  const seconds = Number(input);
  if (!Number.isFinite(seconds) || seconds <= 0) {
    throw new CliError({ kind: "validation", message: "--interval must be a positive number." });
  }
  return seconds;
}
