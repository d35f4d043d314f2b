import chalk from "chalk";
import { Command } from "commander";
import { getCommandContext } from "../lib/command-context";
import { CliError } from "../lib/errors";
import type { CleanupReport } from "../lib/lifecycle";
import { type OutputOptions, respond, withJsonOption } from "../lib/output";
import { runCleanupLoop } from "../lib/scheduler";

interface CleanupOptions extends OutputOptions {
  every?: string;
}

export function registerCleanupCommand(program: Command): void {
  withJsonOption(
    program
      .command("cleanup")
      .description("Expire labs past their time-to-live and purge entries whose container is gone")
      .option("--every <minutes>", "Keep running and sweep on this interval")
  ).action(async (options: CleanupOptions) => {
    if (options.every === undefined) {
      await respond(
        options,
        async () => {
          const { controller } = await getCommandContext({ engine: true });
          return await controller.autoCleanup();
        },
        renderReport
      );
      return;
    }

    const intervalMs = parseIntervalMinutes(options.every) * 60_000;
    const { controller, logger } = await getCommandContext({ engine: true });
    const abort = new AbortController();
    process.once("SIGINT", () => abort.abort());
    process.once("SIGTERM", () => abort.abort());

    if (!options.json) {
      console.log(chalk.dim(`Sweeping every ${options.every} minute(s). Press Ctrl+C to stop.`));
    }
    await runCleanupLoop({
      sweep: () => controller.autoCleanup(),
      intervalMs,
      logger,
      signal: abort.signal,
      onSweep: (report) => (options.json ? console.log(JSON.stringify({ success: true, ...report })) : renderReport(report))
    });
  });
}

function renderReport(report: CleanupReport): void {
  if (report.cleaned.length === 0 && report.purged.length === 0) {
    console.log(chalk.dim(`[${new Date().toISOString()}] Nothing to clean.`));
    return;
  }
  for (const lab of report.cleaned) {
    console.log(`Expired ${lab.name} (owner ${lab.owner}, up ${lab.uptimeHours}h)`);
  }
  if (report.purged.length > 0) {
    console.log(`Purged stale entries: ${report.purged.join(", ")}`);
  }
}

export function parseIntervalMinutes(input: string): number {
  const numeric = Number(input.trim());
  if (!Number.isFinite(numeric) || numeric <= 0) {
    throw new CliError({ kind: "validation", message: "--every must be a positive number of minutes." });
  }
  return numeric;
}
