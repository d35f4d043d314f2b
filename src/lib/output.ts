import chalk from "chalk";
import type { Command } from "commander";
import ora, { type Ora } from "ora";
import { type FailureResult, settle } from "./result";

export interface OutputOptions {
  json?: boolean;
}

export function withJsonOption(command: Command): Command {
  return command.option("--json", "Print the structured result as JSON");
}

/**
 * Runs `operation`, prints its result (JSON or through `render`) and sets the
 * exit code from the success flag.
 */
export async function respond<T extends object>(
  options: OutputOptions,
  operation: () => Promise<T>,
  render: (payload: T) => void
): Promise<void> {
  const result = await settle(operation);
  if (options.json) {
    console.log(JSON.stringify(result));
  } else if (result.success) {
    render(result);
  } else {
    console.error(chalk.red(renderFailure(result)));
  }
  process.exitCode = result.success ? 0 : 1;
}

export function renderFailure(result: FailureResult): string {
  const lines = [result.error];
  const runningLabs = result.runningLabs;
  if (Array.isArray(runningLabs) && runningLabs.length > 0) {
    lines.push(`Running labs: ${runningLabs.join(", ")}`);
  }
  if (typeof result.available === "string" && result.available) {
    lines.push(`Available: ${result.available}`);
  }
  if (typeof result.hint === "string") {
    lines.push(`Hint: ${result.hint}`);
  }
  return lines.join("\n");
}

/** Shows a spinner on stderr while a slow step runs, when a human is watching. */
export async function withSpinner<T>(options: OutputOptions, text: string, step: () => Promise<T>): Promise<T> {
  const spinner: Ora | undefined = options.json || !process.stderr.isTTY ? undefined : ora(text).start();
  try {
    const value = await step();
    spinner?.stop();
    return value;
  } catch (error) {
    spinner?.fail(`${text.replace(/\.+$/, "")} failed.`);
    throw error;
  }
}
