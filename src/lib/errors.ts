import { CommandError, CommandTimeoutError } from "./exec";

export type CliErrorKind =
  | "validation"
  | "permission"
  | "quota"
  | "not_found"
  | "rate_limited"
  | "runtime"
  | "timeout"
  | "persistence"
  | "dependency";

interface CliErrorOptions {
  kind: CliErrorKind;
  message: string;
  hint?: string;
  detail?: string;
  data?: Record<string, unknown>;
  exitCode?: number;
}

export class CliError extends Error {
  readonly kind: CliErrorKind;
  readonly hint?: string;
  readonly detail?: string;
  readonly data?: Record<string, unknown>;
  readonly exitCode: number;

  constructor(options: CliErrorOptions) {
    super(options.message);
    this.name = "CliError";
    this.kind = options.kind;
    this.hint = options.hint;
    this.detail = options.detail;
    this.data = options.data;
    this.exitCode = options.exitCode ?? 1;
  }
}

export function toCliError(error: unknown): CliError {
  if (error instanceof CliError) {
    return error;
  }

  if (error instanceof CommandTimeoutError) {
    return new CliError({
      kind: "timeout",
      message: error.message
    });
  }

  if (error instanceof CommandError) {
    const detail = [error.stdout, error.stderr].filter(Boolean).join("\n");
    return new CliError({
      kind: "runtime",
      message: error.message,
      detail: detail || undefined
    });
  }

  if (error instanceof Error) {
    return new CliError({
      kind: "runtime",
      message: error.message
    });
  }

  return new CliError({
    kind: "runtime",
    message: String(error)
  });
}

export function renderCliError(error: CliError): string {
  const lines = [error.message];
  if (error.hint) {
    lines.push(`Hint: ${error.hint}`);
  }
  if (error.detail) {
    lines.push(error.detail);
  }
  return lines.join("\n");
}

export function notFound(message: string, data?: Record<string, unknown>): CliError {
  return new CliError({ kind: "not_found", message, data });
}

export function describeError(error: unknown): string {
  if (error instanceof CommandError) {
    return [error.message, error.stderr].filter(Boolean).join(": ");
  }
  return error instanceof Error ? error.message : String(error);
}
