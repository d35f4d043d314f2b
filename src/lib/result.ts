import { type CliErrorKind, toCliError } from "./errors";

export type SuccessResult<T extends object> = { success: true } & T;

export interface FailureResult {
  success: false;
  error: string;
  kind: CliErrorKind;
  [key: string]: unknown;
}

export type CommandResult<T extends object> = SuccessResult<T> | FailureResult;

export function ok<T extends object>(payload: T): SuccessResult<T> {
  return { success: true, ...payload };
}

export function fail(error: unknown): FailureResult {
  const cliError = toCliError(error);
  return {
    ...(cliError.data ?? {}),
    success: false,
    error: cliError.message,
    kind: cliError.kind,
    ...(cliError.hint ? { hint: cliError.hint } : {})
  };
}

export async function settle<T extends object>(operation: () => Promise<T>): Promise<CommandResult<T>> {
  try {
    return ok(await operation());
  } catch (error) {
    return fail(error);
  }
}
