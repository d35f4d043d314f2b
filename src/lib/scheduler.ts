import { describeError } from "./errors";
import type { CleanupReport } from "./lifecycle";
import type { Logger } from "./logger";
import { sleep } from "./utils";

export interface CleanupLoopOptions {
  sweep: () => Promise<CleanupReport>;
  intervalMs: number;
  logger: Logger;
  signal?: AbortSignal;
  onSweep?: (report: CleanupReport) => void;
}

/**
 * Calls `sweep` immediately and then every `intervalMs` until `signal` aborts.
 * A failing sweep is logged and the loop keeps going. Resolves with the number
 * of sweeps attempted.
 */
export async function runCleanupLoop(options: CleanupLoopOptions): Promise<number> {
  let sweeps = 0;
  while (!options.signal?.aborted) {
    sweeps += 1;
    try {
      const report = await options.sweep();
      options.onSweep?.(report);
    } catch (error) {
      await options.logger.error("CLEANUP_SWEEP_FAILED", { sweep: sweeps, reason: describeError(error) });
    }
    await sleep(options.intervalMs, options.signal);
  }
  return sweeps;
}
