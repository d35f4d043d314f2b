import { RATE_WINDOW_MS } from "./constants";
import { KeyedMutex } from "./lock";
import type { Logger } from "./logger";
import type { JsonStore } from "./store";
import type { RateLimitData, RateLimitEntry, RateLimitThresholds } from "./types";
import type { Clock } from "./utils";

export const SLOW_DOWN_WARNING = "You're sending commands quickly. Please slow down.";

export type RateLimitDecision =
  | { allowed: true; count: number; warning?: string }
  | { allowed: false; waitSeconds: number; reason: "blocked" | "exceeded" };

export interface RateLimiterOptions {
  store: JsonStore<RateLimitData>;
  thresholds: RateLimitThresholds;
  logger: Logger;
  now?: Clock;
  mutex?: KeyedMutex;
}

/**
 * Sliding one-minute window per identity. Crossing `hard` blocks the identity
 * for `blockSeconds`; crossing `warn` attaches a single warning until the rate
 * falls back under `soft`.
 */
export class RateLimiter {
  private readonly now: Clock;
  private readonly mutex: KeyedMutex;

  constructor(private readonly options: RateLimiterOptions) {
    this.now = options.now ?? Date.now;
    this.mutex = options.mutex ?? new KeyedMutex();
  }

  async check(identity: string): Promise<RateLimitDecision> {
    const decision = await this.mutex.run(`identity:${identity}`, () =>
      this.options.store.update((data) => {
        const { entry, decision } = evaluate(data[identity], this.now(), this.options.thresholds);
        data[identity] = entry;
        return decision;
      })
    );

    if (!decision.allowed) {
      const event = decision.reason === "blocked" ? "RATE_LIMIT_BLOCKED" : "RATE_LIMIT_EXCEEDED";
      await this.options.logger.audit(event, { identity, waitSeconds: decision.waitSeconds }, "warn");
    } else if (decision.warning) {
      await this.options.logger.audit("RATE_LIMIT_WARNED", { identity, count: decision.count }, "warn");
    }
    return decision;
  }
}

export function evaluate(
  previous: RateLimitEntry | undefined,
  now: number,
  thresholds: RateLimitThresholds
): { entry: RateLimitEntry; decision: RateLimitDecision } {
  const cutoff = now - RATE_WINDOW_MS;
  const timestamps = (previous?.timestamps ?? []).filter((timestamp) => timestamp > cutoff);
  const entry: RateLimitEntry = {
    timestamps,
    warned: previous?.warned ?? false,
    blockedUntil: previous?.blockedUntil ?? null
  };

  if (entry.blockedUntil !== null && now < entry.blockedUntil) {
    return {
      entry,
      decision: { allowed: false, waitSeconds: Math.ceil((entry.blockedUntil - now) / 1000), reason: "blocked" }
    };
  }

  const count = timestamps.length;
  if (count >= thresholds.hard) {
    entry.blockedUntil = now + thresholds.blockSeconds * 1000;
    entry.warned = false;
    return {
      entry,
      decision: { allowed: false, waitSeconds: thresholds.blockSeconds, reason: "exceeded" }
    };
  }

  entry.timestamps = [...timestamps, now];
  entry.blockedUntil = null;

  let warning: string | undefined;
  if (count >= thresholds.warn && !entry.warned) {
    warning = SLOW_DOWN_WARNING;
    entry.warned = true;
  } else if (count < thresholds.soft) {
    entry.warned = false;
  }

  return {
    entry,
    decision: warning ? { allowed: true, count: count + 1, warning } : { allowed: true, count: count + 1 }
  };
}
